import type { ResumeRecord } from "../../core/domain/resume"

export const NOW = new Date("2024-03-15T12:00:00Z")

export function analystResume(): ResumeRecord {
  return {
    full_name: "Test User",
    summary: "",
    skills: ["Python", "SQL"],
    experience: [
      {
        job_title: "Data Analyst",
        company: "X",
        location: "",
        start_date: "2020-01",
        end_date: "2023-01",
        is_current: false,
        description: "Led reporting initiatives, increased efficiency 20%",
      },
    ],
    education: [
      {
        degree: "Bachelor",
        field_of_study: "Statistics",
        institution: "Y",
        graduation_date: "2019-06-01",
        gpa: null,
      },
    ],
  }
}

export const ANALYST_JOB = [
  "Data Analyst",
  "We are hiring an analyst to build reports.",
  "Required: Python, SQL and AWS.",
  "Bachelor's degree required.",
].join("\n")
