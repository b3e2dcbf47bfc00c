import { describe, it, expect } from "vitest"
import { DEFAULT_RECOMMENDATIONS, suggestAtsImprovements } from "../../../core/domain/recommendations"
import { scoreAts } from "../../../core/domain/ats"
import { emptyResumeRecord } from "../../../core/domain/resume"
import { analystResume } from "../../helpers/fixtures"

describe("DEFAULT_RECOMMENDATIONS", () => {
  it("holds five entries", () => {
    expect(DEFAULT_RECOMMENDATIONS).toHaveLength(5)
  })
})

describe("suggestAtsImprovements", () => {
  it("lists every hint for an empty resume and caps at five", () => {
    const missing = ["aws", "docker", "kafka", "spark", "airflow", "terraform"]
    const r = suggestAtsImprovements(emptyResumeRecord(), scoreAts("", []), missing)
    expect(r.improvements).toEqual([
      "Add more action verbs to describe your achievements",
      "Include more quantifiable achievements with numbers and percentages",
      "Add a skills section with relevant keywords",
      "Include a professional summary at the top",
      "Work these job keywords into your resume where accurate: aws, docker, kafka, spark, airflow",
    ])
    expect(r.missing_keywords).toEqual(missing)
  })

  it("skips hints the resume already satisfies", () => {
    const resume = { ...analystResume(), summary: "Analyst" }
    const ats = scoreAts("Developed, managed and led 3 projects, 4 reports, 5 audits", [])
    const r = suggestAtsImprovements(resume, ats, [])
    expect(r.improvements).toEqual([])
  })
})
