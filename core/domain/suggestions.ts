// core/domain/suggestions.ts
import type { ResumeRecord } from "./resume";
import { SKILL_VOCABULARY } from "./job_analysis";

export type ContentType = "skills" | "keywords";

const GENERAL_SKILLS = ["Communication", "Problem Solving", "Time Management", "Teamwork", "Leadership", "Adaptability"];

// Checked in order; the first role family with a matching term wins.
const ROLE_SKILL_FAMILIES: ReadonlyArray<[readonly string[], readonly string[]]> = [
  [["developer", "engineer", "programmer", "technical"], SKILL_VOCABULARY.technical],
  [["manager", "analyst", "coordinator", "business"], SKILL_VOCABULARY.business],
  [["designer", "creative", "marketing", "content"], SKILL_VOCABULARY.creative],
];

const ROLE_KEYWORDS: ReadonlyArray<[string, readonly string[]]> = [
  ["manager", ["leadership", "team management", "strategic planning", "budget management"]],
  ["analyst", ["data analysis", "reporting", "research", "insights"]],
  ["developer", ["software development", "coding", "debugging", "testing"]],
];

const GENERAL_KEYWORDS = ["collaboration", "innovation", "efficiency", "quality assurance"];

const BASE_QUESTIONS = [
  "Tell me about yourself and your background.",
  "What interests you most about this position?",
  "Describe your greatest professional achievement.",
  "How do you handle challenging situations at work?",
  "Where do you see yourself in 5 years?",
];

/** Skills or ATS keywords worth considering for a role title. */
export function suggestResumeContent(jobRole: string, contentType: ContentType): string[] {
  const role = String(jobRole || "").toLowerCase();

  if (contentType === "skills") {
    const family = ROLE_SKILL_FAMILIES.find(([terms]) => terms.some((t) => role.includes(t)));
    return family ? family[1].slice(0, 6) : [...GENERAL_SKILLS];
  }

  const specific = ROLE_KEYWORDS.find(([term]) => role.includes(term));
  return [...(specific ? specific[1] : []), ...GENERAL_KEYWORDS].slice(0, 10);
}

/** Interview questions built from the resume's own skills and most recent role. At most eight. */
export function generateInterviewQuestions(resume: ResumeRecord): string[] {
  const questions = [...BASE_QUESTIONS];
  const [first, second] = resume.skills;

  if (first) {
    questions.push(
      `How would you rate your expertise in ${first}?`,
      `Can you give an example of how you've used ${second ?? first} in a project?`
    );
  }

  if (resume.experience.length) {
    const recent = resume.experience[0].job_title || "your recent role";
    questions.push(`What were your main responsibilities as ${recent}?`);
  }

  return questions.slice(0, 8);
}
