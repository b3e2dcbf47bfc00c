// core/domain/recommendations.ts
import type { ResumeRecord } from "./resume";
import type { AtsResult } from "./ats";

export const DEFAULT_RECOMMENDATIONS: readonly string[] = [
  "Tailor your professional summary to the role you are applying for",
  "Add the required skills from the job description that you genuinely have",
  "Quantify your achievements with numbers, percentages or amounts",
  "Start experience bullet points with strong action verbs",
  "Mirror important keywords from the job posting throughout your resume",
];

export type AtsImprovements = {
  improvements: string[];
  missing_keywords: string[];
};

/** Deterministic optimisation hints; at most five, most impactful first. */
export function suggestAtsImprovements(
  resume: ResumeRecord,
  ats: AtsResult,
  missingKeywords: readonly string[]
): AtsImprovements {
  const out: string[] = [];

  if (ats.action_verbs_found.length < 3) {
    out.push("Add more action verbs to describe your achievements");
  }
  if (ats.quantified_count < 3) {
    out.push("Include more quantifiable achievements with numbers and percentages");
  }
  if (!resume.skills.length) {
    out.push("Add a skills section with relevant keywords");
  }
  if (!resume.summary) {
    out.push("Include a professional summary at the top");
  }
  if (missingKeywords.length) {
    out.push(`Work these job keywords into your resume where accurate: ${missingKeywords.slice(0, 5).join(", ")}`);
  }

  return {
    improvements: out.slice(0, 5),
    missing_keywords: [...missingKeywords],
  };
}
