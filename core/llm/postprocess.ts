import type { CollaboratorJobAnalysis } from "./adapter"
import type { RawCollaboratorJobAnalysis } from "./schemas/jobAnalysisSchema"
import { isExperienceLevel } from "../domain/job_analysis"
import { dedupeCaseInsensitive } from "../domain/text"

// Trim, drop blanks and dedupe so collaborator whitespace quirks never reach scoring
const cleanList = (xs: string[], max = 25) => dedupeCaseInsensitive(xs.map(s => s.replace(/\s+/g, " "))).slice(0, max)

export function postProcessJobAnalysis(raw: RawCollaboratorJobAnalysis): CollaboratorJobAnalysis {
  const level = raw.experience_level.trim().toLowerCase()
  const industry = raw.industry.trim().toLowerCase()

  return {
    required_skills: cleanList(raw.required_skills),
    preferred_skills: cleanList(raw.preferred_skills),
    hard_requirements: cleanList(raw.hard_requirements),
    soft_requirements: cleanList(raw.soft_requirements),
    responsibilities: cleanList(raw.responsibilities),
    keywords: cleanList(raw.keywords, 40),
    experience_level: isExperienceLevel(level) ? level : "unknown",
    education_requirements: cleanList(raw.education_requirements, 10),
    industry: industry || "general",
  }
}

export function postProcessRecommendations(xs: string[]): string[] {
  return cleanList(xs, 5)
}
