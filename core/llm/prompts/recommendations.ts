import type { GenerateRecommendationsInput } from "../adapter"

export function buildRecommendationsSystemPrompt(): string {
  return [
    "You are a resume coach.",
    "Given a candidate's resume summary, their skills, the job requirements and the current match score,",
    "suggest concrete edits that would improve the resume for this job.",
    "",
    "Rules:",
    "- Exactly five recommendations, each one sentence, most impactful first.",
    "- Never suggest claiming skills or experience the candidate does not list.",
    "- Output MUST be a JSON object: {\"recommendations\": [string, ...]}. No commentary."
  ].join("\n")
}

export function buildRecommendationsUserPrompt(input: GenerateRecommendationsInput): string {
  const list = (xs: string[]) => (xs.length ? xs.join(", ") : "(none)")
  return [
    `Prompt version: ${input.promptVersion}`,
    `Current match score: ${Math.round(input.overallScore * 100)}%`,
    "",
    "Resume summary:",
    input.resumeSummary || "(none)",
    "",
    `Resume skills: ${list(input.resumeSkills)}`,
    `Required skills: ${list(input.requiredSkills)}`,
    `Missing skills: ${list(input.missingSkills)}`,
    `Hard requirements: ${list(input.hardRequirements)}`,
    "",
    "Return only the JSON object."
  ].join("\n")
}
