import { JOB_ANALYSIS_SCHEMA_VERSION } from "../../versioning/versions"

export function buildAnalyzeJobSystemPrompt(): string {
  return [
    "You are a job posting analysis engine for a resume builder.",
    "Extract structured requirements from the job description into JSON that matches the provided schema EXACTLY.",
    "",
    "Rules:",
    "- Only list skills, requirements and responsibilities that appear in the text. Do NOT invent any.",
    "- required_skills: skills the posting marks as required or must-have.",
    "- preferred_skills: skills marked preferred, nice to have, bonus or a plus.",
    "- hard_requirements: non-negotiable conditions (degrees, years, licenses, clearances).",
    "- soft_requirements: desirable traits and interpersonal qualities.",
    "- keywords: the important domain terms an applicant tracking system would look for.",
    "- experience_level: one of entry, mid, senior, executive; use unknown if the text does not say.",
    "- education_requirements: the degree requirement sentences, verbatim where possible.",
    "- industry: a short lowercase label such as technology, finance, healthcare, education or general.",
    "- Output MUST be valid JSON matching the schema. No extra keys, no commentary."
  ].join("\n")
}

export function buildAnalyzeJobUserPrompt(jobDescription: string, promptVersion: string): string {
  return [
    `Schema version: ${JOB_ANALYSIS_SCHEMA_VERSION}`,
    `Prompt version: ${promptVersion}`,
    "",
    "Job description (verbatim):",
    "-----",
    jobDescription,
    "-----",
    "",
    "Return only the JSON object."
  ].join("\n")
}
