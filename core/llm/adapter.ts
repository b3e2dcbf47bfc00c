import type { JobAnalysis } from "../domain/job_analysis"
import type { ResumeRecord } from "../domain/resume"

export type LLMModel = "gpt-4o-mini" | "gpt-4o" | "gpt-4.1"

export interface LLMUsage {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}

/** Fields the collaborator is asked for. word_frequency and ats_keywords stay local. */
export type CollaboratorJobAnalysis = Omit<JobAnalysis, "word_frequency" | "ats_keywords">

export interface AnalyzeJobPostingInput {
  jobDescription: string
  schemaVersion: "1.0"
  promptVersion: string
}

export interface AnalyzeJobPostingOutput {
  analysis: CollaboratorJobAnalysis
  modelUsed: LLMModel
  usage?: LLMUsage
  latencyMs?: number
}

export interface GenerateRecommendationsInput {
  resumeSummary: string
  resumeSkills: string[]
  requiredSkills: string[]
  missingSkills: string[]
  hardRequirements: string[]
  overallScore: number            // 0..1
  promptVersion: string
}

export interface GenerateRecommendationsOutput {
  recommendations: string[]
  modelUsed: LLMModel
  usage?: LLMUsage
  latencyMs?: number
}

/**
 * Generative-text collaborator. Optional and unreliable by contract:
 * implementations throw on transport, timeout or shape errors and the
 * engine falls back to its deterministic path.
 */
export interface LLMAdapter {
  analyzeJobPosting(input: AnalyzeJobPostingInput): Promise<AnalyzeJobPostingOutput>
  generateRecommendations(input: GenerateRecommendationsInput): Promise<GenerateRecommendationsOutput>
}

export function recommendationContext(resume: ResumeRecord, analysis: JobAnalysis) {
  return {
    resumeSummary: resume.summary,
    resumeSkills: resume.skills.slice(0, 30),
    requiredSkills: analysis.required_skills,
    hardRequirements: analysis.hard_requirements,
  }
}
