/*
Library entry for the job match engine.

  - Scoring (skills, keywords, experience, education, ATS) is pure and lives in core/domain
  - The generative-text collaborator sits behind LLMAdapter and is always optional
  - Pipelines in src/engine never reject; failures show up in report.meta.fallbacks
*/
import type { LLMAdapter } from "../core/llm/adapter"
import { OpenAIAdapter } from "../infra/openai-adapter"
import type { AppConfig } from "./config"

export { runJobMatch, type RunJobMatchArgs } from "./engine/run_match_pipeline"
export { analyzeJob, type JobAnalysisRun } from "./engine/analyze_job"
export { runJobMatchInsights, type JobPosting, type JobMatchInsights, type JobInsightItem } from "./engine/run_match_insights"
export { loadConfig, type AppConfig } from "./config"

export { resumeRecordSchema, emptyResumeRecord, normalizeResumeRecord, type ResumeRecord, type ExperienceEntry, type EducationEntry } from "../core/domain/resume"
export { type JobAnalysis, type ExperienceLevel } from "../core/domain/job_analysis"
export { type MatchReport } from "../core/domain/report"
export { MATCH_WEIGHTS, type ScoreBreakdown } from "../core/domain/scoring"
export { formatExperienceDuration } from "../core/domain/experience"
export { generateInterviewQuestions, suggestResumeContent, type ContentType } from "../core/domain/suggestions"
export { type LLMAdapter } from "../core/llm/adapter"
export { OpenAIAdapter } from "../infra/openai-adapter"

/** The configured collaborator, or null when no API key is set (deterministic mode). */
export function createLLMAdapter(config: AppConfig): LLMAdapter | null {
  if (!config.openai.apiKey) return null
  return new OpenAIAdapter({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.model,
    timeoutMs: config.openai.timeoutMs,
    maxAttempts: config.openai.maxAttempts,
  })
}
