import type { LLMAdapter } from "../../core/llm/adapter"
import {
  analyzeJobDescriptionRules,
  emptyJobAnalysis,
  withDeterministicFields,
  type JobAnalysis,
} from "../../core/domain/job_analysis"
import { errorMessage, fail, succeed, type Outcome } from "../../core/domain/outcome"
import type { StepSource, FallbackRecord } from "../../core/domain/report"
import { JOB_ANALYSIS_SCHEMA_VERSION, PROMPT_ANALYZE_JOB_VERSION } from "../../core/versioning/versions"
import { withTimeout } from "../lib/async"
import { logWarn } from "../lib/log"

export type JobAnalysisRun = {
  analysis: JobAnalysis
  source: StepSource
  fallback: FallbackRecord | null
  modelUsed: string | null
  latencyMs: number | null
}

export async function requestCollaboratorAnalysis(
  llm: LLMAdapter | null | undefined,
  jobDescription: string,
  timeoutMs: number
): Promise<Outcome<{ analysis: JobAnalysis; modelUsed: string; latencyMs: number | null }>> {
  if (!llm) return fail("collaborator_unavailable", "LLM_NOT_CONFIGURED")

  try {
    const out = await withTimeout(
      llm.analyzeJobPosting({
        jobDescription,
        schemaVersion: JOB_ANALYSIS_SCHEMA_VERSION,
        promptVersion: PROMPT_ANALYZE_JOB_VERSION,
      }),
      timeoutMs,
      "LLM_ANALYZE_JOB_TIMEOUT"
    )
    const analysis = withDeterministicFields({ ...out.analysis, ats_keywords: [], word_frequency: [] }, jobDescription)
    return succeed({ analysis, modelUsed: out.modelUsed, latencyMs: out.latencyMs ?? null })
  } catch (err: unknown) {
    return fail("collaborator_unavailable", errorMessage(err))
  }
}

/**
 * Structured analysis of a job description. Prefers the collaborator, falls back
 * to the rule-based extractor; never rejects.
 */
export async function analyzeJob(args: {
  jobDescription: string
  llm?: LLMAdapter | null
  timeoutMs: number
  requestId?: string
}): Promise<JobAnalysisRun> {
  const description = String(args.jobDescription || "")

  if (!description.trim()) {
    return { analysis: emptyJobAnalysis(), source: "rules", fallback: null, modelUsed: null, latencyMs: null }
  }

  if (!args.llm) {
    return { analysis: analyzeJobDescriptionRules(description), source: "rules", fallback: null, modelUsed: null, latencyMs: null }
  }

  const delegated = await requestCollaboratorAnalysis(args.llm, description, args.timeoutMs)
  if (delegated.ok) {
    return {
      analysis: delegated.value.analysis,
      source: "llm",
      fallback: null,
      modelUsed: delegated.value.modelUsed,
      latencyMs: delegated.value.latencyMs,
    }
  }

  logWarn("job_analysis_fallback", { requestId: args.requestId, err: delegated.error })

  return {
    analysis: analyzeJobDescriptionRules(description),
    source: "fallback",
    fallback: { step: "job_analysis", kind: delegated.kind, error: delegated.error },
    modelUsed: null,
    latencyMs: null,
  }
}
