import type { LLMAdapter } from "../../core/llm/adapter"
import { normalizeResumeRecord, type ResumeRecord } from "../../core/domain/resume"
import type { MatchReport } from "../../core/domain/report"
import type { MatchBand } from "../../core/domain/scoring"
import { errorMessage } from "../../core/domain/outcome"
import { mapWithConcurrency, withTimeout } from "../lib/async"
import { logInfo, logWarn } from "../lib/log"
import { runJobMatch } from "./run_match_pipeline"

export type JobPosting = {
  id: string
  title: string
  description: string
}

export type JobInsightItem = {
  id: string
  title: string
  overall_score: number
  match_band: MatchBand | null
  ats_score: number
  missing_skills: string[]
  report: MatchReport | null       // null when the item failed or timed out
  error: string | null
}

export type CountedTerm = { term: string; count: number }

export type JobMatchInsights = {
  items: JobInsightItem[]          // best match first
  summary: {
    jobs_requested: number
    jobs_analyzed: number
    jobs_failed: number
    jobs_truncated: number
    average_score: number
    best_match_id: string | null
    common_missing_skills: CountedTerm[]
    common_matching_keywords: CountedTerm[]
    invalid_resume_fields: string[]
  }
}

function countAcross(lists: string[][], limit = 10): CountedTerm[] {
  const counts = new Map<string, { term: string; count: number }>()
  for (const list of lists) {
    const seen = new Set<string>()
    for (const raw of list) {
      const k = raw.trim().toLowerCase()
      if (!k || seen.has(k)) continue
      seen.add(k)
      const c = counts.get(k)
      if (c) c.count++
      else counts.set(k, { term: raw.trim(), count: 1 })
    }
  }
  return [...counts.values()].sort((a, b) => b.count - a.count).slice(0, limit)
}

function failedItem(job: JobPosting, error: string): JobInsightItem {
  return {
    id: job.id,
    title: job.title,
    overall_score: 0,
    match_band: null,
    ats_score: 0,
    missing_skills: [],
    report: null,
    error,
  }
}

/**
 * One resume against many postings. Each posting runs the full pipeline on its
 * own; a posting that times out or fails becomes a zero-score item and the
 * summary is computed over the postings that completed.
 */
export async function runJobMatchInsights(args: {
  resume: ResumeRecord
  jobs: JobPosting[]
  llm?: LLMAdapter | null
  llmTimeoutMs?: number
  concurrency?: number
  itemTimeoutMs?: number
  maxJobs?: number
  now?: Date
  requestId?: string
}): Promise<JobMatchInsights> {
  const checked = normalizeResumeRecord(args.resume)
  const maxJobs = args.maxJobs ?? 20
  const jobs = args.jobs.slice(0, maxJobs)
  const itemTimeoutMs = args.itemTimeoutMs ?? 60000

  const items = await mapWithConcurrency(jobs, args.concurrency ?? 4, async (job) => {
    try {
      const report = await withTimeout(
        runJobMatch({
          resume: checked.resume,
          jobDescription: job.description,
          llm: args.llm,
          llmTimeoutMs: args.llmTimeoutMs,
          now: args.now,
          requestId: args.requestId,
        }),
        itemTimeoutMs,
        "JOB_MATCH_TIMEOUT"
      )
      const item: JobInsightItem = {
        id: job.id,
        title: job.title,
        overall_score: report.overall_score,
        match_band: report.match_band,
        ats_score: report.ats_score,
        missing_skills: report.missing_skills,
        report,
        error: null,
      }
      return item
    } catch (err: unknown) {
      const msg = errorMessage(err)
      logWarn("insights_item_failed", { requestId: args.requestId, jobId: job.id, err: msg })
      return failedItem(job, msg)
    }
  })

  const completed = items.filter((i) => i.report !== null)
  const sorted = [...items].sort((a, b) => b.overall_score - a.overall_score)
  const average = completed.length
    ? completed.reduce((s, i) => s + i.overall_score, 0) / completed.length
    : 0

  const best = completed.length ? sorted.find((i) => i.report !== null) ?? null : null

  const insights: JobMatchInsights = {
    items: sorted,
    summary: {
      jobs_requested: args.jobs.length,
      jobs_analyzed: completed.length,
      jobs_failed: items.length - completed.length,
      jobs_truncated: args.jobs.length - jobs.length,
      average_score: average,
      best_match_id: best ? best.id : null,
      common_missing_skills: countAcross(completed.map((i) => i.missing_skills)),
      common_matching_keywords: countAcross(completed.map((i) => (i.report ? i.report.matching_keywords : []))),
      invalid_resume_fields: checked.invalid_fields,
    },
  }

  logInfo("insights_done", {
    requestId: args.requestId,
    jobs: items.length,
    failed: insights.summary.jobs_failed,
    averageScore: average,
  })

  return insights
}
