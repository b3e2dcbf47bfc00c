import type { LLMAdapter } from "../../core/llm/adapter"
import { recommendationContext } from "../../core/llm/adapter"
import { keywordBag, type JobAnalysis } from "../../core/domain/job_analysis"
import {
  normalizeResumeRecord,
  renderResumeText,
  resumeAchievementText,
  resumeFullText,
  type ResumeRecord,
} from "../../core/domain/resume"
import { matchSkills, type SkillMatchResult } from "../../core/domain/skills"
import { emptyKeywordRelevance, scoreKeywordRelevance, type KeywordRelevance } from "../../core/domain/keywords"
import { matchExperience, type ExperienceMatchResult } from "../../core/domain/experience"
import { matchEducation, type EducationMatchResult } from "../../core/domain/education"
import { scoreAts, type AtsResult } from "../../core/domain/ats"
import { overallScore, matchBand } from "../../core/domain/scoring"
import { DEFAULT_RECOMMENDATIONS, suggestAtsImprovements } from "../../core/domain/recommendations"
import { generateInterviewQuestions } from "../../core/domain/suggestions"
import { errorMessage, fail, succeed, type Outcome } from "../../core/domain/outcome"
import type { FallbackRecord, MatchReport, StepSource } from "../../core/domain/report"
import { ENGINE_VERSION, PROMPT_RECOMMENDATIONS_VERSION } from "../../core/versioning/versions"
import { withTimeout } from "../lib/async"
import { logInfo, logWarn } from "../lib/log"
import { analyzeJob } from "./analyze_job"

export type RunJobMatchArgs = {
  resume: ResumeRecord
  jobDescription: string
  llm?: LLMAdapter | null
  llmTimeoutMs?: number
  now?: Date
  requestId?: string
}

const DEFAULT_LLM_TIMEOUT_MS = 30000

/**
 * Runs one scorer. Scorers are total by construction; an unexpected throw is
 * recorded and replaced with the scorer's failure default so the report still
 * completes.
 */
async function runStep<T>(
  step: string,
  fallbacks: FallbackRecord[],
  fallbackValue: T,
  work: () => Outcome<T> | T
): Promise<T> {
  try {
    const r = work()
    if (isOutcome(r)) {
      if (r.ok) return r.value
      fallbacks.push({ step, kind: r.kind, error: r.error })
      logWarn("scorer_fallback", { step, kind: r.kind, err: r.error })
      return fallbackValue
    }
    return r
  } catch (err: unknown) {
    fallbacks.push({ step, kind: "invalid_input", error: errorMessage(err) })
    logWarn("scorer_fallback", { step, kind: "invalid_input", err: errorMessage(err) })
    return fallbackValue
  }
}

function isOutcome<T>(v: Outcome<T> | T): v is Outcome<T> {
  return typeof v === "object" && v !== null && "ok" in v && typeof v.ok === "boolean"
}

function skillDefault(analysis: JobAnalysis): SkillMatchResult {
  return {
    score: 0,
    required_score: 0,
    preferred_score: 0,
    matched_required: [],
    missing_required: [...analysis.required_skills],
    matched_preferred: [],
    missing_preferred: [...analysis.preferred_skills],
  }
}

function experienceDefault(analysis: JobAnalysis): ExperienceMatchResult {
  return {
    score: 0,
    years_experience: 0,
    level_match: 0,
    industry_relevance: 0,
    required_level: analysis.experience_level,
    band: null,
    entries: [],
    skipped_entries: 0,
  }
}

const EDUCATION_DEFAULT: EducationMatchResult = { score: 0, requirements_met: false, user_level: 0, required_level: 0 }

const ATS_DEFAULT: AtsResult = {
  score: 0,
  breakdown: { keyword_density: 0, content_length: 0, section_completeness: 0, quantifiable_achievements: 0, action_verbs: 0 },
  sections_found: [],
  quantified_count: 0,
  action_verbs_found: [],
  matched_keywords: [],
}

export async function requestRecommendations(args: {
  llm: LLMAdapter | null | undefined
  resume: ResumeRecord
  analysis: JobAnalysis
  missingSkills: string[]
  overall: number
  timeoutMs: number
}): Promise<Outcome<string[]>> {
  const { llm, resume, analysis, missingSkills, overall, timeoutMs } = args
  if (!llm) return fail("collaborator_unavailable", "LLM_NOT_CONFIGURED")

  try {
    const out = await withTimeout(
      llm.generateRecommendations({
        ...recommendationContext(resume, analysis),
        missingSkills,
        overallScore: overall,
        promptVersion: PROMPT_RECOMMENDATIONS_VERSION,
      }),
      timeoutMs,
      "LLM_RECOMMENDATIONS_TIMEOUT"
    )
    if (!out.recommendations.length) return fail("collaborator_unavailable", "LLM_RECOMMENDATIONS_EMPTY")
    return succeed(out.recommendations)
  } catch (err: unknown) {
    return fail("collaborator_unavailable", errorMessage(err))
  }
}

/**
 * Full match of one resume against one job description. Always resolves with a
 * complete report; collaborator failures and bad input degrade individual steps.
 */
export async function runJobMatch(args: RunJobMatchArgs): Promise<MatchReport> {
  const started = Date.now()
  const now = args.now ?? new Date()
  const timeoutMs = args.llmTimeoutMs ?? DEFAULT_LLM_TIMEOUT_MS
  const { llm, requestId } = args
  const fallbacks: FallbackRecord[] = []

  // Library callers may hand over stored JSON; bad fields are emptied, not fatal.
  const checked = normalizeResumeRecord(args.resume)
  const resume = checked.resume
  if (checked.invalid_fields.length) {
    const error = `INVALID_FIELDS: ${checked.invalid_fields.join(", ")}`
    fallbacks.push({ step: "resume", kind: "invalid_input", error })
    logWarn("resume_invalid_fields", { requestId, err: error })
  }

  logInfo("match_start", {
    requestId,
    skills: resume.skills.length,
    experienceEntries: resume.experience.length,
    descriptionChars: String(args.jobDescription || "").length,
    llm: !!llm,
  })

  // 1️⃣ Job analysis (collaborator first, rules as fallback)
  const analysisRun = await analyzeJob({ jobDescription: args.jobDescription, llm, timeoutMs, requestId })
  const analysis = analysisRun.analysis
  if (analysisRun.fallback) fallbacks.push(analysisRun.fallback)

  const fullText = resumeFullText(resume)
  const atsText = renderResumeText(resume)
  const achievementText = resumeAchievementText(resume)
  const bag = keywordBag(analysis)

  // 2️⃣ Independent scorers; no shared mutable state besides the fallback log
  const [skills, keywords, experience, education, ats] = await Promise.all([
    runStep<SkillMatchResult>("skills", fallbacks, skillDefault(analysis), () =>
      matchSkills(resume.skills, analysis.required_skills, analysis.preferred_skills)
    ),
    runStep<KeywordRelevance>("keywords", fallbacks, emptyKeywordRelevance(), () =>
      scoreKeywordRelevance(fullText, bag)
    ),
    runStep<ExperienceMatchResult>("experience", fallbacks, experienceDefault(analysis), () =>
      matchExperience({
        experience: resume.experience,
        requiredLevel: analysis.experience_level,
        industry: analysis.industry,
        resumeText: fullText,
        now,
      })
    ),
    runStep<EducationMatchResult>("education", fallbacks, EDUCATION_DEFAULT, () =>
      matchEducation(resume.education, analysis.education_requirements)
    ),
    runStep<AtsResult>("ats", fallbacks, ATS_DEFAULT, () => scoreAts(atsText, bag, achievementText)),
  ])

  if (experience.skipped_entries > 0) {
    fallbacks.push({
      step: "experience",
      kind: "malformed_input_date",
      error: `SKIPPED_ENTRIES: ${experience.skipped_entries}`,
    })
  }

  // 3️⃣ Aggregate
  const breakdown = {
    skills: skills.score,
    keywords: keywords.score,
    experience: experience.score,
    education: education.score,
  }
  const overall = overallScore(breakdown)
  const missingSkills = [...skills.missing_required, ...skills.missing_preferred]

  // 4️⃣ Recommendations (collaborator first, fixed list as fallback)
  const recs = await requestRecommendations({ llm, resume, analysis, missingSkills, overall, timeoutMs })
  let recommendationSource: StepSource = "llm"
  let recommendations: string[]
  if (recs.ok) {
    recommendations = recs.value
  } else {
    recommendations = [...DEFAULT_RECOMMENDATIONS]
    recommendationSource = llm ? "fallback" : "rules"
    if (llm) {
      fallbacks.push({ step: "recommendations", kind: recs.kind, error: recs.error })
      logWarn("recommendations_fallback", { requestId, err: recs.error })
    }
  }

  const improvements = suggestAtsImprovements(resume, ats, keywords.missing_keywords)

  const report: MatchReport = {
    overall_score: overall,
    match_band: matchBand(overall),
    score_breakdown: breakdown,
    ats_score: ats.score,
    ats_breakdown: ats.breakdown,
    ats_improvements: improvements.improvements,
    recommendations,
    interview_questions: generateInterviewQuestions(resume),
    missing_skills: missingSkills,
    matching_keywords: keywords.matching_keywords,
    missing_keywords: keywords.missing_keywords,
    keyword_density: keywords.keyword_density,
    skill_detail: skills,
    experience_detail: experience,
    education_detail: education,
    job_analysis: analysis,
    meta: {
      engine_version: ENGINE_VERSION,
      analysis_source: analysisRun.source,
      recommendation_source: recommendationSource,
      fallbacks,
      llm_model: analysisRun.modelUsed,
      latency_ms: Date.now() - started,
      generated_at: now.toISOString(),
    },
  }

  logInfo("match_done", {
    requestId,
    overallScore: report.overall_score,
    atsScore: report.ats_score,
    analysisSource: report.meta.analysis_source,
    recommendationSource,
    fallbacks: fallbacks.map((f) => f.step),
    latencyMs: report.meta.latency_ms,
  })

  return report
}
