// core/domain/report.ts
import type { JobAnalysis } from "./job_analysis";
import type { ScoreBreakdown, MatchBand } from "./scoring";
import type { SkillMatchResult } from "./skills";
import type { ExperienceMatchResult } from "./experience";
import type { EducationMatchResult } from "./education";
import type { AtsBreakdown } from "./ats";
import type { FailureKind } from "./outcome";

export type StepSource = "llm" | "fallback" | "rules";

export type FallbackRecord = {
  step: string;
  kind: FailureKind;
  error: string;
};

export type MatchReport = {
  overall_score: number;
  match_band: MatchBand;
  score_breakdown: ScoreBreakdown;
  ats_score: number;
  ats_breakdown: AtsBreakdown;
  ats_improvements: string[];
  recommendations: string[];
  interview_questions: string[];
  missing_skills: string[];
  matching_keywords: string[];
  missing_keywords: string[];
  keyword_density: number;
  skill_detail: SkillMatchResult;
  experience_detail: ExperienceMatchResult;
  education_detail: EducationMatchResult;
  job_analysis: JobAnalysis;
  meta: {
    engine_version: string;
    analysis_source: StepSource;
    recommendation_source: StepSource;
    fallbacks: FallbackRecord[];
    llm_model: string | null;
    latency_ms: number;
    generated_at: string;
  };
};
