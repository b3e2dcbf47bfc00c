// core/domain/scoring.ts
import { clamp01 } from "./outcome";

export type ScoreBreakdown = {
  skills: number;
  keywords: number;
  experience: number;
  education: number;
};

// Convex weights; they sum to 1.
export const MATCH_WEIGHTS: Readonly<ScoreBreakdown> = {
  skills: 0.35,
  keywords: 0.25,
  experience: 0.25,
  education: 0.15,
};

export type MatchBand = "strong" | "moderate" | "weak";

export function overallScore(b: ScoreBreakdown): number {
  return clamp01(
    MATCH_WEIGHTS.skills * clamp01(b.skills) +
      MATCH_WEIGHTS.keywords * clamp01(b.keywords) +
      MATCH_WEIGHTS.experience * clamp01(b.experience) +
      MATCH_WEIGHTS.education * clamp01(b.education)
  );
}

export function matchBand(overall: number): MatchBand {
  if (overall >= 0.75) return "strong";
  if (overall >= 0.5) return "moderate";
  return "weak";
}
