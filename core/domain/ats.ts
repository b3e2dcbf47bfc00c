// core/domain/ats.ts
import { tokenize, dedupeCaseInsensitive } from "./text";

export const ACTION_VERBS: readonly string[] = [
  "developed", "managed", "led", "implemented", "created", "designed",
  "optimized", "streamlined", "enhanced", "delivered", "coordinated",
  "executed", "supervised", "analyzed", "improved", "established",
  "collaborated", "facilitated", "spearheaded", "achieved", "increased",
];

export const SECTION_WORDS: readonly string[] = ["experience", "education", "skills", "summary"];

export const ATS_WEIGHTS = {
  keywordDensity: 0.3,
  contentLength: 0.2,
  sections: 0.2,
  quantified: 0.15,
  actionVerbs: 0.15,
} as const;

export type AtsBreakdown = {
  keyword_density: number;
  content_length: number;
  section_completeness: number;
  quantifiable_achievements: number;
  action_verbs: number;
};

export type AtsResult = {
  score: number;
  breakdown: AtsBreakdown;
  sections_found: string[];
  quantified_count: number;
  action_verbs_found: string[];
  matched_keywords: string[];
};

/** 1-2 hits earn partial credit, three or more the full weight. */
function tiered(count: number, full: number): number {
  if (count >= 3) return full;
  if (count >= 1) return 0.1;
  return 0;
}

/**
 * Heuristic compatibility with applicant tracking systems, computed from the
 * resume text alone plus the job keyword bag. Deterministic.
 *
 * Quantified results and action verbs are counted over `achievementText`
 * (summary, descriptions, skills) so dates in the rendered document do not
 * count as numbers. It defaults to the full text.
 */
export function scoreAts(resumeText: string, keywords: readonly string[], achievementText: string = resumeText): AtsResult {
  const text = String(resumeText || "");
  const achievements = String(achievementText || "");
  const lower = text.toLowerCase();
  const bag = dedupeCaseInsensitive(keywords);

  const matched = bag.filter((k) => lower.includes(k.toLowerCase()));
  const keywordDensity = bag.length ? ATS_WEIGHTS.keywordDensity * (matched.length / bag.length) : ATS_WEIGHTS.keywordDensity;

  const contentLength = text.length > 200 ? ATS_WEIGHTS.contentLength : 0;

  const tokens = new Set(tokenize(text));
  const sectionsFound = SECTION_WORDS.filter((w) => tokens.has(w));
  const sections = ATS_WEIGHTS.sections * (sectionsFound.length / SECTION_WORDS.length);

  const quantifiedCount = (achievements.match(/\d+[%$]?/g) || []).length;
  const quantified = tiered(quantifiedCount, ATS_WEIGHTS.quantified);

  const achievementTokens = new Set(tokenize(achievements));
  const verbsFound = ACTION_VERBS.filter((v) => achievementTokens.has(v));
  const actionVerbs = tiered(verbsFound.length, ATS_WEIGHTS.actionVerbs);

  const breakdown: AtsBreakdown = {
    keyword_density: keywordDensity,
    content_length: contentLength,
    section_completeness: sections,
    quantifiable_achievements: quantified,
    action_verbs: actionVerbs,
  };

  const total = keywordDensity + contentLength + sections + quantified + actionVerbs;

  return {
    score: Math.min(1, total),
    breakdown,
    sections_found: sectionsFound,
    quantified_count: quantifiedCount,
    action_verbs_found: verbsFound,
    matched_keywords: matched,
  };
}
