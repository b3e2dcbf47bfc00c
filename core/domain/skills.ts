// core/domain/skills.ts
import { clamp01 } from "./outcome";
import { dedupeCaseInsensitive } from "./text";

export type SkillMatchResult = {
  score: number;
  required_score: number;
  preferred_score: number;
  matched_required: string[];
  missing_required: string[];
  matched_preferred: string[];
  missing_preferred: string[];
};

/**
 * Two skills match when either lowercase form contains the other, so "React"
 * matches "React.js". Very short skills match loosely ("R" is inside "React");
 * callers rely on this, it is not filtered here.
 */
export function skillsMatch(a: string, b: string): boolean {
  const x = a.trim().toLowerCase();
  const y = b.trim().toLowerCase();
  if (!x || !y) return false;
  return x.includes(y) || y.includes(x);
}

function splitTier(resumeSkills: string[], wanted: readonly string[]) {
  const matched: string[] = [];
  const missing: string[] = [];
  for (const w of dedupeCaseInsensitive(wanted)) {
    if (resumeSkills.some((s) => skillsMatch(s, w))) matched.push(w);
    else missing.push(w);
  }
  const total = matched.length + missing.length;
  // No requirement in a tier is not a penalty.
  const score = total === 0 ? 1 : matched.length / total;
  return { matched, missing, score };
}

export function matchSkills(
  resumeSkills: readonly string[],
  requiredSkills: readonly string[],
  preferredSkills: readonly string[]
): SkillMatchResult {
  const have = dedupeCaseInsensitive(resumeSkills);
  const req = splitTier(have, requiredSkills);
  const pref = splitTier(have, preferredSkills);

  return {
    score: clamp01(0.7 * req.score + 0.3 * pref.score),
    required_score: req.score,
    preferred_score: pref.score,
    matched_required: req.matched,
    missing_required: req.missing,
    matched_preferred: pref.matched,
    missing_preferred: pref.missing,
  };
}
