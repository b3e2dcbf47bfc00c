// core/domain/education.ts
import type { EducationEntry } from "./resume";
import { clamp01 } from "./outcome";

// Ordinal degree levels, matched on word boundaries so job titles such as
// "Associate Product Manager" or "brand ambassador" do not read as degrees.
export const DEGREE_LEVELS: ReadonlyArray<[RegExp, number]> = [
  [/\bhigh school\b/, 1],
  [/\bdiploma\b/, 1],
  [/\bcertificate\b/, 1],
  [/\bassociate(?:'?s)?(?: (?:degree|of)\b|$)/, 2],
  [/\bbachelor/, 3],
  [/\bmaster(?:'?s\b| (?:degree|of)\b|$)/, 4],
  [/\bmba\b/, 4],
  [/\bph\.?d\b/, 5],
  [/\bdoctorate\b/, 5],
];

// Role names that contain a degree word.
const NOT_A_DEGREE = /\bscrum master\b/g;

function degreeText(text: string): string {
  return String(text || "").toLowerCase().replace(NOT_A_DEGREE, " ").trim();
}

export type EducationMatchResult = {
  score: number;
  requirements_met: boolean;
  user_level: number;
  required_level: number;
};

export function degreeLevel(text: string): number {
  const t = degreeText(text);
  let best = 0;
  for (const [pattern, level] of DEGREE_LEVELS) {
    if (level > best && pattern.test(t)) best = level;
  }
  return best;
}

/** True when a line names a degree or asks for one ("degree in a related field"). */
export function mentionsDegree(text: string): boolean {
  return degreeLevel(text) > 0 || /\bdegree\b/.test(degreeText(text));
}

export function matchEducation(
  education: readonly EducationEntry[],
  requirements: readonly string[]
): EducationMatchResult {
  const reqs = requirements.map((r) => String(r || "").trim()).filter(Boolean);
  const userLevel = education.reduce((max, e) => Math.max(max, degreeLevel(e.degree)), 0);
  const requiredLevel = reqs.reduce((max, r) => Math.max(max, degreeLevel(r)), 0);

  if (!reqs.length) {
    return { score: 1, requirements_met: true, user_level: userLevel, required_level: 0 };
  }
  if (!education.length) {
    return { score: 0, requirements_met: false, user_level: 0, required_level: requiredLevel };
  }
  // Requirements that name no recognisable degree cannot be compared.
  if (requiredLevel === 0) {
    return { score: 1, requirements_met: true, user_level: userLevel, required_level: 0 };
  }

  return {
    score: clamp01(Math.min(1, userLevel / requiredLevel)),
    requirements_met: userLevel >= requiredLevel,
    user_level: userLevel,
    required_level: requiredLevel,
  };
}
