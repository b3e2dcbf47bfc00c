// core/domain/experience.ts
import type { ExperienceEntry } from "./resume";
import type { ExperienceLevel } from "./job_analysis";
import { clamp01, fail, succeed, type Outcome } from "./outcome";

export type YearMonth = { year: number; month: number };

export type ExperienceBand = { min: number; max: number | null }; // inclusive, null = open

export const EXPERIENCE_BANDS: Record<Exclude<ExperienceLevel, "unknown">, ExperienceBand> = {
  entry: { min: 0, max: 2 },
  mid: { min: 2, max: 5 },
  senior: { min: 5, max: 10 },
  executive: { min: 10, max: null },
};

export const INDUSTRY_RELEVANCE_KEYWORDS: Record<string, readonly string[]> = {
  technology: ["software", "development", "programming", "engineering", "technical", "cloud", "data", "systems"],
  finance: ["financial", "finance", "banking", "investment", "accounting", "risk", "portfolio", "audit"],
  healthcare: ["medical", "health", "clinical", "patient", "hospital", "care", "nursing", "pharma"],
  education: ["teaching", "academic", "school", "curriculum", "students", "education", "training", "learning"],
  marketing: ["marketing", "brand", "campaign", "seo", "content", "social media", "digital", "market"],
};

export type ExperienceEntryDetail = {
  job_title: string;
  company: string;
  months: number | null;       // null = dates could not be parsed, entry skipped
  duration_label: string;
};

export type ExperienceMatchResult = {
  score: number;
  years_experience: number;
  level_match: number;
  industry_relevance: number;
  required_level: ExperienceLevel;
  band: ExperienceBand | null;
  entries: ExperienceEntryDetail[];
  skipped_entries: number;
};

const DATE_RE = /^(\d{4})-(\d{2})(?:-(\d{2}))?$/;

export function parseYearMonth(raw: string | null | undefined): Outcome<YearMonth> {
  const s = String(raw ?? "").trim();
  const m = s.match(DATE_RE);
  if (!m) return fail("malformed_input_date", `UNPARSABLE_DATE: ${s.slice(0, 40)}`);

  const year = Number(m[1]);
  const month = Number(m[2]);
  const day = m[3] ? Number(m[3]) : 1;
  if (month < 1 || month > 12 || day < 1 || day > 31) {
    return fail("malformed_input_date", `OUT_OF_RANGE_DATE: ${s}`);
  }
  return succeed({ year, month });
}

export function yearMonthOf(d: Date): YearMonth {
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1 };
}

/** Whole months covered by one entry, floored at 0. Open-ended entries run to `now`. */
export function entryMonths(entry: ExperienceEntry, now: Date): Outcome<number> {
  const start = parseYearMonth(entry.start_date);
  if (!start.ok) return fail(start.kind, start.error);

  let end: YearMonth;
  if (entry.is_current || !entry.end_date) {
    end = yearMonthOf(now);
  } else {
    const parsed = parseYearMonth(entry.end_date);
    if (!parsed.ok) return fail(parsed.kind, parsed.error);
    end = parsed.value;
  }

  const months = (end.year - start.value.year) * 12 + (end.month - start.value.month);
  return succeed(Math.max(0, months));
}

export function formatMonths(months: number): string {
  const years = Math.floor(months / 12);
  const rest = months % 12;
  const parts: string[] = [];
  if (years) parts.push(`${years} year${years === 1 ? "" : "s"}`);
  if (rest) parts.push(`${rest} month${rest === 1 ? "" : "s"}`);
  return parts.length ? parts.join(" ") : "Less than a month";
}

/** Human-readable duration for one entry, e.g. "3 years 2 months". */
export function formatExperienceDuration(
  startDate: string,
  endDate: string | null,
  isCurrent: boolean,
  now: Date
): string {
  const months = entryMonths(
    { job_title: "", company: "", location: "", description: "", start_date: startDate, end_date: endDate, is_current: isCurrent },
    now
  );
  return months.ok ? formatMonths(months.value) : "Unknown duration";
}

/**
 * Total experience in years, rounded to one decimal. Entries with unparsable
 * dates are skipped rather than failing the whole computation.
 */
export function totalExperience(experience: readonly ExperienceEntry[], now: Date) {
  let totalMonths = 0;
  let skipped = 0;
  const entries: ExperienceEntryDetail[] = [];

  for (const e of experience) {
    const m = entryMonths(e, now);
    if (m.ok) totalMonths += m.value;
    else skipped++;
    entries.push({
      job_title: e.job_title,
      company: e.company,
      months: m.ok ? m.value : null,
      duration_label: m.ok ? formatMonths(m.value) : "Unknown duration",
    });
  }

  return {
    years: Math.round((totalMonths / 12) * 10) / 10,
    entries,
    skipped,
  };
}

export function levelMatch(years: number, level: ExperienceLevel): number {
  if (level === "unknown") return 0.5;
  const band = EXPERIENCE_BANDS[level];

  if (years < band.min) return band.min === 0 ? 0.3 : years / band.min;
  if (band.max !== null && years > band.max) return 0.9; // overqualified is still a strong match
  return 1;
}

export function industryRelevance(industry: string, resumeText: string): number {
  const keywords = INDUSTRY_RELEVANCE_KEYWORDS[String(industry || "").trim().toLowerCase()];
  if (!keywords || !keywords.length) return 1;

  const haystack = String(resumeText || "").toLowerCase();
  const hits = keywords.filter((k) => haystack.includes(k)).length;
  return hits / keywords.length;
}

export function matchExperience(args: {
  experience: readonly ExperienceEntry[];
  requiredLevel: ExperienceLevel;
  industry: string;
  resumeText: string;
  now: Date;
}): ExperienceMatchResult {
  const { experience, requiredLevel, industry, resumeText, now } = args;

  const total = totalExperience(experience, now);
  const level = levelMatch(total.years, requiredLevel);
  const relevance = industryRelevance(industry, resumeText);

  return {
    score: clamp01(0.7 * level + 0.3 * relevance),
    years_experience: total.years,
    level_match: level,
    industry_relevance: relevance,
    required_level: requiredLevel,
    band: requiredLevel === "unknown" ? null : EXPERIENCE_BANDS[requiredLevel],
    entries: total.entries,
    skipped_entries: total.skipped,
  };
}
