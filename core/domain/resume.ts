// core/domain/resume.ts
import { z } from "zod";

/*
Resume records arrive loosely shaped (form posts, imports, stored JSON).
They are validated once here; everything past this boundary reads typed fields
and never has to guard against null/undefined again.
*/

export interface ExperienceEntry {
  job_title: string;
  company: string;
  location: string;
  start_date: string;              // "YYYY-MM" or "YYYY-MM-DD"
  end_date: string | null;         // null = open-ended
  is_current: boolean;
  description: string;             // may hold newline-separated bullets
}

export interface EducationEntry {
  degree: string;
  field_of_study: string;
  institution: string;
  graduation_date: string;
  gpa: string | null;
}

export interface ResumeRecord {
  full_name: string;
  summary: string;
  skills: string[];
  experience: ExperienceEntry[];
  education: EducationEntry[];
}

const text = z
  .string()
  .nullish()
  .transform((v) => (v ?? "").trim());

const optionalText = z
  .string()
  .nullish()
  .transform((v) => {
    const t = (v ?? "").trim();
    return t ? t : null;
  });

const list = <T extends z.ZodTypeAny>(item: T) =>
  z
    .array(item)
    .nullish()
    .transform((v) => v ?? []);

export const experienceEntrySchema = z.object({
  job_title: text,
  company: text,
  location: text,
  start_date: text,
  end_date: optionalText,
  is_current: z
    .boolean()
    .nullish()
    .transform((v) => v ?? false),
  description: text,
});

export const educationEntrySchema = z.object({
  degree: text,
  field_of_study: text,
  institution: text,
  graduation_date: text,
  gpa: optionalText,
});

export const resumeRecordSchema = z.object({
  full_name: text,
  summary: text,
  skills: list(z.string()).transform((skills) => skills.map((s) => s.trim()).filter(Boolean)),
  experience: list(experienceEntrySchema),
  education: list(educationEntrySchema),
});

export function emptyResumeRecord(): ResumeRecord {
  return { full_name: "", summary: "", skills: [], experience: [], education: [] };
}

type Parsed<T> = { success: true; data: T } | { success: false };

function keep<T>(r: Parsed<T>, field: string, invalid: string[], fallback: T): T {
  if (r.success) return r.data;
  invalid.push(field);
  return fallback;
}

function keepEntries<T>(
  raw: unknown,
  field: string,
  parse: (v: unknown) => Parsed<T>,
  invalid: string[]
): T[] {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    invalid.push(field);
    return [];
  }
  const out: T[] = [];
  raw.forEach((entry: unknown, i) => {
    const r = parse(entry);
    if (r.success) out.push(r.data);
    else invalid.push(`${field}[${i}]`);
  });
  return out;
}

/**
 * Validates a loosely shaped resume. Fields that fail validation are replaced
 * with their empty value and named in `invalid_fields`; list entries are
 * dropped one by one, so a single bad entry keeps the rest of the list.
 */
export function normalizeResumeRecord(input: unknown): { resume: ResumeRecord; invalid_fields: string[] } {
  const whole = resumeRecordSchema.safeParse(input);
  if (whole.success) return { resume: whole.data, invalid_fields: [] };

  const raw: Record<string, unknown> = typeof input === "object" && input !== null ? Object.fromEntries(Object.entries(input)) : {};
  const invalid: string[] = [];
  if (typeof input !== "object" || input === null) invalid.push("resume");

  const { shape } = resumeRecordSchema;
  const resume: ResumeRecord = {
    full_name: keep(shape.full_name.safeParse(raw.full_name), "full_name", invalid, ""),
    summary: keep(shape.summary.safeParse(raw.summary), "summary", invalid, ""),
    skills: keep(shape.skills.safeParse(raw.skills), "skills", invalid, []),
    experience: keepEntries(raw.experience, "experience", (v) => experienceEntrySchema.safeParse(v), invalid),
    education: keepEntries(raw.education, "education", (v) => educationEntrySchema.safeParse(v), invalid),
  };

  return { resume, invalid_fields: invalid };
}

/**
 * Concatenation used for keyword relevance: summary, every experience
 * title/company/description, every education field and every skill,
 * joined with single spaces.
 */
export function resumeFullText(resume: ResumeRecord): string {
  const parts: string[] = [resume.summary];

  for (const e of resume.experience) {
    parts.push(e.job_title, e.company, e.description);
  }
  for (const ed of resume.education) {
    parts.push(ed.degree, ed.field_of_study, ed.institution, ed.graduation_date, ed.gpa ?? "");
  }
  parts.push(...resume.skills);

  return parts
    .map((p) => p.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join(" ");
}

/** Summary, experience descriptions and skills: the text achievements are counted over. */
export function resumeAchievementText(resume: ResumeRecord): string {
  return [resume.summary, ...resume.experience.map((e) => e.description), ...resume.skills]
    .map((p) => p.replace(/\s+/g, " ").trim())
    .filter(Boolean)
    .join(" ");
}

/**
 * Plain-text rendering with section headers, roughly what an applicant
 * tracking system sees after parsing the exported document.
 * Empty sections are left out entirely.
 */
export function renderResumeText(resume: ResumeRecord): string {
  const out: string[] = [];

  if (resume.full_name) out.push(resume.full_name);

  if (resume.summary) {
    out.push("", "Summary", resume.summary);
  }

  if (resume.experience.length) {
    out.push("", "Experience");
    for (const e of resume.experience) {
      const end = e.is_current || !e.end_date ? "Present" : e.end_date;
      const head = [e.job_title, e.company, e.location].filter(Boolean).join(", ");
      out.push(`${head} (${e.start_date || "?"} - ${end})`);
      if (e.description) out.push(e.description);
    }
  }

  if (resume.education.length) {
    out.push("", "Education");
    for (const ed of resume.education) {
      const line = [ed.degree, ed.field_of_study, ed.institution, ed.graduation_date].filter(Boolean).join(", ");
      out.push(ed.gpa ? `${line} (GPA ${ed.gpa})` : line);
    }
  }

  if (resume.skills.length) {
    out.push("", "Skills", resume.skills.join(", "));
  }

  return out.join("\n").trim();
}
