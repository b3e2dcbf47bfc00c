// core/domain/job_analysis.ts
import { dedupeCaseInsensitive, wordFrequency, type TermCount } from "./text";
import { mentionsDegree } from "./education";

export type ExperienceLevel = "entry" | "mid" | "senior" | "executive" | "unknown";

export const EXPERIENCE_LEVELS: readonly ExperienceLevel[] = ["entry", "mid", "senior", "executive", "unknown"];

export type JobAnalysis = {
  required_skills: string[];
  preferred_skills: string[];
  hard_requirements: string[];
  soft_requirements: string[];
  responsibilities: string[];
  keywords: string[];
  ats_keywords: string[];
  experience_level: ExperienceLevel;
  education_requirements: string[];
  industry: string;
  word_frequency: TermCount[];
};

export function emptyJobAnalysis(): JobAnalysis {
  return {
    required_skills: [],
    preferred_skills: [],
    hard_requirements: [],
    soft_requirements: [],
    responsibilities: [],
    keywords: [],
    ats_keywords: [],
    experience_level: "unknown",
    education_requirements: [],
    industry: "general",
    word_frequency: [],
  };
}

export function isExperienceLevel(v: string): v is ExperienceLevel {
  return (EXPERIENCE_LEVELS as readonly string[]).includes(v);
}

export const SKILL_VOCABULARY: Record<"technical" | "business" | "creative", readonly string[]> = {
  technical: [
    "Python", "JavaScript", "SQL", "React", "Node.js", "AWS",
    "Docker", "Git", "Linux", "MongoDB", "PostgreSQL", "API Development",
  ],
  business: [
    "Project Management", "Strategic Planning", "Business Analysis",
    "Market Research", "Financial Analysis", "Leadership", "Communication",
  ],
  creative: [
    "Graphic Design", "UI/UX Design", "Content Creation", "Brand Management",
    "Social Media Marketing", "Video Editing", "Adobe Creative Suite",
  ],
};

// Checked in this order; the first level with any phrase present wins.
const LEVEL_INDICATORS: ReadonlyArray<[ExperienceLevel, readonly string[]]> = [
  ["entry", ["entry", "junior", "0-2 years"]],
  ["senior", ["senior", "lead", "principal", "5+ years"]],
  ["executive", ["executive", "director", "vp", "10+ years"]],
];

// First industry with a matching keyword wins.
const INDUSTRY_INDICATORS: ReadonlyArray<[string, readonly string[]]> = [
  ["technology", ["software", "tech", "information technology", "development"]],
  ["finance", ["financial", "banking", "investment"]],
  ["healthcare", ["medical", "health", "clinical"]],
  ["education", ["teaching", "academic", "school"]],
];

const PREFERRED_MARKERS = ["preferred", "nice to have", "nice-to-have", "bonus", "a plus", "desirable"];
const SOFT_SKILL_MARKERS = ["communication", "teamwork", "collaborat", "problem-solving", "problem solving", "self-starter", "interpersonal"];
const BULLET_RE = /^\s*(?:[-*•●▪◦]|\d+[.)])\s+/;

export function inferExperienceLevel(description: string): ExperienceLevel {
  const t = description.toLowerCase();
  for (const [level, phrases] of LEVEL_INDICATORS) {
    if (phrases.some((p) => t.includes(p))) return level;
  }
  return "mid";
}

export function inferIndustry(description: string): string {
  const t = description.toLowerCase();
  for (const [industry, keywords] of INDUSTRY_INDICATORS) {
    if (keywords.some((k) => t.includes(k))) return industry;
  }
  return "general";
}

/**
 * ATS-style keywords: acronyms (AWS, SQL), dotted technology names (Node.js, ASP.NET)
 * and x++ language names (C++). Always computed locally.
 */
export function extractAtsKeywords(description: string): string[] {
  const text = String(description || "");
  const found: string[] = [];

  for (const m of text.matchAll(/\b[A-Z]{2,}\b/g)) found.push(m[0]);
  for (const m of text.matchAll(/\b[A-Za-z][A-Za-z0-9]*\.(?:js|net|io|ts|py)\b/gi)) found.push(m[0]);
  for (const m of text.matchAll(/\b[A-Za-z]\+\+/g)) found.push(m[0]);

  return dedupeCaseInsensitive(found);
}

function descriptionLines(description: string): string[] {
  return description
    .split(/\r?\n|(?<=[.;])\s+/)
    .map((l) => l.trim())
    .filter(Boolean);
}

function stripBullet(line: string): string {
  return line.replace(BULLET_RE, "").trim();
}

function clip(s: string, max = 200): string {
  return s.length > max ? s.slice(0, max).trimEnd() : s;
}

/**
 * Rule-based extraction used whenever the generative collaborator is not
 * available or its answer is rejected. Pure and total.
 */
export function analyzeJobDescriptionRules(description: string): JobAnalysis {
  const text = String(description || "");
  if (!text.trim()) return emptyJobAnalysis();

  const lower = text.toLowerCase();
  const lines = descriptionLines(text);

  const required: string[] = [];
  const preferred: string[] = [];

  for (const skills of Object.values(SKILL_VOCABULARY)) {
    for (const skill of skills) {
      const needle = skill.toLowerCase();
      if (!lower.includes(needle)) continue;

      const mentions = lines.filter((l) => l.toLowerCase().includes(needle));
      const onlyPreferred = mentions.length > 0 && mentions.every((l) => {
        const ll = l.toLowerCase();
        return PREFERRED_MARKERS.some((m) => ll.includes(m));
      });
      (onlyPreferred ? preferred : required).push(skill);
    }
  }

  const hard: string[] = [];
  const soft: string[] = [];
  if (lower.includes("degree") || lower.includes("bachelor")) hard.push("Bachelor's degree required");
  if (lower.includes("experience")) hard.push("Relevant work experience");
  if (lower.includes("certification")) soft.push("Professional certifications preferred");
  for (const marker of SOFT_SKILL_MARKERS) {
    if (lower.includes(marker)) {
      soft.push("Strong interpersonal and communication skills");
      break;
    }
  }

  const education = lines
    .filter((l) => mentionsDegree(l))
    .map((l) => clip(stripBullet(l)))
    .slice(0, 5);

  const responsibilities = lines
    .filter((l) => BULLET_RE.test(l))
    .map((l) => clip(stripBullet(l)))
    .filter((l) => {
      const ll = l.toLowerCase();
      return !mentionsDegree(l) && !PREFERRED_MARKERS.some((m) => ll.includes(m));
    })
    .slice(0, 10);

  const frequency = wordFrequency(text, 20);
  const frequentTerms = frequency
    .map((f) => f.term)
    .filter((t) => t.length > 3)
    .slice(0, 15);

  return {
    required_skills: required.slice(0, 10),
    preferred_skills: preferred.slice(0, 10),
    hard_requirements: hard,
    soft_requirements: soft,
    responsibilities,
    keywords: dedupeCaseInsensitive([...required, ...preferred, ...frequentTerms]),
    ats_keywords: extractAtsKeywords(text),
    experience_level: inferExperienceLevel(text),
    education_requirements: dedupeCaseInsensitive(education),
    industry: inferIndustry(text),
    word_frequency: frequency,
  };
}

/**
 * Overlays the locally computed fields onto an analysis from any source.
 * word_frequency and ats_keywords are never taken from the collaborator.
 */
export function withDeterministicFields(analysis: JobAnalysis, description: string): JobAnalysis {
  return {
    ...analysis,
    ats_keywords: extractAtsKeywords(description),
    word_frequency: wordFrequency(description, 20),
  };
}

/** Keyword bag consumed by the relevance and ATS scorers. */
export function keywordBag(analysis: JobAnalysis): string[] {
  return dedupeCaseInsensitive([...analysis.keywords, ...analysis.ats_keywords]);
}

