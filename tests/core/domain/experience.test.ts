import { describe, it, expect } from "vitest"
import {
  entryMonths,
  formatExperienceDuration,
  formatMonths,
  industryRelevance,
  levelMatch,
  matchExperience,
  parseYearMonth,
  totalExperience,
} from "../../../core/domain/experience"
import type { ExperienceEntry } from "../../../core/domain/resume"
import { NOW } from "../../helpers/fixtures"

function entry(start: string, end: string | null, isCurrent = false): ExperienceEntry {
  return {
    job_title: "Engineer",
    company: "Acme",
    location: "",
    start_date: start,
    end_date: end,
    is_current: isCurrent,
    description: "",
  }
}

describe("parseYearMonth", () => {
  it("accepts YYYY-MM and YYYY-MM-DD", () => {
    expect(parseYearMonth("2020-01")).toEqual({ ok: true, value: { year: 2020, month: 1 } })
    expect(parseYearMonth("2019-06-30")).toEqual({ ok: true, value: { year: 2019, month: 6 } })
  })

  it("rejects other shapes and out-of-range months", () => {
    const free = parseYearMonth("last spring")
    expect(free.ok).toBe(false)
    if (!free.ok) expect(free.kind).toBe("malformed_input_date")
    expect(parseYearMonth("2020-13").ok).toBe(false)
    expect(parseYearMonth(null).ok).toBe(false)
  })
})

describe("entryMonths", () => {
  it("counts whole months between start and end", () => {
    expect(entryMonths(entry("2020-01", "2023-01"), NOW)).toEqual({ ok: true, value: 36 })
  })

  it("runs current and open-ended entries up to now", () => {
    expect(entryMonths(entry("2022-03", "2022-09", true), NOW)).toEqual({ ok: true, value: 24 })
    expect(entryMonths(entry("2022-03", null), NOW)).toEqual({ ok: true, value: 24 })
  })

  it("floors a reversed range at zero", () => {
    expect(entryMonths(entry("2023-05", "2021-01"), NOW)).toEqual({ ok: true, value: 0 })
  })
})

describe("totalExperience", () => {
  it("rounds years to one decimal and skips unparsable entries", () => {
    const total = totalExperience([entry("2020-01", "2021-06"), entry("soon", null)], NOW)
    expect(total.years).toBe(1.4)
    expect(total.skipped).toBe(1)
    expect(total.entries[0]).toEqual({ job_title: "Engineer", company: "Acme", months: 17, duration_label: "1 year 5 months" })
    expect(total.entries[1].months).toBeNull()
    expect(total.entries[1].duration_label).toBe("Unknown duration")
  })
})

describe("levelMatch", () => {
  it("bands six years as in range for senior and overqualified for entry", () => {
    expect(levelMatch(6, "senior")).toBe(1)
    expect(levelMatch(6, "entry")).toBe(0.9)
  })

  it("scales below the band minimum", () => {
    expect(levelMatch(1, "senior")).toBeCloseTo(0.2, 10)
    expect(levelMatch(1, "mid")).toBe(0.5)
  })

  it("scores 0.5 for an unknown level", () => {
    expect(levelMatch(3, "unknown")).toBe(0.5)
  })

  it("treats band edges as inside", () => {
    expect(levelMatch(2, "entry")).toBe(1)
    expect(levelMatch(10, "executive")).toBe(1)
    expect(levelMatch(0, "entry")).toBe(1)
  })
})

describe("industryRelevance", () => {
  it("is the fraction of industry keywords found", () => {
    expect(industryRelevance("technology", "Software development on cloud data systems")).toBe(0.625)
  })

  it("is 1.0 for unknown or empty industries", () => {
    expect(industryRelevance("general", "anything")).toBe(1)
    expect(industryRelevance("", "anything")).toBe(1)
  })
})

describe("matchExperience", () => {
  it("combines level and relevance at 0.7 / 0.3", () => {
    const r = matchExperience({
      experience: [entry("2014-01", "2020-01")],
      requiredLevel: "senior",
      industry: "technology",
      resumeText: "Software development on cloud data systems",
      now: NOW,
    })
    expect(r.years_experience).toBe(6)
    expect(r.level_match).toBe(1)
    expect(r.score).toBeCloseTo(0.7 + 0.3 * 0.625, 10)
    expect(r.band).toEqual({ min: 5, max: 10 })
  })

  it("handles a resume with no experience", () => {
    const r = matchExperience({ experience: [], requiredLevel: "mid", industry: "general", resumeText: "", now: NOW })
    expect(r.years_experience).toBe(0)
    expect(r.level_match).toBe(0)
    expect(r.score).toBeCloseTo(0.3, 10)
  })
})

describe("duration labels", () => {
  it("formats months as years and months", () => {
    expect(formatMonths(0)).toBe("Less than a month")
    expect(formatMonths(1)).toBe("1 month")
    expect(formatMonths(24)).toBe("2 years")
  })

  it("formats an entry's duration", () => {
    expect(formatExperienceDuration("2020-01", "2023-03", false, NOW)).toBe("3 years 2 months")
    expect(formatExperienceDuration("2023-12", null, true, NOW)).toBe("3 months")
    expect(formatExperienceDuration("bad", null, true, NOW)).toBe("Unknown duration")
  })
})
