import { describe, it, expect } from "vitest"
import { scoreAts } from "../../../core/domain/ats"

const RICH = [
  "Summary",
  "Analytics engineer focused on reliable reporting for product and finance teams.",
  "Experience",
  "Developed a metrics warehouse used by 40 analysts.",
  "Improved dashboard load time by 35% and managed a $2000 tooling budget.",
  "Led migration of nightly jobs to a scheduled pipeline.",
  "Education",
  "Bachelor of Science, Statistics",
  "Skills",
  "SQL, Python, dbt",
].join("\n")

describe("scoreAts", () => {
  it("gives full keyword credit and nothing else to empty text without keywords", () => {
    const r = scoreAts("", [])
    expect(r.score).toBeCloseTo(0.3, 10)
    expect(r.breakdown).toEqual({
      keyword_density: 0.3,
      content_length: 0,
      section_completeness: 0,
      quantifiable_achievements: 0,
      action_verbs: 0,
    })
  })

  it("scores partial credit on a short resume", () => {
    const r = scoreAts("Led a team. Increased revenue 20%.", ["python", "revenue"])
    expect(r.matched_keywords).toEqual(["revenue"])
    expect(r.breakdown.keyword_density).toBeCloseTo(0.15, 10)
    expect(r.quantified_count).toBe(1)
    expect(r.action_verbs_found).toEqual(["led", "increased"])
    expect(r.score).toBeCloseTo(0.35, 10)
  })

  it("reaches the cap when every criterion is met", () => {
    expect(RICH.length).toBeGreaterThan(200)
    const r = scoreAts(RICH, [])
    expect(r.sections_found).toEqual(["experience", "education", "skills", "summary"])
    expect(r.quantified_count).toBe(3)
    expect(r.action_verbs_found).toEqual(["developed", "managed", "led", "improved"])
    expect(r.score).toBeCloseTo(1, 10)
    expect(r.score).toBeLessThanOrEqual(1)
  })

  it("is deterministic", () => {
    expect(scoreAts(RICH, ["SQL", "Airflow"])).toEqual(scoreAts(RICH, ["SQL", "Airflow"]))
  })

  it("counts numbers and verbs only over the achievement text", () => {
    const rendered = "Experience\nClerk, Acme (2020-01 - 2023-01)\nHandled filing"
    const r = scoreAts(rendered, [], "Handled filing")
    expect(r.quantified_count).toBe(0)
    expect(r.breakdown.quantifiable_achievements).toBe(0)
    expect(r.action_verbs_found).toEqual([])
    expect(r.sections_found).toEqual(["experience"])
  })
})
