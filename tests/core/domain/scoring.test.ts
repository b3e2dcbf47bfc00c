import { describe, it, expect } from "vitest"
import { MATCH_WEIGHTS, matchBand, overallScore } from "../../../core/domain/scoring"

describe("overallScore", () => {
  it("uses weights that sum to one", () => {
    const sum = MATCH_WEIGHTS.skills + MATCH_WEIGHTS.keywords + MATCH_WEIGHTS.experience + MATCH_WEIGHTS.education
    expect(sum).toBeCloseTo(1, 10)
  })

  it("combines the four sub-scores", () => {
    expect(overallScore({ skills: 0.5, keywords: 0.2, experience: 0.8, education: 0.4 })).toBeCloseTo(0.485, 10)
  })

  it("is 1 for perfect sub-scores and clamps out-of-range inputs", () => {
    expect(overallScore({ skills: 1, keywords: 1, experience: 1, education: 1 })).toBeCloseTo(1, 10)
    expect(overallScore({ skills: 3, keywords: -1, experience: Number.NaN, education: 0 })).toBeCloseTo(0.35, 10)
  })
})

describe("matchBand", () => {
  it("labels the overall score", () => {
    expect(matchBand(0.8)).toBe("strong")
    expect(matchBand(0.75)).toBe("strong")
    expect(matchBand(0.5)).toBe("moderate")
    expect(matchBand(0.49)).toBe("weak")
  })
})
