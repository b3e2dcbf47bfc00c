import { describe, it, expect } from "vitest"
import { TokenBucketLimiter } from "../../../services/match-gateway/src/rate_limit"

describe("TokenBucketLimiter", () => {
  it("allows a burst, then refills at the configured rate", () => {
    let now = 0
    const limiter = new TokenBucketLimiter(2, 2, () => now)

    expect(limiter.allow("acme")).toBe(true)
    expect(limiter.allow("acme")).toBe(true)
    expect(limiter.allow("acme")).toBe(false)

    now = 500
    expect(limiter.allow("acme")).toBe(true)
    expect(limiter.allow("acme")).toBe(false)
  })

  it("keeps a separate bucket per tenant", () => {
    const limiter = new TokenBucketLimiter(0, 1, () => 0)
    expect(limiter.allow("acme")).toBe(true)
    expect(limiter.allow("acme")).toBe(false)
    expect(limiter.allow("globex")).toBe(true)
  })
})
