import { describe, it, expect } from "vitest"
import { loadConfig, parseTenantKeys } from "../../src/config"
import { OpenAIAdapter, createLLMAdapter } from "../../src/index"

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const c = loadConfig({})
    expect(c.openai).toEqual({
      apiKey: null,
      baseUrl: "https://api.openai.com/v1",
      model: "gpt-4o-mini",
      timeoutMs: 25000,
      maxAttempts: 3,
    })
    expect(c.llmCallTimeoutMs).toBe(30000)
    expect(c.batch).toEqual({ concurrency: 4, maxJobs: 20, itemTimeoutMs: 60000 })
    expect(c.server.port).toBe(8080)
    expect(c.server.authDisabled).toBe(false)
    expect(c.server.tenantKeys.size).toBe(0)
    expect(c.server.rateLimitRps).toBe(1)
    expect(c.server.rateLimitBurst).toBe(5)
  })

  it("reads overrides and ignores values that do not parse", () => {
    const c = loadConfig({
      OPENAI_API_KEY: " test-key ",
      OPENAI_MODEL: "gpt-4o",
      OPENAI_TIMEOUT_MS: "not-a-number",
      BATCH_MAX_JOBS: "5",
      RATE_LIMIT_BURST: "0",
      AUTH_DISABLED: "TRUE",
      PORT: "3000",
    })
    expect(c.openai.apiKey).toBe("test-key")
    expect(c.openai.model).toBe("gpt-4o")
    expect(c.openai.timeoutMs).toBe(25000)
    expect(c.batch.maxJobs).toBe(5)
    expect(c.server.rateLimitBurst).toBe(5)
    expect(c.server.authDisabled).toBe(true)
    expect(c.server.port).toBe(3000)
  })

  it("falls back to the default model for an unknown name", () => {
    expect(loadConfig({ OPENAI_MODEL: "some-other-model" }).openai.model).toBe("gpt-4o-mini")
  })
})

describe("parseTenantKeys", () => {
  it("maps api keys to tenant ids and skips malformed pairs", () => {
    const m = parseTenantKeys("acme=key-one, globex = key-two ,broken,=nokey")
    expect([...m.entries()]).toEqual([
      ["key-one", "acme"],
      ["key-two", "globex"],
    ])
  })
})

describe("createLLMAdapter", () => {
  it("returns null without an API key", () => {
    expect(createLLMAdapter(loadConfig({}))).toBeNull()
  })

  it("builds the OpenAI adapter when a key is set", () => {
    expect(createLLMAdapter(loadConfig({ OPENAI_API_KEY: "test-key" }))).toBeInstanceOf(OpenAIAdapter)
  })
})
