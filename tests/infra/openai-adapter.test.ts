import { describe, it, expect } from "vitest"
import { OpenAIAdapter, type FetchLike } from "../../infra/openai-adapter"
import { PROMPT_ANALYZE_JOB_VERSION, PROMPT_RECOMMENDATIONS_VERSION } from "../../core/versioning/versions"

type Scripted = { status: number; body: string } | Error

type RecordedCall = { url: string; headers: Record<string, string>; body: string }

function stubFetch(script: Scripted[]) {
  const calls: RecordedCall[] = []
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, headers: init.headers, body: init.body })
    const next = script.shift()
    if (!next) throw new Error("unexpected extra request")
    if (next instanceof Error) throw next
    return { ok: next.status >= 200 && next.status < 300, status: next.status, text: async () => next.body }
  }
  return { fetchImpl, calls }
}

function json(status: number, value: unknown): Scripted {
  return { status, body: JSON.stringify(value) }
}

function abortError() {
  const e = new Error("The operation was aborted")
  e.name = "AbortError"
  return e
}

const analysisInput = {
  jobDescription: "Senior Python engineer",
  schemaVersion: "1.0" as const,
  promptVersion: PROMPT_ANALYZE_JOB_VERSION,
}

const recommendationInput = {
  resumeSummary: "Analyst",
  resumeSkills: ["SQL"],
  requiredSkills: ["SQL", "AWS"],
  missingSkills: ["AWS"],
  hardRequirements: [],
  overallScore: 0.6,
  promptVersion: PROMPT_RECOMMENDATIONS_VERSION,
}

function adapter(fetchImpl: FetchLike, sleeps: number[] = [], maxAttempts = 3) {
  return new OpenAIAdapter({
    apiKey: "test-key",
    baseUrl: "http://llm.test/v1",
    fetchImpl,
    maxAttempts,
    sleep: async (ms) => {
      sleeps.push(ms)
    },
  })
}

describe("OpenAIAdapter.analyzeJobPosting", () => {
  it("reads output_parsed and post-processes the analysis", async () => {
    const { fetchImpl, calls } = stubFetch([
      json(200, {
        output_parsed: { required_skills: ["Python"], experience_level: "Senior", industry: "Technology" },
        usage: { input_tokens: 10, output_tokens: 5, total_tokens: 15 },
      }),
    ])
    const out = await adapter(fetchImpl).analyzeJobPosting(analysisInput)

    expect(out.analysis.required_skills).toEqual(["Python"])
    expect(out.analysis.experience_level).toBe("senior")
    expect(out.analysis.industry).toBe("technology")
    expect(out.modelUsed).toBe("gpt-4o-mini")
    expect(out.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 })

    expect(calls).toHaveLength(1)
    expect(calls[0].url).toBe("http://llm.test/v1/responses")
    expect(calls[0].headers.Authorization).toBe("Bearer test-key")
    const sent: unknown = JSON.parse(calls[0].body)
    expect(sent).toMatchObject({ model: "gpt-4o-mini", text: { format: { type: "json_schema", name: "JobAnalysis" } } })
  })

  it("falls back to a JSON object in the output text", async () => {
    const { fetchImpl } = stubFetch([
      json(200, { output: [{ content: [{ type: "output_text", text: '{"required_skills":["SQL"]}' }] }] }),
    ])
    const out = await adapter(fetchImpl).analyzeJobPosting(analysisInput)
    expect(out.analysis.required_skills).toEqual(["SQL"])
    expect(out.analysis.experience_level).toBe("unknown")
  })

  it("retries a 500 with backoff and then succeeds", async () => {
    const sleeps: number[] = []
    const { fetchImpl, calls } = stubFetch([
      json(500, { error: { message: "boom" } }),
      json(200, { output_parsed: { keywords: ["python"] } }),
    ])
    const out = await adapter(fetchImpl, sleeps).analyzeJobPosting(analysisInput)
    expect(out.analysis.keywords).toEqual(["python"])
    expect(calls).toHaveLength(2)
    expect(sleeps).toHaveLength(1)
    expect(sleeps[0]).toBeGreaterThanOrEqual(500)
    expect(sleeps[0]).toBeLessThan(750)
  })

  it("does not retry a 400 and reports the API message", async () => {
    const { fetchImpl, calls } = stubFetch([json(400, { error: { message: "bad schema" } })])
    await expect(adapter(fetchImpl).analyzeJobPosting(analysisInput)).rejects.toThrow("OPENAI_ERROR_400: bad schema")
    expect(calls).toHaveLength(1)
  })

  it("rejects output of the wrong shape", async () => {
    const { fetchImpl } = stubFetch([json(200, { output_parsed: { required_skills: "Python" } })])
    await expect(adapter(fetchImpl).analyzeJobPosting(analysisInput)).rejects.toThrow("LLM_ANALYZE_JOB_FAILED_SCHEMA")
  })

  it("asks once more when no JSON comes back, then gives up", async () => {
    const { fetchImpl, calls } = stubFetch([
      json(200, { output: [{ content: [{ text: "Sure! Here you go." }] }] }),
      json(200, { output: [] }),
    ])
    await expect(adapter(fetchImpl).analyzeJobPosting(analysisInput)).rejects.toThrow("LLM_STRUCTURED_OUTPUT_MISSING")
    expect(calls).toHaveLength(2)
    expect(calls[1].body).toContain("IMPORTANT: Your last output was invalid")
  })

  it("reports a non-JSON body", async () => {
    const { fetchImpl } = stubFetch([{ status: 200, body: "<html>" }])
    await expect(adapter(fetchImpl).analyzeJobPosting(analysisInput)).rejects.toThrow("OPENAI_NON_JSON_RESPONSE")
  })

  it("turns repeated aborts into OPENAI_TIMEOUT", async () => {
    const sleeps: number[] = []
    const { fetchImpl, calls } = stubFetch([abortError(), abortError()])
    await expect(adapter(fetchImpl, sleeps, 2).analyzeJobPosting(analysisInput)).rejects.toThrow("OPENAI_TIMEOUT")
    expect(calls).toHaveLength(2)
    expect(sleeps).toHaveLength(1)
  })
})

describe("OpenAIAdapter.generateRecommendations", () => {
  it("returns cleaned recommendations", async () => {
    const { fetchImpl, calls } = stubFetch([
      json(200, { output_parsed: { recommendations: ["Add AWS projects", "add aws projects", "Quantify impact"] } }),
    ])
    const out = await adapter(fetchImpl).generateRecommendations(recommendationInput)
    expect(out.recommendations).toEqual(["Add AWS projects", "Quantify impact"])
    expect(calls[0].body).toContain("Recommendations")
  })

  it("rejects an empty list", async () => {
    const { fetchImpl } = stubFetch([json(200, { output_parsed: { recommendations: [] } })])
    await expect(adapter(fetchImpl).generateRecommendations(recommendationInput)).rejects.toThrow(
      "LLM_RECOMMENDATIONS_FAILED_SCHEMA"
    )
  })
})
