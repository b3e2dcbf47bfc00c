import type {
  LLMAdapter,
  LLMModel,
  LLMUsage,
  AnalyzeJobPostingInput,
  AnalyzeJobPostingOutput,
  GenerateRecommendationsInput,
  GenerateRecommendationsOutput,
} from "../core/llm/adapter"
import { collaboratorJobAnalysisSchema, jobAnalysisJsonSchema } from "../core/llm/schemas/jobAnalysisSchema"
import { recommendationsJsonSchema, recommendationsSchema } from "../core/llm/schemas/recommendationsSchema"
import { buildAnalyzeJobSystemPrompt, buildAnalyzeJobUserPrompt } from "../core/llm/prompts/analyzeJobPosting"
import { buildRecommendationsSystemPrompt, buildRecommendationsUserPrompt } from "../core/llm/prompts/recommendations"
import { postProcessJobAnalysis, postProcessRecommendations } from "../core/llm/postprocess"
import { logDebug } from "../src/lib/log"

/** The slice of `fetch` the adapter uses; the global fetch satisfies it. */
export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>

export interface OpenAIAdapterOptions {
  apiKey: string
  baseUrl?: string
  model?: LLMModel
  timeoutMs?: number
  maxAttempts?: number
  fetchImpl?: FetchLike
  sleep?: (ms: number) => Promise<void>
}

type StructuredFormat = { name: string; schema: unknown }

type ResponsesPayload = {
  model: LLMModel
  temperature: number
  input: Array<{ role: "system" | "user"; content: string }>
  text: { format: { type: "json_schema"; name: string; strict: boolean; schema: unknown } }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function defaultSleep(ms: number) {
  return new Promise<void>((r) => setTimeout(r, ms))
}

function jitter(ms: number) {
  const j = Math.floor(Math.random() * Math.min(250, ms))
  return ms + j
}

function isRetryableStatus(status: number) {
  return status === 429 || status === 408 || (status >= 500 && status <= 599)
}

function parseOpenAIErrorMessage(bodyText: string): string | null {
  try {
    const j: unknown = JSON.parse(bodyText)
    if (isRecord(j) && isRecord(j.error) && typeof j.error.message === "string") return j.error.message
    return null
  } catch {
    return null
  }
}

function isTransientNetworkError(e: unknown): boolean {
  if (!(e instanceof Error)) return false
  return (
    e.message.includes("fetch failed") ||
    e.message.includes("ECONNRESET") ||
    e.message.includes("ENOTFOUND") ||
    e.message.includes("ETIMEDOUT")
  )
}

export class OpenAIAdapter implements LLMAdapter {
  private apiKey: string
  private baseUrl: string
  private model: LLMModel
  private timeoutMs: number
  private maxAttempts: number
  private fetchImpl: FetchLike
  private sleep: (ms: number) => Promise<void>

  constructor(opts: OpenAIAdapterOptions) {
    this.apiKey = opts.apiKey
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1"
    this.model = opts.model ?? "gpt-4o-mini"
    this.timeoutMs = opts.timeoutMs ?? 25000
    this.maxAttempts = Math.max(1, opts.maxAttempts ?? 3)
    this.fetchImpl = opts.fetchImpl ?? fetch
    this.sleep = opts.sleep ?? defaultSleep
  }

  async analyzeJobPosting(input: AnalyzeJobPostingInput): Promise<AnalyzeJobPostingOutput> {
    const started = Date.now()
    const system = buildAnalyzeJobSystemPrompt()
    const user = buildAnalyzeJobUserPrompt(input.jobDescription, input.promptVersion)

    const { parsed, usage } = await this.requestStructured(system, user, jobAnalysisJsonSchema)
    const checked = collaboratorJobAnalysisSchema.safeParse(parsed)
    if (!checked.success) throw new Error("LLM_ANALYZE_JOB_FAILED_SCHEMA")

    return {
      analysis: postProcessJobAnalysis(checked.data),
      modelUsed: this.model,
      usage,
      latencyMs: Date.now() - started,
    }
  }

  async generateRecommendations(input: GenerateRecommendationsInput): Promise<GenerateRecommendationsOutput> {
    const started = Date.now()
    const system = buildRecommendationsSystemPrompt()
    const user = buildRecommendationsUserPrompt(input)

    const { parsed, usage } = await this.requestStructured(system, user, recommendationsJsonSchema)
    const checked = recommendationsSchema.safeParse(parsed)
    if (!checked.success) throw new Error("LLM_RECOMMENDATIONS_FAILED_SCHEMA")

    const recommendations = postProcessRecommendations(checked.data.recommendations)
    if (!recommendations.length) throw new Error("LLM_RECOMMENDATIONS_FAILED_SCHEMA")

    return {
      recommendations,
      modelUsed: this.model,
      usage,
      latencyMs: Date.now() - started,
    }
  }

  /**
   * One structured-output request. If the first answer carries no parseable JSON,
   * ask once more with a corrective instruction before giving up.
   */
  private async requestStructured(
    system: string,
    user: string,
    format: StructuredFormat
  ): Promise<{ parsed: unknown; usage?: LLMUsage }> {
    const payload: ResponsesPayload = {
      model: this.model,
      temperature: 0,
      input: [
        { role: "system", content: system },
        { role: "user", content: user },
      ],
      text: {
        format: { type: "json_schema", name: format.name, strict: true, schema: format.schema },
      },
    }

    const first = await this.callResponses(payload)
    const parsed = this.extractParsedJson(first)
    if (parsed !== null) return { parsed, usage: this.mapUsage(first) }

    const retryPayload: ResponsesPayload = {
      ...payload,
      input: [
        { role: "system", content: system },
        {
          role: "user",
          content:
            user +
            "\n\nIMPORTANT: Your last output was invalid or did not match schema. Return ONLY valid JSON matching the schema.",
        },
      ],
    }
    const second = await this.callResponses(retryPayload)
    const reparsed = this.extractParsedJson(second)
    if (reparsed === null) throw new Error("LLM_STRUCTURED_OUTPUT_MISSING")

    return { parsed: reparsed, usage: this.mapUsage(second) }
  }

  private async callResponses(body: ResponsesPayload): Promise<unknown> {
    let lastErr: unknown = null

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const controller = new AbortController()
      const t = setTimeout(() => controller.abort(), this.timeoutMs)

      try {
        const doFetch = this.fetchImpl
        const res = await doFetch(`${this.baseUrl}/responses`, {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.apiKey}`,
            "Content-Type": "application/json",
          },
          body: JSON.stringify(body),
          signal: controller.signal,
        })

        const text = await res.text()

        if (!res.ok) {
          const msg = parseOpenAIErrorMessage(text)
          const errStr = `OPENAI_ERROR_${res.status}: ${(msg ?? text).slice(0, 400)}`

          if (isRetryableStatus(res.status) && attempt < this.maxAttempts) {
            // exponential backoff: 500ms, 1000ms, 2000ms (+ jitter)
            logDebug("openai_retry", { status: res.status, attempt })
            await this.sleep(jitter(500 * Math.pow(2, attempt - 1)))
            continue
          }

          throw new Error(errStr)
        }

        try {
          const json: unknown = JSON.parse(text)
          return json
        } catch {
          throw new Error("OPENAI_NON_JSON_RESPONSE")
        }
      } catch (e: unknown) {
        lastErr = e

        const isAbort = e instanceof Error && e.name === "AbortError"

        if ((isAbort || isTransientNetworkError(e)) && attempt < this.maxAttempts) {
          logDebug("openai_retry", { err: e instanceof Error ? e.message : "unknown", attempt })
          await this.sleep(jitter(500 * Math.pow(2, attempt - 1)))
          continue
        }

        if (isAbort) throw new Error("OPENAI_TIMEOUT")

        throw e
      } finally {
        clearTimeout(t)
      }
    }

    throw lastErr instanceof Error ? lastErr : new Error("OPENAI_UNKNOWN_ERROR")
  }

  /**
   * Parsed JSON from a Responses API result: `output_parsed` when present,
   * otherwise the first output text block that parses as a JSON object.
   */
  private extractParsedJson(resp: unknown): unknown | null {
    if (!isRecord(resp)) return null
    if (resp.output_parsed !== undefined && resp.output_parsed !== null) return resp.output_parsed

    const items = resp.output
    if (!Array.isArray(items)) return null

    for (const item of items) {
      if (!isRecord(item) || !Array.isArray(item.content)) continue
      for (const c of item.content) {
        if (!isRecord(c) || typeof c.text !== "string") continue
        const trimmed = c.text.trim()
        if (!(trimmed.startsWith("{") && trimmed.endsWith("}"))) continue
        try {
          const json: unknown = JSON.parse(trimmed)
          return json
        } catch {
          continue
        }
      }
    }
    return null
  }

  private mapUsage(resp: unknown): LLMUsage | undefined {
    if (!isRecord(resp) || !isRecord(resp.usage)) return undefined
    const u = resp.usage
    const num = (v: unknown) => (typeof v === "number" ? v : undefined)
    return {
      inputTokens: num(u.input_tokens),
      outputTokens: num(u.output_tokens),
      totalTokens: num(u.total_tokens),
    }
  }
}
