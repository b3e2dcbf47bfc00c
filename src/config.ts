import type { LLMModel } from "../core/llm/adapter"

export type Env = Record<string, string | undefined>

export interface AppConfig {
  openai: {
    apiKey: string | null           // null = deterministic mode, no collaborator
    baseUrl: string
    model: LLMModel
    timeoutMs: number
    maxAttempts: number
  }
  llmCallTimeoutMs: number          // engine-side bound per collaborator call
  batch: {
    concurrency: number
    maxJobs: number
    itemTimeoutMs: number
  }
  server: {
    port: number
    authDisabled: boolean
    tenantKeys: Map<string, string> // api key -> tenant id
    rateLimitRps: number
    rateLimitBurst: number
  }
}

const MODELS: readonly LLMModel[] = ["gpt-4o-mini", "gpt-4o", "gpt-4.1"]

function isModel(v: string): v is LLMModel {
  return (MODELS as readonly string[]).includes(v)
}

function num(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || !raw.trim()) return fallback
  const n = Number(raw)
  return Number.isFinite(n) && n >= min ? n : fallback
}

// TENANT_KEYS="acme=key_one,globex=key_two"
export function parseTenantKeys(raw: string | undefined): Map<string, string> {
  const m = new Map<string, string>()
  if (!raw) return m
  for (const part of raw.split(",").map(s => s.trim()).filter(Boolean)) {
    const [tenantId, key] = part.split("=").map(s => s?.trim())
    if (tenantId && key) m.set(key, tenantId)
  }
  return m
}

export function loadConfig(env: Env = process.env): AppConfig {
  const apiKey = (env.OPENAI_API_KEY || "").trim()
  const model = (env.OPENAI_MODEL || "").trim()

  return {
    openai: {
      apiKey: apiKey || null,
      baseUrl: (env.OPENAI_BASE_URL || "").trim() || "https://api.openai.com/v1",
      model: isModel(model) ? model : "gpt-4o-mini",
      timeoutMs: num(env.OPENAI_TIMEOUT_MS, 25000, 1),
      maxAttempts: num(env.OPENAI_MAX_ATTEMPTS, 3, 1),
    },
    llmCallTimeoutMs: num(env.LLM_CALL_TIMEOUT_MS, 30000, 1),
    batch: {
      concurrency: num(env.BATCH_CONCURRENCY, 4, 1),
      maxJobs: num(env.BATCH_MAX_JOBS, 20, 1),
      itemTimeoutMs: num(env.BATCH_ITEM_TIMEOUT_MS, 60000, 1),
    },
    server: {
      port: num(env.PORT, 8080),
      authDisabled: (env.AUTH_DISABLED || "").toLowerCase() === "true",
      tenantKeys: parseTenantKeys(env.TENANT_KEYS),
      rateLimitRps: num(env.RATE_LIMIT_RPS, 1),
      rateLimitBurst: num(env.RATE_LIMIT_BURST, 5, 1),
    },
  }
}
