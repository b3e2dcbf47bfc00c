import express, { type Express, type Request, type Response, type NextFunction } from "express";
import crypto from "crypto";
import type { AppConfig } from "../../../src/config";
import type { LLMAdapter } from "../../../core/llm/adapter";
import { runJobMatch } from "../../../src/engine/run_match_pipeline";
import { analyzeJob } from "../../../src/engine/analyze_job";
import { runJobMatchInsights } from "../../../src/engine/run_match_insights";
import { errorMessage } from "../../../core/domain/outcome";
import { logError, logInfo } from "../../../src/lib/log";
import { TokenBucketLimiter } from "./rate_limit";
import { suggestResumeContent } from "../../../core/domain/suggestions";
import {
  analyzeJobRequestSchema,
  formatIssues,
  insightsRequestSchema,
  matchRequestSchema,
  suggestionsRequestSchema,
} from "./schemas";

export type GatewayDeps = {
  config: AppConfig;
  llm: LLMAdapter | null;
  clock?: () => Date;
};

function getBearerToken(req: Request): string | null {
  const h = req.header("authorization");
  if (!h) return null;
  const m = h.match(/^Bearer\s+(.+)$/i);
  return m ? m[1].trim() : null;
}

function localString(res: Response, key: "requestId" | "tenantId"): string {
  const v: unknown = res.locals[key];
  return typeof v === "string" ? v : "";
}

export function createApp(deps: GatewayDeps): Express {
  const { config, llm } = deps;
  const clock = deps.clock ?? (() => new Date());
  const limiter = new TokenBucketLimiter(config.server.rateLimitRps, config.server.rateLimitBurst);

  const app = express();
  app.use(express.json({ limit: "2mb" }));

  // Request ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") || crypto.randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("x-request-id", requestId);
    next();
  });

  app.get("/healthz", (_req: Request, res: Response) => res.status(200).send("ok"));

  // Auth + rate limit (applies to v1)
  app.use("/v1", (req: Request, res: Response, next: NextFunction) => {
    if (config.server.authDisabled) {
      res.locals.tenantId = "auth_disabled";
      return next();
    }

    const token = getBearerToken(req);
    if (!token) {
      return res.status(401).json({ error: "missing_authorization_bearer_token" });
    }

    const tenantId = config.server.tenantKeys.get(token);
    if (!tenantId) {
      return res.status(403).json({ error: "invalid_api_key" });
    }

    if (!limiter.allow(tenantId)) {
      res.setHeader("Retry-After", "1");
      return res.status(429).json({ error: "rate_limited" });
    }

    res.locals.tenantId = tenantId;
    next();
  });

  app.post("/v1/match", async (req: Request, res: Response) => {
    const requestId = localString(res, "requestId");
    const parsed = matchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error), requestId });
    }

    try {
      const report = await runJobMatch({
        resume: parsed.data.resume,
        jobDescription: parsed.data.job_description,
        llm,
        llmTimeoutMs: config.llmCallTimeoutMs,
        now: clock(),
        requestId,
      });
      return res.json({ ok: true, requestId, tenantId: localString(res, "tenantId"), report });
    } catch (e: unknown) {
      logError("match_error", { requestId, err: errorMessage(e) });
      return res.status(500).json({ error: "internal_error", requestId });
    }
  });

  app.post("/v1/analyze-job", async (req: Request, res: Response) => {
    const requestId = localString(res, "requestId");
    const parsed = analyzeJobRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error), requestId });
    }

    try {
      const run = await analyzeJob({
        jobDescription: parsed.data.job_description,
        llm,
        timeoutMs: config.llmCallTimeoutMs,
        requestId,
      });
      return res.json({ ok: true, requestId, source: run.source, analysis: run.analysis });
    } catch (e: unknown) {
      logError("analyze_job_error", { requestId, err: errorMessage(e) });
      return res.status(500).json({ error: "internal_error", requestId });
    }
  });

  app.post("/v1/suggestions", (req: Request, res: Response) => {
    const requestId = localString(res, "requestId");
    const parsed = suggestionsRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error), requestId });
    }

    const { job_role, content_type } = parsed.data;
    return res.json({ ok: true, requestId, content_type, suggestions: suggestResumeContent(job_role, content_type) });
  });

  app.post("/v1/match/insights", async (req: Request, res: Response) => {
    const requestId = localString(res, "requestId");
    const parsed = insightsRequestSchema(config.batch.maxJobs).safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "invalid_request", issues: formatIssues(parsed.error), requestId });
    }

    try {
      const insights = await runJobMatchInsights({
        resume: parsed.data.resume,
        jobs: parsed.data.jobs.map((j, i) => ({
          id: j.id ?? `job-${i + 1}`,
          title: j.title ?? "",
          description: j.description,
        })),
        llm,
        llmTimeoutMs: config.llmCallTimeoutMs,
        concurrency: config.batch.concurrency,
        itemTimeoutMs: config.batch.itemTimeoutMs,
        maxJobs: config.batch.maxJobs,
        now: clock(),
        requestId,
      });
      logInfo("insights_served", { requestId, jobs: insights.items.length });
      return res.json({ ok: true, requestId, insights });
    } catch (e: unknown) {
      logError("insights_error", { requestId, err: errorMessage(e) });
      return res.status(500).json({ error: "internal_error", requestId });
    }
  });

  // Malformed JSON bodies surface here from express.json()
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = localString(res, "requestId");
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: "invalid_json", requestId });
    }
    logError("unhandled_error", { requestId, err: errorMessage(err) });
    return res.status(500).json({ error: "internal_error", requestId });
  });

  return app;
}
