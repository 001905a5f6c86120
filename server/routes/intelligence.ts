/**
 * Intelligence API routes - Express handlers over the calibration engine.
 *
 * Each endpoint is a plain function of (context, input) returning a status and
 * JSON body; `route` adapts it to Express. Typed errors map to status codes:
 * 400 unknown category / validation, 404 missing trigger, 503 no model,
 * storage or transport failure, 502 remote error.
 */

import type { Request, RequestHandler, Response } from "express";
import { z } from "zod";
import { runCalibration, getCalibrationHistory } from "../../src/lib/intelligence/calibrationHarness.js";
import { compareModels } from "../../src/lib/intelligence/modelComparison.js";
import { detectHandoffTriggers, recordManualTrigger } from "../../src/lib/intelligence/handoffTriggers.js";
import { evaluateResponse, QUALITY_RUBRIC } from "../../src/lib/intelligence/evaluator.js";
import { IntelligenceError } from "../../src/lib/intelligence/errors.js";
import { GENERAL_CATEGORY } from "../../src/lib/intelligence/calibrationPrompts.js";
import type { IntelligenceContext } from "../../src/lib/intelligence/context.js";

export interface EndpointInput {
  params: Record<string, string | undefined>;
  query: unknown;
  body: unknown;
}

export interface HttpResult {
  status: number;
  body: unknown;
}

export type Endpoint = (ctx: IntelligenceContext, input: EndpointInput) => Promise<HttpResult> | HttpResult;

const STATUS_BY_CODE: Record<string, number> = {
  UNKNOWN_CATEGORY: 400,
  NO_MODEL_AVAILABLE: 503,
  STORAGE_UNAVAILABLE: 503,
  TRANSPORT_ERROR: 503,
  REMOTE_ERROR: 502,
};

class ValidationError extends Error {
  constructor(public readonly issues: Record<string, string[] | undefined>) {
    super("Invalid request");
    this.name = "ValidationError";
  }
}

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    throw new ValidationError(result.error.flatten().fieldErrors);
  }
  return result.data;
}

function ok(data: Record<string, unknown>): HttpResult {
  return { status: 200, body: { success: true, ...data } };
}

function fail(status: number, code: string, message: string, details?: unknown): HttpResult {
  return { status, body: { success: false, error: { code, message, ...(details !== undefined && { details }) } } };
}

export function toHttpError(err: unknown): HttpResult {
  if (err instanceof ValidationError) {
    return fail(400, "VALIDATION_ERROR", err.message, err.issues);
  }
  if (err instanceof IntelligenceError) {
    return fail(STATUS_BY_CODE[err.code] ?? 500, err.code, err.message, err.details);
  }
  console.error("[API] Unhandled error:", err);
  return fail(500, "INTERNAL_ERROR", err instanceof Error ? err.message : "Internal server error");
}

export async function invokeEndpoint(
  endpoint: Endpoint,
  ctx: IntelligenceContext,
  input: EndpointInput
): Promise<HttpResult> {
  try {
    return await endpoint(ctx, input);
  } catch (e) {
    return toHttpError(e);
  }
}

export function route(ctx: IntelligenceContext, endpoint: Endpoint): RequestHandler {
  return async (req: Request, res: Response) => {
    const result = await invokeEndpoint(endpoint, ctx, { params: req.params, query: req.query, body: req.body });
    res.status(result.status).json(result.body);
  };
}

const intQuery = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).optional().default(fallback);

const MetricsQuerySchema = z.object({
  modelId: z.string().min(1).optional(),
  days: intQuery(1, 365, 30),
});

export const metricsGet: Endpoint = (ctx, { query }) => {
  const q = parse(MetricsQuerySchema, query);
  return ok({ summary: ctx.store.summarizeMetrics(q.modelId, q.days) });
};

const CalibrationRunSchema = z.object({
  modelId: z.string().min(1).optional(),
  category: z.string().min(1).default(GENERAL_CATEGORY),
  customPrompt: z.string().optional(),
  passingThreshold: z.number().min(0).max(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const calibrationRunPost: Endpoint = async (ctx, { body }) => {
  const b = parse(CalibrationRunSchema, body);
  const run = await runCalibration(
    { store: ctx.store, client: ctx.client },
    {
      category: b.category,
      runLogPath: ctx.runLogPath,
      ...(b.modelId && { modelId: b.modelId }),
      ...(b.customPrompt && { customPrompt: b.customPrompt }),
      ...(b.passingThreshold != null && { passingThreshold: b.passingThreshold }),
      ...(b.timeoutMs != null && { timeoutMs: b.timeoutMs }),
    }
  );
  return ok({ run });
};

const HistoryQuerySchema = z.object({
  modelId: z.string().min(1).optional(),
  limit: intQuery(1, 500, 50),
});

export const calibrationHistoryGet: Endpoint = (ctx, { query }) => {
  const q = parse(HistoryQuerySchema, query);
  return ok({ history: getCalibrationHistory(ctx.store, q.modelId, q.limit) });
};

const EvaluateSchema = z.object({
  prompt: z.string(),
  response: z.string(),
  category: z.string().min(1).default(GENERAL_CATEGORY),
});

export const evaluatePost: Endpoint = (_ctx, { body }) => {
  const b = parse(EvaluateSchema, body);
  return ok({ evaluation: evaluateResponse(b.prompt, b.response, b.category), rubric: QUALITY_RUBRIC });
};

const DetectSchema = z.object({
  recentWindow: z.number().int().positive().optional(),
  failureThreshold: z.number().int().positive().optional(),
});

export const triggersDetectPost: Endpoint = (ctx, { body }) => {
  const b = parse(DetectSchema, body);
  return ok({ detection: detectHandoffTriggers(ctx.store, b) });
};

const ManualTriggerSchema = z.object({
  patternType: z.string().min(1),
  description: z.string().min(1),
  confidence: z.number().min(0).max(1).optional(),
});

export const triggersPost: Endpoint = (ctx, { body }) => {
  const b = parse(ManualTriggerSchema, body);
  return ok({ triggers: recordManualTrigger(ctx.store, b.patternType, b.description, b.confidence) });
};

const TriggersQuerySchema = z.object({
  activeOnly: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v !== "false"),
});

export const triggersGet: Endpoint = (ctx, { query }) => {
  const q = parse(TriggersQuerySchema, query);
  return ok({ triggers: ctx.store.getHandoffTriggers(q.activeOnly) });
};

const TriggerIdSchema = z.object({ id: z.coerce.number().int().positive() });
const TriggerActiveSchema = z.object({ active: z.boolean() });

export const triggerActivePost: Endpoint = (ctx, { params, body }) => {
  const { id } = parse(TriggerIdSchema, params);
  const { active } = parse(TriggerActiveSchema, body);
  if (!ctx.store.setHandoffTriggerActive(id, active)) {
    return fail(404, "NOT_FOUND", `Handoff trigger ${id} not found`);
  }
  return ok({ id, active });
};

const CompareSchema = z.object({
  prompt: z.string().min(1),
  systemPrompt: z.string().optional(),
  modelIds: z.array(z.string()).optional(),
  policy: z.enum(["speed", "quality", "balanced"]).default("balanced"),
  category: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const comparePost: Endpoint = async (ctx, { body }) => {
  const b = parse(CompareSchema, body);
  const comparison = await compareModels({ store: ctx.store, client: ctx.client }, b);
  return ok({ comparison });
};

export const healthGet: Endpoint = async (ctx) => {
  let storage: { ok: boolean; error?: string };
  try {
    ctx.store.initialize();
    storage = { ok: true };
  } catch (e) {
    storage = { ok: false, error: e instanceof Error ? e.message : String(e) };
  }
  let sidecar: { reachable: boolean; modelCount: number; error?: string };
  try {
    const models = await ctx.client.listModels();
    sidecar = { reachable: true, modelCount: models.length };
  } catch (e) {
    sidecar = { reachable: false, modelCount: 0, error: e instanceof Error ? e.message : String(e) };
  }
  return {
    status: storage.ok ? 200 : 503,
    body: { success: storage.ok, dbPath: ctx.store.path, storage, sidecar },
  };
};
