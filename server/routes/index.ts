/**
 * API route registration for Express.
 * Mounts the intelligence routes under /api/intelligence via a dedicated router.
 */

import express, { type Express } from "express";
import type { IntelligenceContext } from "../../src/lib/intelligence/context.js";
import * as intelligence from "./intelligence.js";

export function registerApiRoutes(app: Express, ctx: IntelligenceContext): void {
  const api = express.Router();
  const route = (endpoint: intelligence.Endpoint) => intelligence.route(ctx, endpoint);

  api.get("/health", route(intelligence.healthGet));

  // Metrics
  api.get("/metrics", route(intelligence.metricsGet));

  // Calibration
  api.post("/calibration/run", route(intelligence.calibrationRunPost));
  api.get("/calibration/history", route(intelligence.calibrationHistoryGet));
  api.post("/evaluate", route(intelligence.evaluatePost));

  // Handoff triggers
  api.post("/handoff-triggers/detect", route(intelligence.triggersDetectPost));
  api.post("/handoff-triggers", route(intelligence.triggersPost));
  api.get("/handoff-triggers", route(intelligence.triggersGet));
  api.post("/handoff-triggers/:id/active", route(intelligence.triggerActivePost));

  // Comparison
  api.post("/compare", route(intelligence.comparePost));

  app.use("/api/intelligence", api);
}
