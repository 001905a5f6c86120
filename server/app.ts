/**
 * Express app factory. Kept separate from the listener so the wiring can be
 * built around any context.
 */

import express, { type Express } from "express";
import cors from "cors";
import { registerApiRoutes } from "./routes/index.js";
import type { IntelligenceContext } from "../src/lib/intelligence/context.js";

export function createApp(ctx: IntelligenceContext): Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  registerApiRoutes(app, ctx);

  app.get("/", (_req, res) => {
    res.json({ name: "local-model-intelligence", health: "/api/intelligence/health" });
  });
  return app;
}
