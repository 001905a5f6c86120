/**
 * Express server - intelligence API.
 */

import { createApp } from "./app.js";
import { createIntelligenceContext } from "../src/lib/intelligence/context.js";

const PORT = parseInt(process.env.PORT ?? "3000", 10);

async function start() {
  const ctx = createIntelligenceContext();
  try {
    ctx.store.initialize();
  } catch (e) {
    console.warn("[Server] Metrics storage unavailable at startup:", e instanceof Error ? e.message : e);
  }
  const app = createApp(ctx);
  const server = app.listen(PORT, "0.0.0.0", () => {
    console.log(`Server running at http://0.0.0.0:${PORT} (metrics db: ${ctx.store.path})`);
  });

  const shutdown = () => {
    server.close(() => {
      ctx.store.close();
      process.exit(0);
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
