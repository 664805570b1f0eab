import express from "express";
import type { RelayMetrics } from "./relay-metrics.js";
import type { RelayServer } from "./relay-server.js";

/** HTTP side door for operators: liveness and Prometheus scraping. */
export function createStatusApp(relay: RelayServer, metrics: RelayMetrics): express.Application {
  const app = express();
  const startedAt = Date.now();

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      players: relay.playerCount,
      uptime_s: Math.floor((Date.now() - startedAt) / 1000),
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/metrics", async (_req: express.Request, res: express.Response) => {
    try {
      const body = await metrics.getMetrics();
      res.set("Content-Type", metrics.getContentType());
      res.send(body);
    } catch (err) {
      res.status(500).json({ error: err instanceof Error ? err.message : String(err) });
    }
  });

  return app;
}
