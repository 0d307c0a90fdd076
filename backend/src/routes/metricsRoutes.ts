import { Router } from "express";
import { renderPrometheusMetrics } from "../observability/metrics.js";
import type { ServiceRuntime } from "../app.js";

export function createMetricsRouter(runtime: ServiceRuntime): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    res.json({
      ok: true,
      service: "codebuild-agent-provisioner",
      clouds: runtime.clouds.list().length,
      agents: runtime.registry.size
    });
  });

  router.get("/metrics", (_req, res) => {
    res.setHeader("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
    res.send(renderPrometheusMetrics());
  });

  return router;
}
