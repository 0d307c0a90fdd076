import cors from "cors";
import express from "express";
import { authenticateRequest, authorizeRoleForRequest } from "./auth/middleware.js";
import { validateSecurityConfig } from "./auth/config.js";
import type { CloudSet } from "./cloud/cloudSet.js";
import type { DiscoveryDeps } from "./cloud/discovery.js";
import type { ConnectSecrets } from "./nodes/connectSecret.js";
import type { NodeRegistry } from "./nodes/registry.js";
import { attachRequestContext, logRequestLifecycle, logUnhandledError } from "./observability/requestContext.js";
import { createAgentRouter } from "./routes/agentRoutes.js";
import { createCloudRouter } from "./routes/cloudRoutes.js";
import { createMetricsRouter } from "./routes/metricsRoutes.js";
import { createProvisionRouter } from "./routes/provisionRoutes.js";
import { subscribeEvents } from "./services/eventBus.js";

/** Everything the HTTP surface reaches into. */
export interface ServiceRuntime {
  clouds: CloudSet;
  registry: NodeRegistry;
  connectSecrets: ConnectSecrets;
  discovery: DiscoveryDeps;
}

export function createApp(runtime: ServiceRuntime) {
  validateSecurityConfig();

  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(attachRequestContext);
  app.use(logRequestLifecycle);

  app.use(createMetricsRouter(runtime));

  app.use(authenticateRequest);
  app.use(authorizeRoleForRequest);

  app.use(createCloudRouter(runtime));
  app.use(createProvisionRouter(runtime));
  app.use(createAgentRouter(runtime));

  app.get("/events", (_req, res) => {
    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");
    res.flushHeaders();

    const unsubscribe = subscribeEvents((event) => {
      res.write(`data: ${JSON.stringify(event)}\n\n`);
    });

    const heartbeat = setInterval(() => {
      res.write(": heartbeat\n\n");
    }, 20000);

    res.on("close", () => {
      clearInterval(heartbeat);
      unsubscribe();
      res.end();
    });
  });

  app.use(logUnhandledError);
  return app;
}
