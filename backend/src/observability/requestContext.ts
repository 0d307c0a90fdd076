import { nanoid } from "nanoid";
import type { NextFunction, Request, Response } from "express";
import { logError, logInfo } from "./logger.js";
import { recordHttpRequest } from "./metrics.js";

export interface RequestContext {
  request_id: string;
  cloud?: string;
  agent?: string;
}

const RESERVED_CLOUD_SEGMENTS = new Set(["projects", "regions"]);

function pickString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

function pathSegment(path: string, prefix: string): string | undefined {
  const [first, second] = path.split("/").filter(Boolean);
  if (first !== prefix || !second) return undefined;
  return decodeURIComponent(second);
}

export function resolveRequestContext(req: Request): RequestContext {
  const request_id = pickString(req.header("x-request-id")) ?? nanoid(10);
  const cloudSegment = pathSegment(req.path, "clouds");
  const cloud =
    pickString(req.header("x-cloud-name")) ??
    (cloudSegment && !RESERVED_CLOUD_SEGMENTS.has(cloudSegment) ? cloudSegment : undefined);
  const agent = pickString(req.header("x-agent-name")) ?? pathSegment(req.path, "agents");

  return {
    request_id,
    ...(cloud ? { cloud } : {}),
    ...(agent ? { agent } : {})
  };
}

export function attachRequestContext(req: Request, res: Response, next: NextFunction): void {
  req.context = resolveRequestContext(req);
  res.setHeader("x-request-id", req.context.request_id);
  next();
}

function endpointLabel(req: Request): string {
  const route: unknown = req.route;
  const routePath = route && typeof route === "object" && "path" in route && typeof route.path === "string" ? route.path : null;
  if (!routePath) return "unmatched";
  return `${req.baseUrl ?? ""}${routePath}`.replace(/\/{2,}/g, "/");
}

/** Logs each request once it finishes and records its latency by route pattern. */
export function logRequestLifecycle(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on("finish", () => {
    const duration_ms = Date.now() - startedAt;
    const data: Record<string, unknown> = {
      method: req.method,
      path: req.path,
      status_code: res.statusCode,
      duration_ms
    };
    if (res.statusCode >= 400) {
      logError("http.request.completed", { context: req.context, data });
    } else {
      logInfo("http.request.completed", { context: req.context, data });
    }
    recordHttpRequest({ method: req.method, endpoint: endpointLabel(req), statusCode: res.statusCode, durationMs: duration_ms });
  });

  next();
}

export function logUnhandledError(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  void _next;
  logError("http.request.unhandled_error", {
    context: req.context,
    data: {
      method: req.method,
      path: req.path,
      status_code: 500,
      error: err instanceof Error ? err.message : "Unknown error"
    }
  });
  res.status(500).json({ error: "Internal server error" });
}
