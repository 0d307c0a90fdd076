import type { NextFunction, Request, Response } from "express";
import jwt, { type Algorithm } from "jsonwebtoken";
import { isAuthDisabled } from "./config.js";
import { AUTH_ROLES, type AuthPrincipal, type AuthRole } from "./types.js";

const PUBLIC_PATHS = new Set(["/health", "/metrics"]);
const AUTH_ALGORITHMS: Algorithm[] = ["HS256"];
const AGENT_INGRESS = /^\/agents\/[^/]+\/(connect|disconnect)$/;

/** Agents authenticate these with their own connect secret. */
function isAgentIngress(req: Request): boolean {
  return req.method === "POST" && AGENT_INGRESS.test(req.path);
}

function isPublicRequest(req: Request): boolean {
  return req.method === "OPTIONS" || PUBLIC_PATHS.has(req.path) || isAgentIngress(req);
}

function parseBearerToken(headerValue: string | undefined): string | null {
  if (!headerValue) return null;
  const match = headerValue.match(/^Bearer\s+(.+)$/i);
  return match?.[1] ?? null;
}

function getSecret(): string {
  return process.env.AUTH_JWT_SECRET?.trim() ?? "";
}

function toRole(value: unknown): AuthRole | null {
  if (typeof value !== "string") return null;
  return AUTH_ROLES.find((role) => role === value) ?? null;
}

function buildLocalBypassPrincipal(): AuthPrincipal {
  return {
    subject: process.env.AUTH_DEV_SUBJECT ?? "local-dev-user",
    role: toRole(process.env.AUTH_DEV_ROLE) ?? "admin"
  };
}

function deny(res: Response, status: 401 | 403, code: string, message: string): void {
  res.status(status).json({ error: message, code });
}

export function authenticateRequest(req: Request, res: Response, next: NextFunction): void {
  if (isPublicRequest(req)) {
    next();
    return;
  }

  if (isAuthDisabled()) {
    req.auth = buildLocalBypassPrincipal();
    next();
    return;
  }

  const token = parseBearerToken(req.header("authorization"));
  if (!token) {
    deny(res, 401, "AUTH_MISSING_BEARER", "Missing Authorization Bearer token");
    return;
  }

  const secret = getSecret();
  if (!secret) {
    deny(res, 401, "AUTH_SECRET_MISCONFIGURED", "Auth secret is not configured");
    return;
  }

  try {
    const decoded = jwt.verify(token, secret, { algorithms: AUTH_ALGORITHMS });
    if (typeof decoded !== "object" || decoded === null) {
      deny(res, 401, "AUTH_INVALID_PAYLOAD", "Invalid JWT payload");
      return;
    }

    const role = toRole(decoded.role);
    const subject = typeof decoded.sub === "string" ? decoded.sub : null;

    if (!subject || !role) {
      deny(res, 401, "AUTH_MISSING_CLAIMS", "JWT must include sub and role claims");
      return;
    }

    req.auth = { subject, role };
    next();
  } catch {
    deny(res, 401, "AUTH_INVALID_TOKEN", "Invalid or expired JWT");
  }
}

function isCloudRegistration(req: Request): boolean {
  return req.method === "POST" && req.path === "/clouds";
}

function isWriteMethod(req: Request): boolean {
  return req.method !== "GET" && req.method !== "HEAD";
}

export function authorizeRoleForRequest(req: Request, res: Response, next: NextFunction): void {
  if (isPublicRequest(req)) {
    next();
    return;
  }

  const principal = req.auth;
  if (!principal) {
    deny(res, 401, "AUTH_REQUIRED", "Authentication required");
    return;
  }

  if (principal.role === "admin") {
    next();
    return;
  }

  if (principal.role === "operator") {
    if (isCloudRegistration(req)) {
      deny(res, 403, "RBAC_FORBIDDEN", "Operator role is not allowed to register clouds");
      return;
    }
    next();
    return;
  }

  if (isWriteMethod(req)) {
    deny(res, 403, "RBAC_FORBIDDEN", "Viewer role is read-only");
    return;
  }

  next();
}
