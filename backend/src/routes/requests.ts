export interface ProvisionRequest {
  label: string | null;
  excessWorkload: number;
}

function bodyObject(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== "object" || Array.isArray(body)) return {};
  return Object.fromEntries(Object.entries(body));
}

export function readProvisionRequest(body: unknown): ProvisionRequest {
  const source = bodyObject(body);
  const { label, excessWorkload } = source;

  if (label !== undefined && label !== null && typeof label !== "string") {
    throw new Error("label must be a string");
  }
  if (typeof excessWorkload !== "number" || !Number.isInteger(excessWorkload) || excessWorkload < 0) {
    throw new Error("excessWorkload must be a non-negative integer");
  }
  return { label: label ?? null, excessWorkload };
}

export interface TaskSignal {
  task: string;
  durationMs?: number;
  problems?: string;
}

export function readTaskSignal(body: unknown): TaskSignal {
  const source = bodyObject(body);
  const { task, durationMs, problems } = source;

  if (typeof task !== "string" || !task.trim()) {
    throw new Error("task is required");
  }
  if (durationMs !== undefined && (typeof durationMs !== "number" || durationMs < 0)) {
    throw new Error("durationMs must be a non-negative number");
  }
  if (problems !== undefined && problems !== null && typeof problems !== "string") {
    throw new Error("problems must be a string");
  }
  return {
    task,
    ...(durationMs !== undefined ? { durationMs } : {}),
    ...(typeof problems === "string" && problems ? { problems } : {})
  };
}

/** The agent's connect secret, from the JSON body or the x-agent-secret header. */
export function readAgentSecret(body: unknown, header: string | undefined): string | null {
  const secret = bodyObject(body).secret;
  if (typeof secret === "string" && secret) return secret;
  return header?.trim() || null;
}

export function readLimit(value: unknown, fallback: number): number {
  if (typeof value !== "string") return fallback;
  const limit = Number(value);
  return Number.isInteger(limit) && limit > 0 ? Math.min(limit, 500) : fallback;
}

export function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}
