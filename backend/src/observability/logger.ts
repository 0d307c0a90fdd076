export interface LogContext {
  request_id?: string;
  cloud?: string;
  agent?: string;
  build_id?: string;
}

export type LogLevel = "info" | "error";

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

const SERVICE_NAME = "codebuild-agent-provisioner";

export function buildLogEntry(input: {
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level: input.level,
    message: input.message,
    service: SERVICE_NAME,
    ...(input.context ? { context: input.context } : {}),
    ...(input.data ? { data: input.data } : {})
  };
}

function isSilenced(): boolean {
  return process.env.LOG_SILENT === "true";
}

export function logInfo(message: string, options?: { context?: LogContext; data?: Record<string, unknown> }): void {
  if (isSilenced()) return;
  process.stdout.write(`${JSON.stringify(buildLogEntry({ level: "info", message, ...options }))}\n`);
}

export function logError(message: string, options?: { context?: LogContext; data?: Record<string, unknown> }): void {
  if (isSilenced()) return;
  process.stderr.write(`${JSON.stringify(buildLogEntry({ level: "error", message, ...options }))}\n`);
}
