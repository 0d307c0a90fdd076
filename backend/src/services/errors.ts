export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class CloudConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CloudConfigError";
  }
}

export class LaunchTimeoutError extends Error {
  constructor(agentName: string, buildId: string) {
    super(`Timed out while waiting for agent ${agentName} to start for build ID: ${buildId}`);
    this.name = "LaunchTimeoutError";
  }
}

export class NodeAlreadyRegisteredError extends Error {
  constructor(name: string) {
    super(`Node already registered: ${name}`);
    this.name = "NodeAlreadyRegisteredError";
  }
}
