import { logError, logInfo } from "../observability/logger.js";
import { describeError } from "../services/errors.js";
import type { CodeBuildAgent } from "./agentNode.js";
import { appendAgentEvent } from "./eventStore.js";
import { removeAgentNode } from "./teardown.js";
import type { CloudContext, RuntimeComputer, TaskInfo } from "./types.js";

export const GRACEFUL_SHUTDOWN_DELAY_MS = 500;

export function buildConsoleUrl(input: { region: string; projectName: string; buildId: string }): string {
  return `https://${input.region}.console.aws.amazon.com/codesuite/codebuild/projects/${input.projectName}/build/${encodeURIComponent(input.buildId)}`;
}

/** Runtime handle of a CodeBuild agent: connection state, task hooks and the bound build. */
export class CodeBuildComputer implements RuntimeComputer {
  readonly name: string;
  private readonly cloud: CloudContext;
  private node: CodeBuildAgent | null;
  private buildId: string | null = null;
  private online = false;
  private acceptingTasks = true;
  private shutdown: Promise<void> | null = null;

  constructor(agent: CodeBuildAgent) {
    this.node = agent;
    this.name = agent.displayName;
    this.cloud = agent.cloud;
  }

  getNode(): CodeBuildAgent | null {
    return this.node;
  }

  getBuildId(): string | null {
    return this.buildId;
  }

  setBuildId(buildId: string | null): void {
    this.buildId = buildId;
  }

  getBuildUrl(): string | null {
    if (!this.buildId) return null;
    return buildConsoleUrl({
      region: this.cloud.config.region,
      projectName: this.cloud.config.projectName,
      buildId: this.buildId
    });
  }

  isOnline(): boolean {
    return this.online;
  }

  isAcceptingTasks(): boolean {
    return this.acceptingTasks;
  }

  setAcceptingTasks(accepting: boolean): void {
    this.acceptingTasks = accepting;
  }

  connect(): void {
    this.online = true;
    logInfo("agent.connected", { context: { agent: this.name, build_id: this.buildId ?? undefined } });
    appendAgentEvent({ agent: this.name, type: "AGENT_CONNECTED", message: "Agent connected" });
  }

  disconnect(): void {
    const wasOnline = this.online;
    this.online = false;
    this.node?.launcher.beforeDisconnect(this);
    if (wasOnline) {
      logInfo("agent.disconnected", { context: { agent: this.name } });
      appendAgentEvent({ agent: this.name, type: "AGENT_DISCONNECTED", message: "Agent disconnected" });
    }
  }

  detach(): void {
    this.node = null;
  }

  onTaskAccepted(task: TaskInfo): void {
    logInfo("agent.task.accepted", { context: { agent: this.name }, data: { task: task.name } });
    appendAgentEvent({ agent: this.name, type: "TASK_ACCEPTED", message: `Task in job '${task.name}' accepted` });
  }

  onTaskCompleted(task: TaskInfo): void {
    logInfo("agent.task.completed", {
      context: { agent: this.name },
      data: { task: task.name, duration_ms: task.durationMs ?? null }
    });
    appendAgentEvent({ agent: this.name, type: "TASK_COMPLETED", message: `Task in job '${task.name}' completed` });
    void this.gracefulShutdown();
  }

  onTaskCompletedWithProblems(task: TaskInfo, problems: unknown): void {
    logError("agent.task.completed_with_problems", {
      context: { agent: this.name },
      data: { task: task.name, duration_ms: task.durationMs ?? null, problems: describeError(problems) }
    });
    appendAgentEvent({
      agent: this.name,
      type: "TASK_COMPLETED",
      message: `Task in job '${task.name}' completed with problems`,
      payload: { problems: describeError(problems) }
    });
    void this.gracefulShutdown();
  }

  /**
   * Stops accepting tasks right away, then removes the node after a short grace
   * delay. Repeated calls share one teardown.
   */
  gracefulShutdown(): Promise<void> {
    this.acceptingTasks = false;
    if (this.shutdown) return this.shutdown;

    const node = this.node;
    if (!node) {
      this.shutdown = Promise.resolve();
      return this.shutdown;
    }

    logInfo("agent.shutdown.scheduled", { context: { agent: this.name }, data: { delay_ms: GRACEFUL_SHUTDOWN_DELAY_MS } });
    this.shutdown = removeAgentNode(this.cloud.registry, node, "task_completed", {
      delayMs: GRACEFUL_SHUTDOWN_DELAY_MS,
      clock: this.cloud.clock
    }).then(() => undefined);
    return this.shutdown;
  }

  toString(): string {
    return `name: ${this.name} buildID: ${this.buildId}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      buildId: this.buildId,
      buildUrl: this.getBuildUrl(),
      online: this.online,
      acceptingTasks: this.acceptingTasks,
      shuttingDown: this.shutdown !== null
    };
  }
}
