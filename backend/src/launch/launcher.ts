import { logError, logInfo } from "../observability/logger.js";
import { recordLaunch } from "../observability/metrics.js";
import { CodeBuildAgent } from "../nodes/agentNode.js";
import { CodeBuildComputer } from "../nodes/computer.js";
import { appendAgentEvent } from "../nodes/eventStore.js";
import { removeAgentNode } from "../nodes/teardown.js";
import type { CloudContext, LauncherInterface, RuntimeComputer } from "../nodes/types.js";
import { publishEvent } from "../services/eventBus.js";
import { describeError, LaunchTimeoutError } from "../services/errors.js";
import { buildBuildspec, buildConnectCommand } from "./buildspec.js";
import { reduceLaunchState, type LaunchEvent, type LaunchState } from "./stateMachine.js";
import type { TaskListener } from "./taskListener.js";

export const POLL_INTERVAL_MS = 500;

/**
 * Starts the CodeBuild build for one agent and waits for the agent to connect
 * back. Used once: a launcher never relaunches after it leaves `idle`.
 */
export class CodeBuildLauncher implements LauncherInterface {
  private state: LaunchState = "idle";
  private readonly pollIntervalMs: number;

  constructor(
    private readonly cloud: CloudContext,
    options: { pollIntervalMs?: number } = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  }

  getState(): LaunchState {
    return this.state;
  }

  isLaunchSupported(): boolean {
    return this.state === "idle";
  }

  /** Connection attempts before giving up; `agentTimeout * 2` at the default interval. */
  pollAttempts(): number {
    return Math.max(1, Math.ceil((this.cloud.config.agentTimeout * 1000) / this.pollIntervalMs));
  }

  async launch(computer: RuntimeComputer, listener: TaskListener): Promise<void> {
    if (!this.isLaunchSupported()) {
      logError("launch.rejected", { context: { cloud: this.cloud.name, agent: computer.name }, data: { state: this.state } });
      return;
    }
    if (!(computer instanceof CodeBuildComputer)) {
      logError("launch.unsupported_computer", { context: { cloud: this.cloud.name, agent: computer.name } });
      return;
    }
    const node = computer.getNode();
    if (!(node instanceof CodeBuildAgent)) {
      logError("launch.missing_node", { context: { cloud: this.cloud.name, agent: computer.name } });
      return;
    }

    const agent = node.displayName;
    const config = this.cloud.config;
    const clock = this.cloud.clock;
    this.transition(agent, "launch_requested");
    logInfo("launch.started", { context: { cloud: this.cloud.name, agent }, data: { project: config.projectName } });

    try {
      const connectCommand = buildConnectCommand({
        jnlpCommand: config.jnlpCommand,
        controllerUrl: config.controllerUrl,
        connectSecret: this.cloud.connectSecrets.issue(agent),
        displayName: agent
      });
      const buildId = await this.cloud.getClient().startBuild({
        projectName: config.projectName,
        buildspec: buildBuildspec(connectCommand),
        image: config.jnlpImage,
        computeType: config.computeType
      });
      const startedAt = clock.now();

      computer.setBuildId(buildId);
      this.transition(agent, "build_started");
      await this.cloud.registry.recordBuild(agent);
      appendAgentEvent({ agent, type: "BUILD_STARTED", message: `Started build ${buildId}`, payload: { build_id: buildId } });

      this.transition(agent, "awaiting_connection");
      listener.info(`Waiting for agent '${computer.toString()}' to connect to build ID: ${buildId}`);

      const attempts = this.pollAttempts();
      for (let attempt = 0; attempt < attempts; attempt += 1) {
        await clock.sleep(this.pollIntervalMs);
        if (computer.isOnline() && computer.isAcceptingTasks()) {
          this.transition(agent, "agent_connected");
          recordLaunch({ cloud: this.cloud.name, outcome: "connected", durationMs: clock.now() - startedAt });
          logInfo("launch.connected", { context: { cloud: this.cloud.name, agent, build_id: buildId } });
          return;
        }
      }
      throw new LaunchTimeoutError(agent, buildId);
    } catch (error) {
      await this.fail(computer, node, listener, error);
    }
  }

  beforeDisconnect(computer: RuntimeComputer): void {
    if (computer instanceof CodeBuildComputer) {
      computer.setBuildId(null);
    }
  }

  private async fail(computer: CodeBuildComputer, node: CodeBuildAgent, listener: TaskListener, error: unknown): Promise<void> {
    const agent = node.displayName;
    const timedOut = error instanceof LaunchTimeoutError;
    const message = describeError(error);

    computer.setBuildId(null);
    this.transition(agent, "launch_failed");
    recordLaunch({ cloud: this.cloud.name, outcome: timedOut ? "timeout" : "failed" });
    logError("launch.failed", { context: { cloud: this.cloud.name, agent }, data: { error: message } });
    listener.fatalError(`Exception while starting build: ${message}`);

    if (this.cloud.registry.get(agent) === node) {
      await removeAgentNode(this.cloud.registry, node, timedOut ? "connect_timeout" : "launch_failed");
    }
  }

  private transition(agent: string, event: LaunchEvent): void {
    const next = reduceLaunchState(this.state, { event });
    if (next === this.state) return;
    this.state = next;
    publishEvent({
      type: "launch.state_changed",
      timestamp: new Date(this.cloud.clock.now()).toISOString(),
      payload: { cloud: this.cloud.name, agent, state: next }
    });
  }
}
