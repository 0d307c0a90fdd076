import { logError, logInfo } from "../observability/logger.js";
import { recordTeardown } from "../observability/metrics.js";
import { systemClock, type Clock } from "../services/clock.js";
import { describeError } from "../services/errors.js";
import { appendAgentEvent } from "./eventStore.js";
import type { NodeRegistry } from "./registry.js";
import type { AgentNode } from "./types.js";

export type TeardownReason = "launch_failed" | "connect_timeout" | "task_completed" | "startup_orphan";

/**
 * Removes an agent node from the registry. Failures are logged and reported
 * as `false`; this never throws and never retries.
 */
export async function removeAgentNode(
  registry: NodeRegistry,
  node: AgentNode,
  reason: TeardownReason,
  options: { delayMs?: number; clock?: Clock } = {}
): Promise<boolean> {
  const agent = node.displayName;
  try {
    if (options.delayMs && options.delayMs > 0) {
      await (options.clock ?? systemClock).sleep(options.delayMs);
    }

    const removed = await registry.remove(node);
    recordTeardown({ reason, result: removed ? "removed" : "missing" });
    if (removed) {
      logInfo("agent.teardown.completed", { context: { agent }, data: { reason } });
      appendAgentEvent({ agent, type: "AGENT_REMOVED", message: `Agent removed (${reason})`, payload: { reason } });
    }
    return removed;
  } catch (error) {
    recordTeardown({ reason, result: "error" });
    logError("agent.teardown.failed", { context: { agent }, data: { reason, error: describeError(error) } });
    return false;
  }
}
