import { logError, logInfo } from "../observability/logger.js";
import { appendAgentEvent } from "../nodes/eventStore.js";

/** Receives launch progress for one agent. */
export interface TaskListener {
  info(message: string): void;
  fatalError(message: string): void;
}

export function createAgentTaskListener(agent: string): TaskListener {
  return {
    info(message) {
      logInfo("agent.launch.info", { context: { agent }, data: { message } });
      appendAgentEvent({ agent, type: "LOG", message });
    },
    fatalError(message) {
      logError("agent.launch.fatal", { context: { agent }, data: { message } });
      appendAgentEvent({ agent, type: "LAUNCH_FAILED", message });
    }
  };
}
