import { nanoid } from "nanoid";
import { publishEvent } from "../services/eventBus.js";
import { recordAgentEvent } from "../observability/metrics.js";

export type AgentEventType =
  | "AGENT_PLANNED"
  | "AGENT_REGISTERED"
  | "BUILD_STARTED"
  | "AGENT_CONNECTED"
  | "AGENT_DISCONNECTED"
  | "TASK_ACCEPTED"
  | "TASK_COMPLETED"
  | "LAUNCH_FAILED"
  | "AGENT_REMOVED"
  | "LOG";

export interface AgentEvent {
  id: string;
  agent: string;
  type: AgentEventType;
  message: string;
  payload?: Record<string, unknown>;
  timestamp: string;
}

/** Default threshold: prune when a log exceeds this many events. */
export const PRUNE_THRESHOLD = 500;
/** After pruning, keep this many recent events. */
export const PRUNE_KEEP = 200;
/** Logs of the oldest agents are dropped beyond this many. */
export const MAX_TRACKED_AGENTS = 500;

const logs = new Map<string, AgentEvent[]>();

function logFor(agent: string): AgentEvent[] {
  const existing = logs.get(agent);
  if (existing) return existing;

  const created: AgentEvent[] = [];
  logs.set(agent, created);
  while (logs.size > MAX_TRACKED_AGENTS) {
    const oldest = logs.keys().next();
    if (oldest.done) break;
    logs.delete(oldest.value);
  }
  return created;
}

export function appendAgentEvent(input: Omit<AgentEvent, "id" | "timestamp"> & { timestamp?: string }): AgentEvent {
  const event: AgentEvent = {
    id: nanoid(10),
    timestamp: input.timestamp ?? new Date().toISOString(),
    ...input
  };

  logFor(input.agent).push(event);
  autoPruneIfNeeded(input.agent);

  recordAgentEvent();
  publishEvent({
    type: "agent.event",
    timestamp: event.timestamp,
    payload: {
      agent: event.agent,
      eventType: event.type,
      message: event.message
    }
  });
  return event;
}

export function readAgentEvents(agent: string, limit = 50): AgentEvent[] {
  const log = logs.get(agent);
  if (!log) return [];
  return log.slice(-limit);
}

export function countAgentEvents(agent: string): number {
  return logs.get(agent)?.length ?? 0;
}

/**
 * Keep only the most recent `keep` events. Returns the number removed.
 */
export function pruneAgentEvents(agent: string, keep: number): number {
  const log = logs.get(agent);
  if (!log || log.length <= keep) return 0;

  const removed = log.length - keep;
  log.splice(0, removed);
  return removed;
}

export function autoPruneIfNeeded(agent: string): number {
  if (countAgentEvents(agent) > PRUNE_THRESHOLD) {
    return pruneAgentEvents(agent, PRUNE_KEEP);
  }
  return 0;
}

export function resetAgentEventsForTests(): void {
  logs.clear();
}
