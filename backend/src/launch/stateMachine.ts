export type LaunchState =
  | "idle"
  | "launch_requested"
  | "build_started"
  | "awaiting_connection"
  | "connected"
  | "failed";

export type LaunchEvent =
  | "launch_requested"
  | "build_started"
  | "awaiting_connection"
  | "agent_connected"
  | "launch_failed";

export function isTerminalLaunchState(state: LaunchState): boolean {
  return state === "connected" || state === "failed";
}

export function reduceLaunchState(current: LaunchState, input: { event: LaunchEvent }): LaunchState {
  if (input.event === "launch_requested" && current === "idle") return "launch_requested";
  if (input.event === "build_started" && current === "launch_requested") return "build_started";
  if (input.event === "awaiting_connection" && current === "build_started") return "awaiting_connection";
  if (input.event === "agent_connected" && current === "awaiting_connection") return "connected";
  if (input.event === "launch_failed" && !isTerminalLaunchState(current)) return "failed";

  return current;
}
