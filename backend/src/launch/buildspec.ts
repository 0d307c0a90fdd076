export interface ConnectCommandInput {
  jnlpCommand: string;
  controllerUrl: string;
  connectSecret: string;
  displayName: string;
}

export function buildConnectCommand(input: ConnectCommandInput): string {
  return `${input.jnlpCommand} -noreconnect -workDir "$CODEBUILD_SRC_DIR" -url "${input.controllerUrl}" "${input.connectSecret}" "${input.displayName}"`;
}

/**
 * Inline buildspec for a NO_SOURCE build. The pre_build phase starts the Docker
 * daemon when the image ships one; the build phase runs the agent until its
 * single task is done. Both steps exit 0 so the build never reports failure.
 */
export function buildBuildspec(connectCommand: string): string {
  return [
    "version: 0.2",
    "phases:",
    "  pre_build:",
    "    commands:",
    "      - which dockerd-entrypoint.sh >/dev/null && dockerd-entrypoint.sh || exit 0",
    "  build:",
    "    commands:",
    `      - ${connectCommand} || exit 0`,
    ""
  ].join("\n");
}

const CONNECT_COMMAND_PATTERN = /^(.+?) -noreconnect -workDir "\$CODEBUILD_SRC_DIR" -url "([^"]*)" "([^"]*)" "([^"]*)"$/;

export function parseConnectCommand(command: string): ConnectCommandInput | null {
  const match = CONNECT_COMMAND_PATTERN.exec(command);
  if (!match) return null;
  const [, jnlpCommand, controllerUrl, connectSecret, displayName] = match;
  if (jnlpCommand === undefined || controllerUrl === undefined || connectSecret === undefined || displayName === undefined) {
    return null;
  }
  return { jnlpCommand, controllerUrl, connectSecret, displayName };
}
