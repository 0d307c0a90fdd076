import assert from "node:assert/strict";
import test from "node:test";
import { DEFAULT_JNLP_IMAGE } from "../cloud/cloudConfig.js";
import { renderPrometheusMetrics, resetMetricsForTests } from "../observability/metrics.js";
import { CodeBuildAgent } from "../nodes/agentNode.js";
import { CodeBuildComputer } from "../nodes/computer.js";
import { createTestCloud, RecordingListener, TEST_PUBLIC_URL } from "../testing/fakes.js";
import { parseConnectCommand } from "./buildspec.js";
import { CodeBuildLauncher, POLL_INTERVAL_MS } from "./launcher.js";

const AGENT = "proj.cb-AbCd";

test.before(() => {
  process.env.LOG_SILENT = "true";
});

test.after(() => {
  delete process.env.LOG_SILENT;
});

test.beforeEach(() => {
  resetMetricsForTests();
});

async function setup(agentTimeout?: number) {
  const testCloud = createTestCloud({
    configure: (config) => {
      config.agentTimeout = agentTimeout;
    }
  });
  const launcher = new CodeBuildLauncher(testCloud.cloud);
  const agent = new CodeBuildAgent(testCloud.cloud, AGENT, launcher);
  const computer = await testCloud.registry.add(agent);
  assert.ok(computer instanceof CodeBuildComputer);
  return { ...testCloud, launcher, agent, computer, listener: new RecordingListener() };
}

test("launch starts a NO_SOURCE build and waits for the agent to connect", async () => {
  const { launcher, computer, listener, service, clock, registry, connectSecrets } = await setup();
  clock.onSleep = () => {
    if (clock.sleeps.length === 3) computer.connect();
  };

  await launcher.launch(computer, listener);

  assert.equal(launcher.getState(), "connected");
  assert.equal(launcher.isLaunchSupported(), false);
  assert.equal(computer.getBuildId(), "proj:build-1");
  assert.deepEqual(clock.sleeps, [POLL_INTERVAL_MS, POLL_INTERVAL_MS, POLL_INTERVAL_MS]);
  assert.equal(registry.has(AGENT), true);
  assert.deepEqual(listener.fatals, []);
  assert.deepEqual(listener.infos, [`Waiting for agent 'name: ${AGENT} buildID: proj:build-1' to connect to build ID: proj:build-1`]);

  assert.equal(service.started.length, 1);
  const request = service.started[0];
  assert.ok(request);
  assert.equal(request.projectName, "proj");
  assert.equal(request.image, DEFAULT_JNLP_IMAGE);
  assert.equal(request.computeType, "BUILD_GENERAL1_SMALL");

  const buildLine = request.buildspec.split("\n")[7] ?? "";
  assert.ok(buildLine.startsWith("      - ") && buildLine.endsWith(" || exit 0"));
  const command = parseConnectCommand(buildLine.slice("      - ".length, -" || exit 0".length));
  assert.ok(command);
  assert.equal(command.jnlpCommand, "jenkins-agent");
  assert.equal(command.controllerUrl, TEST_PUBLIC_URL);
  assert.equal(command.displayName, AGENT);
  assert.equal(connectSecrets.verify(AGENT, command.connectSecret), true);

  assert.match(renderPrometheusMetrics(), /codebuild_agents_launches_total\{cloud="codebuilder_0",outcome="connected"\} 1/);
});

test("launch polls agentTimeout * 2 times before timing out", async () => {
  const { launcher, computer, listener, clock, registry } = await setup(3);

  await launcher.launch(computer, listener);

  assert.equal(clock.sleeps.length, 6);
  assert.equal(launcher.getState(), "failed");
  assert.equal(computer.getBuildId(), null);
  assert.equal(registry.has(AGENT), false);
  assert.deepEqual(listener.fatals, [
    `Exception while starting build: Timed out while waiting for agent ${AGENT} to start for build ID: proj:build-1`
  ]);
  assert.match(renderPrometheusMetrics(), /codebuild_agents_teardowns_total\{reason="connect_timeout",result="removed"\} 1/);
});

test("a connected but non-accepting agent does not count as ready", async () => {
  const { launcher, computer, listener, clock } = await setup(1);
  computer.setAcceptingTasks(false);
  clock.onSleep = () => computer.connect();

  await launcher.launch(computer, listener);

  assert.equal(clock.sleeps.length, 2);
  assert.equal(launcher.getState(), "failed");
});

test("a failed build start removes the node and reports a fatal error", async () => {
  const { launcher, computer, listener, clock, registry, service } = await setup();
  service.startError = new Error("AccessDeniedException: not authorized");

  await launcher.launch(computer, listener);

  assert.deepEqual(clock.sleeps, []);
  assert.equal(launcher.getState(), "failed");
  assert.equal(computer.getBuildId(), null);
  assert.equal(registry.has(AGENT), false);
  assert.deepEqual(listener.fatals, ["Exception while starting build: AccessDeniedException: not authorized"]);
  assert.match(renderPrometheusMetrics(), /codebuild_agents_teardowns_total\{reason="launch_failed",result="removed"\} 1/);
});

test("launch refuses a computer without a node and never relaunches", async () => {
  const { launcher, computer, listener, service, clock } = await setup();
  computer.detach();

  await launcher.launch(computer, listener);
  assert.equal(service.started.length, 0);
  assert.equal(launcher.getState(), "idle");
  assert.equal(launcher.isLaunchSupported(), true);

  const second = await setup();
  second.clock.onSleep = () => second.computer.connect();
  await second.launcher.launch(second.computer, second.listener);
  await second.launcher.launch(second.computer, second.listener);
  assert.equal(second.service.started.length, 1);
  assert.deepEqual(clock.sleeps, []);
});

test("beforeDisconnect clears the bound build", async () => {
  const { launcher, computer } = await setup();
  computer.setBuildId("proj:build-9");

  launcher.beforeDisconnect(computer);
  assert.equal(computer.getBuildId(), null);
});

test("pollAttempts scales with the poll interval", () => {
  const { cloud } = createTestCloud({
    configure: (config) => {
      config.agentTimeout = 10;
    }
  });
  assert.equal(new CodeBuildLauncher(cloud).pollAttempts(), 20);
  assert.equal(new CodeBuildLauncher(cloud, { pollIntervalMs: 250 }).pollAttempts(), 40);
  assert.equal(new CodeBuildLauncher(cloud, { pollIntervalMs: 60_000 }).pollAttempts(), 1);
});
