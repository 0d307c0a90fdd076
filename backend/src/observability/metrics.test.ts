import assert from "node:assert/strict";
import test from "node:test";
import {
  recordAgentEvent,
  recordHttpRequest,
  recordLaunch,
  recordProvisionRequest,
  recordTeardown,
  renderPrometheusMetrics,
  resetMetricsForTests
} from "./metrics.js";

test.beforeEach(() => {
  resetMetricsForTests();
});

test("metrics count provision outcomes and planned units", () => {
  recordProvisionRequest({ cloud: "codebuilder_0", outcome: "accepted", planned: 3 });
  recordProvisionRequest({ cloud: "codebuilder_0", outcome: "cooldown", planned: 0 });
  recordAgentEvent();

  const text = renderPrometheusMetrics();
  assert.match(text, /codebuild_agents_planned_units_total 3/);
  assert.match(text, /codebuild_agents_agent_events_total 1/);
  assert.match(text, /codebuild_agents_provision_requests_total\{cloud="codebuilder_0",outcome="accepted"\} 1/);
  assert.match(text, /codebuild_agents_provision_requests_total\{cloud="codebuilder_0",outcome="cooldown"\} 1/);
});

test("metrics include launch outcomes, connect latency and teardowns", () => {
  recordLaunch({ cloud: "codebuilder_0", outcome: "connected", durationMs: 4000 });
  recordLaunch({ cloud: "codebuilder_0", outcome: "timeout" });
  recordTeardown({ reason: "task_completed", result: "removed" });

  const text = renderPrometheusMetrics();
  assert.match(text, /codebuild_agents_launches_total\{cloud="codebuilder_0",outcome="connected"\} 1/);
  assert.match(text, /codebuild_agents_launches_total\{cloud="codebuilder_0",outcome="timeout"\} 1/);
  assert.match(text, /codebuild_agents_launch_connect_duration_ms_bucket\{cloud="codebuilder_0",le="1000"\} 0/);
  assert.match(text, /codebuild_agents_launch_connect_duration_ms_bucket\{cloud="codebuilder_0",le="5000"\} 1/);
  assert.match(text, /codebuild_agents_launch_connect_duration_ms_count\{cloud="codebuilder_0"\} 1/);
  assert.match(text, /codebuild_agents_teardowns_total\{reason="task_completed",result="removed"\} 1/);
});

test("metrics include http latency histogram", () => {
  recordHttpRequest({ method: "post", endpoint: "/provision", statusCode: 202, durationMs: 87 });
  recordHttpRequest({ method: "POST", endpoint: "/provision", statusCode: 500, durationMs: 210 });

  const text = renderPrometheusMetrics();
  assert.match(text, /codebuild_agents_http_requests_total\{endpoint="\/provision",method="POST"\} 2/);
  assert.match(text, /codebuild_agents_http_requests_failed_total\{endpoint="\/provision",method="POST"\} 1/);
  assert.match(text, /codebuild_agents_http_request_duration_ms_bucket\{endpoint="\/provision",method="POST",le="100"\} 1/);
  assert.match(text, /codebuild_agents_http_request_duration_ms_count\{endpoint="\/provision",method="POST"\} 2/);
});
