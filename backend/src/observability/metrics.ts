type Histogram = {
  buckets: number[];
  bucketCounts: Map<number, number>;
  count: number;
  sum: number;
};

const LATENCY_BUCKETS_MS = [10, 25, 50, 100, 250, 500, 1000, 2500, 5000];
const CONNECT_BUCKETS_MS = [1000, 5000, 15000, 30000, 60000, 120000, 300000];

const PREFIX = "codebuild_agents";

const state = {
  planned_units_total: 0,
  agent_events_total: 0,
  provision_requests_total: new Map<string, number>(),
  launches_total: new Map<string, number>(),
  teardowns_total: new Map<string, number>(),
  launch_connect_duration_ms: new Map<string, Histogram>(),
  http_requests_total: new Map<string, number>(),
  http_requests_failed_total: new Map<string, number>(),
  http_request_duration_ms: new Map<string, Histogram>()
};

function key(labels: Record<string, string>): string {
  return Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`)
    .join("|");
}

function parseKey(compact: string): Record<string, string> {
  if (!compact) return {};
  return Object.fromEntries(compact.split("|").map((part) => {
    const idx = part.indexOf("=");
    return [part.slice(0, idx), part.slice(idx + 1)];
  }));
}

function labelsString(labels: Record<string, string>): string {
  const parts = Object.entries(labels).map(([k, v]) => `${k}="${v.replace(/"/g, '\\"')}"`);
  return `{${parts.join(",")}}`;
}

function getHistogram(map: Map<string, Histogram>, compactKey: string, buckets: number[]): Histogram {
  const existing = map.get(compactKey);
  if (existing) return existing;

  const created: Histogram = {
    buckets,
    bucketCounts: new Map(buckets.map((b) => [b, 0])),
    count: 0,
    sum: 0
  };
  map.set(compactKey, created);
  return created;
}

function inc(map: Map<string, number>, labels: Record<string, string>, by = 1): void {
  const compact = key(labels);
  map.set(compact, (map.get(compact) ?? 0) + by);
}

function observe(map: Map<string, Histogram>, buckets: number[], labels: Record<string, string>, value: number): void {
  const hist = getHistogram(map, key(labels), buckets);

  hist.count += 1;
  hist.sum += value;

  for (const bucket of hist.buckets) {
    if (value <= bucket) {
      hist.bucketCounts.set(bucket, (hist.bucketCounts.get(bucket) ?? 0) + 1);
    }
  }
}

export type ProvisionOutcome = "accepted" | "cooldown" | "label_mismatch";

export function recordProvisionRequest(input: { cloud: string; outcome: ProvisionOutcome; planned: number }): void {
  inc(state.provision_requests_total, { cloud: input.cloud, outcome: input.outcome });
  state.planned_units_total += input.planned;
}

export function recordLaunch(input: { cloud: string; outcome: "connected" | "failed" | "timeout"; durationMs?: number }): void {
  inc(state.launches_total, { cloud: input.cloud, outcome: input.outcome });
  if (input.outcome === "connected" && input.durationMs !== undefined) {
    observe(state.launch_connect_duration_ms, CONNECT_BUCKETS_MS, { cloud: input.cloud }, input.durationMs);
  }
}

export function recordTeardown(input: { reason: string; result: "removed" | "missing" | "error" }): void {
  inc(state.teardowns_total, { reason: input.reason, result: input.result });
}

export function recordAgentEvent(): void {
  state.agent_events_total += 1;
}

export function recordHttpRequest(input: {
  method: string;
  endpoint: string;
  statusCode: number;
  durationMs: number;
}): void {
  const labels = {
    method: input.method.toUpperCase(),
    endpoint: input.endpoint
  };
  inc(state.http_requests_total, labels, 1);
  if (input.statusCode >= 400) {
    inc(state.http_requests_failed_total, labels, 1);
  }
  observe(state.http_request_duration_ms, LATENCY_BUCKETS_MS, labels, input.durationMs);
}

function renderCounter(name: string, help: string, value: number): string[] {
  return [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} counter`,
    `${name} ${value}`
  ];
}

function renderLabeledCounter(name: string, help: string, map: Map<string, number>): string[] {
  const rows = [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} counter`
  ];
  for (const [compact, value] of map.entries()) {
    rows.push(`${name}${labelsString(parseKey(compact))} ${value}`);
  }
  return rows;
}

function renderHistogram(name: string, help: string, map: Map<string, Histogram>): string[] {
  const rows = [
    `# HELP ${name} ${help}`,
    `# TYPE ${name} histogram`
  ];

  for (const [compact, hist] of map.entries()) {
    const labels = parseKey(compact);
    for (const bucket of hist.buckets) {
      rows.push(`${name}_bucket${labelsString({ ...labels, le: String(bucket) })} ${hist.bucketCounts.get(bucket) ?? 0}`);
    }
    rows.push(`${name}_bucket${labelsString({ ...labels, le: "+Inf" })} ${hist.count}`);
    rows.push(`${name}_sum${labelsString(labels)} ${hist.sum}`);
    rows.push(`${name}_count${labelsString(labels)} ${hist.count}`);
  }

  return rows;
}

export function renderPrometheusMetrics(): string {
  const lines = [
    ...renderCounter(`${PREFIX}_planned_units_total`, "Total planned capacity units handed to the scheduler", state.planned_units_total),
    ...renderCounter(`${PREFIX}_agent_events_total`, "Total agent lifecycle events recorded", state.agent_events_total),
    ...renderLabeledCounter(`${PREFIX}_provision_requests_total`, "Provision requests by cloud and outcome", state.provision_requests_total),
    ...renderLabeledCounter(`${PREFIX}_launches_total`, "Agent launches by cloud and outcome", state.launches_total),
    ...renderLabeledCounter(`${PREFIX}_teardowns_total`, "Agent teardowns by reason and result", state.teardowns_total),
    ...renderHistogram(`${PREFIX}_launch_connect_duration_ms`, "Time from build start to agent connection in milliseconds", state.launch_connect_duration_ms),
    ...renderLabeledCounter(`${PREFIX}_http_requests_total`, "Total HTTP requests by endpoint", state.http_requests_total),
    ...renderLabeledCounter(`${PREFIX}_http_requests_failed_total`, "Total failed HTTP requests by endpoint", state.http_requests_failed_total),
    ...renderHistogram(`${PREFIX}_http_request_duration_ms`, "HTTP request latency in milliseconds", state.http_request_duration_ms)
  ];
  return `${lines.join("\n")}\n`;
}

export function resetMetricsForTests(): void {
  state.planned_units_total = 0;
  state.agent_events_total = 0;
  state.provision_requests_total.clear();
  state.launches_total.clear();
  state.teardowns_total.clear();
  state.launch_connect_duration_ms.clear();
  state.http_requests_total.clear();
  state.http_requests_failed_total.clear();
  state.http_request_duration_ms.clear();
}
