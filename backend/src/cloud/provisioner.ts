import { setImmediate as yieldToLoop } from "node:timers/promises";
import { CodeBuildLauncher } from "../launch/launcher.js";
import { logError, logInfo } from "../observability/logger.js";
import { recordProvisionRequest } from "../observability/metrics.js";
import { CodeBuildAgent } from "../nodes/agentNode.js";
import type { ConnectSecrets } from "../nodes/connectSecret.js";
import { appendAgentEvent } from "../nodes/eventStore.js";
import { generateDisplayName } from "../nodes/names.js";
import type { NodeRegistry } from "../nodes/registry.js";
import type { CloudContext, PlannedCapacity, ProvisionerInterface } from "../nodes/types.js";
import { systemClock, type Clock } from "../services/clock.js";
import { describeError } from "../services/errors.js";
import type { BuildService } from "./buildService.js";
import { createBuildService, type BuildServiceFactory, type ProxySettings } from "./client.js";
import type { CloudConfig } from "./cloudConfig.js";

export const PROVISION_COOLDOWN_MS = 500;

export interface CodeBuildCloudDeps {
  registry: NodeRegistry;
  connectSecrets: ConnectSecrets;
  proxy?: ProxySettings | null;
  clientFactory?: BuildServiceFactory;
  clock?: Clock;
  pollIntervalMs?: number;
}

/** Provisions one single-use CodeBuild agent per unit of excess demand. */
export class CodeBuildCloud implements ProvisionerInterface<CodeBuildAgent>, CloudContext {
  readonly registry: NodeRegistry;
  readonly connectSecrets: ConnectSecrets;
  readonly clock: Clock;
  private readonly proxy: ProxySettings | null;
  private readonly clientFactory: BuildServiceFactory;
  private readonly pollIntervalMs: number | undefined;
  private client: BuildService | null = null;
  private lastProvisionTime: number | null = null;

  constructor(
    readonly name: string,
    readonly config: CloudConfig,
    deps: CodeBuildCloudDeps
  ) {
    this.registry = deps.registry;
    this.connectSecrets = deps.connectSecrets;
    this.clock = deps.clock ?? systemClock;
    this.proxy = deps.proxy ?? null;
    this.clientFactory = deps.clientFactory ?? createBuildService;
    this.pollIntervalMs = deps.pollIntervalMs;
    logInfo("cloud.initialized", { context: { cloud: name }, data: { cloud: this.toString(), region: config.region } });
  }

  toString(): string {
    return `${this.name}<${this.config.projectName}>`;
  }

  getClient(): BuildService {
    if (!this.client) {
      this.client = this.clientFactory({
        credentialsId: this.config.credentialsId,
        region: this.config.region,
        proxy: this.proxy
      });
    }
    return this.client;
  }

  canProvision(label?: string | null): boolean {
    const result = this.matchesLabel(label);
    logInfo("cloud.can_provision", { context: { cloud: this.name }, data: { label: label ?? null, result } });
    return result;
  }

  provision(label: string | null | undefined, excessWorkload: number): PlannedCapacity<CodeBuildAgent>[] {
    if (!this.matchesLabel(label)) {
      recordProvisionRequest({ cloud: this.name, outcome: "label_mismatch", planned: 0 });
      return [];
    }

    const now = this.clock.now();
    if (this.lastProvisionTime !== null && now - this.lastProvisionTime < PROVISION_COOLDOWN_MS) {
      logInfo("cloud.provision.cooldown", {
        context: { cloud: this.name },
        data: { excess_workload: excessWorkload, elapsed_ms: now - this.lastProvisionTime, cooldown_ms: PROVISION_COOLDOWN_MS }
      });
      recordProvisionRequest({ cloud: this.name, outcome: "cooldown", planned: 0 });
      return [];
    }

    logInfo("cloud.provision.accepted", {
      context: { cloud: this.name },
      data: { excess_workload: excessWorkload, label: label ?? this.config.label }
    });

    const batch = new Set<string>();
    const planned: PlannedCapacity<CodeBuildAgent>[] = [];
    for (let i = 0; i < excessWorkload; i += 1) {
      const displayName = generateDisplayName(
        this.config.projectName,
        (candidate) => batch.has(candidate) || this.registry.has(candidate)
      );
      batch.add(displayName);

      const future = this.realize(displayName);
      void future.catch((error: unknown) => {
        logError("cloud.provision.unit_failed", { context: { cloud: this.name, agent: displayName }, data: { error: describeError(error) } });
      });
      appendAgentEvent({ agent: displayName, type: "AGENT_PLANNED", message: `Planned on ${this.toString()}` });
      planned.push({ displayName, numExecutors: 1, future });
    }

    this.lastProvisionTime = this.clock.now();
    recordProvisionRequest({ cloud: this.name, outcome: "accepted", planned: planned.length });
    return planned;
  }

  private matchesLabel(label: string | null | undefined): boolean {
    return label === null || label === undefined || label === this.config.label;
  }

  private async realize(displayName: string): Promise<CodeBuildAgent> {
    await yieldToLoop();
    const launcher = new CodeBuildLauncher(this, { pollIntervalMs: this.pollIntervalMs });
    const agent = new CodeBuildAgent(this, displayName, launcher);
    await this.registry.add(agent);
    return agent;
  }
}
