import type { CodeBuildAgent } from "../nodes/agentNode.js";
import type { PlannedCapacity } from "../nodes/types.js";
import { CloudConfigError } from "../services/errors.js";
import { createCloudConfig, type CloudConfigInput } from "./cloudConfig.js";
import { CodeBuildCloud, type CodeBuildCloudDeps } from "./provisioner.js";
import type { RegionResolver } from "./region.js";

export interface CloudDefinition extends CloudConfigInput {
  name?: string;
}

export interface CloudSetDeps extends CodeBuildCloudDeps {
  resolveRegion: RegionResolver;
  publicUrl?: string;
}

export type PlannedCloudCapacity = PlannedCapacity<CodeBuildAgent> & { cloud: string };

/** Configured clouds, in the order they were added. */
export class CloudSet {
  private readonly clouds = new Map<string, CodeBuildCloud>();

  constructor(private readonly deps: CloudSetDeps) {}

  nextDefaultName(): string {
    return `codebuilder_${this.clouds.size}`;
  }

  async create(definition: CloudDefinition): Promise<CodeBuildCloud> {
    const config = await createCloudConfig(definition, {
      resolveRegion: this.deps.resolveRegion,
      fallbackControllerUrl: this.deps.publicUrl
    });

    const name = definition.name?.trim() || this.nextDefaultName();
    if (this.clouds.has(name)) {
      throw new CloudConfigError(`Cloud already exists: ${name}`);
    }

    const cloud = new CodeBuildCloud(name, config, this.deps);
    this.clouds.set(name, cloud);
    return cloud;
  }

  get(name: string): CodeBuildCloud | null {
    return this.clouds.get(name) ?? null;
  }

  list(): CodeBuildCloud[] {
    return [...this.clouds.values()];
  }

  /**
   * Offers the demand to each cloud that serves the label, in order, until the
   * planned capacity covers it.
   */
  provision(label: string | null | undefined, excessWorkload: number): PlannedCloudCapacity[] {
    const planned: PlannedCloudCapacity[] = [];
    let remaining = excessWorkload;

    for (const cloud of this.clouds.values()) {
      if (remaining <= 0) break;
      if (!cloud.canProvision(label)) continue;

      const units = cloud.provision(label, remaining);
      planned.push(...units.map((unit) => ({ ...unit, cloud: cloud.name })));
      remaining -= units.length;
    }
    return planned;
  }
}

const STRING_FIELDS = [
  "name",
  "credentialsId",
  "region",
  "label",
  "computeType",
  "controllerUrl",
  "jnlpImage",
  "jnlpCommand"
] as const;

/** Reads a cloud definition from untrusted JSON (a clouds file or a request body). */
export function parseCloudDefinition(value: unknown): CloudDefinition {
  if (!value || typeof value !== "object" || Array.isArray(value)) {
    throw new CloudConfigError("Cloud definition must be an object");
  }
  const source = Object.fromEntries(Object.entries(value));

  const projectName = source.projectName;
  if (typeof projectName !== "string" || !projectName.trim()) {
    throw new CloudConfigError("projectName is required");
  }

  const definition: CloudDefinition = { projectName };
  for (const field of STRING_FIELDS) {
    const fieldValue = source[field];
    if (fieldValue === undefined || fieldValue === null) continue;
    if (typeof fieldValue !== "string") {
      throw new CloudConfigError(`${field} must be a string`);
    }
    definition[field] = fieldValue;
  }

  const agentTimeout = source.agentTimeout;
  if (agentTimeout !== undefined && agentTimeout !== null) {
    const seconds = typeof agentTimeout === "string" ? Number(agentTimeout) : agentTimeout;
    if (typeof seconds !== "number" || !Number.isInteger(seconds) || seconds < 0) {
      throw new CloudConfigError("agentTimeout must be a non-negative integer number of seconds");
    }
    definition.agentTimeout = seconds;
  }
  return definition;
}
