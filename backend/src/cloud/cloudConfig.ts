import { ComputeType } from "@aws-sdk/client-codebuild";
import { CloudConfigError } from "../services/errors.js";
import type { RegionResolver } from "./region.js";

export const DEFAULT_JNLP_IMAGE = "jenkins/inbound-agent:latest-alpine";
export const DEFAULT_JNLP_COMMAND = "jenkins-agent";
export const DEFAULT_AGENT_TIMEOUT = 120;
export const DEFAULT_COMPUTE_TYPE: ComputeType = ComputeType.BUILD_GENERAL1_SMALL;

export interface CloudConfigInput {
  projectName: string;
  credentialsId?: string;
  region?: string;
  label?: string;
  computeType?: string;
  controllerUrl?: string;
  jnlpImage?: string;
  jnlpCommand?: string;
  agentTimeout?: number;
}

export interface CloudConfigOptions {
  resolveRegion: RegionResolver;
  /** Used when no controller URL is configured, typically the service's public URL. */
  fallbackControllerUrl?: string;
}

function isBlank(value: string | undefined | null): boolean {
  return !value || !value.trim();
}

export function isComputeType(value: string): value is ComputeType {
  return Object.values(ComputeType).some((type) => type === value);
}

export class CloudConfig {
  readonly projectName: string;
  readonly credentialsId: string;
  readonly region: string;

  private labelValue = "";
  private computeTypeValue: ComputeType | null = null;
  private controllerUrlValue = "";
  private jnlpImageValue = "";
  private jnlpCommandValue = "";
  private agentTimeoutValue = 0;

  constructor(
    input: { projectName: string; credentialsId?: string; region: string },
    private readonly fallbackControllerUrl = ""
  ) {
    if (isBlank(input.projectName)) {
      throw new CloudConfigError("A CodeBuild project name is required");
    }
    if (isBlank(input.region)) {
      throw new CloudConfigError(`No AWS region configured or resolvable for project ${input.projectName}`);
    }
    this.projectName = input.projectName.trim();
    this.credentialsId = input.credentialsId?.trim() ?? "";
    this.region = input.region.trim();
  }

  get label(): string {
    return this.labelValue;
  }

  set label(value: string | undefined) {
    this.labelValue = value ?? "";
  }

  get computeType(): ComputeType {
    return this.computeTypeValue ?? DEFAULT_COMPUTE_TYPE;
  }

  set computeType(value: string | undefined) {
    if (value === undefined || !value.trim()) {
      this.computeTypeValue = null;
      return;
    }
    if (!isComputeType(value)) {
      throw new CloudConfigError(`Unknown CodeBuild compute type: ${value}`);
    }
    this.computeTypeValue = value;
  }

  get controllerUrl(): string {
    if (!isBlank(this.controllerUrlValue)) return this.controllerUrlValue;
    return isBlank(this.fallbackControllerUrl) ? "unknown" : this.fallbackControllerUrl;
  }

  set controllerUrl(value: string | undefined) {
    // A value equal to the fallback is not stored, so the config keeps tracking it.
    this.controllerUrlValue = value === this.fallbackControllerUrl ? "" : value ?? "";
  }

  get jnlpImage(): string {
    return isBlank(this.jnlpImageValue) ? DEFAULT_JNLP_IMAGE : this.jnlpImageValue;
  }

  set jnlpImage(value: string | undefined) {
    this.jnlpImageValue = value ?? "";
  }

  get jnlpCommand(): string {
    return isBlank(this.jnlpCommandValue) ? DEFAULT_JNLP_COMMAND : this.jnlpCommandValue;
  }

  set jnlpCommand(value: string | undefined) {
    this.jnlpCommandValue = value ?? "";
  }

  /** Seconds to wait for the agent to connect after its build starts. */
  get agentTimeout(): number {
    return this.agentTimeoutValue > 0 ? this.agentTimeoutValue : DEFAULT_AGENT_TIMEOUT;
  }

  set agentTimeout(value: number | undefined) {
    this.agentTimeoutValue = value !== undefined && Number.isFinite(value) ? Math.trunc(value) : 0;
  }

  toJSON(): Record<string, unknown> {
    return {
      projectName: this.projectName,
      credentialsId: this.credentialsId,
      region: this.region,
      label: this.label,
      computeType: this.computeType,
      controllerUrl: this.controllerUrl,
      jnlpImage: this.jnlpImage,
      jnlpCommand: this.jnlpCommand,
      agentTimeout: this.agentTimeout
    };
  }
}

/**
 * Resolves a blank region once through the provider chain, then fixes it for the
 * lifetime of the config.
 */
export async function createCloudConfig(input: CloudConfigInput, options: CloudConfigOptions): Promise<CloudConfig> {
  if (isBlank(input.projectName)) {
    throw new CloudConfigError("A CodeBuild project name is required");
  }

  const region = isBlank(input.region) ? await options.resolveRegion() : input.region ?? null;
  const config = new CloudConfig(
    { projectName: input.projectName, credentialsId: input.credentialsId, region: region ?? "" },
    options.fallbackControllerUrl
  );

  config.label = input.label;
  config.computeType = input.computeType;
  config.controllerUrl = input.controllerUrl;
  config.jnlpImage = input.jnlpImage;
  config.jnlpCommand = input.jnlpCommand;
  config.agentTimeout = input.agentTimeout;
  return config;
}
