import type { BuildService } from "../cloud/buildService.js";
import type { CloudConfig } from "../cloud/cloudConfig.js";
import type { TaskListener } from "../launch/taskListener.js";
import type { Clock } from "../services/clock.js";
import type { ConnectSecrets } from "./connectSecret.js";
import type { NodeRegistry } from "./registry.js";

export interface TaskInfo {
  name: string;
  durationMs?: number;
}

/** A unit of capacity handed to the scheduler before its node exists. */
export interface PlannedCapacity<TNode> {
  displayName: string;
  numExecutors: number;
  future: Promise<TNode>;
}

export interface ProvisionerInterface<TNode> {
  canProvision(label?: string | null): boolean;
  provision(label: string | null | undefined, excessWorkload: number): PlannedCapacity<TNode>[];
}

export interface LauncherInterface {
  isLaunchSupported(): boolean;
  launch(computer: RuntimeComputer, listener: TaskListener): Promise<void>;
  beforeDisconnect(computer: RuntimeComputer): void;
}

export interface ComputerInterface {
  onTaskAccepted(task: TaskInfo): void;
  onTaskCompleted(task: TaskInfo): void;
  onTaskCompletedWithProblems(task: TaskInfo, problems: unknown): void;
}

export interface RuntimeComputer extends ComputerInterface {
  readonly name: string;
  getNode(): AgentNode | null;
  getBuildId(): string | null;
  isOnline(): boolean;
  isAcceptingTasks(): boolean;
  connect(): void;
  disconnect(): void;
  /** Drops the node reference once the node has been removed. */
  detach(): void;
  toJSON(): Record<string, unknown>;
}

export interface JournalEntry {
  name: string;
  cloud: string;
  projectName: string;
  region: string;
  credentialsId: string;
  buildId: string | null;
  createdAt: string;
}

export interface AgentNode {
  readonly displayName: string;
  readonly launcher: LauncherInterface;
  createComputer(): RuntimeComputer;
  toJournalEntry(buildId: string | null): JournalEntry;
  toJSON(): Record<string, unknown>;
}

/** What an agent needs from the cloud that provisioned it. */
export interface CloudContext {
  readonly name: string;
  readonly config: CloudConfig;
  readonly registry: NodeRegistry;
  readonly connectSecrets: ConnectSecrets;
  readonly clock: Clock;
  getClient(): BuildService;
  toString(): string;
}
