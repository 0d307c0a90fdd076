import { promises as fs } from "node:fs";
import path from "node:path";
import { createAgentTaskListener, type TaskListener } from "../launch/taskListener.js";
import { logError, logInfo } from "../observability/logger.js";
import { publishEvent } from "../services/eventBus.js";
import { describeError, NodeAlreadyRegisteredError } from "../services/errors.js";
import { appendAgentEvent } from "./eventStore.js";
import type { AgentNode, JournalEntry, RuntimeComputer } from "./types.js";

export interface RegisteredNode {
  node: AgentNode;
  computer: RuntimeComputer;
}

export interface NodeRegistryOptions {
  /** File that records live nodes so a later process can clean them up. */
  journalFile?: string;
  /** Start the node's launcher as soon as it is registered. Defaults to true. */
  launchOnAdd?: boolean;
  listenerFactory?: (agent: string) => TaskListener;
}

function readString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  return typeof value === "string" ? value : null;
}

function toJournalEntry(value: unknown): JournalEntry | null {
  if (!value || typeof value !== "object") return null;
  const row = Object.fromEntries(Object.entries(value));
  const name = readString(row, "name");
  const projectName = readString(row, "projectName");
  const region = readString(row, "region");
  if (!name || !projectName || !region) return null;
  return {
    name,
    cloud: readString(row, "cloud") ?? "",
    projectName,
    region,
    credentialsId: readString(row, "credentialsId") ?? "",
    buildId: readString(row, "buildId"),
    createdAt: readString(row, "createdAt") ?? ""
  };
}

/**
 * The set of agent nodes this process owns. Map mutations are synchronous,
 * listing returns a snapshot, and journal writes are applied in call order.
 */
export class NodeRegistry {
  private readonly entries = new Map<string, RegisteredNode>();
  private readonly journalFile: string | null;
  private readonly launchOnAdd: boolean;
  private readonly listenerFactory: (agent: string) => TaskListener;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(options: NodeRegistryOptions = {}) {
    this.journalFile = options.journalFile ?? null;
    this.launchOnAdd = options.launchOnAdd ?? true;
    this.listenerFactory = options.listenerFactory ?? createAgentTaskListener;
  }

  static journalPath(dataRoot: string): string {
    return path.join(dataRoot, "nodes.json");
  }

  async add(node: AgentNode): Promise<RuntimeComputer> {
    const name = node.displayName;
    if (this.entries.has(name)) {
      throw new NodeAlreadyRegisteredError(name);
    }

    const computer = node.createComputer();
    this.entries.set(name, { node, computer });
    logInfo("nodes.added", { context: { agent: name } });
    appendAgentEvent({ agent: name, type: "AGENT_REGISTERED", message: "Agent registered" });
    publishEvent({ type: "node.added", timestamp: new Date().toISOString(), payload: { agent: name } });
    await this.persist();

    if (this.launchOnAdd) {
      void node.launcher.launch(computer, this.listenerFactory(name)).catch((error: unknown) => {
        logError("nodes.launch.unhandled_error", { context: { agent: name }, data: { error: describeError(error) } });
      });
    }
    return computer;
  }

  get(name: string): AgentNode | null {
    return this.entries.get(name)?.node ?? null;
  }

  getComputer(name: string): RuntimeComputer | null {
    return this.entries.get(name)?.computer ?? null;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  list(): RegisteredNode[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Removes the node if it is the one registered under its name. The channel
   * is torn down first, which clears any bound build.
   */
  async remove(node: AgentNode): Promise<boolean> {
    const name = node.displayName;
    const entry = this.entries.get(name);
    if (!entry || entry.node !== node) return false;

    this.entries.delete(name);
    entry.computer.disconnect();
    entry.computer.detach();
    logInfo("nodes.removed", { context: { agent: name } });
    publishEvent({ type: "node.removed", timestamp: new Date().toISOString(), payload: { agent: name } });
    await this.persist();
    return true;
  }

  /** Records a change of the build bound to a node. */
  async recordBuild(name: string): Promise<void> {
    if (this.entries.has(name)) {
      await this.persist();
    }
  }

  async readJournal(): Promise<JournalEntry[]> {
    if (!this.journalFile) return [];

    let raw: string;
    try {
      raw = await fs.readFile(this.journalFile, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") return [];
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      const rows = parsed && typeof parsed === "object" && "nodes" in parsed ? parsed.nodes : null;
      if (!Array.isArray(rows)) return [];
      return rows.map(toJournalEntry).filter((entry): entry is JournalEntry => entry !== null);
    } catch (error) {
      logError("nodes.journal.unreadable", { data: { file: this.journalFile, error: describeError(error) } });
      return [];
    }
  }

  /** Rewrites the journal to hold only the nodes registered now. */
  async rewriteJournal(): Promise<void> {
    await this.persist();
  }

  private persist(): Promise<void> {
    const file = this.journalFile;
    if (!file) return Promise.resolve();

    const snapshot = this.list().map(({ node, computer }) => node.toJournalEntry(computer.getBuildId()));
    this.writeChain = this.writeChain
      .then(async () => {
        await fs.mkdir(path.dirname(file), { recursive: true });
        await fs.writeFile(file, JSON.stringify({ nodes: snapshot }, null, 2), "utf8");
      })
      .catch((error: unknown) => {
        logError("nodes.journal.write_failed", { data: { file, error: describeError(error) } });
      });
    return this.writeChain;
  }
}
