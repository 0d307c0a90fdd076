import { logError, logInfo } from "../observability/logger.js";
import type { NodeRegistry } from "../nodes/registry.js";
import { removeAgentNode } from "../nodes/teardown.js";
import type { JournalEntry } from "../nodes/types.js";
import { describeError } from "../services/errors.js";
import type { BuildServiceFactory, ProxySettings } from "./client.js";

export interface OrphanSweepResult {
  cleared: string[];
  stoppedBuilds: string[];
}

/**
 * Terminates every agent left over from a previous process: stops the build
 * bound to it, drops it from the registry and rewrites the journal. Runs
 * before the service accepts demand.
 */
export async function clearAllNodes(
  registry: NodeRegistry,
  deps: { clientFactory: BuildServiceFactory; proxy?: ProxySettings | null }
): Promise<OrphanSweepResult> {
  const live = registry.list();
  const entries = new Map<string, JournalEntry>();
  for (const entry of await registry.readJournal()) {
    entries.set(entry.name, entry);
  }
  for (const { node, computer } of live) {
    entries.set(node.displayName, node.toJournalEntry(computer.getBuildId()));
  }

  if (entries.size === 0) {
    return { cleared: [], stoppedBuilds: [] };
  }
  logInfo("nodes.orphans.clearing", { data: { count: entries.size } });

  const stoppedBuilds: string[] = [];
  for (const entry of entries.values()) {
    if (!entry.buildId) continue;
    try {
      const service = deps.clientFactory({ credentialsId: entry.credentialsId, region: entry.region, proxy: deps.proxy });
      await service.stopBuild(entry.buildId);
      stoppedBuilds.push(entry.buildId);
    } catch (error) {
      logError("nodes.orphans.stop_failed", {
        context: { agent: entry.name, build_id: entry.buildId },
        data: { error: describeError(error) }
      });
    }
  }

  for (const { node } of live) {
    await removeAgentNode(registry, node, "startup_orphan");
  }
  await registry.rewriteJournal();

  const cleared = [...entries.keys()];
  logInfo("nodes.orphans.cleared", { data: { cleared, stopped_builds: stoppedBuilds } });
  return { cleared, stoppedBuilds };
}
