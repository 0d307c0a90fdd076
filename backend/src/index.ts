import { createApp } from "./app.js";
import { createBuildService } from "./cloud/client.js";
import { CloudSet } from "./cloud/cloudSet.js";
import { clearAllNodes } from "./cloud/orphans.js";
import { resolveDefaultRegion } from "./cloud/region.js";
import { loadServiceConfig } from "./config/env.js";
import { ConnectSecrets } from "./nodes/connectSecret.js";
import { NodeRegistry } from "./nodes/registry.js";
import { logError, logInfo } from "./observability/logger.js";
import { describeError } from "./services/errors.js";

const config = loadServiceConfig();

const registry = new NodeRegistry({ journalFile: NodeRegistry.journalPath(config.dataRoot) });
const sweep = await clearAllNodes(registry, { clientFactory: createBuildService, proxy: config.proxy });
logInfo("service.orphans.cleared", { data: { cleared: sweep.cleared.length, stopped_builds: sweep.stoppedBuilds.length } });

const connectSecrets = new ConnectSecrets(config.connectSecret);
const clouds = new CloudSet({
  registry,
  connectSecrets,
  proxy: config.proxy,
  clientFactory: createBuildService,
  resolveRegion: resolveDefaultRegion,
  publicUrl: config.publicUrl
});

for (const definition of config.clouds) {
  try {
    await clouds.create(definition);
  } catch (error) {
    logError("service.cloud.rejected", { data: { project: definition.projectName, error: describeError(error) } });
  }
}

const app = createApp({
  clouds,
  registry,
  connectSecrets,
  discovery: { factory: createBuildService, resolveRegion: resolveDefaultRegion, proxy: config.proxy }
});

app.listen(config.port, () => {
  logInfo("service.started", {
    data: { port: config.port, clouds: clouds.list().map((cloud) => cloud.toString()), data_root: config.dataRoot }
  });
});
