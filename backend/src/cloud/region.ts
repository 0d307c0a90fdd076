import { NODE_REGION_CONFIG_FILE_OPTIONS, NODE_REGION_CONFIG_OPTIONS } from "@smithy/config-resolver";
import { loadConfig } from "@smithy/node-config-provider";
import { logInfo } from "../observability/logger.js";
import { describeError } from "../services/errors.js";

export type RegionResolver = () => Promise<string | null>;

/** AWS region provider chain: AWS_REGION, then the shared config/credentials files. */
export const resolveDefaultRegion: RegionResolver = async () => {
  try {
    const region = await loadConfig(NODE_REGION_CONFIG_OPTIONS, NODE_REGION_CONFIG_FILE_OPTIONS)();
    return region.trim() || null;
  } catch (error) {
    logInfo("cloud.region.unresolved", { data: { error: describeError(error) } });
    return null;
  }
};
