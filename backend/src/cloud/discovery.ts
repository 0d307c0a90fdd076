import { logError } from "../observability/logger.js";
import { describeError } from "../services/errors.js";
import type { BuildServiceFactory, ProxySettings } from "./client.js";
import type { RegionResolver } from "./region.js";
import { CODEBUILD_REGIONS } from "./regions.js";

export interface DiscoveryDeps {
  factory: BuildServiceFactory;
  resolveRegion: RegionResolver;
  proxy?: ProxySettings | null;
}

/**
 * Lists CodeBuild project names visible to a profile, sorted. Missing
 * credentials or any other client failure yields an empty list.
 */
export async function discoverProjects(
  input: { credentialsId?: string; region?: string },
  deps: DiscoveryDeps
): Promise<string[]> {
  const region = input.region?.trim() || (await deps.resolveRegion());
  if (!region) return [];

  try {
    const service = deps.factory({ credentialsId: input.credentialsId?.trim() ?? "", region, proxy: deps.proxy });
    return await service.listProjects();
  } catch (error) {
    logError("cloud.discovery.failed", { data: { region, error: describeError(error) } });
    return [];
  }
}

/** Region choices with the default region, when known, listed first. */
export async function listRegionOptions(resolveRegion: RegionResolver): Promise<string[]> {
  const defaultRegion = await resolveRegion();
  if (!defaultRegion) return [...CODEBUILD_REGIONS];
  return [defaultRegion, ...CODEBUILD_REGIONS.filter((region) => region !== defaultRegion)];
}
