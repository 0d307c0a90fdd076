import { CodeBuildClient } from "@aws-sdk/client-codebuild";
import { fromIni } from "@aws-sdk/credential-providers";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import { HttpsProxyAgent } from "https-proxy-agent";
import { logInfo } from "../observability/logger.js";
import { CodeBuildService, type BuildService } from "./buildService.js";

export interface ProxySettings {
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface ClientSettings {
  /** Shared credentials/config profile; empty means the default credential chain. */
  credentialsId: string;
  region: string;
  proxy?: ProxySettings | null;
}

export type BuildServiceFactory = (settings: ClientSettings) => BuildService;

export function proxyUrl(proxy: ProxySettings): string {
  let auth = "";
  if (proxy.username) {
    auth = encodeURIComponent(proxy.username);
    if (proxy.password) auth += `:${encodeURIComponent(proxy.password)}`;
    auth += "@";
  }
  return `http://${auth}${proxy.host}:${proxy.port}`;
}

export function buildCodeBuildClient(settings: ClientSettings): CodeBuildClient {
  return new CodeBuildClient({
    region: settings.region,
    ...(settings.credentialsId ? { credentials: fromIni({ profile: settings.credentialsId }) } : {}),
    ...(settings.proxy
      ? { requestHandler: new NodeHttpHandler({ httpsAgent: new HttpsProxyAgent(proxyUrl(settings.proxy)) }) }
      : {})
  });
}

export const createBuildService: BuildServiceFactory = (settings) => {
  logInfo("cloud.client.created", {
    data: {
      region: settings.region,
      credentials_profile: settings.credentialsId || null,
      proxy: settings.proxy ? `${settings.proxy.host}:${settings.proxy.port}` : null
    }
  });
  return new CodeBuildService(buildCodeBuildClient(settings));
};
