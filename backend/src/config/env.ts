import { readFileSync } from "node:fs";
import path from "node:path";
import { nanoid } from "nanoid";
import type { ProxySettings } from "../cloud/client.js";
import { parseCloudDefinition, type CloudDefinition } from "../cloud/cloudSet.js";
import { describeError } from "../services/errors.js";

export interface ServiceConfig {
  port: number;
  /** Externally reachable URL of this service; agents connect back to it unless a cloud overrides it. */
  publicUrl: string;
  dataRoot: string;
  connectSecret: string;
  proxy: ProxySettings | null;
  clouds: CloudDefinition[];
}

type Env = Record<string, string | undefined>;

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function parsePort(value: string, key: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`${key} must be a TCP port, got: ${value}`);
  }
  return port;
}

export function loadProxySettings(env: Env = process.env): ProxySettings | null {
  const host = read(env, "CODEBUILD_PROXY_HOST");
  if (host) {
    const port = read(env, "CODEBUILD_PROXY_PORT");
    return {
      host,
      port: port ? parsePort(port, "CODEBUILD_PROXY_PORT") : 80,
      username: read(env, "CODEBUILD_PROXY_USER"),
      password: read(env, "CODEBUILD_PROXY_PASSWORD")
    };
  }

  const url = read(env, "HTTPS_PROXY") ?? read(env, "https_proxy");
  if (!url) return null;

  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`HTTPS_PROXY is not a valid URL: ${url}`);
  }
  return {
    host: parsed.hostname,
    port: parsed.port ? parsePort(parsed.port, "HTTPS_PROXY") : parsed.protocol === "https:" ? 443 : 80,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined
  };
}

export function loadCloudDefinitions(env: Env = process.env): CloudDefinition[] {
  const file = read(env, "CODEBUILD_CLOUDS_FILE");
  if (file) {
    const parsed: unknown = JSON.parse(readFileSync(file, "utf8"));
    if (!Array.isArray(parsed)) {
      throw new Error(`CODEBUILD_CLOUDS_FILE must contain a JSON array: ${file}`);
    }
    return parsed.map((entry, index) => {
      try {
        return parseCloudDefinition(entry);
      } catch (error) {
        throw new Error(`Invalid cloud #${index} in ${file}: ${describeError(error)}`);
      }
    });
  }

  const projectName = read(env, "CODEBUILD_PROJECT");
  if (!projectName) return [];

  return [
    parseCloudDefinition({
      name: read(env, "CODEBUILD_CLOUD_NAME"),
      projectName,
      credentialsId: read(env, "CODEBUILD_CREDENTIALS_PROFILE"),
      region: read(env, "CODEBUILD_REGION"),
      label: read(env, "CODEBUILD_LABEL"),
      computeType: read(env, "CODEBUILD_COMPUTE_TYPE"),
      controllerUrl: read(env, "CODEBUILD_CONTROLLER_URL"),
      jnlpImage: read(env, "CODEBUILD_JNLP_IMAGE"),
      jnlpCommand: read(env, "CODEBUILD_JNLP_COMMAND"),
      agentTimeout: read(env, "CODEBUILD_AGENT_TIMEOUT")
    })
  ];
}

export function loadServiceConfig(env: Env = process.env): ServiceConfig {
  const port = read(env, "PORT");
  const dataRoot = read(env, "CODEBUILD_AGENTS_DATA_ROOT");

  return {
    port: port ? parsePort(port, "PORT") : 4000,
    publicUrl: read(env, "PUBLIC_URL") ?? "",
    dataRoot: dataRoot ? path.resolve(dataRoot) : path.resolve("data"),
    connectSecret: read(env, "AGENT_CONNECT_SECRET") ?? nanoid(48),
    proxy: loadProxySettings(env),
    clouds: loadCloudDefinitions(env)
  };
}
