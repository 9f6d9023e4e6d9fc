/**
 * peerweave configuration resolution.
 * Merges a raw JSON config and environment overrides with defaults.
 *
 *   resolveMeshConfig(raw)  coerce an untyped object (embedding, tests)
 *   loadMeshConfig()        read from file, overlay PEERWEAVE_* env
 *
 * Durations are in milliseconds.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { isLogLevel, type LogLevel } from "./logger.js";
import type { ModelInfo } from "./types.js";
import { isRecord, toRecord, toStringArray, toStringMap } from "./utils/guards.js";
import { DEFAULT_PEER_PORT, parsePort } from "./peers/address.js";

/** Ways a node may learn about peers. */
export type DiscoveryMethod = "registry" | "dns" | "peers";

const DISCOVERY_METHODS: readonly DiscoveryMethod[] = ["registry", "dns", "peers"];

function isDiscoveryMethod(v: unknown): v is DiscoveryMethod {
  return typeof v === "string" && (DISCOVERY_METHODS as readonly string[]).includes(v);
}

/** How this node describes itself to the directory and to peers. */
export interface AgentIdentityConfig {
  id: string;
  name: string;
  description: string;
  capabilities: string[];
  /** Host other nodes use to reach this one. */
  host: string;
  port: number;
  interfaces: Record<string, string>;
  endpoints: Record<string, string>;
  version: string;
  protocols: string[];
  modelInfo?: ModelInfo;
  owner?: string;
}

export interface MeshConfig {
  agent: AgentIdentityConfig;
  /** Address the peer HTTP server binds to. Default: "0.0.0.0". */
  listenHost: string;
  registry: {
    url: string;
    timeoutMs: number;
  };
  dns: {
    /** Name server address; null uses the system resolver. */
    server: string | null;
    port: number;
    timeoutMs: number;
  };
  /** Enabled discovery methods, in no particular order. */
  discoveryMethods: DiscoveryMethod[];
  cacheTtlMs: number;
  refreshIntervalMs: number;
  gossip: {
    intervalMs: number;
    fanout: number;
    maxPeersToExchange: number;
    peerTtlMs: number;
    maxConcurrentExchanges: number;
  };
  registration: {
    heartbeatIntervalMs: number;
    cooldownMs: number;
    maxAttempts: number;
    backoffMs: number;
  };
  logLevel: LogLevel;
}

export interface ConfigDefaults {
  /** Machine name used to derive the agent id and host. Default: os.hostname(). */
  hostname?: string;
}

function str(v: unknown, fallback: string): string {
  return typeof v === "string" && v.length > 0 ? v : fallback;
}

/** Positive number, else the fallback. */
function num(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : fallback;
}

function int(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : fallback;
}

function resolveAgent(r: Record<string, unknown>, hostname: string): AgentIdentityConfig {
  const serviceName = hostname.split(".")[0];
  const host = str(r.host, serviceName);
  const port = parsePort(r.port) ?? DEFAULT_PEER_PORT;

  const modelRaw = toRecord(r.modelInfo);
  const modelInfo: ModelInfo = {};
  if (typeof modelRaw.type === "string") modelInfo.type = modelRaw.type;
  if (typeof modelRaw.provider === "string") modelInfo.provider = modelRaw.provider;

  const agent: AgentIdentityConfig = {
    id: str(r.id, `${hostname}.agents.local`),
    name: str(r.name, `Agent-${hostname}`),
    description: typeof r.description === "string" ? r.description : "",
    capabilities: Array.isArray(r.capabilities)
      ? toStringArray(r.capabilities).map((c) => c.trim()).filter((c) => c.length > 0)
      : ["chat", "summarization", "translation"],
    host,
    port,
    interfaces: isRecord(r.interfaces) ? toStringMap(r.interfaces) : { rest: `http://${host}:${port}/v1` },
    endpoints: {
      metadata: "/metadata",
      peers: "/peers",
      ping: "/health",
      ...toStringMap(r.endpoints),
    },
    version: str(r.version, "0.1.0"),
    protocols: Array.isArray(r.protocols) ? toStringArray(r.protocols) : ["rest-json"],
  };
  if (Object.keys(modelInfo).length > 0) agent.modelInfo = modelInfo;
  if (typeof r.owner === "string") agent.owner = r.owner;
  return agent;
}

export function resolveMeshConfig(
  raw?: Record<string, unknown> | null,
  defaults: ConfigDefaults = {},
): MeshConfig {
  const r = raw ?? {};
  const hostname = defaults.hostname ?? os.hostname();

  const registryRaw = toRecord(r.registry);
  const dnsRaw = toRecord(r.dns);
  const gossipRaw = toRecord(r.gossip);
  const registrationRaw = toRecord(r.registration);

  const discoveryMethods: DiscoveryMethod[] = Array.isArray(r.discoveryMethods)
    ? Array.from(new Set(r.discoveryMethods.filter(isDiscoveryMethod)))
    : [...DISCOVERY_METHODS];

  return {
    agent: resolveAgent(toRecord(r.agent), hostname),
    listenHost: str(r.listenHost, "0.0.0.0"),
    registry: {
      url: str(registryRaw.url, "http://registry:5000").replace(/\/+$/, ""),
      timeoutMs: num(registryRaw.timeoutMs, 10_000),
    },
    dns: {
      server: typeof dnsRaw.server === "string" && dnsRaw.server.length > 0 ? dnsRaw.server : null,
      port: parsePort(dnsRaw.port) ?? 53,
      timeoutMs: num(dnsRaw.timeoutMs, 5_000),
    },
    discoveryMethods,
    cacheTtlMs: num(r.cacheTtlMs, 600_000),
    refreshIntervalMs: num(r.refreshIntervalMs, 300_000),
    gossip: {
      intervalMs: num(gossipRaw.intervalMs, 60_000),
      fanout: int(gossipRaw.fanout, 3),
      maxPeersToExchange: int(gossipRaw.maxPeersToExchange, 10),
      peerTtlMs: num(gossipRaw.peerTtlMs, 3_600_000),
      maxConcurrentExchanges: int(gossipRaw.maxConcurrentExchanges, 5),
    },
    registration: {
      heartbeatIntervalMs: num(registrationRaw.heartbeatIntervalMs, 60_000),
      cooldownMs: num(registrationRaw.cooldownMs, 10_000),
      maxAttempts: int(registrationRaw.maxAttempts, 5),
      backoffMs: num(registrationRaw.backoffMs, 60_000),
    },
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
  };
}

/**
 * Overlay PEERWEAVE_* environment variables onto a raw config:
 *
 *   PEERWEAVE_NODE_ID       agent.id
 *   PEERWEAVE_HOST          agent.host
 *   PEERWEAVE_PORT          agent.port
 *   PEERWEAVE_CAPABILITIES  agent.capabilities (comma list)
 *   PEERWEAVE_REGISTRY_URL  registry.url
 *   PEERWEAVE_DNS_SERVER    dns.server
 *   PEERWEAVE_DNS_PORT      dns.port
 *   PEERWEAVE_LOG_LEVEL     logLevel
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const agent = { ...toRecord(raw.agent) };
  const registry = { ...toRecord(raw.registry) };
  const dns = { ...toRecord(raw.dns) };
  const out: Record<string, unknown> = { ...raw };

  if (env.PEERWEAVE_NODE_ID) agent.id = env.PEERWEAVE_NODE_ID;
  if (env.PEERWEAVE_HOST) agent.host = env.PEERWEAVE_HOST;
  if (env.PEERWEAVE_PORT) agent.port = env.PEERWEAVE_PORT;
  if (env.PEERWEAVE_CAPABILITIES) agent.capabilities = env.PEERWEAVE_CAPABILITIES.split(",");
  if (env.PEERWEAVE_REGISTRY_URL) registry.url = env.PEERWEAVE_REGISTRY_URL;
  if (env.PEERWEAVE_DNS_SERVER) dns.server = env.PEERWEAVE_DNS_SERVER;
  if (env.PEERWEAVE_DNS_PORT) dns.port = env.PEERWEAVE_DNS_PORT;
  if (env.PEERWEAVE_LOG_LEVEL) out.logLevel = env.PEERWEAVE_LOG_LEVEL;

  out.agent = agent;
  out.registry = registry;
  out.dns = dns;
  return out;
}

/**
 * Default config file search paths (highest priority first):
 *   1. $PEERWEAVE_CONFIG env
 *   2. ./peerweave.json (cwd)
 *   3. ~/.peerweave/peerweave.json
 */
function resolveConfigPath(env: NodeJS.ProcessEnv): string | null {
  if (env.PEERWEAVE_CONFIG) {
    return env.PEERWEAVE_CONFIG;
  }
  const cwdPath = path.resolve("peerweave.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".peerweave", "peerweave.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

export interface LoadConfigOptions {
  /** Explicit file; wins over the search paths. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  defaults?: ConfigDefaults;
}

/**
 * Load config from the file system, then apply env overrides.
 * Falls back to defaults if no config file is found.
 */
export function loadMeshConfig(opts: LoadConfigOptions = {}): MeshConfig {
  const env = opts.env ?? process.env;
  const configPath = opts.configPath ?? resolveConfigPath(env);

  let raw: Record<string, unknown> = {};
  if (configPath) {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
    if (!isRecord(parsed)) {
      throw new Error(`Invalid peerweave config at ${configPath}: expected a JSON object`);
    }
    raw = parsed;
  }
  return resolveMeshConfig(applyEnvOverrides(raw, env), opts.defaults);
}
