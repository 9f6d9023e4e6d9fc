/**
 * Name-service lookup of agents.
 *
 * An agent id `agent1.agents.local` publishes
 *   SRV _llm-agent._tcp.agent1.agents.local → target:port
 *   TXT _llm-agent._tcp.agent1.agents.local → "caps=a,b" "desc=..." "ver=..."
 *
 * Used only as the fallback behind the directory; it cannot enumerate.
 */

import { Resolver } from "node:dns/promises";
import type { AgentRecord, Logger } from "../types.js";
import { errorMessage } from "../utils/guards.js";

/** Service label prefixed to agent ids. */
export const AGENT_SERVICE_PREFIX = "_llm-agent._tcp";

/** Version assumed when the TXT record carries none. */
const DEFAULT_VERSION = "1.0";

/** Error codes meaning "no such record" rather than "lookup broken". */
const NOT_FOUND_CODES: ReadonlySet<string> = new Set(["ENOTFOUND", "ENODATA", "NOTFOUND", "NODATA"]);

/** The subset of node:dns Resolver this link uses. */
export interface DnsResolverLike {
  resolveSrv(hostname: string): Promise<Array<{ name: string; port: number; priority: number; weight: number }>>;
  resolveTxt(hostname: string): Promise<string[][]>;
}

export interface DnsLink {
  /** Resolves null when no SRV record exists; throws when the lookup itself fails. */
  lookup(id: string): Promise<AgentRecord | null>;
}

export interface DnsLinkOptions {
  logger: Logger;
  /** Name server host or IP. Omit to use the system resolver. */
  server?: string;
  /** Name server port. Default: 53. */
  port?: number;
  /** Lookup timeout (ms). Default: 5_000. */
  timeoutMs?: number;
  /** Inject a resolver (tests). Overrides server/port/timeout. */
  resolver?: DnsResolverLike;
}

function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  return typeof err.code === "string" && NOT_FOUND_CODES.has(err.code);
}

/**
 * Parse TXT strings into capabilities, description and version.
 * Multi-string records are joined first, as DNS splits long values.
 */
export function parseAgentTxt(records: string[][]): {
  capabilities: string[];
  description: string;
  version: string;
} {
  let capabilities: string[] = [];
  let description = "";
  let version = DEFAULT_VERSION;

  for (const chunks of records) {
    const item = chunks.join("");
    if (item.startsWith("caps=")) {
      capabilities = item.slice(5).split(",").map((c) => c.trim()).filter((c) => c.length > 0);
    } else if (item.startsWith("desc=")) {
      description = item.slice(5);
    } else if (item.startsWith("ver=")) {
      version = item.slice(4);
    }
  }

  return { capabilities, description, version };
}

function createResolver(opts: DnsLinkOptions): DnsResolverLike {
  const resolver = new Resolver({ timeout: opts.timeoutMs ?? 5_000, tries: 1 });
  if (opts.server) {
    const port = opts.port ?? 53;
    const server = opts.server.includes(":") ? `[${opts.server}]:${port}` : `${opts.server}:${port}`;
    resolver.setServers([server]);
  }
  return resolver;
}

export function createDnsLink(opts: DnsLinkOptions): DnsLink {
  const { logger } = opts;
  const resolver = opts.resolver ?? createResolver(opts);

  async function lookup(id: string): Promise<AgentRecord | null> {
    const name = `${AGENT_SERVICE_PREFIX}.${id}`;
    logger.debug?.(`[peerweave:dns] Looking up SRV ${name}`);

    const srv = await resolver.resolveSrv(name).catch((err: unknown) => {
      if (isNotFound(err)) return [];
      throw err;
    });
    const first = srv[0];
    if (!first) return null;

    let txt: string[][] = [];
    try {
      txt = await resolver.resolveTxt(name);
    } catch (err) {
      // SRV alone is enough to reach the agent.
      logger.debug?.(`[peerweave:dns] No TXT for ${name}: ${errorMessage(err)}`);
    }
    const meta = parseAgentTxt(txt);

    return {
      id,
      name: id,
      description: meta.description,
      capabilities: meta.capabilities,
      interfaces: {},
      endpoints: {},
      host: first.name.replace(/\.$/, ""),
      port: first.port,
      version: meta.version,
      protocols: [],
    };
  }

  return { lookup };
}
