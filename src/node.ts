/**
 * Node runtime.
 *
 * Builds every collaborator from a MeshConfig, injects them into each
 * other, then brings the node up in order:
 *
 *   1. peer HTTP server
 *   2. initial registration (directory enabled)
 *   3. initial refresh, then the refresh loop
 *   4. registration loop
 *   5. gossip loop (when "peers" discovery is enabled)
 *
 * Nothing here is a module-level singleton; two nodes can share a
 * process, which is what the integration tests do.
 */

import type { Server } from "node:http";
import type { MeshConfig } from "./config.js";
import type { AgentRecord, Logger } from "./types.js";
import { createMeshLogger } from "./logger.js";
import { DiscoveryCache } from "./discovery/cache.js";
import { createHttpRegistryLink, type RegistryLink } from "./discovery/registry-link.js";
import { createDnsLink, type DnsLink } from "./discovery/dns-link.js";
import { PeerTable } from "./peers/table.js";
import { createHttpPeerLink, type PeerLink } from "./peers/link.js";
import type { UsablePeerPolicy } from "./peers/policy.js";
import { GossipEngine } from "./gossip/engine.js";
import { RegistrationLoop } from "./loops/registration.js";
import { RefreshLoop } from "./loops/refresh.js";
import { createPeerRoutes } from "./routes.js";
import { listeningPort, startMeshHttpServer, stopMeshHttpServer } from "./server.js";
import { errorMessage } from "./utils/guards.js";
import type { RandomSource } from "./utils/random.js";
import type { SleepFn } from "./utils/sleep.js";

/** Replacements for the collaborators startNode would build itself. */
export interface NodeOverrides {
  logger?: Logger;
  registry?: RegistryLink;
  dns?: DnsLink;
  peerLink?: PeerLink;
  usablePolicy?: UsablePeerPolicy;
  /** Port to bind instead of agent.port (0 picks a free one). */
  listenPort?: number;
  now?: () => number;
  random?: RandomSource;
  sleep?: SleepFn;
}

export interface MeshNode {
  readonly config: MeshConfig;
  readonly logger: Logger;
  readonly table: PeerTable;
  readonly discovery: DiscoveryCache;
  readonly gossip: GossipEngine;
  readonly refresh: RefreshLoop;
  /** Null when "registry" discovery is disabled. */
  readonly registration: RegistrationLoop | null;
  readonly server: Server;
  /** Port the HTTP server is bound to. */
  readonly port: number;
  describeSelf(): AgentRecord;
  stop(): Promise<void>;
}

export async function startNode(config: MeshConfig, overrides: NodeOverrides = {}): Promise<MeshNode> {
  const logger = overrides.logger ?? createMeshLogger({ level: config.logLevel });
  const now = overrides.now ?? Date.now;
  const methods = new Set(config.discoveryMethods);
  const { agent } = config;

  const registry = methods.has("registry")
    ? overrides.registry ?? createHttpRegistryLink({
        baseUrl: config.registry.url,
        logger,
        timeoutMs: config.registry.timeoutMs,
      })
    : null;
  const dns = methods.has("dns")
    ? overrides.dns ?? createDnsLink({
        logger,
        server: config.dns.server ?? undefined,
        port: config.dns.port,
        timeoutMs: config.dns.timeoutMs,
      })
    : null;

  const discovery = new DiscoveryCache({ registry, dns, logger, cacheTtlMs: config.cacheTtlMs, now });
  const peerLink = overrides.peerLink ?? createHttpPeerLink({ logger });
  const table = new PeerTable({
    selfId: agent.id,
    logger,
    peerLink,
    usablePolicy: overrides.usablePolicy,
    now,
  });

  const gossip = new GossipEngine({
    selfId: agent.id,
    table,
    resolver: discovery,
    peerLink,
    logger,
    fanout: config.gossip.fanout,
    maxPeersToExchange: config.gossip.maxPeersToExchange,
    peerTtlMs: config.gossip.peerTtlMs,
    intervalMs: config.gossip.intervalMs,
    maxConcurrentExchanges: config.gossip.maxConcurrentExchanges,
    random: overrides.random,
    now,
    sleep: overrides.sleep,
  });

  const describeSelf = (): AgentRecord => {
    const record: AgentRecord = {
      id: agent.id,
      name: agent.name,
      description: agent.description,
      capabilities: [...agent.capabilities],
      interfaces: { ...agent.interfaces },
      endpoints: { ...agent.endpoints },
      host: agent.host,
      port: agent.port,
      version: agent.version,
      protocols: [...agent.protocols],
      lastUpdate: now(),
    };
    if (agent.modelInfo) record.modelInfo = { ...agent.modelInfo };
    if (agent.owner !== undefined) record.owner = agent.owner;
    return record;
  };

  const refresh = new RefreshLoop({
    discovery,
    table,
    capabilities: agent.capabilities,
    logger,
    intervalMs: config.refreshIntervalMs,
    sleep: overrides.sleep,
  });

  const registration = registry
    ? new RegistrationLoop({
        registry,
        describeSelf,
        logger,
        ...config.registration,
        now,
        sleep: overrides.sleep,
      })
    : null;

  const server = await startMeshHttpServer(
    createPeerRoutes({ describeSelf, table, gossip, discovery, logger }),
    { port: overrides.listenPort ?? agent.port, host: config.listenHost, logger },
  );

  if (registration) {
    if (await registration.registerNow()) {
      logger.info(`[peerweave:node] Registered ${agent.id} with the directory`);
    } else {
      logger.warn("[peerweave:node] Initial registration failed, will retry in the registration loop");
    }
  }

  await refresh.refresh();
  refresh.start();
  registration?.start();
  if (methods.has("peers")) {
    gossip.start();
  }
  logger.info(`[peerweave:node] Node ${agent.id} up (discovery: ${[...methods].join(", ") || "none"})`);

  async function stop(): Promise<void> {
    await gossip.stop();
    await refresh.stop();
    if (registration) {
      await registration.stop();
      if (registry && registration.state.registered) {
        try {
          await registry.unregister(agent.id);
        } catch (err) {
          logger.warn(`[peerweave:node] Failed to unregister ${agent.id}: ${errorMessage(err)}`);
        }
      }
    }
    await stopMeshHttpServer(server);
    logger.info(`[peerweave:node] Node ${agent.id} stopped`);
  }

  return {
    config,
    logger,
    table,
    discovery,
    gossip,
    refresh,
    registration,
    server,
    port: listeningPort(server),
    describeSelf,
    stop,
  };
}
