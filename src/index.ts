/**
 * peerweave: peer discovery, peer table and gossip for agent nodes.
 *
 * Provides:
 * - Discovery over a central directory with a DNS SRV/TXT fallback
 * - A time-bounded discovery cache
 * - A peer table with health, last-seen and TTL eviction
 * - A gossip engine that spreads peer ids between nodes
 * - Registration/heartbeat and refresh loops
 * - The peer-to-peer HTTP routes every node exposes
 */

export type { AgentRecord, Logger, ModelInfo, Provenance, SearchCriteria } from "./types.js";
export { DirectoryError, PeerRequestError, type RequestFailureCode } from "./errors.js";
export { createMeshLogger, silentLogger, type LogLevel, type MeshLoggerOptions } from "./logger.js";
export {
  applyEnvOverrides,
  loadMeshConfig,
  resolveMeshConfig,
  type DiscoveryMethod,
  type MeshConfig,
} from "./config.js";

export { recordFromWire, recordsFromWire, recordToWire, placeholderRecord } from "./discovery/record.js";
export {
  createHttpRegistryLink,
  type RegistryLink,
  type AgentListFilters,
  type HeartbeatResult,
  type HeartbeatStatus,
} from "./discovery/registry-link.js";
export { createDnsLink, parseAgentTxt, type DnsLink, type DnsResolverLike } from "./discovery/dns-link.js";
export { DiscoveryCache, type AgentResolver, type DiscoveryCacheOptions } from "./discovery/cache.js";

export { resolvePeerAddress, DEFAULT_PEER_PORT, type PeerAddress } from "./peers/address.js";
export {
  recentlySeenPolicy,
  healthyOnlyPolicy,
  RECENTLY_SEEN_MS,
  type PeerHealth,
  type UsablePeerPolicy,
} from "./peers/policy.js";
export { PeerTable, type PeerEntry, type PeerTableOptions } from "./peers/table.js";
export { createHttpPeerLink, type PeerLink, type PeerTarget, type PeerPushResult } from "./peers/link.js";

export {
  GossipEngine,
  type GossipEngineOptions,
  type GossipStats,
  type RoundResult,
  type TargetResult,
} from "./gossip/engine.js";
export { RegistrationLoop, type RegistrationState } from "./loops/registration.js";
export { RefreshLoop, type RefreshResult } from "./loops/refresh.js";

export { createPeerRoutes, type PeerRoutesDeps } from "./routes.js";
export { startMeshHttpServer, stopMeshHttpServer, readJsonBody } from "./server.js";
export { startNode, type MeshNode, type NodeOverrides } from "./node.js";
