/**
 * Shared type definitions for peerweave.
 * Kept free of runtime dependencies so every layer can import them.
 */

// --- Logging ---

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

// --- Agent records ---

/** How a record was learned. */
export type Provenance = "registry" | "dns" | "gossip";

/** Model metadata advertised by an agent (used by provider search). */
export interface ModelInfo {
  type?: string;
  provider?: string;
}

/**
 * Everything known about one agent.
 *
 * Records are immutable by replacement: a fresher discovery produces a
 * new object, callers never patch one in place.
 */
export interface AgentRecord {
  /** Globally unique, domain-like id (e.g. "agent1.agents.local"). */
  id: string;
  name: string;
  description?: string;
  capabilities: string[];
  /** Protocol name → URL (e.g. rest → "http://agent1:8000/v1"). */
  interfaces: Record<string, string>;
  /** Logical endpoint name → path or URL (e.g. peers → "/peers"). */
  endpoints: Record<string, string>;
  host?: string;
  /** Loosely typed on purpose: directories hand back strings too. */
  port?: number | string;
  version?: string;
  protocols: string[];
  modelInfo?: ModelInfo;
  owner?: string;
  /** Epoch ms of the last directory update. */
  lastUpdate?: number;
  provenance?: Provenance;
  /** Epoch ms when the record entered the discovery cache. */
  cacheTime?: number;
  /** Set on gossip placeholders that still need a full lookup. */
  needsResolution?: boolean;
  /** Peer that told us about this id (placeholders only). */
  discoveredVia?: string;
}

/** Search filters understood by the directory listing. */
export interface SearchCriteria {
  /** Every capability must be advertised (AND). */
  capabilities?: string[];
  /** Case-insensitive substring over name or description. */
  query?: string;
  protocol?: string;
  provider?: string;
  limit?: number;
  offset?: number;
}
