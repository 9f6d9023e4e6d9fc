/**
 * Peer Table
 *
 * The local node's view of its peers: one record, one health state and
 * one last-seen time per id. Three loops (registration, refresh, gossip)
 * and the peer routes all share one table.
 *
 * Every method body that touches the maps is synchronous, so the event
 * loop runs it to completion before any other task observes the maps:
 * the three maps change together or not at all. `probe` is the only
 * async method and performs its request outside any mutation.
 *
 * Reads hand out copies; callers never hold live references.
 */

import type { AgentRecord, Logger } from "../types.js";
import { errorMessage } from "../utils/guards.js";
import { resolvePeerAddress, type PeerAddress } from "./address.js";
import type { PeerLink } from "./link.js";
import { recentlySeenPolicy, type PeerHealth, type UsablePeerPolicy } from "./policy.js";

/** One known peer. */
export interface PeerEntry {
  id: string;
  record: AgentRecord;
  /** Null when no health was ever recorded. */
  health: PeerHealth | null;
  /** Epoch ms of the last upsert or successful contact. */
  lastSeen: number;
  /** Resolved once on upsert; null when no host could be derived. */
  address: PeerAddress | null;
}

export interface PeerTableOptions {
  /** This node's id; never stored. */
  selfId: string;
  logger: Logger;
  /** Client used by `probe`. Without it, probes report "unknown". */
  peerLink?: PeerLink;
  /** Which peers `usablePeers` returns. Default: recentlySeenPolicy(). */
  usablePolicy?: UsablePeerPolicy;
  /** Return every peer when the policy admits none. Default: true. */
  fallbackToAll?: boolean;
  /** Clock (epoch ms). Default: Date.now. */
  now?: () => number;
}

function copyRecord(record: AgentRecord): AgentRecord {
  const copy: AgentRecord = {
    ...record,
    capabilities: [...record.capabilities],
    interfaces: { ...record.interfaces },
    endpoints: { ...record.endpoints },
    protocols: [...record.protocols],
  };
  if (record.modelInfo) copy.modelInfo = { ...record.modelInfo };
  return copy;
}

export class PeerTable {
  private records = new Map<string, AgentRecord>();
  private healthById = new Map<string, PeerHealth>();
  private lastSeenById = new Map<string, number>();
  private addresses = new Map<string, PeerAddress | null>();

  readonly selfId: string;
  private readonly logger: Logger;
  private readonly peerLink: PeerLink | undefined;
  private readonly usablePolicy: UsablePeerPolicy;
  private readonly fallbackToAll: boolean;
  private readonly now: () => number;

  constructor(opts: PeerTableOptions) {
    this.selfId = opts.selfId;
    this.logger = opts.logger;
    this.peerLink = opts.peerLink;
    this.usablePolicy = opts.usablePolicy ?? recentlySeenPolicy();
    this.fallbackToAll = opts.fallbackToAll ?? true;
    this.now = opts.now ?? Date.now;
  }

  /**
   * Insert or replace a peer's record.
   * Returns false (and changes nothing) for the local node's own id.
   */
  upsert(id: string, record: AgentRecord): boolean {
    if (id === this.selfId) return false;

    const address = resolvePeerAddress(id, record, this.logger);
    const isNew = !this.records.has(id);

    this.records.set(id, copyRecord(record));
    this.lastSeenById.set(id, this.now());
    this.addresses.set(id, address);
    if (isNew) {
      this.healthById.set(id, "unknown");
      this.logger.debug?.(`[peerweave:peers] Added new peer: ${id}`);
    } else {
      this.logger.debug?.(`[peerweave:peers] Updated existing peer: ${id}`);
    }
    return true;
  }

  /** Remove a peer. Returns true if it existed. */
  remove(id: string): boolean {
    const existed = this.records.delete(id);
    this.healthById.delete(id);
    this.lastSeenById.delete(id);
    this.addresses.delete(id);
    if (existed) this.logger.debug?.(`[peerweave:peers] Removed peer: ${id}`);
    return existed;
  }

  /** A copy of one peer's entry, or null. */
  get(id: string): PeerEntry | null {
    const record = this.records.get(id);
    if (!record) return null;
    return this.entryFor(id, record);
  }

  /** Copies of every entry. */
  all(): PeerEntry[] {
    return Array.from(this.records.entries(), ([id, record]) => this.entryFor(id, record));
  }

  ids(): string[] {
    return Array.from(this.records.keys());
  }

  has(id: string): boolean {
    return this.records.has(id);
  }

  get size(): number {
    return this.records.size;
  }

  /**
   * Record a probe or exchange outcome for a known peer.
   * "healthy" counts as contact and refreshes last-seen.
   * Unknown ids are ignored.
   */
  setHealth(id: string, health: PeerHealth): void {
    if (!this.records.has(id)) return;
    this.healthById.set(id, health);
    if (health === "healthy") this.lastSeenById.set(id, this.now());
  }

  /**
   * Peers admitted by the usable-peer policy.
   * Never empty while the table is non-empty, unless fallbackToAll is off.
   */
  usablePeers(): PeerEntry[] {
    const now = this.now();
    const everyone = this.all();
    const usable = everyone.filter((peer) => this.usablePolicy(peer, now));

    if (usable.length === 0 && everyone.length > 0 && this.fallbackToAll) {
      this.logger.warn("[peerweave:peers] No peers marked as usable, using all peers as a fallback");
      return everyone;
    }
    return usable;
  }

  /**
   * Check a peer's health endpoint and record the outcome.
   *
   * - 2xx → "healthy"
   * - non-2xx or request failure → "unhealthy"
   * - no derivable address, no link, or unknown peer → "unknown"
   */
  async probe(id: string): Promise<PeerHealth> {
    const entry = this.get(id);
    if (!entry) return "unknown";

    if (!entry.address || !this.peerLink) {
      this.logger.warn(`[peerweave:peers] Cannot determine address for peer ${id}`);
      this.setHealth(id, "unknown");
      return "unknown";
    }

    let health: PeerHealth;
    try {
      const ok = await this.peerLink.checkHealth({
        id,
        address: entry.address,
        endpoints: entry.record.endpoints,
      });
      health = ok ? "healthy" : "unhealthy";
    } catch (err) {
      this.logger.warn(`[peerweave:peers] Health check failed for peer ${id}: ${errorMessage(err)}`);
      health = "unhealthy";
    }

    // The peer may have been evicted while the request was in flight.
    this.setHealth(id, health);
    return health;
  }

  /**
   * Remove every peer not seen for more than `ttlMs`.
   * Returns the removed ids.
   */
  evictStale(ttlMs: number): string[] {
    const now = this.now();
    const removed: string[] = [];

    for (const [id, lastSeen] of this.lastSeenById) {
      if (now - lastSeen > ttlMs) removed.push(id);
    }
    for (const id of removed) this.remove(id);

    if (removed.length > 0) {
      this.logger.info(`[peerweave:peers] Removed ${removed.length} stale peer(s)`);
    }
    return removed;
  }

  private entryFor(id: string, record: AgentRecord): PeerEntry {
    const address = this.addresses.get(id) ?? null;
    return {
      id,
      record: copyRecord(record),
      health: this.healthById.get(id) ?? null,
      lastSeen: this.lastSeenById.get(id) ?? 0,
      address: address ? { ...address } : null,
    };
  }
}
