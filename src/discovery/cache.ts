/**
 * Discovery Cache
 *
 * One lookup API over the directory (RegistryLink) and the name service
 * (DnsLink), with a time-bounded cache in front of both.
 *
 * Resolution order for a single id:
 *   1. Cache hit younger than cacheTtlMs → served, no network call
 *   2. Directory lookup
 *   3. If the directory failed or had nothing → name-service lookup
 *   4. Success → provenance + cacheTime stamped, cached
 *
 * Nothing here throws: link failures are logged and degrade to
 * "no result". Capability and criteria searches are directory-only.
 */

import type { AgentRecord, Logger, Provenance, SearchCriteria } from "../types.js";
import type { RegistryLink } from "./registry-link.js";
import type { DnsLink } from "./dns-link.js";
import { errorMessage } from "../utils/guards.js";

/** Anything that can turn an agent id into a record. */
export interface AgentResolver {
  resolve(id: string): Promise<AgentRecord | null>;
}

export interface DiscoveryCacheOptions {
  /** Directory client. Null disables directory lookups. */
  registry: RegistryLink | null;
  /** Name-service client. Null disables the fallback. */
  dns: DnsLink | null;
  logger: Logger;
  /** Max age of a cached record (ms). Default: 300_000 (5 minutes). */
  cacheTtlMs?: number;
  /** Clock (epoch ms). Default: Date.now. */
  now?: () => number;
}

export class DiscoveryCache implements AgentResolver {
  private entries = new Map<string, AgentRecord>();
  private readonly registry: RegistryLink | null;
  private readonly dns: DnsLink | null;
  private readonly logger: Logger;
  private readonly cacheTtlMs: number;
  private readonly now: () => number;

  constructor(opts: DiscoveryCacheOptions) {
    this.registry = opts.registry;
    this.dns = opts.dns;
    this.logger = opts.logger;
    this.cacheTtlMs = opts.cacheTtlMs ?? 300_000;
    this.now = opts.now ?? Date.now;
  }

  /** Number of cached records, fresh or not. */
  get size(): number {
    return this.entries.size;
  }

  /** Cached record for an id if still fresh, without touching the network. */
  peek(id: string): AgentRecord | null {
    const cached = this.entries.get(id);
    if (!cached || cached.cacheTime === undefined) return null;
    if (this.now() - cached.cacheTime >= this.cacheTtlMs) return null;
    return { ...cached };
  }

  /** Resolve one agent id. Returns null when every method came up empty. */
  async resolve(id: string): Promise<AgentRecord | null> {
    const cached = this.peek(id);
    if (cached) {
      this.logger.debug?.(`[peerweave:discovery] Cache hit for ${id}`);
      return cached;
    }

    if (this.registry) {
      try {
        const found = await this.registry.get(id);
        if (found) {
          this.logger.debug?.(`[peerweave:discovery] Found ${id} in directory`);
          return this.store(found, "registry");
        }
      } catch (err) {
        this.logger.warn(`[peerweave:discovery] Directory lookup for ${id} failed: ${errorMessage(err)}`);
      }
    }

    if (this.dns) {
      try {
        const found = await this.dns.lookup(id);
        if (found) {
          this.logger.debug?.(`[peerweave:discovery] Found ${id} via DNS`);
          return this.store(found, "dns");
        }
      } catch (err) {
        this.logger.warn(`[peerweave:discovery] DNS lookup for ${id} failed: ${errorMessage(err)}`);
      }
    }

    this.logger.warn(`[peerweave:discovery] ${id} not found via any discovery method`);
    return null;
  }

  /** Directory-only capability search; every hit is written through the cache. */
  async resolveByCapability(capability: string): Promise<AgentRecord[]> {
    if (!this.registry) return [];
    try {
      const found = await this.registry.list({ capability });
      this.logger.info(`[peerweave:discovery] ${found.length} agent(s) with capability "${capability}"`);
      return found.map((r) => this.store(r, "registry"));
    } catch (err) {
      this.logger.warn(`[peerweave:discovery] Capability search "${capability}" failed: ${errorMessage(err)}`);
      return [];
    }
  }

  /** Directory criteria search (AND capabilities, text, protocol, provider, paging). */
  async resolveByCriteria(criteria: SearchCriteria): Promise<AgentRecord[]> {
    if (!this.registry) return [];
    try {
      const found = await this.registry.search(criteria);
      this.logger.info(`[peerweave:discovery] ${found.length} agent(s) matching criteria`);
      return found.map((r) => this.store(r, "registry"));
    } catch (err) {
      this.logger.warn(`[peerweave:discovery] Criteria search failed: ${errorMessage(err)}`);
      return [];
    }
  }

  /** Full directory listing, written through the cache. */
  async listAll(): Promise<AgentRecord[]> {
    if (!this.registry) return [];
    try {
      const found = await this.registry.list();
      return found.map((r) => this.store(r, "registry"));
    } catch (err) {
      this.logger.warn(`[peerweave:discovery] Directory listing failed: ${errorMessage(err)}`);
      return [];
    }
  }

  /** Drop one cached record. Returns true if it was cached. */
  invalidate(id: string): boolean {
    return this.entries.delete(id);
  }

  /** Drop every cached record. */
  clear(): void {
    this.logger.info(`[peerweave:discovery] Clearing cache (${this.entries.size} record(s))`);
    this.entries.clear();
  }

  private store(record: AgentRecord, provenance: Provenance): AgentRecord {
    const stamped: AgentRecord = { ...record, provenance, cacheTime: this.now() };
    this.entries.set(stamped.id, stamped);
    return { ...stamped };
  }
}
