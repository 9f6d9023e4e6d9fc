/**
 * Refresh Loop
 *
 * Every interval, pull what the directory knows into the peer table:
 * the full listing, then agents sharing each of this node's
 * capabilities, then another try at every gossip placeholder.
 */

import type { AgentRecord, Logger } from "../types.js";
import type { DiscoveryCache } from "../discovery/cache.js";
import type { PeerTable } from "../peers/table.js";
import type { SleepFn } from "../utils/sleep.js";
import { LoopRunner } from "./runner.js";

export interface RefreshLoopOptions {
  discovery: DiscoveryCache;
  table: PeerTable;
  /** Capabilities to discover peers for. */
  capabilities: readonly string[];
  logger: Logger;
  /** Default: 300_000. */
  intervalMs?: number;
  sleep?: SleepFn;
}

export interface RefreshResult {
  /** Ids that were not in the table before this pass. */
  added: string[];
  /** Placeholders replaced by a full record. */
  resolved: string[];
  total: number;
}

export class RefreshLoop {
  private readonly discovery: DiscoveryCache;
  private readonly table: PeerTable;
  private readonly capabilities: readonly string[];
  private readonly logger: Logger;
  readonly intervalMs: number;
  private readonly runner: LoopRunner;

  constructor(opts: RefreshLoopOptions) {
    this.discovery = opts.discovery;
    this.table = opts.table;
    this.capabilities = opts.capabilities;
    this.logger = opts.logger;
    this.intervalMs = opts.intervalMs ?? 300_000;

    this.runner = new LoopRunner({
      name: "refresh",
      logger: this.logger,
      body: async () => {
        await this.refresh();
      },
      delayMs: () => this.intervalMs,
      sleep: opts.sleep,
    });
  }

  get running(): boolean {
    return this.runner.running;
  }

  /** Start the loop. The first pass runs after one interval. */
  start(): boolean {
    return this.runner.start();
  }

  async stop(): Promise<boolean> {
    return this.runner.stop();
  }

  /** One full pass. Never throws. */
  async refresh(): Promise<RefreshResult> {
    const known = new Set(this.table.ids());

    this.absorb(await this.discovery.listAll());
    for (const capability of this.capabilities) {
      this.absorb(await this.discovery.resolveByCapability(capability));
    }

    const resolved: string[] = [];
    const placeholders = this.table.all().filter((peer) => peer.record.needsResolution);
    for (const peer of placeholders) {
      const record = await this.discovery.resolve(peer.id);
      if (record && this.table.upsert(peer.id, record)) resolved.push(peer.id);
    }
    if (resolved.length > 0) {
      this.logger.info(`[peerweave:refresh] Resolved ${resolved.length} gossip placeholder(s)`);
    }

    const added = this.table.ids().filter((id) => !known.has(id));
    if (added.length > 0) {
      this.logger.info(`[peerweave:refresh] Discovered ${added.length} new peer(s): ${added.join(", ")}`);
    }
    this.logger.info(`[peerweave:refresh] Refreshed peers, now tracking ${this.table.size} peer(s)`);
    return { added, resolved, total: this.table.size };
  }

  private absorb(records: AgentRecord[]): void {
    for (const record of records) {
      // upsert refuses our own id.
      this.table.upsert(record.id, record);
    }
  }
}
