/**
 * Gossip Engine
 *
 * Periodic epidemic exchange of peer ids. Each round:
 *
 *   1. evict peers not seen within peerTtlMs
 *   2. pick `fanout` targets (usable peers first, padded with the rest)
 *   3. with each target, through a bounded worker pool:
 *        GET /peers   → ids the target knows
 *        POST /peers  → a sample of ids we know
 *        absorb the target's ids we did not know
 *   4. mark targets that answered as healthy
 *
 * Absorption resolves each new id through the discovery cache; ids that
 * do not resolve enter the table as placeholders and are retried by the
 * refresh loop. Incoming POST /peers requests go through the same path.
 *
 * All peer state lives in the PeerTable; the engine only holds stats.
 */

import type { AgentRecord, Logger } from "../types.js";
import type { AgentResolver } from "../discovery/cache.js";
import { placeholderRecord } from "../discovery/record.js";
import type { PeerTable, PeerEntry } from "../peers/table.js";
import type { PeerLink, PeerPushResult } from "../peers/link.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { errorMessage } from "../utils/guards.js";
import { sampleWithoutReplacement, type RandomSource } from "../utils/random.js";
import type { SleepFn } from "../utils/sleep.js";
import { LoopRunner } from "../loops/runner.js";

/** Default time between rounds (ms). */
export const DEFAULT_GOSSIP_INTERVAL_MS = 60_000;

/** Shortest accepted interval; anything below falls back to the default. */
export const MIN_GOSSIP_INTERVAL_MS = 1_000;

export interface GossipStats {
  rounds: number;
  messagesSent: number;
  messagesReceived: number;
  peersSent: number;
  peersReceived: number;
  newPeersDiscovered: number;
  stalePeersRemoved: number;
  errors: number;
  /** Epoch ms when the last round started, null before the first. */
  lastRoundAt: number | null;
  lastRoundDurationMs: number | null;
}

/** Outcome of the exchange with one target. */
export interface TargetResult {
  peerId: string;
  status: "success" | "error";
  /** Ids received from the target. */
  received: number;
  /** Ids sent to the target. */
  sent: number;
  /** Ids that were new to us and now sit in the table. */
  learned: string[];
  /** Ids the target reported as new to it. */
  addedByTarget: string[];
  error?: string;
}

export interface RoundResult {
  status: "completed" | "no_peers";
  startedAt: number;
  durationMs: number;
  evicted: string[];
  targets: TargetResult[];
}

export interface AbsorbOptions {
  /** Ids to skip besides our own (e.g. the peer that sent the list). */
  exclude?: readonly string[];
  /** Recorded on placeholders as `discoveredVia`. */
  via?: string;
}

export interface GossipEngineOptions {
  selfId: string;
  table: PeerTable;
  resolver: AgentResolver;
  peerLink: PeerLink;
  logger: Logger;
  /** Targets per round. Default: 3. */
  fanout?: number;
  /** Most ids sent to one target. Default: 10. */
  maxPeersToExchange?: number;
  /** Peers unseen for longer are evicted (ms). Default: 3_600_000. */
  peerTtlMs?: number;
  /** Time between rounds (ms). Default: 60_000; below 1_000 uses the default. */
  intervalMs?: number;
  /** Exchanges in flight at once. Default: 5. */
  maxConcurrentExchanges?: number;
  random?: RandomSource;
  now?: () => number;
  sleep?: SleepFn;
}

export class GossipEngine {
  private readonly selfId: string;
  private readonly table: PeerTable;
  private readonly resolver: AgentResolver;
  private readonly peerLink: PeerLink;
  private readonly logger: Logger;
  private readonly fanout: number;
  private readonly maxPeersToExchange: number;
  private readonly peerTtlMs: number;
  readonly intervalMs: number;
  private readonly maxConcurrentExchanges: number;
  private readonly random: RandomSource;
  private readonly now: () => number;
  private readonly runner: LoopRunner;

  private counters: GossipStats = {
    rounds: 0,
    messagesSent: 0,
    messagesReceived: 0,
    peersSent: 0,
    peersReceived: 0,
    newPeersDiscovered: 0,
    stalePeersRemoved: 0,
    errors: 0,
    lastRoundAt: null,
    lastRoundDurationMs: null,
  };
  private last: RoundResult | null = null;

  constructor(opts: GossipEngineOptions) {
    this.selfId = opts.selfId;
    this.table = opts.table;
    this.resolver = opts.resolver;
    this.peerLink = opts.peerLink;
    this.logger = opts.logger;
    this.fanout = opts.fanout ?? 3;
    this.maxPeersToExchange = opts.maxPeersToExchange ?? 10;
    this.peerTtlMs = opts.peerTtlMs ?? 3_600_000;
    this.maxConcurrentExchanges = opts.maxConcurrentExchanges ?? 5;
    this.random = opts.random ?? Math.random;
    this.now = opts.now ?? Date.now;

    const interval = opts.intervalMs ?? DEFAULT_GOSSIP_INTERVAL_MS;
    if (interval < MIN_GOSSIP_INTERVAL_MS) {
      this.logger.warn(
        `[peerweave:gossip] Gossip interval ${interval}ms is too short, using ${DEFAULT_GOSSIP_INTERVAL_MS}ms`,
      );
      this.intervalMs = DEFAULT_GOSSIP_INTERVAL_MS;
    } else {
      this.intervalMs = interval;
    }

    this.runner = new LoopRunner({
      name: "gossip",
      logger: this.logger,
      body: async () => {
        await this.runRound();
      },
      delayMs: () => this.intervalMs,
      immediate: true,
      sleep: opts.sleep,
    });
  }

  get running(): boolean {
    return this.runner.running;
  }

  /** Counters since process start. */
  get stats(): GossipStats {
    return { ...this.counters };
  }

  /** Result of the most recent round, or null. */
  get lastRound(): RoundResult | null {
    return this.last;
  }

  /**
   * Start the background loop. The first round runs immediately.
   * Returns false if already running.
   */
  start(): boolean {
    if (!this.runner.start()) return false;
    this.logger.info(`[peerweave:gossip] Gossip started (interval: ${this.intervalMs / 1000}s, fanout: ${this.fanout})`);
    return true;
  }

  /**
   * Stop the loop and wait for it to exit. A round in progress finishes
   * first; a sleeping loop wakes within one slice.
   * Returns false if not running.
   */
  async stop(): Promise<boolean> {
    if (!(await this.runner.stop())) return false;
    this.logger.info("[peerweave:gossip] Gossip stopped");
    return true;
  }

  /** Run one round now. Never throws. */
  async runRound(): Promise<RoundResult> {
    const startedAt = this.now();

    const evicted = this.table.evictStale(this.peerTtlMs);
    this.counters.stalePeersRemoved += evicted.length;
    this.counters.rounds++;

    const targets = this.selectTargets();
    let results: TargetResult[] = [];
    if (targets.length === 0) {
      this.logger.info("[peerweave:gossip] No gossip targets available");
    } else {
      results = await mapWithConcurrency(targets, this.maxConcurrentExchanges, (peer) => this.exchangeWith(peer));
    }

    const durationMs = this.now() - startedAt;
    this.counters.lastRoundAt = startedAt;
    this.counters.lastRoundDurationMs = durationMs;

    const round: RoundResult = {
      status: targets.length === 0 ? "no_peers" : "completed",
      startedAt,
      durationMs,
      evicted,
      targets: results,
    };
    this.last = round;

    if (results.length > 0) {
      const ok = results.filter((r) => r.status === "success").length;
      const learned = results.reduce((sum, r) => sum + r.learned.length, 0);
      this.logger.info(
        `[peerweave:gossip] Round ${this.counters.rounds}: ${ok}/${results.length} exchange(s) succeeded, ${learned} new peer(s)`,
      );
    }
    return round;
  }

  /**
   * Up to `fanout` distinct peers: a uniform sample of the usable ones,
   * padded with a uniform sample of the remaining known peers.
   */
  selectTargets(): PeerEntry[] {
    const usable = this.table.usablePeers();
    const chosen = sampleWithoutReplacement(usable, this.fanout, this.random);
    if (chosen.length >= this.fanout) return chosen;

    const picked = new Set(chosen.map((p) => p.id));
    const rest = this.table.all().filter((p) => !picked.has(p.id));
    return [...chosen, ...sampleWithoutReplacement(rest, this.fanout - chosen.length, this.random)];
  }

  /**
   * Bring ids we did not know into the table. Each is resolved through
   * the discovery cache; an unresolved id becomes a placeholder.
   * Returns the ids added.
   */
  async absorbPeerIds(ids: readonly string[], opts: AbsorbOptions = {}): Promise<string[]> {
    const skip = new Set([this.selfId, ...(opts.exclude ?? [])]);
    const added: string[] = [];

    for (const id of new Set(ids)) {
      if (skip.has(id) || this.table.has(id)) continue;

      let record: AgentRecord | null = null;
      try {
        record = await this.resolver.resolve(id);
      } catch (err) {
        this.logger.warn(`[peerweave:gossip] Failed to discover peer ${id} from gossip: ${errorMessage(err)}`);
      }

      // A concurrent exchange may have added it while we resolved.
      if (this.table.has(id)) continue;

      const inserted = record
        ? this.table.upsert(id, record)
        : this.table.upsert(id, placeholderRecord(id, opts.via));
      if (inserted) added.push(id);
    }

    this.counters.newPeersDiscovered += added.length;
    return added;
  }

  /** Serve an incoming POST /peers. */
  async handleIncomingPeers(ids: readonly string[]): Promise<PeerPushResult> {
    this.counters.messagesReceived++;
    this.counters.peersReceived += ids.length;

    const addedPeers = await this.absorbPeerIds(ids);
    if (addedPeers.length > 0) {
      this.logger.info(`[peerweave:gossip] Learned ${addedPeers.length} peer(s) from an incoming push`);
    }
    return { status: "success", addedPeers, totalPeers: this.table.size };
  }

  private async exchangeWith(peer: PeerEntry): Promise<TargetResult> {
    const result: TargetResult = {
      peerId: peer.id,
      status: "error",
      received: 0,
      sent: 0,
      learned: [],
      addedByTarget: [],
    };

    if (!peer.address) {
      this.counters.errors++;
      result.error = "no usable address";
      this.logger.warn(`[peerweave:gossip] Cannot gossip with ${peer.id}: no usable address`);
      return result;
    }
    const target = { id: peer.id, address: peer.address, endpoints: peer.record.endpoints };

    try {
      const theirs = await this.peerLink.fetchPeerIds(target);
      this.counters.messagesReceived++;
      this.counters.peersReceived += theirs.length;
      result.received = theirs.length;

      const candidates = this.table.ids().filter((id) => id !== peer.id && id !== this.selfId);
      const ours = sampleWithoutReplacement(candidates, this.maxPeersToExchange, this.random);
      const pushed = await this.peerLink.sendPeerIds(target, ours);
      this.counters.messagesSent++;
      this.counters.peersSent += ours.length;
      result.sent = ours.length;
      result.addedByTarget = pushed.addedPeers;

      result.learned = await this.absorbPeerIds(theirs, { exclude: [peer.id], via: peer.id });
      this.table.setHealth(peer.id, "healthy");
      result.status = "success";
    } catch (err) {
      this.counters.errors++;
      result.error = errorMessage(err);
      this.logger.warn(`[peerweave:gossip] Exchange with ${peer.id} failed: ${result.error}`);
    }
    return result;
  }
}
