/**
 * Registration Loop
 *
 * Keeps this node registered with the directory.
 *
 *   unregistered ──register ok──▶ registered
 *        ▲                            │
 *        └── heartbeat "not_found" ───┤
 *        └── 5 heartbeat errors ──────┘
 *
 * While unregistered, attempts are spaced by the cooldown; after
 * `maxAttempts` consecutive failures the loop backs off before the
 * counter starts again. While registered, a heartbeat goes out every
 * interval.
 *
 * `tick()` is one step of the state machine and is what tests drive.
 */

import type { AgentRecord, Logger } from "../types.js";
import type { RegistryLink } from "../discovery/registry-link.js";
import { errorMessage } from "../utils/guards.js";
import { SLEEP_SLICE_MS, type SleepFn } from "../utils/sleep.js";
import { LoopRunner } from "./runner.js";

export interface RegistrationLoopOptions {
  registry: RegistryLink;
  /** This node's record, rebuilt for every attempt. */
  describeSelf: () => AgentRecord;
  logger: Logger;
  /** Default: 60_000. */
  heartbeatIntervalMs?: number;
  /** Minimum spacing of registration attempts (ms). Default: 10_000. */
  cooldownMs?: number;
  /** Consecutive failures before backing off. Also the heartbeat error limit. Default: 5. */
  maxAttempts?: number;
  /** Default: 60_000. */
  backoffMs?: number;
  now?: () => number;
  sleep?: SleepFn;
}

export interface RegistrationState {
  registered: boolean;
  /** Consecutive failed registration attempts. */
  attempts: number;
  /** Consecutive heartbeat transport errors. */
  heartbeatErrors: number;
  /** Earliest epoch ms of the next registration attempt. */
  nextAttemptAt: number;
}

export class RegistrationLoop {
  private readonly registry: RegistryLink;
  private readonly describeSelf: () => AgentRecord;
  private readonly logger: Logger;
  private readonly heartbeatIntervalMs: number;
  private readonly cooldownMs: number;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly now: () => number;
  private readonly runner: LoopRunner;

  private registered = false;
  private attempts = 0;
  private heartbeatErrors = 0;
  private nextAttemptAt = 0;

  constructor(opts: RegistrationLoopOptions) {
    this.registry = opts.registry;
    this.describeSelf = opts.describeSelf;
    this.logger = opts.logger;
    this.heartbeatIntervalMs = opts.heartbeatIntervalMs ?? 60_000;
    this.cooldownMs = opts.cooldownMs ?? 10_000;
    this.maxAttempts = opts.maxAttempts ?? 5;
    this.backoffMs = opts.backoffMs ?? 60_000;
    this.now = opts.now ?? Date.now;

    this.runner = new LoopRunner({
      name: "registration",
      logger: this.logger,
      body: () => this.tick(),
      delayMs: () => this.nextDelay(),
      sleep: opts.sleep,
    });
  }

  get state(): RegistrationState {
    return {
      registered: this.registered,
      attempts: this.attempts,
      heartbeatErrors: this.heartbeatErrors,
      nextAttemptAt: this.nextAttemptAt,
    };
  }

  get running(): boolean {
    return this.runner.running;
  }

  /** Start the loop. The first step runs after one delay. */
  start(): boolean {
    if (!this.runner.start()) return false;
    this.logger.info("[peerweave:registration] Registration loop started");
    return true;
  }

  async stop(): Promise<boolean> {
    if (!(await this.runner.stop())) return false;
    this.logger.info("[peerweave:registration] Registration loop stopped");
    return true;
  }

  /**
   * Attempt registration right away, ignoring the cooldown.
   * Used once at startup. Failures count like any other attempt.
   */
  async registerNow(): Promise<boolean> {
    return this.attempt(this.now());
  }

  /** One step: a due registration attempt, or a heartbeat. */
  async tick(): Promise<void> {
    const now = this.now();

    if (!this.registered) {
      if (now < this.nextAttemptAt) return;
      this.logger.info(
        `[peerweave:registration] Not registered yet, attempting to register (attempt ${this.attempts + 1}/${this.maxAttempts})`,
      );
      await this.attempt(now);
      return;
    }

    const id = this.describeSelf().id;
    const result = await this.registry.heartbeat(id);
    switch (result.status) {
      case "ok":
        this.heartbeatErrors = 0;
        this.logger.debug?.(`[peerweave:registration] Sent heartbeat for ${id}`);
        break;
      case "not_found":
        this.logger.warn("[peerweave:registration] Agent not found in registry, will re-register soon");
        this.markUnregistered(now + this.cooldownMs);
        break;
      case "error":
        this.heartbeatErrors++;
        this.logger.error(`[peerweave:registration] Failed to send heartbeat: ${result.message ?? "unknown error"}`);
        if (this.heartbeatErrors >= this.maxAttempts) {
          this.logger.warn("[peerweave:registration] Too many heartbeat failures, will try to re-register");
          this.markUnregistered(now);
        }
        break;
    }
  }

  private async attempt(now: number): Promise<boolean> {
    try {
      const result = await this.registry.register(this.describeSelf());
      this.registered = true;
      this.attempts = 0;
      this.heartbeatErrors = 0;
      this.logger.info(`[peerweave:registration] Registered with registry: ${result.status}`);
      return true;
    } catch (err) {
      this.attempts++;
      this.logger.error(`[peerweave:registration] Failed to register with registry: ${errorMessage(err)}`);
    }

    if (this.attempts >= this.maxAttempts) {
      this.logger.error(
        `[peerweave:registration] Failed to register after ${this.maxAttempts} attempts. Will retry in ${this.backoffMs / 1000}s`,
      );
      this.attempts = 0;
      this.nextAttemptAt = now + this.backoffMs;
    } else {
      this.nextAttemptAt = now + this.cooldownMs;
    }
    return false;
  }

  private markUnregistered(nextAttemptAt: number): void {
    this.registered = false;
    this.heartbeatErrors = 0;
    this.nextAttemptAt = nextAttemptAt;
  }

  private nextDelay(): number {
    if (this.registered) return this.heartbeatIntervalMs;
    return Math.max(this.nextAttemptAt - this.now(), SLEEP_SLICE_MS);
  }
}
