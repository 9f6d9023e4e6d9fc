/**
 * Cooperative background loop.
 *
 * Runs `body`, sleeps `delayMs()` in one-second slices, repeats until
 * stopped. A body that throws is logged and the loop carries on.
 * `stop()` resolves once the loop has exited.
 */

import type { Logger } from "../types.js";
import { errorMessage } from "../utils/guards.js";
import { sleep, sleepWhile, type SleepFn } from "../utils/sleep.js";

export interface LoopRunnerOptions {
  /** Used in log lines ("gossip", "refresh", ...). */
  name: string;
  logger: Logger;
  body: () => Promise<void>;
  /** Wait after each pass (ms); read again every pass. */
  delayMs: () => number;
  /** Run the first pass at once instead of after one delay. Default: false. */
  immediate?: boolean;
  sleep?: SleepFn;
}

export class LoopRunner {
  private readonly opts: LoopRunnerOptions;
  private readonly sleepFn: SleepFn;
  private active = false;
  private generation = 0;
  private loop: Promise<void> | null = null;

  constructor(opts: LoopRunnerOptions) {
    this.opts = opts;
    this.sleepFn = opts.sleep ?? sleep;
  }

  get running(): boolean {
    return this.active;
  }

  /** Returns false if already running. */
  start(): boolean {
    if (this.active) return false;
    this.active = true;
    this.generation++;
    this.loop = this.run(this.generation);
    return true;
  }

  /** Returns false if not running. */
  async stop(): Promise<boolean> {
    if (!this.active) return false;
    this.active = false;
    const loop = this.loop;
    this.loop = null;
    if (loop) await loop;
    return true;
  }

  private async run(generation: number): Promise<void> {
    // A stop followed by a quick start must not revive this pass.
    const keepGoing = (): boolean => this.active && this.generation === generation;
    if (!this.opts.immediate) {
      await sleepWhile(this.opts.delayMs(), keepGoing, this.sleepFn);
    }
    while (keepGoing()) {
      try {
        await this.opts.body();
      } catch (err) {
        this.opts.logger.error(`[peerweave:${this.opts.name}] Loop pass failed: ${errorMessage(err)}`);
      }
      await sleepWhile(this.opts.delayMs(), keepGoing, this.sleepFn);
    }
  }
}
