/**
 * Burst scheduling: alternate a sleeping phase and a generating phase
 */

import type { BurstConfig } from "../../types/config.js";
import { ConfigError } from "../../utils/errors.js";
import { sleep, throwIfCancelled } from "../utils/abort.js";

export type BurstPhase = "sleeping" | "generating";

/**
 * Wall-clock driven burst window. The schedule starts inside a generating
 * window of `generateTimeMs`, followed by `sleepTimeMs` of silence, and so on.
 * Phases are computed from the current time on every call, so callers that
 * stop pulling for a while land in the right window when they come back.
 */
export class BurstScheduler {
  private readonly sleepTimeMs: number;
  private readonly generateTimeMs: number;
  /** End of the current (or last seen) generating window. */
  private windowEnd: number;

  constructor(config: BurstConfig, now: number = Date.now()) {
    if (config.sleepTimeMs < 0) {
      throw new ConfigError(
        `burst sleep time must be >= 0, got ${config.sleepTimeMs}ms`,
      );
    }
    if (config.sleepTimeMs > 0 && !(config.generateTimeMs > 0)) {
      throw new ConfigError(
        `burst generate time must be > 0 when sleep time is set, got ${config.generateTimeMs}ms`,
      );
    }
    this.sleepTimeMs = config.sleepTimeMs;
    this.generateTimeMs = config.generateTimeMs;
    this.windowEnd = now + config.generateTimeMs;
  }

  get enabled(): boolean {
    return this.sleepTimeMs > 0;
  }

  get currentWindowEnd(): number {
    return this.windowEnd;
  }

  /**
   * Phase at `now`, without moving the window.
   */
  phase(now: number = Date.now()): BurstPhase {
    if (!this.enabled || now < this.windowEnd) return "generating";
    const cycle = this.sleepTimeMs + this.generateTimeMs;
    return (now - this.windowEnd) % cycle < this.sleepTimeMs
      ? "sleeping"
      : "generating";
  }

  /**
   * Return immediately inside a generating window, otherwise block until the
   * next one starts.
   *
   * @throws CancelledError if `signal` aborts first
   */
  async wait(signal?: AbortSignal, now: number = Date.now()): Promise<void> {
    throwIfCancelled(signal);
    if (!this.enabled || now < this.windowEnd) return;

    // Catch the window up to the present in whole cycles.
    const cycle = this.sleepTimeMs + this.generateTimeMs;
    const cycles = Math.floor((now - this.windowEnd) / cycle) + 1;
    this.windowEnd += cycles * cycle;

    const wakeAt = this.windowEnd - this.generateTimeMs;
    if (wakeAt <= now) return;

    await sleep(wakeAt - now, signal);
  }
}
