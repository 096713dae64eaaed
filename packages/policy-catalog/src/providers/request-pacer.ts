/**
 * Request Pacer
 *
 * Enforces a minimum interval between consecutive requests to one upstream.
 * Each source owns its pacer instance; nothing here is module-level, so two
 * runs in one process never share pacing state.
 *
 * @example
 * ```typescript
 * const pacer = new RequestPacer({ minIntervalMs: 200 });
 * await pacer.wait();
 * const page = await client.fetchTextOrNull(url);
 * ```
 */

export interface RequestPacerConfig {
  /** Minimum gap between the start of two requests */
  readonly minIntervalMs: number;

  /** Clock in milliseconds (default: Date.now) */
  readonly now?: () => number;

  /** Delay implementation (default: setTimeout) */
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface RequestPacerStats {
  readonly requests: number;
  readonly totalWaitMs: number;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class RequestPacer {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastRequestAt: number | null = null;
  private requests = 0;
  private totalWaitMs = 0;

  constructor(config: RequestPacerConfig) {
    if (!Number.isFinite(config.minIntervalMs) || config.minIntervalMs < 0) {
      throw new Error(`minIntervalMs must be a non-negative number, got ${config.minIntervalMs}`);
    }
    this.minIntervalMs = config.minIntervalMs;
    this.now = config.now ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
  }

  /**
   * Resolve once a request may start, and claim that slot
   */
  async wait(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.now() - this.lastRequestAt;
      const remaining = this.minIntervalMs - elapsed;
      if (remaining > 0) {
        this.totalWaitMs += remaining;
        await this.sleep(remaining);
      }
    }
    this.lastRequestAt = this.now();
    this.requests++;
  }

  getStats(): RequestPacerStats {
    return { requests: this.requests, totalWaitMs: this.totalWaitMs };
  }
}
