/**
 * FIFO throttler for fetch starts.
 * Keeps a minimum interval between starts and pauses after every
 * `batchSize` starts so long universes do not hammer the data source.
 */

import { sleep as defaultSleep } from '@/core/time';

export interface ThrottlerOptions {
  minIntervalMs?: number;
  batchSize?: number;
  batchPauseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export class RequestThrottler {
  private lastStart = 0;
  private started = 0;
  private chain: Promise<unknown> = Promise.resolve();
  private readonly minIntervalMs: number;
  private readonly batchSize: number;
  private readonly batchPauseMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: ThrottlerOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.batchSize = options.batchSize ?? 0;
    this.batchPauseMs = options.batchPauseMs ?? 0;
    this.sleep = options.sleep ?? defaultSleep;
  }

  getStartedCount(): number {
    return this.started;
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    const gate = this.chain.then(async () => {
      if (this.batchSize > 0 && this.batchPauseMs > 0 && this.started > 0 && this.started % this.batchSize === 0) {
        await this.sleep(this.batchPauseMs);
      }
      const waitMs = Math.max(0, this.minIntervalMs - (Date.now() - this.lastStart));
      if (waitMs > 0) {
        await this.sleep(waitMs);
      }
      this.lastStart = Date.now();
      this.started += 1;
    });
    // Only the start is serialized; the task itself runs concurrently
    this.chain = gate;
    await gate;
    return fn();
  }
}
