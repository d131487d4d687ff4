import pLimit from "p-limit";

import { createLogger } from "./logger.ts";

const log = createLogger("rate-limit");

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

type RateLimiterOptions = {
  maxRequestsPerWindow: number;
  windowMs?: number;
  minIntervalMs?: number;
  concurrency?: number;
  sleep?: Sleep;
  clock?: () => number;
};

/**
 * Request budget shared by everything that talks to one API. Once the window's
 * budget is spent, the next request waits for the window to roll over.
 */
export class RequestRateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly minIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly clock: () => number;
  private readonly limit: ReturnType<typeof pLimit>;

  private windowStart: number | null = null;
  private windowCount = 0;
  private lastRequestAt = 0;
  private total = 0;

  constructor(options: RateLimiterOptions) {
    this.maxRequests = options.maxRequestsPerWindow;
    this.windowMs = options.windowMs ?? 60_000;
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? Date.now;
    this.limit = pLimit(options.concurrency ?? 1);
  }

  get requestCount() {
    return this.total;
  }

  schedule<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(async () => {
      await this.acquire();
      return task();
    });
  }

  private async acquire() {
    const now = this.clock();
    if (this.windowStart === null || now - this.windowStart >= this.windowMs) {
      this.windowStart = now;
      this.windowCount = 0;
    }

    if (this.windowCount >= this.maxRequests) {
      const waitFor = Math.max(0, this.windowMs - (now - this.windowStart));
      log.warn({ waitFor, budget: this.maxRequests }, "Request budget spent, waiting");
      await this.sleep(waitFor);
      this.windowStart = this.clock();
      this.windowCount = 0;
    }

    const sinceLast = this.clock() - this.lastRequestAt;
    const waitFor = Math.max(0, this.minIntervalMs - sinceLast);
    if (waitFor > 0) {
      await this.sleep(waitFor);
    }

    this.lastRequestAt = this.clock();
    this.windowCount += 1;
    this.total += 1;
  }
}
