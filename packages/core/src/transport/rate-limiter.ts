/**
 * Sliding-window limit on outgoing provider requests
 */

import { PROVIDER_RATE_LIMIT } from '../constants.js';
import { sleep as defaultSleep } from './retry.js';

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export class RateLimiter {
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  /** Send times inside the current window, oldest first */
  private sent: number[] = [];

  constructor(options: RateLimiterOptions = {}) {
    this.maxRequests = options.maxRequests ?? PROVIDER_RATE_LIMIT.MAX_REQUESTS;
    this.windowMs = options.windowMs ?? PROVIDER_RATE_LIMIT.WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  inFlight(): number {
    return this.slide().length;
  }

  /** 0 when a request may go out now */
  waitTime(): number {
    const window = this.slide();
    const oldest = window[0];
    if (window.length < this.maxRequests || oldest === undefined) {
      return 0;
    }
    return oldest + this.windowMs - this.now();
  }

  /**
   * Wait for a free slot, then take it
   */
  async acquire(): Promise<void> {
    for (let wait = this.waitTime(); wait > 0; wait = this.waitTime()) {
      await this.sleep(wait);
    }
    this.sent.push(this.now());
  }

  private slide(): number[] {
    const cutoff = this.now() - this.windowMs;
    while (this.sent.length > 0 && (this.sent[0] ?? cutoff) <= cutoff) {
      this.sent.shift();
    }
    return this.sent;
  }
}
