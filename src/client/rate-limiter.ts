/**
 * RateLimiter - shared throttling state for API calls
 *
 * Requests take a slot with `acquire()` before going out and release it
 * once the response is in. Slots are handed out one at a time, spaced by
 * `minIntervalMs`, and never before the backoff deadline set by the most
 * recent 429. The first slot after a backoff is a lone trial: every other
 * waiter is held until it is released, and a 429 on it starts a new
 * backoff round before anyone else goes out.
 *
 * Pass the same instance to several clients to make them share a budget;
 * by default each client builds its own.
 */

import { setTimeout as delay } from "node:timers/promises";

import { apiLogger } from "../logger.js";

// ============================================================================
// Clock
// ============================================================================

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) => delay(ms, undefined, { signal }),
};

/**
 * min(base × 2^attempt, cap)
 */
export function backoffDelay(
  baseMs: number,
  attempt: number,
  capMs: number
): number {
  return Math.min(baseMs * 2 ** attempt, capMs);
}

// ============================================================================
// Rate Limiter
// ============================================================================

export interface RateLimiterOptions {
  /** Minimum spacing between two requests */
  minIntervalMs?: number;
  clock?: Clock;
}

export interface RateLimiterStats {
  requests: number;
  throttled: number;
  blockedUntil: number;
}

export interface RateLimitSlot {
  /** Call once the request has a response or has failed */
  release(): void;
}

interface Trial {
  settled: Promise<void>;
  settle: () => void;
}

const FREE_SLOT: RateLimitSlot = { release: () => undefined };

function createTrial(): Trial {
  let settle: () => void = () => undefined;
  const settled = new Promise<void>((resolve) => {
    settle = resolve;
  });
  return { settled, settle };
}

/**
 * Resolve when `settled` does, or reject when the signal aborts first
 */
function untilSettled(settled: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (signal === undefined) {
    return settled;
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    void settled.then(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    });
  });
}

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly clock: Clock;

  private blockedUntil = 0;
  private lastRequestAt = Number.NEGATIVE_INFINITY;
  private requests = 0;
  private throttled = 0;
  private queue: Promise<unknown> = Promise.resolve();
  private recovering = false;
  private trial: Trial | null = null;

  constructor(options: RateLimiterOptions = {}) {
    this.minIntervalMs = options.minIntervalMs ?? 0;
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Wait for the next request slot
   */
  acquire(signal?: AbortSignal): Promise<RateLimitSlot> {
    const turn = this.queue.then(() => this.waitForSlot(signal));
    // A cancelled waiter must not stall the ones queued behind it; the
    // rejection still reaches its own caller through `turn`.
    this.queue = turn.catch(() => undefined);
    return turn;
  }

  /**
   * Push the shared deadline out after a 429. Returns the deadline.
   */
  backOff(delayMs: number): number {
    this.throttled++;
    this.recovering = true;
    const until = this.clock.now() + delayMs;
    if (until > this.blockedUntil) {
      this.blockedUntil = until;
    }

    apiLogger.warn(
      { delayMs, blockedUntil: new Date(this.blockedUntil).toISOString() },
      "Rate limited: backing off"
    );

    // Held waiters re-read the new deadline
    this.endTrial();

    return this.blockedUntil;
  }

  stats(): RateLimiterStats {
    return {
      requests: this.requests,
      throttled: this.throttled,
      blockedUntil: this.blockedUntil,
    };
  }

  private async waitForSlot(signal?: AbortSignal): Promise<RateLimitSlot> {
    for (;;) {
      signal?.throwIfAborted();

      if (this.trial !== null) {
        apiLogger.debug("Rate limiting: waiting for the request sent after backoff");
        await untilSettled(this.trial.settled, signal);
        continue;
      }

      const readyAt = Math.max(
        this.blockedUntil,
        this.lastRequestAt + this.minIntervalMs
      );
      const waitTime = readyAt - this.clock.now();
      if (waitTime <= 0) {
        break;
      }

      apiLogger.debug({ waitTime }, "Rate limiting: waiting before request");
      await this.clock.sleep(waitTime, signal);
    }

    this.lastRequestAt = this.clock.now();
    this.requests++;

    if (!this.recovering) {
      return FREE_SLOT;
    }

    this.recovering = false;
    const trial = createTrial();
    this.trial = trial;
    return {
      release: () => {
        if (this.trial === trial) {
          this.endTrial();
        }
      },
    };
  }

  private endTrial(): void {
    const trial = this.trial;
    this.trial = null;
    trial?.settle();
  }
}
