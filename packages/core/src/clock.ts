import type { Core } from "./types";
import { codes, formatMessage } from "./error-codes";

export const systemClock: Core.Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        clearTimeout(handle);
        reject(signal?.reason);
      };
      const handle = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      signal?.addEventListener("abort", onAbort, { once: true });
    }),
};

type Timer = {
  due: number;
  sequence: number;
  fire: () => void;
};

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Logical clock for tests. Nothing moves until the test advances it; timers
 * run in due-time order, ties in the order they were scheduled, and pending
 * promise continuations are drained after every timer so that work scheduled
 * by a resumed task is picked up within the same advance.
 */
export class VirtualClock implements Core.Clock {
  private time = 0;
  private sequence = 0;
  private timers: Timer[] = [];

  constructor(private readonly settle: () => Promise<void> = flushPromises) {}

  get currentTime(): number {
    return this.time;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  now(): number {
    return this.time;
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      const onAbort = () => {
        this.timers = this.timers.filter((t) => t !== timer);
        reject(signal?.reason);
      };
      const timer: Timer = {
        due: this.time + Math.max(0, ms),
        sequence: this.sequence++,
        fire: () => {
          signal?.removeEventListener("abort", onAbort);
          resolve();
        },
      };

      this.schedule(timer);
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }

  async runCurrent(): Promise<void> {
    await this.runUntil(this.time);
  }

  async advanceTimeBy(ms: number): Promise<void> {
    if (!Number.isFinite(ms) || ms < 0) {
      throw new RangeError(
        formatMessage(codes.INVALID_OPTION, {
          option: "ms",
          reason: `expected a non-negative finite duration, got ${ms}`,
        })
      );
    }

    const target = this.time + ms;
    await this.runUntil(target);
    this.time = target;
  }

  async advanceUntilIdle(): Promise<void> {
    await this.settle();

    let next = this.timers[0];
    while (next) {
      await this.runUntil(next.due);
      next = this.timers[0];
    }
  }

  private schedule(timer: Timer): void {
    const index = this.timers.findIndex(
      (t) =>
        t.due > timer.due || (t.due === timer.due && t.sequence > timer.sequence)
    );

    if (index === -1) {
      this.timers.push(timer);
    } else {
      this.timers.splice(index, 0, timer);
    }
  }

  private async runUntil(target: number): Promise<void> {
    await this.settle();

    let next = this.timers[0];
    while (next && next.due <= target) {
      this.timers.shift();
      this.time = next.due;
      next.fire();
      await this.settle();
      next = this.timers[0];
    }
  }
}
