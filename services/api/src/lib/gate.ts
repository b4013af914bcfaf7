import { GateRejectedError } from "./errors";

/**
 * Admission control for alignment work: at most `maxConcurrent` tasks run at once and at most `maxQueued`
 * wait for a slot; beyond that `run` rejects with GateRejectedError.
 */
export class ConcurrencyGate {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(
    readonly maxConcurrent: number,
    readonly maxQueued: number
  ) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) throw new RangeError("maxConcurrent must be a positive integer");
    if (!Number.isInteger(maxQueued) || maxQueued < 0) throw new RangeError("maxQueued must be a non-negative integer");
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    if (this.waiting.length >= this.maxQueued) return Promise.reject(new GateRejectedError(this.waiting.length));
    return new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  private release(): void {
    // the slot passes straight to the next waiter, so `active` only drops when nobody is queued
    const next = this.waiting.shift();
    if (next) next();
    else this.active--;
  }
}
