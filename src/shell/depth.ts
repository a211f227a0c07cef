import { RecursionError } from './errors.js';

export const DEFAULT_MAX_DEPTH = 10;

/**
 * Bounds nested execution. Each execution carries its own depth, derived
 * from the context that spawned it, so unrelated concurrent calls never
 * count against each other. `active` is the number of executions in
 * flight across the whole engine.
 */
export class RecursionGuard {
  private inFlight = 0;

  constructor(readonly maxDepth: number = DEFAULT_MAX_DEPTH) {}

  get active(): number {
    return this.inFlight;
  }

  /**
   * Runs `fn` at `parentDepth + 1`. The in-flight count is released on
   * every exit path, including when the depth check itself fails.
   */
  async run<T>(parentDepth: number, fn: (depth: number) => Promise<T>): Promise<T> {
    const depth = parentDepth + 1;
    this.inFlight++;
    try {
      if (depth > this.maxDepth) {
        throw new RecursionError(this.maxDepth);
      }
      return await fn(depth);
    } finally {
      this.inFlight--;
    }
  }
}
