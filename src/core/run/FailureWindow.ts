export const DEFAULT_FAILURE_HORIZON_MS = 60_000;

/**
 * Timestamps of terminal failures, ascending. Entries are appended in time
 * order and pruned only from the front.
 */
export class FailureWindow {
  private readonly timestamps: number[] = [];

  constructor(private readonly horizonMs = DEFAULT_FAILURE_HORIZON_MS) {}

  record(at: number): void {
    const last = this.timestamps[this.timestamps.length - 1];
    // keep ascending order even if a caller hands in a stale clock reading
    this.timestamps.push(last !== undefined && at < last ? last : at);
  }

  /** Drops entries older than the horizon and returns how many remain. */
  prune(now: number): number {
    let drop = 0;
    while (drop < this.timestamps.length && now - this.timestamps[drop] > this.horizonMs) {
      drop += 1;
    }
    if (drop > 0) this.timestamps.splice(0, drop);
    return this.timestamps.length;
  }

  get size(): number {
    return this.timestamps.length;
  }

  entries(): readonly number[] {
    return [...this.timestamps];
  }
}
