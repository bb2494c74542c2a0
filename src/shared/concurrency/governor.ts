export type ConcurrencyState = {
  currentLimit: number;
  activeCount: number;
  lastChangeAt: number;
};

export type GovernorBounds = {
  min: number;
  max: number;
};

/**
 * Admission gate with an adjustable limit.
 *
 * A slot is granted only while `activeCount < currentLimit`. Lowering the
 * limit never preempts running work: holders finish and release, and no new
 * slot is granted until the active count falls below the new limit.
 *
 * Every release and every limit change re-evaluates all waiters in FIFO order,
 * so a raised limit admits as many waiters as it has room for at once.
 */
export class ConcurrencyGovernor {
  private currentLimit: number;
  private activeCount = 0;
  private lastChangeAt = Number.NEGATIVE_INFINITY;
  private readonly waiters: Array<() => void> = [];

  constructor(initialLimit: number, private readonly bounds: GovernorBounds) {
    if (!Number.isInteger(bounds.min) || !Number.isInteger(bounds.max) || bounds.min < 1 || bounds.min > bounds.max) {
      throw new Error(`governor bounds must satisfy 1 <= min <= max. Received: [${bounds.min}..${bounds.max}]`);
    }
    if (!Number.isInteger(initialLimit) || initialLimit < bounds.min || initialLimit > bounds.max) {
      throw new Error(`initial limit ${initialLimit} is out of allowed range [${bounds.min}..${bounds.max}]`);
    }
    this.currentLimit = initialLimit;
  }

  get limit(): number {
    return this.currentLimit;
  }

  get active(): number {
    return this.activeCount;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  get minBound(): number {
    return this.bounds.min;
  }

  get maxBound(): number {
    return this.bounds.max;
  }

  snapshot(): ConcurrencyState {
    return {
      currentLimit: this.currentLimit,
      activeCount: this.activeCount,
      lastChangeAt: this.lastChangeAt
    };
  }

  acquire(): Promise<void> {
    if (this.waiters.length === 0 && this.activeCount < this.currentLimit) {
      this.activeCount += 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
      this.admitWaiters();
    });
  }

  release(): void {
    if (this.activeCount === 0) {
      throw new Error("release() called without a matching acquire()");
    }
    this.activeCount -= 1;
    this.admitWaiters();
  }

  /**
   * Sets the limit (clamped to the bounds), stamps the change time and wakes
   * waiters. Returns the limit actually applied.
   */
  setLimit(limit: number, changedAt: number): number {
    const clamped = Math.min(this.bounds.max, Math.max(this.bounds.min, Math.floor(limit)));
    this.currentLimit = clamped;
    this.lastChangeAt = changedAt;
    this.admitWaiters();
    return clamped;
  }

  private admitWaiters(): void {
    while (this.waiters.length > 0 && this.activeCount < this.currentLimit) {
      const wake = this.waiters.shift();
      if (!wake) return;
      this.activeCount += 1;
      wake();
    }
  }
}
