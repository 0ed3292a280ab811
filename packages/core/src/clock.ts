/**
 * Ledger clock.
 *
 * The notion of "current time" every expiration is measured against. Read once
 * per operation. Participants cannot advance it.
 */
export interface LedgerClock {
  now(): number;
}

/**
 * Ledger height counter.
 *
 * Starts at `initialHeight` and only moves forward. The host advances it
 * (one tick per block, per batch, per test step).
 */
export class HeightClock implements LedgerClock {
  private height: number;

  constructor(initialHeight = 0) {
    if (!Number.isSafeInteger(initialHeight) || initialHeight < 0) {
      throw new RangeError("initialHeight must be a non-negative integer");
    }
    this.height = initialHeight;
  }

  now(): number {
    return this.height;
  }

  /**
   * Move the height forward by `blocks`.
   */
  advance(blocks = 1): number {
    if (!Number.isSafeInteger(blocks) || blocks < 0) {
      throw new RangeError("blocks must be a non-negative integer");
    }
    this.height += blocks;
    return this.height;
  }

  /**
   * Jump to `height`. Moving backwards is rejected.
   */
  setHeight(height: number): void {
    if (!Number.isSafeInteger(height) || height < this.height) {
      throw new RangeError(
        `height must be an integer >= current height ${this.height}`
      );
    }
    this.height = height;
  }
}

/**
 * Unix seconds, never moving backwards even if the wall clock does.
 */
export class EpochClock implements LedgerClock {
  private last = 0;

  constructor(private readonly source: () => number = Date.now) {}

  now(): number {
    const seconds = Math.floor(this.source() / 1000);
    if (seconds > this.last) {
      this.last = seconds;
    }
    return this.last;
  }
}
