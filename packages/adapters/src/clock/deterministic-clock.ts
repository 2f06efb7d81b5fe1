const MS_PER_MINUTE = 60_000;

/**
 * Clock that advances a fixed step on every `now()` call.
 * The generator uses it to lay out strictly increasing timestamps.
 */
export class DeterministicClock {
  private currentMs: number;

  constructor(
    epoch: Date,
    private readonly tickMs: number = MS_PER_MINUTE,
  ) {
    if (!(tickMs > 0)) throw new RangeError(`tickMs must be positive, got ${tickMs}`);
    this.currentMs = epoch.getTime();
  }

  static everyMinutes(epoch: Date, minutes: number): DeterministicClock {
    return new DeterministicClock(epoch, minutes * MS_PER_MINUTE);
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }
}

/** Wall clock, for record-keeping timestamps such as `createdAt`. */
export function wallClockNow(): Date {
  return new Date();
}
