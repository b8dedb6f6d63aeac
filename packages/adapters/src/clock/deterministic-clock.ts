export type Clock = () => Date;

/**
 * Clock for tests and simulations. `now()` returns the current instant and
 * then moves forward by `tickMs`; use `tickMs = 0` for a frozen clock.
 */
export class DeterministicClock {
  private currentMs: number;

  constructor(
    epochMs: number,
    private readonly tickMs: number = 1_000,
  ) {
    this.currentMs = epochMs;
  }

  now(): Date {
    const ts = new Date(this.currentMs);
    this.currentMs += this.tickMs;
    return ts;
  }

  peek(): Date {
    return new Date(this.currentMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  /** Bound `now`, usable wherever a `Clock` is expected. */
  readonly asClock: Clock = () => this.now();
}

export const wallClockNow: Clock = () => new Date();
