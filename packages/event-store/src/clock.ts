/**
 * @covenant/event-store: Injectable time.
 *
 * Every timestamp the store writes comes from a Clock, so tests can
 * freeze and advance time and replays never consult the wall clock.
 */

export interface Clock {
  /** Current time as an ISO 8601 string */
  now(): string;
}

/**
 * Wall-clock time.
 */
export class SystemClock implements Clock {
  now(): string {
    return new Date().toISOString();
  }
}

/**
 * Controllable clock for deterministic tests.
 */
export class ManualClock implements Clock {
  private _ms: number;

  constructor(initial: string | number = 0) {
    this._ms = typeof initial === "number" ? initial : Date.parse(initial);
    if (Number.isNaN(this._ms)) {
      throw new Error(`Invalid initial time: ${String(initial)}`);
    }
  }

  now(): string {
    return new Date(this._ms).toISOString();
  }

  set(time: string): void {
    const ms = Date.parse(time);
    if (Number.isNaN(ms)) {
      throw new Error(`Invalid time: ${time}`);
    }
    this._ms = ms;
  }

  advance(ms: number): void {
    this._ms += ms;
  }

  advanceDays(days: number): void {
    this.advance(days * MS_PER_DAY);
  }
}

/**
 * Wraps another clock so that successive readings never go backwards.
 */
export class MonotonicClock implements Clock {
  private _last = Number.NEGATIVE_INFINITY;

  constructor(private readonly _inner: Clock = new SystemClock()) {}

  now(): string {
    const ms = Math.max(Date.parse(this._inner.now()), this._last);
    this._last = ms;
    return new Date(ms).toISOString();
  }
}

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * The later of two ISO timestamps.
 */
export function maxTimestamp(a: string, b: string): string {
  return Date.parse(a) >= Date.parse(b) ? a : b;
}

/**
 * Add whole days to an ISO timestamp.
 */
export function addDays(timestamp: string, days: number): string {
  return new Date(Date.parse(timestamp) + days * MS_PER_DAY).toISOString();
}
