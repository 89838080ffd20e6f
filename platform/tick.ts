/**
 * Narrow backend — uint32 tick counter, int32 tick durations.
 *
 * Tick period is 1 / ticksPerSecond (default 1 ms). The counter wraps at 2^32,
 * so isBefore/isAfter only order instants within one wraparound epoch;
 * difference() is wraparound-aware and yields the short signed distance.
 */

import {
  asTickDelta,
  asTicks,
  INT32_MAX,
  INT32_MIN,
  MILLIS_PER_SECOND,
  UINT32_MAX,
  type TickDelta,
  type Ticks,
} from "../domain/core.js";
import type { TimeBackend } from "../domain/timeBackend.js";
import { assert } from "../domain/validation.js";
import { systemTickSource, type TickSource } from "./clock.js";

export type TickBackend = TimeBackend<Ticks, TickDelta> & {
  readonly ticksPerSecond: number;
};

export interface TickBackendOptions {
  readonly ticksPerSecond?: number;
  readonly source?: TickSource;
}

export const DEFAULT_TICKS_PER_SECOND = 1_000;

const wrapTicks = (n: number) => asTicks(n >>> 0);
const wrapDelta = (n: number) => asTickDelta(n | 0);

function saturate(value: number): TickDelta {
  if (Number.isNaN(value)) return asTickDelta(0);
  return asTickDelta(value > 0 ? INT32_MAX : INT32_MIN);
}

/** Validating constructor. Throws TimeValueError unless n is a uint32. */
export function ticks(n: number): Ticks {
  assert(Number.isInteger(n) && n >= 0 && n <= UINT32_MAX, "ticks must be an integer in [0, 2^32)", { ticks: n });
  return asTicks(n);
}

export function createTickBackend(options: TickBackendOptions = {}): TickBackend {
  const rate = options.ticksPerSecond ?? DEFAULT_TICKS_PER_SECOND;
  assert(Number.isSafeInteger(rate) && rate > 0, "ticksPerSecond must be a positive integer", {
    ticksPerSecond: rate,
  });
  const source = options.source ?? systemTickSource(rate);

  return {
    platform: "tick",
    ticksPerSecond: rate,

    now: () => wrapTicks(source.readTicks()),

    maxRelative: () => asTickDelta(INT32_MAX),

    offset: (base, delta) => wrapTicks(base + delta),

    difference: (a, b) => wrapDelta(b - a),

    isBefore: (a, b) => a < b,
    isAfter: (a, b) => a > b,
    isEqual: (a, b) => a === b,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),

    relativeFromSeconds(seconds) {
      const n = seconds * rate;
      if (!Number.isFinite(n)) return saturate(n);
      return wrapDelta(Math.trunc(n));
    },

    relativeToSeconds: (delta) => delta / rate,

    relativeFromMillis(milliseconds) {
      if (!Number.isFinite(milliseconds)) return saturate(milliseconds);
      return wrapDelta(Math.trunc((Math.trunc(milliseconds) * rate) / MILLIS_PER_SECOND));
    },

    relativeToMillis(delta) {
      const ms = Math.trunc((delta * MILLIS_PER_SECOND) / rate);
      // Math.trunc keeps the sign of a small negative quotient as -0.
      return ms === 0 ? 0 : ms;
    },
  };
}
