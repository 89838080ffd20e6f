/**
 * Wide backend — seconds + nanoseconds instants, int64 nanosecond durations.
 *
 * Overflow policy: wrap. Seconds and durations are reduced to int64 two's
 * complement after every operation, as native fixed-width arithmetic would.
 * Non-finite conversion input maps NaN to 0 and ±Infinity to the int64 bounds.
 */

import {
  asNanoseconds,
  INT64_MAX,
  INT64_MIN,
  NANOS_PER_MILLI,
  NANOS_PER_SECOND,
  type Nanoseconds,
  type PosixAbsoluteTime,
} from "../domain/core.js";
import type { TimeBackend } from "../domain/timeBackend.js";
import { assert, invariant } from "../domain/validation.js";
import { systemWallClock, type WallClock } from "./clock.js";

export type PosixBackend = TimeBackend<PosixAbsoluteTime, Nanoseconds>;

export interface PosixBackendOptions {
  readonly clock?: WallClock;
}

const NANOS_PER_SECOND_FLOAT = 1e9;

const wrapSeconds = (s: bigint) => BigInt.asIntN(64, s);
const wrapRelative = (ns: bigint) => asNanoseconds(BigInt.asIntN(64, ns));

function make(seconds: bigint, nanoseconds: bigint): PosixAbsoluteTime {
  invariant(nanoseconds >= 0n && nanoseconds < NANOS_PER_SECOND, "nanoseconds not normalized", {
    seconds,
    nanoseconds,
  });
  return Object.freeze({ seconds: wrapSeconds(seconds), nanoseconds: Number(nanoseconds) });
}

function saturate(value: number): Nanoseconds {
  if (Number.isNaN(value)) return asNanoseconds(0n);
  return asNanoseconds(value > 0 ? INT64_MAX : INT64_MIN);
}

/** Validating constructor. Throws TimeValueError on a non-normalized value. */
export function absoluteTime(seconds: bigint | number, nanoseconds: number): PosixAbsoluteTime {
  if (typeof seconds === "number") {
    assert(Number.isSafeInteger(seconds), "seconds must be a safe integer", { seconds });
  }
  const s = BigInt(seconds);
  assert(s >= INT64_MIN && s <= INT64_MAX, "seconds out of int64 range", { seconds: s });
  assert(Number.isInteger(nanoseconds), "nanoseconds must be an integer", { nanoseconds });
  assert(nanoseconds >= 0 && nanoseconds < NANOS_PER_SECOND_FLOAT, "nanoseconds must be in [0, 1e9)", {
    nanoseconds,
  });
  return make(s, BigInt(nanoseconds));
}

/** Instant from nanoseconds since the epoch. Floor division, so negatives borrow. */
export function absoluteFromNanoseconds(epochNs: bigint): PosixAbsoluteTime {
  let seconds = epochNs / NANOS_PER_SECOND;
  let nanos = epochNs % NANOS_PER_SECOND;
  if (nanos < 0n) {
    seconds -= 1n;
    nanos += NANOS_PER_SECOND;
  }
  return make(seconds, nanos);
}

/** Exact nanoseconds since the epoch. Not wrapped. */
export function absoluteToNanoseconds(t: PosixAbsoluteTime): bigint {
  return t.seconds * NANOS_PER_SECOND + BigInt(t.nanoseconds);
}

export function createPosixBackend(options: PosixBackendOptions = {}): PosixBackend {
  const clock = options.clock ?? systemWallClock();

  const isBefore = (a: PosixAbsoluteTime, b: PosixAbsoluteTime) =>
    a.seconds < b.seconds || (a.seconds === b.seconds && a.nanoseconds < b.nanoseconds);

  const isAfter = (a: PosixAbsoluteTime, b: PosixAbsoluteTime) =>
    a.seconds > b.seconds || (a.seconds === b.seconds && a.nanoseconds > b.nanoseconds);

  return {
    platform: "posix",

    now: () => absoluteFromNanoseconds(clock.readEpochNanoseconds()),

    maxRelative: () => asNanoseconds(INT64_MAX),

    offset(base, delta) {
      // bigint / and % truncate toward zero, so the remainder carries delta's sign.
      let seconds = base.seconds + delta / NANOS_PER_SECOND;
      let nanos = BigInt(base.nanoseconds) + (delta % NANOS_PER_SECOND);
      if (nanos >= NANOS_PER_SECOND) {
        seconds += 1n;
        nanos -= NANOS_PER_SECOND;
      } else if (nanos < 0n) {
        seconds -= 1n;
        nanos += NANOS_PER_SECOND;
      }
      return make(seconds, nanos);
    },

    difference: (a, b) =>
      wrapRelative((b.seconds - a.seconds) * NANOS_PER_SECOND + BigInt(b.nanoseconds - a.nanoseconds)),

    isBefore,
    isAfter,

    isEqual: (a, b) => a.seconds === b.seconds && a.nanoseconds === b.nanoseconds,

    compare: (a, b) => (isBefore(a, b) ? -1 : isAfter(a, b) ? 1 : 0),

    relativeFromSeconds(seconds) {
      const ns = seconds * NANOS_PER_SECOND_FLOAT;
      if (!Number.isFinite(ns)) return saturate(ns);
      return wrapRelative(BigInt(Math.trunc(ns)));
    },

    relativeToSeconds: (delta) => Number(delta) / NANOS_PER_SECOND_FLOAT,

    relativeFromMillis(milliseconds) {
      if (!Number.isFinite(milliseconds)) return saturate(milliseconds);
      return wrapRelative(BigInt(Math.trunc(milliseconds)) * NANOS_PER_MILLI);
    },

    relativeToMillis: (delta) => Number(delta / NANOS_PER_MILLI),
  };
}
