/**
 * Domain core — time value model only.
 * Platform-independent. No arithmetic here.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

// --- Wide representation (posix) ---

/**
 * Instant as seconds plus a sub-second nanosecond field.
 * `nanoseconds` is always an integer in [0, 1e9); `seconds` fits int64.
 */
export interface PosixAbsoluteTime {
  readonly seconds: bigint;
  readonly nanoseconds: number;
}

/** Signed span of time (int64 nanoseconds). Positive = forward. */
export type Nanoseconds = Brand<bigint, "Nanoseconds">;

// --- Narrow representation (tick counter) ---

/** Instant as a free-running uint32 tick counter. Wraps at 2^32. */
export type Ticks = Brand<number, "Ticks">;

/** Signed span of time (int32 ticks). */
export type TickDelta = Brand<number, "TickDelta">;

// --- Constructors (no validation) ---

export const asNanoseconds = (ns: bigint) => ns as Nanoseconds;
export const asTicks = (n: number) => n as Ticks;
export const asTickDelta = (n: number) => n as TickDelta;

// --- Units and widths ---

export const NANOS_PER_SECOND = 1_000_000_000n;
export const NANOS_PER_MILLI = 1_000_000n;
export const MILLIS_PER_SECOND = 1_000;

export const INT64_MAX = 9_223_372_036_854_775_807n;
export const INT64_MIN = -9_223_372_036_854_775_808n;

export const INT32_MAX = 2_147_483_647;
export const INT32_MIN = -2_147_483_648;
export const UINT32_MAX = 4_294_967_295;
