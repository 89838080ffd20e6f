/**
 * Time backend contract — one implementation per platform representation.
 * All operations are pure and total except now().
 */

export type PlatformId = "posix" | "tick";

/**
 * Arithmetic, ordering and unit conversion over one representation.
 * `Abs` is the absolute instant, `Rel` the signed duration between two instants.
 */
export interface TimeBackend<Abs, Rel> {
  readonly platform: PlatformId;

  /** Current instant from the backend's clock collaborator. */
  now(): Abs;

  /** Largest representable duration; callers use it as "never". */
  maxRelative(): Rel;

  /** base + delta. Wraps at the representation width. */
  offset(base: Abs, delta: Rel): Abs;

  /** b - a. Negative when b is earlier than a. Wraps at the relative width. */
  difference(a: Abs, b: Abs): Rel;

  /** Strict: false when a equals b. */
  isBefore(a: Abs, b: Abs): boolean;

  /** Strict: false when a equals b. */
  isAfter(a: Abs, b: Abs): boolean;

  isEqual(a: Abs, b: Abs): boolean;

  /** -1 if a is before b, 1 if after, 0 if equal. */
  compare(a: Abs, b: Abs): -1 | 0 | 1;

  /** Truncates toward zero into the base unit. */
  relativeFromSeconds(seconds: number): Rel;
  relativeToSeconds(delta: Rel): number;

  /** Truncates toward zero into the base unit. */
  relativeFromMillis(milliseconds: number): Rel;
  /** Truncates toward zero. */
  relativeToMillis(delta: Rel): number;
}
