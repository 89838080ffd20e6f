/**
 * Clock collaborators — the only impure edge of the library.
 * System adapters read the host; manual adapters are for tests and replay.
 */

import { NANOS_PER_MILLI, NANOS_PER_SECOND } from "../domain/core.js";

/** Source of wall-clock instants, in nanoseconds since the Unix epoch. */
export interface WallClock {
  readEpochNanoseconds(): bigint;
}

/** Free-running tick counter. May exceed 32 bits; the backend wraps it. */
export interface TickSource {
  readTicks(): number;
}

/**
 * Wall clock anchored to Date.now() once, then advanced by hrtime.
 * Reads never go backwards, even if the host clock is adjusted later.
 */
export function systemWallClock(): WallClock {
  const anchorEpochNs = BigInt(Date.now()) * NANOS_PER_MILLI;
  const anchorHr = process.hrtime.bigint();
  return {
    readEpochNanoseconds: () => anchorEpochNs + (process.hrtime.bigint() - anchorHr),
  };
}

/** Counter starting at zero on creation, like an RTC started at boot. */
export function systemTickSource(ticksPerSecond: number): TickSource {
  const rate = BigInt(ticksPerSecond);
  const startedAtHr = process.hrtime.bigint();
  return {
    readTicks: () => Number(BigInt.asUintN(32, ((process.hrtime.bigint() - startedAtHr) * rate) / NANOS_PER_SECOND)),
  };
}

/** In-memory wall clock. Holds still until told otherwise. */
export class ManualWallClock implements WallClock {
  private epochNs: bigint;

  constructor(epochNs = 0n) {
    this.epochNs = epochNs;
  }

  readEpochNanoseconds(): bigint {
    return this.epochNs;
  }

  set(epochNs: bigint): void {
    this.epochNs = epochNs;
  }

  advance(ns: bigint): void {
    this.epochNs += ns;
  }
}

/** In-memory tick counter. */
export class ManualTickSource implements TickSource {
  private ticks: number;

  constructor(ticks = 0) {
    this.ticks = ticks;
  }

  readTicks(): number {
    return this.ticks;
  }

  set(ticks: number): void {
    this.ticks = ticks;
  }

  advance(ticks: number): void {
    this.ticks += ticks;
  }
}
