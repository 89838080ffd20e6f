/**
 * Backend selection — one representation per process.
 * Swap platform via TIME_PLATFORM without touching callers.
 */

import { neverReached } from "../domain/validation.js";
import type { WallClock, TickSource } from "./clock.js";
import { loadTimeConfig, type TimeConfig } from "./config.js";
import { createPosixBackend, type PosixBackend } from "./posix.js";
import { createTickBackend, type TickBackend } from "./tick.js";

export type SelectedBackend =
  | { readonly platform: "posix"; readonly backend: PosixBackend }
  | { readonly platform: "tick"; readonly backend: TickBackend };

/** Clock overrides, mainly for tests. Defaults read the host. */
export interface ClockOverrides {
  readonly wallClock?: WallClock;
  readonly tickSource?: TickSource;
}

export function createBackend(config: TimeConfig, clocks: ClockOverrides = {}): SelectedBackend {
  switch (config.platform) {
    case "posix":
      return { platform: "posix", backend: createPosixBackend({ clock: clocks.wallClock }) };
    case "tick":
      return {
        platform: "tick",
        backend: createTickBackend({ ticksPerSecond: config.ticksPerSecond, source: clocks.tickSource }),
      };
    default:
      return neverReached(config.platform, "Unknown time platform");
  }
}

/**
 * Backend named by TIME_PLATFORM / TIME_TICK_RATE_HZ.
 * Reads the environment on each call; importing this module reads nothing.
 */
export function selectBackend(env: NodeJS.ProcessEnv = process.env, clocks: ClockOverrides = {}): SelectedBackend {
  return createBackend(loadTimeConfig(env), clocks);
}

/** Posix backend on the system wall clock, independent of TIME_PLATFORM. */
export const posix: PosixBackend = createPosixBackend();
