/**
 * Time configuration — backend selection from the environment.
 */

import type { PlatformId } from "../domain/timeBackend.js";
import { TimeConfigError } from "../domain/errors.js";
import { DEFAULT_TICKS_PER_SECOND } from "./tick.js";

export interface TimeConfig {
  readonly platform: PlatformId;
  readonly ticksPerSecond: number;
}

const PLATFORMS: readonly PlatformId[] = ["posix", "tick"];
const DEFAULT_PLATFORM: PlatformId = "posix";

function isPlatformId(value: string): value is PlatformId {
  return PLATFORMS.some((p) => p === value);
}

function parsePlatform(raw: string | undefined): PlatformId {
  if (raw === undefined || raw === "") return DEFAULT_PLATFORM;
  if (!isPlatformId(raw)) {
    throw new TimeConfigError(`TIME_PLATFORM must be one of: ${PLATFORMS.join(", ")}`, "TIME_PLATFORM", raw);
  }
  return raw;
}

function parseTickRate(raw: string | undefined): number {
  if (raw === undefined || raw === "") return DEFAULT_TICKS_PER_SECOND;
  const rate = Number(raw);
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(rate) || rate <= 0) {
    throw new TimeConfigError("TIME_TICK_RATE_HZ must be a positive integer", "TIME_TICK_RATE_HZ", raw);
  }
  return rate;
}

/** Read TIME_PLATFORM and TIME_TICK_RATE_HZ. Throws TimeConfigError on bad values. */
export function loadTimeConfig(env: NodeJS.ProcessEnv = process.env): TimeConfig {
  const platform = parsePlatform(env.TIME_PLATFORM);
  const ticksPerSecond = parseTickRate(env.TIME_TICK_RATE_HZ);
  if (platform === "tick" && ticksPerSecond % 1_000 !== 0) {
    console.warn(`TIME_TICK_RATE_HZ=${ticksPerSecond}: millisecond conversions truncate to whole ticks`);
  }
  return Object.freeze({ platform, ticksPerSecond });
}
