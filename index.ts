export * from "./domain/core.js";
export * from "./domain/errors.js";
export type { PlatformId, TimeBackend } from "./domain/timeBackend.js";
export * from "./platform/clock.js";
export { loadTimeConfig, type TimeConfig } from "./platform/config.js";
export {
  absoluteFromNanoseconds,
  absoluteTime,
  absoluteToNanoseconds,
  createPosixBackend,
  type PosixBackend,
  type PosixBackendOptions,
} from "./platform/posix.js";
export {
  createTickBackend,
  DEFAULT_TICKS_PER_SECOND,
  ticks,
  type TickBackend,
  type TickBackendOptions,
} from "./platform/tick.js";
export { createBackend, posix, selectBackend, type ClockOverrides, type SelectedBackend } from "./platform/index.js";
