import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { createTickBackend, ticks } from "./tick.js";
import { ManualTickSource } from "./clock.js";
import { asTickDelta, INT32_MAX, INT32_MIN, UINT32_MAX } from "../domain/core.js";
import { TimeValueError } from "../domain/errors.js";

const time = createTickBackend({ source: new ManualTickSource() });

describe("now()", () => {
  it("reads the tick source, wrapped to 32 bits", () => {
    const source = new ManualTickSource(42);
    const backend = createTickBackend({ source });
    expect(backend.now()).toBe(42);

    source.set(2 ** 32 + 5);
    expect(backend.now()).toBe(5);
  });

  it("system source never goes backwards", () => {
    const system = createTickBackend();
    const t1 = system.now();
    const t2 = system.now();
    expect(system.difference(t1, t2)).toBeGreaterThanOrEqual(0);
  });
});

describe("offset()", () => {
  it("adds ticks", () => {
    expect(time.offset(ticks(1000), asTickDelta(500))).toBe(1500);
    expect(time.offset(ticks(1000), asTickDelta(-300))).toBe(700);
  });

  it("wraps past 2^32", () => {
    expect(time.offset(ticks(0xffff_fff0), asTickDelta(0x20))).toBe(0x10);
  });

  it("wraps below zero", () => {
    expect(time.offset(ticks(5), asTickDelta(-10))).toBe(UINT32_MAX - 4);
  });
});

describe("difference()", () => {
  it("is signed", () => {
    expect(time.difference(ticks(1000), ticks(3500))).toBe(2500);
    expect(time.difference(ticks(3500), ticks(1000))).toBe(-2500);
  });

  it("yields the short distance across one wraparound", () => {
    expect(time.difference(ticks(0xffff_fff0), ticks(0x10))).toBe(32);
    expect(time.difference(ticks(0x10), ticks(0xffff_fff0))).toBe(-32);
  });

  it("difference(a, offset(a, d)) === d", () => {
    fc.assert(
      fc.property(fc.integer({ min: 0, max: UINT32_MAX }), fc.integer({ min: INT32_MIN, max: INT32_MAX }), (a, d) => {
        expect(time.difference(ticks(a), time.offset(ticks(a), asTickDelta(d)))).toBe(d);
      })
    );
  });
});

describe("ordering", () => {
  it("compares raw counter values", () => {
    expect(time.isBefore(ticks(1), ticks(2))).toBe(true);
    expect(time.isAfter(ticks(2), ticks(1))).toBe(true);
    expect(time.isBefore(ticks(2), ticks(2))).toBe(false);
    expect(time.isAfter(ticks(2), ticks(2))).toBe(false);
    expect(time.isEqual(ticks(2), ticks(2))).toBe(true);
    expect(time.compare(ticks(3), ticks(2))).toBe(1);
  });

  it("offset by max stays in the future within one epoch", () => {
    const t1 = ticks(0);
    const t2 = time.offset(t1, time.maxRelative());
    expect(t2).toBe(INT32_MAX);
    expect(time.isBefore(t1, t2)).toBe(true);
    expect(time.isBefore(t2, t1)).toBe(false);
  });
});

describe("unit conversions", () => {
  it("1 ms ticks by default", () => {
    expect(time.ticksPerSecond).toBe(1000);
    expect(time.relativeFromMillis(1500)).toBe(1500);
    expect(time.relativeToMillis(time.relativeFromMillis(1500))).toBe(1500);
    expect(time.relativeFromSeconds(1.5)).toBe(time.relativeFromMillis(1500));
    expect(time.relativeToSeconds(asTickDelta(1500))).toBe(1.5);
  });

  it("scales by a 32768 Hz rate", () => {
    const rtc = createTickBackend({ ticksPerSecond: 32_768, source: new ManualTickSource() });
    expect(rtc.relativeFromSeconds(1)).toBe(32_768);
    expect(rtc.relativeFromMillis(1000)).toBe(32_768);
    expect(rtc.relativeFromMillis(1)).toBe(32);
    expect(rtc.relativeToMillis(asTickDelta(32_768))).toBe(1000);
    expect(rtc.relativeToSeconds(asTickDelta(16_384))).toBe(0.5);
  });

  it("truncates negative durations toward zero", () => {
    const rtc = createTickBackend({ ticksPerSecond: 32_768, source: new ManualTickSource() });
    expect(rtc.relativeToMillis(asTickDelta(-33))).toBe(-1);
    expect(rtc.relativeToMillis(asTickDelta(-32))).toBe(0);
    expect(rtc.relativeToSeconds(asTickDelta(-16_384))).toBe(-0.5);
    expect(rtc.relativeFromMillis(-1)).toBe(-32);
  });

  it("wraps durations past int32", () => {
    expect(time.relativeFromMillis(3_000_000_000)).toBe(-1_294_967_296);
  });

  it("non-finite input saturates, NaN is zero", () => {
    expect(time.relativeFromSeconds(Number.POSITIVE_INFINITY)).toBe(INT32_MAX);
    expect(time.relativeFromMillis(Number.NEGATIVE_INFINITY)).toBe(INT32_MIN);
    expect(time.relativeFromSeconds(Number.NaN)).toBe(0);
  });
});

describe("validation", () => {
  it("ticks() rejects values outside uint32", () => {
    expect(() => ticks(-1)).toThrow(TimeValueError);
    expect(() => ticks(1.5)).toThrow(TimeValueError);
    expect(() => ticks(2 ** 32)).toThrow(TimeValueError);
    expect(ticks(UINT32_MAX)).toBe(UINT32_MAX);
  });

  it("rejects a non-positive tick rate", () => {
    expect(() => createTickBackend({ ticksPerSecond: 0 })).toThrow(TimeValueError);
    expect(() => createTickBackend({ ticksPerSecond: 2.5 })).toThrow("ticksPerSecond must be a positive integer");
  });
});
