/**
 * TimerClock unit tests.
 *
 * Uses Vitest fake timers so `setTimeout`, `clearTimeout` and
 * `performance.now` advance only when the test says so.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { TimerClock } from "./timer-clock.js";

describe("TimerClock", () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "performance"] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("now() follows performance.now()", () => {
    const clock = new TimerClock();
    const before = clock.now();
    vi.advanceTimersByTime(40);
    expect(clock.now() - before).toBe(40);
  });

  it("requestFrame() fires once after the frame interval", () => {
    const callback = vi.fn();
    const clock = new TimerClock({ frameIntervalMs: 20 });
    const start = clock.now();

    clock.requestFrame(callback);
    vi.advanceTimersByTime(19);
    expect(callback).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
    expect(callback).toHaveBeenCalledWith(start + 20);

    vi.advanceTimersByTime(100);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("defaults to a 16ms frame interval", () => {
    const callback = vi.fn();
    new TimerClock().requestFrame(callback);

    vi.advanceTimersByTime(15);
    expect(callback).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("falls back to the default for invalid intervals", () => {
    const callback = vi.fn();
    new TimerClock({ frameIntervalMs: -5 }).requestFrame(callback);

    vi.advanceTimersByTime(16);
    expect(callback).toHaveBeenCalledTimes(1);
  });

  it("cancel handle prevents the callback", () => {
    const callback = vi.fn();
    const clock = new TimerClock();

    const handle = clock.requestFrame(callback);
    handle.cancel();
    vi.advanceTimersByTime(100);

    expect(callback).not.toHaveBeenCalled();
  });
});
