import { describe, it, expect } from "vitest";
import { quadIn } from "@tweenloom/core";
import { buildSequence, buildTween, parseSequenceConfig, parseTweenConfig } from "../src/index.js";

describe("buildTween", () => {
  it("returns a started tween with the configured curve", () => {
    const tween = buildTween(parseTweenConfig({ from: 0, to: 100, duration: 2, easing: "quadIn" }));

    expect(tween.state).toBe("running");
    expect(tween.ease).toBe(quadIn);
    tween.update(1);
    expect(tween.currentValue).toBe(25);
  });

  it("applies delay, time scale and loop", () => {
    const tween = buildTween(
      parseTweenConfig({
        from: 0,
        to: 10,
        duration: 1,
        delay: 0.5,
        timeScale: 2,
        loop: { type: "pingPong", count: 1 },
      }),
    );

    expect(tween.state).toBe("delayed");
    expect(tween.timeScale).toBe(2);
    expect(tween.loopType).toBe("pingPong");
    expect(tween.loopCount).toBe(1);

    tween.update(0.25);
    expect(tween.state).toBe("running");
    expect(tween.currentValue).toBe(0);
  });

  it("blends lists component-wise", () => {
    const tween = buildTween(parseTweenConfig({ from: [0, 100], to: [10, 200], duration: 1 }));
    tween.update(0.5);
    expect(tween.currentValue).toEqual([5, 150]);
  });
});

describe("buildSequence", () => {
  it("returns an unstarted sequence of started tweens", () => {
    const seq = buildSequence(
      parseSequenceConfig({
        steps: [
          { from: 0, to: 50, duration: 1 },
          { from: 50, to: 100, duration: 1 },
        ],
      }),
    );

    expect(seq.state).toBe("stopped");
    expect(seq.length).toBe(2);
    expect(seq.members.map((member) => member.state)).toEqual(["running", "running"]);

    seq.start();
    seq.update(1.5);
    expect(seq.currentIndex).toBe(1);
    expect(seq.progress).toBe(0.75);
  });

  it("multiplies step and sequence time scales", () => {
    const seq = buildSequence(
      parseSequenceConfig({
        timeScale: 2,
        steps: [
          { from: 0, to: 1, duration: 1 },
          { from: 1, to: 0, duration: 1, timeScale: 0.25 },
        ],
      }),
    );

    expect(seq.timeScale).toBe(2);
    expect(seq.members.map((member) => member.timeScale)).toEqual([2, 0.5]);
  });
});
