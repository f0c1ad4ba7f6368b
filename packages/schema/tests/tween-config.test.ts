import { describe, it, expect } from "vitest";
import {
  ConfigParseError,
  easingNameSchema,
  loopConfigSchema,
  parseSequenceConfig,
  parseTweenConfig,
  tweenConfigSchema,
} from "../src/index.js";

function parseIssues(input: unknown): readonly string[] {
  try {
    parseTweenConfig(input);
  } catch (error) {
    if (error instanceof ConfigParseError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("tween config schema", () => {
  it("fills in defaults", () => {
    expect(parseTweenConfig({ from: 0, to: 100, duration: 2 })).toEqual({
      from: 0,
      to: 100,
      duration: 2,
      easing: "linear",
      delay: 0,
      timeScale: 1,
    });
  });

  it("accepts lists of the same length", () => {
    const config = parseTweenConfig({ from: [0, 0], to: [10, 20], duration: 1, easing: "sineOut" });
    expect(config.from).toEqual([0, 0]);
    expect(config.easing).toBe("sineOut");
  });

  it("defaults the loop count to forever", () => {
    const config = parseTweenConfig({ from: 0, to: 1, duration: 1, loop: { type: "yoyo" } });
    expect(config.loop).toEqual({ type: "yoyo", count: -1 });
  });

  it("rejects a non-positive duration", () => {
    expect(parseIssues({ from: 0, to: 1, duration: 0 })).toEqual([
      "duration: Number must be greater than 0",
    ]);
  });

  it("reports missing fields by path", () => {
    expect(parseIssues({ from: 0, to: 1 })).toEqual(["duration: Required"]);
  });

  it("rejects mismatched shapes", () => {
    expect(parseIssues({ from: 0, to: [1, 2], duration: 1 })).toEqual([
      "to: from and to must both be numbers or lists of the same length",
    ]);
    expect(parseIssues({ from: [0], to: [1, 2], duration: 1 })).toHaveLength(1);
  });

  it("rejects empty lists", () => {
    expect(tweenConfigSchema.safeParse({ from: [], to: [], duration: 1 }).success).toBe(false);
  });

  it("rejects negative delays and time scales", () => {
    expect(parseIssues({ from: 0, to: 1, duration: 1, delay: -1, timeScale: -2 })).toEqual([
      "delay: Number must be greater than or equal to 0",
      "timeScale: Number must be greater than or equal to 0",
    ]);
  });

  it("reports the root for non-object input", () => {
    const issues = parseIssues("fast");
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatch(/^\(root\): /);
  });

  it("summarizes every issue in the error message", () => {
    expect(() => parseTweenConfig({ from: 0, to: 1, duration: -1 })).toThrow(
      "Invalid tween config: duration: Number must be greater than 0",
    );
  });
});

describe("easing names", () => {
  it("accept every catalog entry and nothing else", () => {
    expect(easingNameSchema.safeParse("bounceInOut").success).toBe(true);
    expect(easingNameSchema.safeParse("bounce").success).toBe(false);
  });
});

describe("loop config", () => {
  it("rejects counts below -1 and fractional counts", () => {
    expect(loopConfigSchema.safeParse({ type: "restart", count: -2 }).success).toBe(false);
    expect(loopConfigSchema.safeParse({ type: "restart", count: 1.5 }).success).toBe(false);
    expect(loopConfigSchema.safeParse({ type: "spin", count: 1 }).success).toBe(false);
  });
});

describe("sequence config schema", () => {
  it("parses steps and defaults the time scale", () => {
    const config = parseSequenceConfig({
      steps: [
        { from: 0, to: 50, duration: 1 },
        { from: 50, to: 100, duration: 1, easing: "quadOut" },
      ],
    });
    expect(config.timeScale).toBe(1);
    expect(config.steps).toHaveLength(2);
    expect(config.steps[1]?.easing).toBe("quadOut");
  });

  it("requires at least one step", () => {
    try {
      parseSequenceConfig({ steps: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigParseError);
      if (error instanceof ConfigParseError) {
        expect(error.issues).toEqual(["steps: A sequence needs at least one step"]);
      }
    }
  });

  it("reports nested step paths", () => {
    try {
      parseSequenceConfig({ steps: [{ from: 0, to: 1, duration: 1 }, { from: 0, to: 1, duration: 0 }] });
      expect.unreachable();
    } catch (error) {
      if (error instanceof ConfigParseError) {
        expect(error.issues).toEqual(["steps.1.duration: Number must be greater than 0"]);
      } else {
        throw error;
      }
    }
  });
});
