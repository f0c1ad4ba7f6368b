/**
 * Parsing and building: turn untrusted input into live tweens and sequences.
 */

import { EASING_FUNCTIONS, lerpNumeric, Sequence, Tween } from "@tweenloom/core";
import type { NumericValue } from "@tweenloom/core";
import { ConfigParseError } from "./errors.js";
import { sequenceConfigSchema, tweenConfigSchema } from "./tween-config.js";
import type { SequenceConfig, TweenConfig } from "./tween-config.js";

/** @throws {ConfigParseError} listing every problem found. */
export function parseTweenConfig(input: unknown): TweenConfig {
  const result = tweenConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigParseError.fromZodError("tween config", result.error);
  }
  return result.data;
}

/** @throws {ConfigParseError} listing every problem found. */
export function parseSequenceConfig(input: unknown): SequenceConfig {
  const result = sequenceConfigSchema.safeParse(input);
  if (!result.success) {
    throw ConfigParseError.fromZodError("sequence config", result.error);
  }
  return result.data;
}

/** Build and start a tween over numbers or number lists. */
export function buildTween(config: TweenConfig): Tween<NumericValue> {
  const tween = new Tween<NumericValue>(lerpNumeric)
    .setDelay(config.delay)
    .setTimeScale(config.timeScale);
  if (config.loop) {
    tween.setLoop(config.loop.type, config.loop.count);
  }
  return tween.start(config.from, config.to, config.duration, EASING_FUNCTIONS[config.easing]);
}

/**
 * Build a sequence whose steps are started tweens. The sequence itself is
 * returned unstarted.
 *
 * Each step plays at its own time scale multiplied by the sequence's.
 */
export function buildSequence(config: SequenceConfig): Sequence {
  const result = new Sequence();
  result.timeScale = config.timeScale;
  for (const step of config.steps) {
    const tween = buildTween(step);
    result.append(tween);
    tween.timeScale = step.timeScale * config.timeScale;
  }
  return result;
}
