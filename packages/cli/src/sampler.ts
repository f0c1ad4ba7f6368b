/**
 * Sampler — plays a tween config against a virtual clock and records one
 * sample per frame.
 *
 * Runs the same path a host would (clock → ticker → manager → tween), only
 * with a `TestClock`, so sampling is instant and deterministic.
 */

import { z } from "zod";
import { TestClock, Ticker, TweenManager } from "@tweenloom/core";
import type { NumericValue, PlaybackState } from "@tweenloom/core";
import { buildTween, ConfigParseError } from "@tweenloom/schema";
import type { TweenConfig } from "@tweenloom/schema";

/** The tween's value and state at one frame. */
export interface Sample {
  /** Seconds since the tween was started. */
  readonly time: number;
  readonly value: NumericValue;
  readonly state: PlaybackState;
}

export const sampleOptionsSchema = z.object({
  fps: z.number().int().min(1).max(1000).describe("Frames per simulated second."),
  maxTime: z.number().finite().positive().describe("Seconds after which sampling stops."),
});

/** Options for `sampleTween`. */
export type SampleOptions = z.infer<typeof sampleOptionsSchema>;

/** @throws {ConfigParseError} if the options are out of range. */
export function parseSampleOptions(input: unknown): SampleOptions {
  const result = sampleOptionsSchema.safeParse(input);
  if (!result.success) {
    throw ConfigParseError.fromZodError("sample options", result.error);
  }
  return result.data;
}

/**
 * Sample a tween from its start until it completes or `maxTime` passes.
 *
 * The first sample is taken right after start, before any time elapses.
 */
export function sampleTween(config: TweenConfig, options: SampleOptions): Sample[] {
  const tween = buildTween(config);
  const manager = new TweenManager().add(tween);
  const clock = new TestClock();
  // fps >= 1, so no frame is longer than the clamp.
  const ticker = new Ticker({ clock, target: manager, maxDeltaSeconds: 1 });
  const frameMs = 1000 / options.fps;
  const lastFrame = Math.floor(options.maxTime * options.fps);

  const samples: Sample[] = [];
  const record = (frame: number): void => {
    samples.push({
      time: frame / options.fps,
      value: tween.currentValue ?? config.from,
      state: tween.state,
    });
  };

  ticker.start();
  clock.advance(0);
  record(0);
  for (let frame = 1; frame <= lastFrame && !tween.isComplete; frame++) {
    clock.advance(frameMs);
    record(frame);
  }
  ticker.stop();

  return samples;
}
