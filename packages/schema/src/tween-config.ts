/**
 * zod schemas for declarative tween and sequence configuration.
 *
 * A config describes how to build a unit, never its playback state. The
 * schemas are the source of truth; the exported types are inferred from them.
 */

import { z } from "zod";
import { EASING_NAMES } from "@tweenloom/core";
import type { LoopType } from "@tweenloom/core";

// ---------------------------------------------------------------------------
// Building blocks
// ---------------------------------------------------------------------------

const LOOP_TYPES = ["none", "restart", "pingPong", "yoyo"] as const satisfies readonly LoopType[];

export const easingNameSchema = z
  .enum(EASING_NAMES)
  .describe("Name of a built-in easing curve (e.g. 'linear', 'quadInOut', 'bounceOut').");

export const loopTypeSchema = z
  .enum(LOOP_TYPES)
  .describe("'none' stops at the end; 'restart', 'pingPong' and 'yoyo' repeat.");

export const loopConfigSchema = z.object({
  type: loopTypeSchema,
  count: z
    .number()
    .int()
    .min(-1)
    .default(-1)
    .describe("Repeats after the first play. -1 repeats forever."),
});

/** A scalar or a non-empty list of scalars (a vector, a color...). */
export const numericValueSchema = z.union([
  z.number().finite(),
  z.array(z.number().finite()).min(1),
]);

// ---------------------------------------------------------------------------
// Tween
// ---------------------------------------------------------------------------

type NumericInput = z.infer<typeof numericValueSchema>;

function sameShape(a: NumericInput, b: NumericInput): boolean {
  if (typeof a === "number" || typeof b === "number") {
    return typeof a === typeof b;
  }
  return a.length === b.length;
}

export const tweenConfigSchema = z
  .object({
    from: numericValueSchema,
    to: numericValueSchema,
    duration: z.number().finite().positive().describe("Seconds per iteration."),
    easing: easingNameSchema.default("linear"),
    delay: z.number().finite().nonnegative().default(0).describe("Seconds before playback."),
    timeScale: z.number().finite().nonnegative().default(1),
    loop: loopConfigSchema.optional(),
  })
  .refine((config) => sameShape(config.from, config.to), {
    message: "from and to must both be numbers or lists of the same length",
    path: ["to"],
  });

// ---------------------------------------------------------------------------
// Sequence
// ---------------------------------------------------------------------------

export const sequenceConfigSchema = z.object({
  timeScale: z.number().finite().nonnegative().default(1),
  steps: z.array(tweenConfigSchema).min(1, "A sequence needs at least one step"),
});

// ---------------------------------------------------------------------------
// Inferred types
// ---------------------------------------------------------------------------

/** A validated tween config with defaults filled in. */
export type TweenConfig = z.infer<typeof tweenConfigSchema>;
/** What callers may write before defaults are applied. */
export type TweenConfigInput = z.input<typeof tweenConfigSchema>;
export type LoopConfig = z.infer<typeof loopConfigSchema>;
export type SequenceConfig = z.infer<typeof sequenceConfigSchema>;
export type SequenceConfigInput = z.input<typeof sequenceConfigSchema>;
