/**
 * @tweenloom/schema — declarative configuration for tweens and sequences.
 *
 * zod schemas are the source of truth; TypeScript types are inferred from them.
 */

export {
  easingNameSchema,
  loopTypeSchema,
  loopConfigSchema,
  numericValueSchema,
  tweenConfigSchema,
  sequenceConfigSchema,
} from "./tween-config.js";
export type {
  TweenConfig,
  TweenConfigInput,
  LoopConfig,
  SequenceConfig,
  SequenceConfigInput,
} from "./tween-config.js";

export { ConfigParseError } from "./errors.js";

export { parseTweenConfig, parseSequenceConfig, buildTween, buildSequence } from "./build.js";
