/**
 * @tweenloom/cli — sample tween curves from the command line.
 */

export { parseArgs, toTweenConfigInput } from "./args.js";
export type { CliOptions } from "./args.js";
export { sampleTween, parseSampleOptions, sampleOptionsSchema } from "./sampler.js";
export type { Sample, SampleOptions } from "./sampler.js";
export { formatSample, formatValue, plotValue, renderBar } from "./format.js";
export { run } from "./run.js";
export type { CliOutput } from "./run.js";
