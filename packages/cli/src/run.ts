/**
 * The sampler command, independent of the process it runs in.
 */

import { readFileSync } from "node:fs";
import { ConfigParseError, parseTweenConfig } from "@tweenloom/schema";
import type { TweenConfig } from "@tweenloom/schema";
import { parseArgs, toTweenConfigInput } from "./args.js";
import type { CliOptions } from "./args.js";
import { formatSample, formatValue, plotValue, renderBar } from "./format.js";
import { parseSampleOptions, sampleTween } from "./sampler.js";
import type { SampleOptions } from "./sampler.js";

/** Where the command writes. `console` satisfies it. */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

function loadConfig(options: CliOptions): TweenConfig {
  if (options.configPath === undefined) {
    return parseTweenConfig(toTweenConfigInput(options));
  }
  const raw: unknown = JSON.parse(readFileSync(options.configPath, "utf8"));
  return parseTweenConfig(raw);
}

function describeError(error: unknown): string[] {
  if (error instanceof ConfigParseError) {
    return error.issues.map((issue) => `  ${issue}`);
  }
  if (error instanceof Error) {
    return [`  ${error.message}`];
  }
  return [`  ${String(error)}`];
}

/**
 * Run the sampler with `process.argv`-style arguments.
 *
 * @returns The process exit code.
 */
export function run(argv: readonly string[], output: CliOutput = console): number {
  const options = parseArgs(argv);

  let config: TweenConfig;
  let sampleOptions: SampleOptions;
  try {
    config = loadConfig(options);
    sampleOptions = parseSampleOptions({ fps: options.fps, maxTime: options.maxTime });
  } catch (error) {
    output.error("[tweenloom] Invalid configuration:");
    for (const line of describeError(error)) {
      output.error(line);
    }
    return 1;
  }

  const samples = sampleTween(config, sampleOptions);
  const low = Math.min(plotValue(config.from), plotValue(config.to));
  const high = Math.max(plotValue(config.from), plotValue(config.to));

  output.log(`Tweenloom sampler`);
  output.log(`  easing:   ${config.easing}`);
  output.log(`  range:    ${formatValue(config.from)} -> ${formatValue(config.to)} over ${config.duration}s`);
  output.log(`  fps:      ${sampleOptions.fps}`);
  output.log(`  samples:  ${samples.length}`);
  output.log(``);

  for (const sample of samples) {
    const line = formatSample(sample);
    output.log(options.plot ? `${line}  ${renderBar(plotValue(sample.value), low, high)}` : line);
  }
  return 0;
}
