/**
 * Command-line flags for the sampler.
 */

/** Parsed flags. Values are passed on unvalidated; the schemas check them. */
export interface CliOptions {
  readonly configPath: string | undefined;
  readonly from: number;
  readonly to: number;
  readonly duration: number;
  readonly easing: string;
  readonly delay: number;
  readonly loop: string | undefined;
  readonly count: number | undefined;
  readonly fps: number;
  readonly maxTime: number;
  readonly plot: boolean;
}

/**
 * Parse `process.argv`-style arguments (the first two entries are skipped).
 * Unknown flags are ignored.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const args = argv.slice(2);
  let configPath: string | undefined;
  let from = 0;
  let to = 100;
  let duration = 1;
  let easing = "linear";
  let delay = 0;
  let loop: string | undefined;
  let count: number | undefined;
  let fps = 60;
  let maxTime = 10;
  let plot = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const next = args[i + 1];
    if (arg === "--plot") {
      plot = true;
      continue;
    }
    if (next === undefined) {
      continue;
    }
    switch (arg) {
      case "--config":
        configPath = next;
        break;
      case "--from":
        from = parseFloat(next);
        break;
      case "--to":
        to = parseFloat(next);
        break;
      case "--duration":
        duration = parseFloat(next);
        break;
      case "--easing":
        easing = next;
        break;
      case "--delay":
        delay = parseFloat(next);
        break;
      case "--loop":
        loop = next;
        break;
      case "--count":
        count = parseInt(next, 10);
        break;
      case "--fps":
        fps = parseInt(next, 10);
        break;
      case "--max-time":
        maxTime = parseFloat(next);
        break;
      default:
        continue;
    }
    i++;
  }

  return { configPath, from, to, duration, easing, delay, loop, count, fps, maxTime, plot };
}

/** The tween config described by the flags, before validation. */
export function toTweenConfigInput(options: CliOptions): Record<string, unknown> {
  const input: Record<string, unknown> = {
    from: options.from,
    to: options.to,
    duration: options.duration,
    easing: options.easing,
    delay: options.delay,
  };
  if (options.loop !== undefined) {
    input["loop"] = options.count === undefined ? { type: options.loop } : { type: options.loop, count: options.count };
  }
  return input;
}
