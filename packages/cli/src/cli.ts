#!/usr/bin/env node
/**
 * CLI entry point for the tween sampler.
 *
 * Usage:
 *   tweenloom-sample                                          # 0 -> 100 over 1s, linear, 60fps
 *   tweenloom-sample --easing bounceOut --duration 2 --fps 30 --plot
 *   tweenloom-sample --from 0 --to 1 --loop pingPong --count 2
 *   tweenloom-sample --config ./fade.json --max-time 5
 */

import { run } from "./run.js";

const exitCode = run(process.argv);
if (exitCode !== 0) {
  process.exit(exitCode);
}
