/**
 * Fixed-width text rendering for samples.
 */

import { clamp01 } from "@tweenloom/core";
import type { NumericValue } from "@tweenloom/core";
import type { Sample } from "./sampler.js";

const DEFAULT_BAR_WIDTH = 40;

export function formatValue(value: NumericValue): string {
  if (typeof value === "number") {
    return value.toFixed(3);
  }
  return `[${value.map((component) => component.toFixed(3)).join(", ")}]`;
}

/** e.g. `  0.250s      25.000  running` */
export function formatSample(sample: Sample): string {
  const time = sample.time.toFixed(3).padStart(7);
  const value = formatValue(sample.value).padStart(10);
  return `${time}s  ${value}  ${sample.state.padEnd(7)}`;
}

/** The value plotted for a sample: the scalar itself, or a list's first component. */
export function plotValue(value: NumericValue): number {
  if (typeof value === "number") {
    return value;
  }
  return value[0] ?? 0;
}

/**
 * Horizontal bar showing where `value` lies between `min` and `max`.
 * Values outside the range (overshooting curves) pin to an edge.
 */
export function renderBar(value: number, min: number, max: number, width: number = DEFAULT_BAR_WIDTH): string {
  const span = max - min;
  const fraction = span === 0 ? 1 : (value - min) / span;
  const filled = Math.round(clamp01(fraction) * width);
  return `|${"#".repeat(filled)}${" ".repeat(width - filled)}|`;
}
