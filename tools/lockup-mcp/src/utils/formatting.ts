import type { RewardConvention, RoiVerdict } from "./roi.js";

/** Format a dollar amount with two decimals, e.g. "$2.94". */
export function formatUsd(value: number): string {
  return `$${value.toFixed(2)}`;
}

const VERDICT_TEXT: Record<RoiVerdict, string> = {
  locking: "Locking produces a higher ROI than holding.",
  holding: "Holding is more profitable than locking.",
  "break-even": "The strategies are at break-even.",
};

export function verdictText(verdict: RoiVerdict): string {
  return VERDICT_TEXT[verdict];
}

/** Human-readable formula behind the locking value. */
export function describeConvention(convention: RewardConvention): string {
  return convention.mode === "baseline"
    ? `${convention.baseline} × day multiplier × Token2 price`
    : "day multiplier × Token2 price";
}

export interface Bar {
  label: string;
  value: number;
}

export const BAR_CHAR = "█";
export const CHART_WIDTH = 40;
/** Headroom above the tallest bar. */
export const CHART_HEADROOM = 1.2;

/**
 * Render a horizontal text bar chart.
 *
 * Bars are scaled against `max(values) * 1.2`, or 1 when every value is 0.
 * Each line is `label | bars $value`, labels padded to the longest one.
 */
export function renderBarChart(
  title: string,
  bars: Bar[],
  annotation: string,
  width = CHART_WIDTH,
): string {
  const tallest = Math.max(0, ...bars.map((b) => b.value));
  const ceiling = tallest > 0 ? tallest * CHART_HEADROOM : 1;
  const labelWidth = Math.max(0, ...bars.map((b) => b.label.length));

  const lines = [title, annotation];
  for (const bar of bars) {
    const length = Math.max(0, Math.round((bar.value / ceiling) * width));
    const fill = BAR_CHAR.repeat(length);
    const gap = length > 0 ? " " : "";
    lines.push(`${bar.label.padEnd(labelWidth)} | ${fill}${gap}${formatUsd(bar.value)}`);
  }
  return lines.join("\n");
}
