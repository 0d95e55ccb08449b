/**
 * Holding-vs-locking ROI comparison.
 *
 * Holding keeps one token A at its price. Locking it earns a token B reward
 * scaled by the day multiplier, valued at token B's price.
 */

/** Baseline token B reward for a multiplier of 1. */
export const DEFAULT_REWARD_BASELINE = 396;

export type RewardConvention =
  | { mode: "baseline"; baseline: number }
  | { mode: "direct" };

export const DEFAULT_REWARD_CONVENTION: RewardConvention = {
  mode: "baseline",
  baseline: DEFAULT_REWARD_BASELINE,
};

// Query bounds, matching the calculator's input sliders.
export const TOKEN1_PRICE = { min: 0.5, max: 15.0, default: 2.94 } as const;
export const TOKEN2_PRICE = { min: 0.1, max: 1.5, default: 0.5 } as const;

export interface RoiResult {
  holdingValue: number;
  lockingValue: number;
  roiRatio: number;
}

export type RoiVerdict = "locking" | "holding" | "break-even";

export function totalReward(multiplier: number, convention: RewardConvention): number {
  return convention.mode === "baseline" ? convention.baseline * multiplier : multiplier;
}

export function calculateRoi(
  token1Price: number,
  token2Price: number,
  multiplier: number,
  convention: RewardConvention = DEFAULT_REWARD_CONVENTION,
): RoiResult {
  const holdingValue = token1Price;
  const lockingValue = totalReward(multiplier, convention) * token2Price;
  const roiRatio = holdingValue !== 0 ? lockingValue / holdingValue : 0;
  return { holdingValue, lockingValue, roiRatio };
}

/** Compare against exactly 1; there is no tolerance band. */
export function classifyRoi(roiRatio: number): RoiVerdict {
  if (roiRatio > 1) return "locking";
  if (roiRatio < 1) return "holding";
  return "break-even";
}
