import { describe, it, expect } from "vitest";
import {
  calculateRoi,
  classifyRoi,
  totalReward,
  DEFAULT_REWARD_BASELINE,
  type RewardConvention,
} from "../utils/roi.js";

const BASELINE: RewardConvention = { mode: "baseline", baseline: DEFAULT_REWARD_BASELINE };
const DIRECT: RewardConvention = { mode: "direct" };

describe("totalReward", () => {
  it("scales the multiplier by the baseline", () => {
    expect(totalReward(2, BASELINE)).toBe(792);
  });

  it("uses the multiplier directly", () => {
    expect(totalReward(2, DIRECT)).toBe(2);
  });
});

describe("calculateRoi", () => {
  it("holding value is the Token1 price", () => {
    expect(calculateRoi(2.94, 0.5, 9.615405784).holdingValue).toBe(2.94);
  });

  it("baseline convention: 396 × multiplier × Token2 price", () => {
    const result = calculateRoi(2.94, 0.5, 9.615405784, BASELINE);
    expect(result.holdingValue).toBe(2.94);
    expect(result.lockingValue).toBeCloseTo(1903.850345232, 6);
    expect(result.roiRatio).toBeCloseTo(647.568, 3);
  });

  it("defaults to the baseline convention", () => {
    expect(calculateRoi(2.94, 0.5, 9.615405784)).toEqual(
      calculateRoi(2.94, 0.5, 9.615405784, BASELINE),
    );
  });

  it("direct convention: multiplier × Token2 price", () => {
    const result = calculateRoi(2.94, 0.5, 9.615405784, DIRECT);
    expect(result.lockingValue).toBeCloseTo(4.807702892, 9);
    expect(result.roiRatio).toBeCloseTo(1.635273, 6);
  });

  it("zero Token2 price gives zero locking value and ratio", () => {
    for (const multiplier of [0, 1, 7.3, 20]) {
      const result = calculateRoi(5, 0, multiplier, BASELINE);
      expect(result.lockingValue).toBe(0);
      expect(result.roiRatio).toBe(0);
    }
  });

  it("zero Token1 price yields a zero ratio instead of dividing by zero", () => {
    const result = calculateRoi(0, 0.8, 9, BASELINE);
    expect(result.holdingValue).toBe(0);
    expect(result.lockingValue).toBeCloseTo(2851.2, 9);
    expect(result.roiRatio).toBe(0);
  });
});

describe("classifyRoi", () => {
  it("locking wins above 1", () => {
    expect(classifyRoi(1.0000001)).toBe("locking");
    expect(classifyRoi(647.57)).toBe("locking");
  });

  it("holding wins below 1", () => {
    expect(classifyRoi(0.9999999)).toBe("holding");
    expect(classifyRoi(0)).toBe("holding");
  });

  it("break-even at exactly 1", () => {
    expect(classifyRoi(1.0)).toBe("break-even");
  });

  it("break-even from a computed ratio of exactly 1", () => {
    const { roiRatio } = calculateRoi(2, 0.5, 4, DIRECT);
    expect(roiRatio).toBe(1);
    expect(classifyRoi(roiRatio)).toBe("break-even");
  });
});
