import { z } from "zod";
import { tableSettings } from "../sources/table.js";
import {
  calculateRoi as computeRoi,
  classifyRoi,
  TOKEN1_PRICE,
  TOKEN2_PRICE,
} from "../utils/roi.js";
import { describeConvention, formatUsd, renderBarChart, verdictText } from "../utils/formatting.js";
import { resolveDay } from "./resolve-day.js";
import { textResult } from "./result.js";

export const calculateRoiSchema = z.object({
  token1_price: z
    .number()
    .min(TOKEN1_PRICE.min)
    .max(TOKEN1_PRICE.max)
    .default(TOKEN1_PRICE.default)
    .describe(`Token1 price in USD (${TOKEN1_PRICE.min}–${TOKEN1_PRICE.max})`),
  token2_price: z
    .number()
    .min(TOKEN2_PRICE.min)
    .max(TOKEN2_PRICE.max)
    .default(TOKEN2_PRICE.default)
    .describe(`Token2 price in USD (${TOKEN2_PRICE.min}–${TOKEN2_PRICE.max})`),
  day: z
    .number()
    .int()
    .optional()
    .describe("Days locked up. Must be inside the multiplier table's day range; defaults to day 113 or the middle of the table."),
});

export async function calculateRoi(args: z.infer<typeof calculateRoiSchema>) {
  const resolved = resolveDay(args.day);
  if (!resolved.ok) return resolved.result;

  const { day, multiplier } = resolved.row;
  const { reward } = tableSettings();
  const result = computeRoi(args.token1_price, args.token2_price, multiplier, reward);

  const chart = renderBarChart(
    "ROI Comparison: Holding vs. Locking",
    [
      { label: "Holding Token1", value: result.holdingValue },
      { label: "Locking Token1", value: result.lockingValue },
    ],
    `Day: ${day} | Multiplier: ${multiplier.toFixed(4)}`,
  );

  return textResult(
    [
      `**ROI Comparison: Holding vs. Locking**`,
      `- **Token 1 Price:** ${formatUsd(args.token1_price)}`,
      `- **Token 2 Price:** ${formatUsd(args.token2_price)}`,
      `- **Chosen Day (Locked):** ${day}`,
      `- **Day's Multiplier:** ${multiplier.toFixed(6)}`,
      ``,
      `- **Holding Value (Token1):** ${formatUsd(result.holdingValue)}`,
      `- **Locking Value (${describeConvention(reward)}):** ${formatUsd(result.lockingValue)}`,
      `- **ROI (Locking / Holding):** ${result.roiRatio.toFixed(2)}`,
      ``,
      `**Result:** ${verdictText(classifyRoi(result.roiRatio))}`,
      ``,
      "```text",
      chart,
      "```",
    ].join("\n"),
  );
}
