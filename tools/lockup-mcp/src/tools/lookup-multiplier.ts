import { z } from "zod";
import { resolveDay } from "./resolve-day.js";
import { textResult } from "./result.js";

export const lookupMultiplierSchema = z.object({
  day: z.number().int().describe("Days locked up"),
});

export async function lookupMultiplier(args: z.infer<typeof lookupMultiplierSchema>) {
  const resolved = resolveDay(args.day);
  if (!resolved.ok) return resolved.result;

  const { day, intCol, multiplier } = resolved.row;
  return textResult(
    [
      `**Multiplier for day ${day}**`,
      `- **Multiplier:** ${multiplier.toFixed(6)}`,
      `- **Second column:** ${intCol}`,
    ].join("\n"),
  );
}
