import { z } from "zod";
import { getMultiplierTable, tableSettings } from "../sources/table.js";
import { dayRange, defaultDay } from "../utils/multipliers.js";
import { describeConvention } from "../utils/formatting.js";
import { textResult } from "./result.js";

export const describeTableSchema = z.object({});

export async function describeTable() {
  const table = getMultiplierTable();
  const settings = tableSettings();
  const range = dayRange(table);

  return textResult(
    [
      `**Multiplier Table**`,
      `- **Source:** \`${table.source}\``,
      `- **Rows:** ${table.rows.length}`,
      `- **Day range:** ${range.min}–${range.max}`,
      `- **Default day:** ${defaultDay(range, settings.defaultDay)}`,
      `- **Header row:** ${settings.hasHeader ? "skipped" : "none"}`,
      `- **Locking value:** ${describeConvention(settings.reward)}`,
    ].join("\n"),
  );
}
