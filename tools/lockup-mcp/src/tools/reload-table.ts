import { z } from "zod";
import { reloadMultiplierTable } from "../sources/table.js";
import { dayRange } from "../utils/multipliers.js";
import { textResult } from "./result.js";

export const reloadTableSchema = z.object({});

export async function reloadTable() {
  const table = reloadMultiplierTable();
  const range = dayRange(table);
  return textResult(
    `**Reloaded** \`${table.source}\`: ${table.rows.length} rows, days ${range.min}–${range.max}.`,
  );
}
