import { getMultiplierTable, tableSettings } from "../sources/table.js";
import { RowNotFoundError } from "../utils/errors.js";
import { dayRange, defaultDay, requireRow, type MultiplierRow } from "../utils/multipliers.js";
import { errorResult, type ToolResult } from "./result.js";

export type ResolvedDay =
  | { ok: true; row: MultiplierRow }
  | { ok: false; result: ToolResult };

/**
 * Pick the table row for a requested day, defaulting to the configured day.
 * Out-of-range and missing days become error results; anything else throws.
 */
export function resolveDay(requested: number | undefined): ResolvedDay {
  const table = getMultiplierTable();
  const range = dayRange(table);
  const day = requested ?? defaultDay(range, tableSettings().defaultDay);

  if (day < range.min || day > range.max) {
    return {
      ok: false,
      result: errorResult(`Day ${day} is outside the table range (${range.min}–${range.max}).`),
    };
  }

  try {
    return { ok: true, row: requireRow(table, day) };
  } catch (err) {
    if (err instanceof RowNotFoundError) {
      return { ok: false, result: errorResult(err.message) };
    }
    throw err;
  }
}
