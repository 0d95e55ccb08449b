import { config } from "../config.js";
import { createTableLoader, type MultiplierTable } from "../utils/multipliers.js";

const loader = createTableLoader({ hasHeader: config.hasHeader });

const source = () => config.tablePath;

function logLoaded(table: MultiplierTable, verb: string): void {
  console.error(`${verb} ${table.rows.length} multiplier rows from ${table.source}`);
}

/** The configured table, read on first use and memoized afterwards. */
export function getMultiplierTable(): MultiplierTable {
  const cached = loader.isCached(source());
  const table = loader.load(source());
  if (!cached) logLoaded(table, "Loaded");
  return table;
}

export function reloadMultiplierTable(): MultiplierTable {
  const table = loader.reload(source());
  logLoaded(table, "Reloaded");
  return table;
}

export function tableSettings() {
  return {
    source: source(),
    hasHeader: config.hasHeader,
    reward: config.reward,
    defaultDay: config.defaultDay,
  };
}
