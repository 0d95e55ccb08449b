#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { getMultiplierTable } from "./sources/table.js";
import { calculateRoiSchema, calculateRoi } from "./tools/calculate-roi.js";
import { lookupMultiplierSchema, lookupMultiplier } from "./tools/lookup-multiplier.js";
import { describeTableSchema, describeTable } from "./tools/describe-table.js";
import { reloadTableSchema, reloadTable } from "./tools/reload-table.js";

const server = new McpServer({
  name: "lockup-roi",
  version: "0.1.0",
});

// -- Calculator --

server.tool(
  "calculate_roi",
  "Compare holding Token1 against locking it for a number of days. Looks up the day's reward multiplier, computes holding value, locking value and ROI ratio, and draws a bar chart.",
  calculateRoiSchema.shape,
  calculateRoi,
);

// -- Multiplier table --

server.tool(
  "lookup_multiplier",
  "Get the reward multiplier for an exact lock-up day",
  lookupMultiplierSchema.shape,
  lookupMultiplier,
);

server.tool(
  "describe_multiplier_table",
  "Show the multiplier table source, day range, default day and reward convention",
  describeTableSchema.shape,
  describeTable,
);

server.tool(
  "reload_multiplier_table",
  "Drop the cached multiplier table and read its source again",
  reloadTableSchema.shape,
  reloadTable,
);

// -- Start server --

async function main() {
  // A table that cannot be loaded is fatal: fail before accepting calls.
  getMultiplierTable();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
