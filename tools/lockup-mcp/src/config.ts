import { fileURLToPath } from "node:url";
import { z } from "zod";
import { DEFAULT_REWARD_BASELINE, type RewardConvention } from "./utils/roi.js";
import { PREFERRED_DEFAULT_DAY } from "./utils/multipliers.js";

const BUNDLED_TABLE = fileURLToPath(new URL("../data/multipliers.csv", import.meta.url));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  LOCKUP_MULTIPLIER_CSV: z.string().min(1).default(BUNDLED_TABLE),
  LOCKUP_CSV_HAS_HEADER: booleanFlag.default("false"),
  LOCKUP_REWARD_MODE: z.enum(["baseline", "direct"]).default("baseline"),
  LOCKUP_REWARD_BASELINE: z.coerce.number().positive().default(DEFAULT_REWARD_BASELINE),
  LOCKUP_DEFAULT_DAY: z.coerce.number().int().default(PREFERRED_DEFAULT_DAY),
});

export interface Config {
  tablePath: string;
  hasHeader: boolean;
  reward: RewardConvention;
  defaultDay: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = envSchema.parse(env);
  return {
    tablePath: parsed.LOCKUP_MULTIPLIER_CSV,
    hasHeader: parsed.LOCKUP_CSV_HAS_HEADER,
    reward:
      parsed.LOCKUP_REWARD_MODE === "baseline"
        ? { mode: "baseline", baseline: parsed.LOCKUP_REWARD_BASELINE }
        : { mode: "direct" },
    defaultDay: parsed.LOCKUP_DEFAULT_DAY,
  };
}

export const config = loadConfig();
