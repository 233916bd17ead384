import { z } from "zod";
import { ConfigError } from "./errors";
import { TableConfig } from "./types";

export const PACKS_PER_SHOE = 6;
export const RESHUFFLE_THRESHOLD = 15;

export const DEFAULT_TABLE: TableConfig = {
  bet: 10,
  initialBankroll: 1000,
  logFile: "blackjack_log.txt",
  logLevel: "info",
};

const envSchema = z.object({
  BLACKJACK_BET: z.coerce.number().positive().default(DEFAULT_TABLE.bet),
  BLACKJACK_BANKROLL: z.coerce.number().min(0).default(DEFAULT_TABLE.initialBankroll),
  BLACKJACK_LOG_FILE: z.string().min(1).default(DEFAULT_TABLE.logFile),
  BLACKJACK_SEED: z.coerce.number().int().optional(),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export function loadTableConfig(env: NodeJS.ProcessEnv = process.env): TableConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const values = parsed.data;
  return {
    bet: values.BLACKJACK_BET,
    initialBankroll: values.BLACKJACK_BANKROLL,
    logFile: values.BLACKJACK_LOG_FILE,
    seed: values.BLACKJACK_SEED,
    logLevel: values.LOG_LEVEL,
  };
}
