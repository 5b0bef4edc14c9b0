import { object, optional, picklist, pipe, regex, safeParse, string } from "valibot";
import { CrossChainError } from "./core/errors";
import type { LogLevel } from "./logging";

const LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const envSchema = object({
  LOG_LEVEL: optional(picklist(LEVELS), "info"),
  LOG_PRETTY: optional(picklist(["true", "false"]), "false"),
  RELAY_GAS_LIMIT: optional(pipe(string(), regex(/^[1-9]\d*$/, "must be a positive integer")), "200000"),
});

export interface Config {
  logLevel: LogLevel;
  logPretty: boolean;
  gasLimit: bigint;
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => {
  const parsed = safeParse(envSchema, env);
  if (!parsed.success) {
    const issue = parsed.issues[0];
    const key = issue.path?.map((p) => String(p.key)).join(".") ?? "env";
    throw new CrossChainError("InvalidArgument", `invalid configuration ${key}: ${issue.message}`);
  }
  const { LOG_LEVEL, LOG_PRETTY, RELAY_GAS_LIMIT } = parsed.output;
  return {
    logLevel: LOG_LEVEL,
    logPretty: LOG_PRETTY === "true",
    gasLimit: BigInt(RELAY_GAS_LIMIT),
  };
};
