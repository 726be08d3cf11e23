import type { LevelWithSilent } from "pino";
import * as v from "valibot";

// Unrecognised values read as the defaults.
const ConfigSchema = v.object({
  LOG_LEVEL: v.fallback(
    v.optional(v.picklist(["fatal", "error", "warn", "info", "debug", "trace", "silent"]), "info"),
    "info",
  ),
  LOG_PRETTY: v.fallback(v.optional(v.picklist(["true", "false"]), "false"), "false"),
});

export type Config = Readonly<{
  logLevel: LevelWithSilent;
  logPretty: boolean;
}>;

export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => {
  const parsed = v.parse(ConfigSchema, {
    LOG_LEVEL: env.LOG_LEVEL,
    LOG_PRETTY: env.LOG_PRETTY,
  });
  return Object.freeze({
    logLevel: parsed.LOG_LEVEL ?? "info",
    logPretty: parsed.LOG_PRETTY === "true",
  });
};

export const config = loadConfig();
