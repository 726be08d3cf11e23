import pino, { type LevelWithSilent, type Logger } from "pino";
import { config } from "./config";

export type ILogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export const makeLogger = (level: LevelWithSilent = "info", pretty = false): Logger =>
  pretty
    ? pino({
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      })
    : pino({ level });

export const logger: ILogger = makeLogger(config.logLevel, config.logPretty);
