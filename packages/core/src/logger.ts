import pino, { type Logger } from "pino";
import type { LogLevel } from "@sessiondex/contracts";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export type { Logger };

export interface LoggerOptions {
  level: LogLevel;
  pretty?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

export function levelFromEnv(fallback: LogLevel = "info"): LogLevel {
  const fromEnv = process.env.SESSIONDEX_LOG_LEVEL?.trim().toLowerCase();
  if (isLogLevel(fromEnv)) return fromEnv;
  if (process.env.LOG_TRACE === "1") return "trace";
  if (process.env.LOG_DEBUG === "1") return "debug";
  if (process.env.LOG_SILENT === "1") return "silent";
  return fallback;
}

export function createLogger(options: LoggerOptions): Logger {
  const { level } = options;
  const pretty = (options.pretty ?? Boolean(process.stderr.isTTY)) && level !== "silent";
  const baseConfig: pino.LoggerOptions = {
    level,
    name: "sessiondex",
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // stdout belongs to command output, logs go to stderr
  if (pretty) {
    return pino(
      baseConfig,
      pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: 2,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }),
    );
  }
  return pino(baseConfig, pino.destination(2));
}

export const logger: Logger = createLogger({ level: levelFromEnv() });

export function childLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
