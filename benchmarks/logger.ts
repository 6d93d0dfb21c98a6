import { pino, type Logger } from "pino";

export type { Logger } from "pino";

export const DISPLAY_WIDTH = 120;

/**
 * Create logger instance
 * - Human-readable CLI output by default
 * - Set LOG_JSON=1 for machine-readable JSON output (for piping to jq, log aggregators, etc.)
 */
export function createLogger(
  env: NodeJS.ProcessEnv = process.env
): Logger {
  const level = env.LOG_LEVEL || "info";

  if (env.LOG_JSON === "1") {
    return pino({
      level,
      formatters: {
        level: (label) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        messageFormat: "{msg}",
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

let defaultLogger: Logger | undefined;

/**
 * Process-wide logger, created on first use
 */
export function getLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger();
  }
  return defaultLogger;
}

/**
 * Centers a title in a rule of `fill` characters
 */
export function banner(title: string, fill: string, width: number = DISPLAY_WIDTH): string {
  if (title.length >= width) {
    return title;
  }
  const left = Math.floor((width - title.length) / 2);
  const right = width - title.length - left;
  return `${fill.repeat(left)}${title}${fill.repeat(right)}`;
}
