import pino, { Logger } from "pino";

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";
  const base = {
    base: undefined,
    level,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.epochTime,
  };
  if (!options.pretty) {
    return pino(base);
  }
  const transport = pino.transport({
    target: "pino-pretty",
    options: {
      translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
      colorize: true,
      ignore: "pid,hostname",
    },
  });
  return pino(base, transport);
}

export type { Logger };
