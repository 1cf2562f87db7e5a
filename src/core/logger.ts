import pino, { Logger } from "pino";

export type { Logger };

export type LoggerOptions = {
  level?: string;
  name?: string;
};

// stdout carries the report, so log lines go to stderr.
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "chainwarden",
      level: options.level ?? "warn"
    },
    pino.destination(2)
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
