import { pino } from "pino";

export interface Logger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  debug(msg: string): void;
  info(obj: Record<string, unknown>, msg?: string): void;
  info(msg: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
  warn(msg: string): void;
  error(obj: Record<string, unknown>, msg?: string): void;
  error(msg: string): void;
}

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export interface LoggerOptions {
  name?: string;
  level?: LogLevel;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "exam-desk",
    level: options.level ?? "info",
  });
}
