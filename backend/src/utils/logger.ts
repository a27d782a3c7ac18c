import { config, type LogLevel } from "../config";

const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type LogMeta = Record<string, unknown>;

const formatMessage = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  const timestamp = new Date().toISOString();
  const scopeLabel = scope ? ` [${scope}]` : "";
  const base = `[${timestamp}] [${level.toUpperCase()}]${scopeLabel} ${message}`;
  if (!meta || Object.keys(meta).length === 0) return base;
  return `${base} ${JSON.stringify(meta)}`;
};

const shouldLog = (level: LogLevel): boolean => levelPriority[level] >= levelPriority[config.logLevel];

const log = (level: LogLevel, scope: string | undefined, message: string, meta?: LogMeta) => {
  if (!shouldLog(level)) return;
  const line = formatMessage(level, scope, message, meta);
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.log(line);
};

export interface Logger {
  debug: (message: string, meta?: LogMeta) => void;
  info: (message: string, meta?: LogMeta) => void;
  warn: (message: string, meta?: LogMeta) => void;
  error: (message: string, meta?: LogMeta) => void;
}

export const createLogger = (scope?: string): Logger => ({
  debug: (message, meta) => log("debug", scope, message, meta),
  info: (message, meta) => log("info", scope, message, meta),
  warn: (message, meta) => log("warn", scope, message, meta),
  error: (message, meta) => log("error", scope, message, meta),
});

export const logger = createLogger();

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};
