import path from "node:path";
import dotenv from "dotenv";

dotenv.config();

const DEFAULT_PORT = 5000;
const DEFAULT_SCHEDULE_CACHE_MS = 5 * 60_000;
const DEFAULT_CROWD_ACTIVE_WINDOW_MS = 2 * 60 * 60_000;
const DEFAULT_CROWD_RETENTION_HOURS = 24;
const DEFAULT_CROWD_CLEANUP_INTERVAL_MS = 60 * 60_000;
const DEFAULT_BASE_DELAY_PROBABILITY = 0.3;
const DEFAULT_MAX_DELAY_MINUTES = 120;
const DEFAULT_HISTORY_CAPACITY = 100;
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  port: number;
  dataDir: string;
  crowdValidationsFile: string;
  redisUrl: string | undefined;
  logLevel: LogLevel;
  enableAdmin: boolean;
  randomSeed: number | undefined;
  scheduleCacheMs: number;
  crowdActiveWindowMs: number;
  crowdRetentionHours: number;
  crowdCleanupIntervalMs: number;
  baseDelayProbability: number;
  maxDelayMinutes: number;
  historyCapacity: number;
}

const normalizeLogLevel = (value?: string): LogLevel => {
  const normalized = (value ?? "").toLowerCase();
  if (normalized === "debug" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
};

const parsePositiveNumber = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (value !== undefined && Number.isFinite(parsed) && parsed > 0) return parsed;
  return fallback;
};

const parseProbability = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  if (value !== undefined && Number.isFinite(parsed) && parsed >= 0 && parsed <= 1) return parsed;
  return fallback;
};

const parseOptionalInteger = (value: string | undefined): number | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isInteger(parsed) ? parsed : undefined;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const dataDir = path.resolve(env.DATA_DIR ?? "data");
  return {
    port: parsePositiveNumber(env.PORT, DEFAULT_PORT),
    dataDir,
    crowdValidationsFile: env.CROWD_VALIDATIONS_FILE ?? path.join(dataDir, "crowd_validations.json"),
    redisUrl: env.REDIS_URL || undefined,
    logLevel: normalizeLogLevel(env.LOG_LEVEL),
    enableAdmin: env.ENABLE_ADMIN === "true" || env.NODE_ENV !== "production",
    randomSeed: parseOptionalInteger(env.RANDOM_SEED),
    scheduleCacheMs: parsePositiveNumber(env.SCHEDULE_CACHE_MS, DEFAULT_SCHEDULE_CACHE_MS),
    crowdActiveWindowMs: parsePositiveNumber(env.CROWD_ACTIVE_WINDOW_MS, DEFAULT_CROWD_ACTIVE_WINDOW_MS),
    crowdRetentionHours: parsePositiveNumber(env.CROWD_RETENTION_HOURS, DEFAULT_CROWD_RETENTION_HOURS),
    crowdCleanupIntervalMs: parsePositiveNumber(env.CROWD_CLEANUP_INTERVAL_MS, DEFAULT_CROWD_CLEANUP_INTERVAL_MS),
    baseDelayProbability: parseProbability(env.BASE_DELAY_PROBABILITY, DEFAULT_BASE_DELAY_PROBABILITY),
    maxDelayMinutes: parsePositiveNumber(env.MAX_DELAY_MINUTES, DEFAULT_MAX_DELAY_MINUTES),
    historyCapacity: Math.floor(parsePositiveNumber(env.DELAY_HISTORY_CAPACITY, DEFAULT_HISTORY_CAPACITY)),
  };
};

export const config: AppConfig = loadConfig();
