import fs from "node:fs/promises";
import path from "node:path";
import type { CrowdConfirmation, LatLng } from "@railwatch/core";
import type { RedisManager } from "../cache/redisClient";
import { createLogger } from "../utils/logger";

const logger = createLogger("crowd-persistence");

export interface TrainValidationRecord {
  confirmations: CrowdConfirmation[];
  last_updated: string;
  total_confirmations: number;
}

export type CrowdSnapshot = Record<string, TrainValidationRecord>;

export interface CrowdPersistence {
  readonly kind: "file" | "redis" | "memory";
  load(): Promise<CrowdSnapshot>;
  save(snapshot: CrowdSnapshot): Promise<void>;
}

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toCoordinates = (value: unknown): LatLng | null => {
  if (!isObject(value)) return null;
  const { lat, lng } = value;
  return typeof lat === "number" && typeof lng === "number" ? { lat, lng } : null;
};

const toConfirmation = (value: unknown): CrowdConfirmation | null => {
  if (!isObject(value)) return null;
  if (typeof value.user_id !== "string" || typeof value.timestamp !== "string") return null;
  return {
    user_id: value.user_id,
    timestamp: value.timestamp,
    station_name: typeof value.station_name === "string" ? value.station_name : null,
    coordinates: toCoordinates(value.coordinates),
  };
};

/** Keeps the well-formed part of a stored snapshot; malformed entries are dropped with a warning. */
export const sanitizeSnapshot = (raw: unknown): CrowdSnapshot => {
  const snapshot: CrowdSnapshot = {};
  if (!isObject(raw)) return snapshot;
  Object.entries(raw).forEach(([trainNumber, entry]) => {
    if (!isObject(entry) || !Array.isArray(entry.confirmations)) {
      logger.warn("Dropping malformed crowd validation entry", { train: trainNumber });
      return;
    }
    const confirmations = entry.confirmations
      .map(toConfirmation)
      .filter((confirmation): confirmation is CrowdConfirmation => confirmation !== null);
    snapshot[trainNumber] = {
      confirmations,
      last_updated: typeof entry.last_updated === "string" ? entry.last_updated : new Date(0).toISOString(),
      total_confirmations:
        typeof entry.total_confirmations === "number" ? entry.total_confirmations : confirmations.length,
    };
  });
  return snapshot;
};

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export const createFileCrowdPersistence = (filePath: string): CrowdPersistence => ({
  kind: "file",
  load: async () => {
    try {
      const payload = await fs.readFile(filePath, "utf-8");
      return sanitizeSnapshot(JSON.parse(payload));
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }
  },
  save: async (snapshot) => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), "utf-8");
    await fs.rename(tempPath, filePath);
  },
});

const REDIS_KEY = "railwatch:crowd:validations";

export const createRedisCrowdPersistence = (redis: RedisManager): CrowdPersistence => ({
  kind: "redis",
  load: async () => sanitizeSnapshot(await redis.getJson(REDIS_KEY)),
  save: async (snapshot) => {
    await redis.setJson(REDIS_KEY, snapshot);
  },
});

export const createMemoryCrowdPersistence = (initial: CrowdSnapshot = {}): CrowdPersistence & {
  saved: CrowdSnapshot[];
} => {
  let stored: CrowdSnapshot = structuredClone(initial);
  const saved: CrowdSnapshot[] = [];
  return {
    kind: "memory",
    saved,
    load: async () => structuredClone(stored),
    save: async (snapshot) => {
      stored = structuredClone(snapshot);
      saved.push(stored);
    },
  };
};
