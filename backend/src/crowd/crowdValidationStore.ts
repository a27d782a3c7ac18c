import type {
  ConfirmResponse,
  CrowdConfidence,
  CrowdConfirmation,
  CrowdData,
  CrowdLevel,
  CrowdMetrics,
  CrowdTrainSummary,
  DataFreshness,
  LatLng,
  RemoveConfirmationResponse,
} from "@railwatch/core";
import { createLogger, describeError } from "../utils/logger";
import { KeyedMutex } from "../utils/keyedMutex";
import { fail, ok, type Result } from "../utils/result";
import type { CrowdPersistence, CrowdSnapshot, TrainValidationRecord } from "./persistence";

const logger = createLogger("crowd");

const DEFAULT_ACTIVE_WINDOW_MS = 2 * 60 * 60_000;
const PERSIST_KEY = "__persist__";

export const classifyCrowdLevel = (activeCount: number): CrowdLevel => {
  if (activeCount === 0) return "low";
  if (activeCount <= 5) return "medium";
  if (activeCount <= 15) return "high";
  return "very_high";
};

export const classifyConfidence = (activeCount: number): CrowdConfidence => {
  if (activeCount === 0) return "none";
  if (activeCount <= 3) return "low";
  if (activeCount <= 10) return "medium";
  return "high";
};

export const classifyFreshness = (averageMinutes: number): DataFreshness => {
  if (averageMinutes < 30) return "high";
  if (averageMinutes < 60) return "medium";
  return "low";
};

export interface ConfirmInput {
  userId: string;
  stationName?: string | undefined;
  coordinates?: LatLng | undefined;
}

export type ConfirmOutcome = ConfirmResponse | { success: false; error: string };

export type RemoveOutcome = RemoveConfirmationResponse | { success: false; error: string };

export interface CrowdValidationStoreOptions {
  persistence: CrowdPersistence;
  activeWindowMs?: number;
}

/**
 * User "I am on this train" confirmations, one bucket per train. Activity is evaluated
 * against `now` at read time; nothing is flagged inactive in storage.
 */
export class CrowdValidationStore {
  private validations: CrowdSnapshot = {};
  private readonly mutex = new KeyedMutex();
  private readonly persistence: CrowdPersistence;
  private readonly activeWindowMs: number;

  constructor(options: CrowdValidationStoreOptions) {
    this.persistence = options.persistence;
    this.activeWindowMs = options.activeWindowMs ?? DEFAULT_ACTIVE_WINDOW_MS;
  }

  public get persistenceKind() {
    return this.persistence.kind;
  }

  /** Replaces in-memory state with whatever the persistence layer holds. */
  public async hydrate(): Promise<number> {
    try {
      this.validations = await this.persistence.load();
      const trains = Object.keys(this.validations).length;
      logger.info("Crowd validations loaded", { trains, persistence: this.persistence.kind });
      return trains;
    } catch (error) {
      logger.error("Failed to load crowd validations; starting empty", { message: describeError(error) });
      this.validations = {};
      return 0;
    }
  }

  private async persist(): Promise<void> {
    await this.mutex.runExclusive(PERSIST_KEY, async () => {
      try {
        await this.persistence.save(structuredClone(this.validations));
      } catch (error) {
        logger.error("Failed to persist crowd validations", { message: describeError(error) });
      }
    });
  }

  private isActive(confirmation: CrowdConfirmation, now: Date): boolean {
    const recordedAt = Date.parse(confirmation.timestamp);
    if (Number.isNaN(recordedAt)) return false;
    return now.getTime() - recordedAt < this.activeWindowMs;
  }

  private activeConfirmations(record: TrainValidationRecord | undefined, now: Date): CrowdConfirmation[] {
    return record ? record.confirmations.filter((confirmation) => this.isActive(confirmation, now)) : [];
  }

  public async confirm(trainNumber: string, input: ConfirmInput, now: Date = new Date()): Promise<ConfirmOutcome> {
    const userId = input.userId.trim();
    if (!userId) {
      return { success: false, error: "User ID is required" };
    }

    const outcome = await this.mutex.runExclusive(trainNumber, () => {
      const timestamp = now.toISOString();
      const record = this.validations[trainNumber] ?? {
        confirmations: [],
        last_updated: timestamp,
        total_confirmations: 0,
      };
      const confirmation: CrowdConfirmation = {
        user_id: userId,
        timestamp,
        station_name: input.stationName ?? null,
        coordinates: input.coordinates ?? null,
      };
      const existingIndex = record.confirmations.findIndex((entry) => entry.user_id === userId);
      if (existingIndex === -1) {
        record.confirmations.push(confirmation);
        record.total_confirmations += 1;
      } else {
        record.confirmations[existingIndex] = confirmation;
      }
      record.last_updated = timestamp;
      this.validations[trainNumber] = record;
      return { timestamp, updated: existingIndex !== -1 };
    });

    await this.persist();

    const metrics = this.getMetrics(trainNumber, now);
    if (!metrics.ok) {
      return { success: false, error: metrics.error.message };
    }
    logger.info("Crowd confirmation recorded", { train: trainNumber, updated: outcome.updated });
    return {
      success: true,
      message: outcome.updated ? "Confirmation updated" : "Confirmation added",
      train_number: trainNumber,
      user_id: userId,
      timestamp: outcome.timestamp,
      crowd_metrics: metrics.value,
    };
  }

  public async removeConfirmation(trainNumber: string, userId: string, now: Date = new Date()): Promise<RemoveOutcome> {
    const removed = await this.mutex.runExclusive(trainNumber, () => {
      const record = this.validations[trainNumber];
      if (!record) return false;
      const remaining = record.confirmations.filter((entry) => entry.user_id !== userId);
      if (remaining.length === record.confirmations.length) return false;
      record.confirmations = remaining;
      record.total_confirmations = Math.max(0, record.total_confirmations - 1);
      record.last_updated = now.toISOString();
      return true;
    });

    if (!removed) {
      return { success: false, error: "Confirmation not found" };
    }
    await this.persist();
    return {
      success: true,
      message: "Confirmation removed",
      train_number: trainNumber,
      user_id: userId,
    };
  }

  public getCrowdData(trainNumber: string, now: Date = new Date()): CrowdData {
    const record = this.validations[trainNumber];
    const active = this.activeConfirmations(record, now);
    return {
      train_number: trainNumber,
      total_confirmations: record?.total_confirmations ?? 0,
      active_confirmations: active.length,
      crowd_level: classifyCrowdLevel(active.length),
      last_updated: record?.last_updated ?? null,
      confirmations: active.map((confirmation) => ({ ...confirmation })),
    };
  }

  public getMetrics(trainNumber: string, now: Date = new Date()): Result<CrowdMetrics> {
    const record = this.validations[trainNumber];
    if (!record) {
      return fail("not_found", `No crowd data for train ${trainNumber}`);
    }
    const active = this.activeConfirmations(record, now);
    const activeUsers = new Set(active.map((confirmation) => confirmation.user_id)).size;

    let averageMinutes = 0;
    if (active.length > 0) {
      const totalSeconds = active.reduce(
        (sum, confirmation) => sum + (now.getTime() - Date.parse(confirmation.timestamp)) / 1000,
        0,
      );
      averageMinutes = Math.trunc(totalSeconds / active.length / 60);
    }

    return ok({
      crowd_level: classifyCrowdLevel(active.length),
      confidence: classifyConfidence(active.length),
      active_confirmations: active.length,
      active_users: activeUsers,
      average_time_since_confirmation: `${averageMinutes} minutes ago`,
      data_freshness: classifyFreshness(averageMinutes),
      last_updated: record.last_updated,
    });
  }

  public getAllTrainValidations(now: Date = new Date()): Record<string, CrowdTrainSummary> {
    const summaries: Record<string, CrowdTrainSummary> = {};
    Object.entries(this.validations).forEach(([trainNumber, record]) => {
      const activeCount = this.activeConfirmations(record, now).length;
      summaries[trainNumber] = {
        total_confirmations: record.total_confirmations,
        active_confirmations: activeCount,
        crowd_level: classifyCrowdLevel(activeCount),
        last_updated: record.last_updated,
      };
    });
    return summaries;
  }

  /** Drops confirmations older than `maxAgeHours`; returns how many trains were emptied and removed. */
  public async cleanupOldValidations(maxAgeHours: number, now: Date = new Date()): Promise<number> {
    const cutoff = now.getTime() - maxAgeHours * 60 * 60_000;
    let removedTrains = 0;
    let trimmed = false;
    for (const trainNumber of Object.keys(this.validations)) {
      const outcome = await this.mutex.runExclusive(trainNumber, () => {
        const record = this.validations[trainNumber];
        if (!record) return "unchanged";
        const remaining = record.confirmations.filter((confirmation) => {
          const recordedAt = Date.parse(confirmation.timestamp);
          return !Number.isNaN(recordedAt) && recordedAt > cutoff;
        });
        if (remaining.length === 0) {
          delete this.validations[trainNumber];
          return "emptied";
        }
        const changed =
          remaining.length !== record.confirmations.length || record.total_confirmations !== remaining.length;
        record.confirmations = remaining;
        record.total_confirmations = remaining.length;
        return changed ? "trimmed" : "unchanged";
      });
      if (outcome === "emptied") removedTrains += 1;
      if (outcome === "trimmed") trimmed = true;
    }

    if (removedTrains > 0 || trimmed) {
      await this.persist();
      logger.info("Cleaned up stale crowd validations", { removedTrains, maxAgeHours });
    }
    return removedTrains;
  }
}
