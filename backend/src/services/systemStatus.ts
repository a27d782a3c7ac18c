import type { CrowdTrainSummary, HealthResponse, SystemStatusResponse } from "@railwatch/core";
import type { AppContext } from "../context";

export const SERVICE_VERSION = "1.0.0";

interface CrowdTotals {
  total_trains: number;
  total_confirmations: number;
  active_confirmations: number;
}

const summarizeCrowd = (validations: Record<string, CrowdTrainSummary>): CrowdTotals => {
  const entries = Object.values(validations);
  return {
    total_trains: entries.length,
    total_confirmations: entries.reduce((sum, entry) => sum + entry.total_confirmations, 0),
    active_confirmations: entries.reduce((sum, entry) => sum + entry.active_confirmations, 0),
  };
};

export const buildHealth = (context: AppContext, now: Date): HealthResponse => {
  const crowd = summarizeCrowd(context.crowd.getAllTrainValidations(now));
  return {
    success: true,
    status: "healthy",
    version: SERVICE_VERSION,
    data_sources: context.schedule.getStatus(now.getTime()),
    crowd_validations: {
      total_trains: crowd.total_trains,
      active_validations: crowd.active_confirmations,
    },
    redis: {
      status: context.redis.status,
      error: context.redis.error ? context.redis.error.message : null,
    },
    timestamp: now.toISOString(),
  };
};

export const buildSystemStatus = (context: AppContext, now: Date): SystemStatusResponse => {
  const status = context.schedule.getStatus(now.getTime());
  const crowd = summarizeCrowd(context.crowd.getAllTrainValidations(now));
  const scheduleHealth = status.schedules_count > 0 ? "healthy" : "unhealthy";
  return {
    success: true,
    system_status: {
      data_sources: {
        schedules: status.schedules_count,
        stations: status.stations_count,
        segments: status.segments_count,
        route_mappings: status.route_mappings_count,
      },
      crowd_validations: crowd,
      system_health: {
        schedule_store: scheduleHealth,
        position_estimator: status.stations_count > 0 ? "healthy" : "unhealthy",
        delay_model: "healthy",
        timeline_assembler: scheduleHealth,
        crowd_validation: context.redis.status === "error" ? "unhealthy" : "healthy",
      },
      last_updated: now.toISOString(),
    },
    timestamp: now.toISOString(),
  };
};
