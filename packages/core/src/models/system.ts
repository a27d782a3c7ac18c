import type { ApiSuccess, IsoTimestamp } from "./common";

export interface DataSourceStatus {
  stations_count: number;
  segments_count: number;
  schedules_count: number;
  route_mappings_count: number;
  last_loaded: IsoTimestamp | null;
  cache_valid: boolean;
}

export interface CrowdTrainSummary {
  total_confirmations: number;
  active_confirmations: number;
  crowd_level: string;
  last_updated: IsoTimestamp | null;
}

export interface HealthResponse extends ApiSuccess {
  status: "healthy";
  version: string;
  data_sources: DataSourceStatus;
  crowd_validations: {
    total_trains: number;
    active_validations: number;
  };
  redis: {
    status: string;
    error: string | null;
  };
}

export type ComponentHealth = "healthy" | "unhealthy";

export interface SystemStatusResponse extends ApiSuccess {
  system_status: {
    data_sources: {
      schedules: number;
      stations: number;
      segments: number;
      route_mappings: number;
    };
    crowd_validations: {
      total_trains: number;
      total_confirmations: number;
      active_confirmations: number;
    };
    system_health: Record<
      "schedule_store" | "position_estimator" | "delay_model" | "timeline_assembler" | "crowd_validation",
      ComponentHealth
    >;
    last_updated: IsoTimestamp;
  };
}

export interface RefreshDataResponse extends ApiSuccess {
  message: string;
  data_status: DataSourceStatus;
  cleaned_validations: number;
}
