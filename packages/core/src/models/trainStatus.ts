import type { ApiSuccess, IsoTimestamp, WeatherCondition } from "./common";
import type { CrowdData, CrowdValidationInfo } from "./crowd";
import type { TrainSummary } from "./schedule";

export type StationStatusTag = "completed" | "current" | "next" | "upcoming";
export type StationCrowdLevel = "low" | "normal" | "medium" | "high";

export interface StationStatus {
  station_name: string;
  status: StationStatusTag;
  scheduled_arrival: IsoTimestamp | null;
  scheduled_departure: IsoTimestamp | null;
  actual_arrival: IsoTimestamp | null;
  actual_departure: IsoTimestamp | null;
  delay_minutes: number;
  halt_duration: string;
  duration: string;
  distance_from_start: number;
  weather_condition: WeatherCondition;
  crowd_level: StationCrowdLevel;
}

export interface TrainStatusReport {
  train_number: string;
  train_name: string;
  station_statuses: StationStatus[];
  current_speed: number;
  distance_covered: number;
  distance_to_next: number;
  /** Overall delay: the worst per-station delay, not a sum. */
  delay_minutes: number;
  estimated_arrival: string | null;
  progress_percentage: number;
  current_station: string | null;
  next_station: string | null;
  position_available: boolean;
  weather_condition: WeatherCondition;
  last_updated: IsoTimestamp;
  crowd_validation?: CrowdValidationInfo;
  eta_adjusted_by_crowd?: boolean;
  crowd_eta_confidence?: "high";
}

export interface TrainStatusResponse extends ApiSuccess {
  train_number: string;
  status: TrainStatusReport;
}

export interface TrainSummaryResponse extends ApiSuccess {
  train_number: string;
  summary: TrainSummary & { crowd_data: CrowdData };
}
