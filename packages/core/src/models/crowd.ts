import type { ApiSuccess, IsoTimestamp, LatLng } from "./common";

export type CrowdLevel = "low" | "medium" | "high" | "very_high";
export type CrowdConfidence = "none" | "low" | "medium" | "high";
export type DataFreshness = "high" | "medium" | "low";

export interface CrowdConfirmation {
  user_id: string;
  timestamp: IsoTimestamp;
  station_name: string | null;
  coordinates: LatLng | null;
}

export interface CrowdData {
  train_number: string;
  total_confirmations: number;
  active_confirmations: number;
  crowd_level: CrowdLevel;
  last_updated: IsoTimestamp | null;
  confirmations: CrowdConfirmation[];
}

export interface CrowdMetrics {
  crowd_level: CrowdLevel;
  confidence: CrowdConfidence;
  active_confirmations: number;
  active_users: number;
  average_time_since_confirmation: string;
  data_freshness: DataFreshness;
  last_updated: IsoTimestamp | null;
}

export interface CrowdValidationInfo {
  confidence: CrowdConfidence;
  active_users: number;
  crowd_level: CrowdLevel;
  last_updated: IsoTimestamp | null;
}

export interface ConfirmRequest {
  user_id: string;
  station_name?: string;
  coordinates?: LatLng;
}

export interface ConfirmResponse extends ApiSuccess {
  message: string;
  train_number: string;
  user_id: string;
  timestamp: IsoTimestamp;
  crowd_metrics: CrowdMetrics;
}

export interface RemoveConfirmationResponse extends ApiSuccess {
  message: string;
  train_number: string;
  user_id: string;
}

export interface CrowdDataResponse extends ApiSuccess {
  train_number: string;
  crowd_data: CrowdData;
}
