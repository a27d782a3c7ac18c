import type { ApiSuccess, ClockString, IsoTimestamp, LatLng } from "./common";

export interface StopRecord {
  city: string;
  arrival_time: ClockString | null;
  departure_time: ClockString | null;
  halt: string | null;
  duration: string | null;
}

export interface TrainScheduleRecord {
  data: {
    train_name: string;
    train_model: string;
    days: string[];
    total_duration: string;
    routes: StopRecord[];
  };
}

export type StationCoordinates = Record<string, [number, number]>;

export interface StationsResponse extends ApiSuccess {
  stations: StationCoordinates;
  total_count: number;
}

export type TrainSearchResponse = ApiSuccess & {
  results: TrainScheduleRecord[];
  total_count: number;
  message?: string;
} & (
    | { search_type: "train_number"; query: string }
    | { search_type: "station_to_station"; from_station: string; to_station: string }
  );

export interface StationTrainEntry {
  train_number: string;
  train_name: string;
  arrival_time: ClockString | null;
  departure_time: ClockString | null;
  halt_duration: string;
  operating_days: string[];
}

export interface StationTrainsResponse extends ApiSuccess {
  station_name: string;
  trains: StationTrainEntry[];
  total_count: number;
}

export interface PositionSnapshot {
  available: true;
  current_station_idx: number;
  current_station: string;
  next_station: string | null;
  progress_percentage: number;
  distance_covered: number;
  distance_to_next: number;
  eta_to_next: string | null;
  total_stations: number;
  current_time: IsoTimestamp;
}

export interface PositionUnavailable {
  available: false;
  reason: string;
  total_stations: number;
  current_time: IsoTimestamp;
}

export type PositionResult = PositionSnapshot | PositionUnavailable;

export interface TrainPositionResponse extends ApiSuccess {
  train_number: string;
  position: PositionResult;
  current_speed: number;
}

export interface TrainSummary {
  train_number: string;
  train_name: string;
  operating_days: string[];
  total_stations: number;
  route_summary: {
    origin: string;
    destination: string;
    total_distance: number;
  };
  schedule_info: {
    departure_time: ClockString | null;
    arrival_time: ClockString | null;
  };
}

