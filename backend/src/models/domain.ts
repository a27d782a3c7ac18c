import type { LatLng, StopRecord, TrainScheduleRecord } from "@railwatch/core";

export type Coordinate = LatLng;

/** One scheduled call of a train; position within `Train.stops` is significant. */
export type Stop = StopRecord;

export interface Train {
  key: string;
  name: string;
  model: string;
  days: string[];
  totalDuration: string;
  stops: Stop[];
}

export interface CoordinateLookup {
  getCoordinates(stationName: string): Coordinate | null;
}

export interface ScheduleSnapshot {
  stations: Map<string, Coordinate>;
  trains: Map<string, Train>;
  segmentsCount: number;
  routeMappings: Map<string, unknown>;
}

export const toScheduleRecord = (train: Train): TrainScheduleRecord => ({
  data: {
    train_name: train.name,
    train_model: train.model,
    days: [...train.days],
    total_duration: train.totalDuration,
    routes: train.stops.map((stop) => ({ ...stop })),
  },
});
