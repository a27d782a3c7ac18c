import type { CrowdData, TrainSummary } from "@railwatch/core";
import type { Train } from "../models/domain";
import type { PositionEstimator } from "./positionEstimator";

export type TrainSummaryWithCrowd = TrainSummary & { crowd_data: CrowdData };

export const buildTrainSummary = (
  train: Train,
  positions: PositionEstimator,
  crowdData: CrowdData,
): TrainSummaryWithCrowd => {
  const first = train.stops[0];
  const last = train.stops[train.stops.length - 1];
  return {
    train_number: train.key,
    train_name: train.name,
    operating_days: [...train.days],
    total_stations: train.stops.length,
    route_summary: {
      origin: first?.city ?? "Unknown",
      destination: last?.city ?? "Unknown",
      total_distance: positions.totalDistance(train.stops),
    },
    schedule_info: {
      departure_time: first?.departure_time ?? null,
      arrival_time: last?.arrival_time ?? null,
    },
    crowd_data: crowdData,
  };
};
