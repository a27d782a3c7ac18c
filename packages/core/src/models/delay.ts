import type { ApiSuccess, IsoTimestamp, WeatherCondition } from "./common";
import type { StopRecord } from "./schedule";

export interface DelayFactors {
  weather: number;
  time_of_day: number;
  day_of_week: number;
  station: number;
}

export interface DelaySynthesis {
  delay_minutes: number;
  scheduled_time: IsoTimestamp;
  actual_time: IsoTimestamp;
  weather_condition: WeatherCondition;
  factors_applied: DelayFactors;
}

export type DelayBucket = "0-15 min" | "16-30 min" | "31-60 min" | "60+ min";

export interface DelayStatsAvailable {
  available: true;
  total_delays: number;
  average_delay: number;
  max_delay: number;
  min_delay: number;
  delay_distribution: Record<DelayBucket, number>;
}

export interface DelayStatsUnavailable {
  available: false;
  reason: string;
}

export type DelayStats = DelayStatsAvailable | DelayStatsUnavailable;

export type PredictionConfidence = "low" | "medium" | "high";

export interface DelayProbabilityFallback {
  probability: number;
  confidence: PredictionConfidence;
}

export interface DelayProbabilityEstimate extends DelayProbabilityFallback {
  historical_data_points: number;
  factors_applied: {
    time_of_day: number;
    day_of_week: number;
  };
}

export type DelayProbability = DelayProbabilityFallback | DelayProbabilityEstimate;

export interface OverallDelayStats {
  total_trains: number;
  trains_with_delays: number;
  average_delay: number;
}

export type DelayAnalyticsResponse = ApiSuccess &
  (
    | { analytics_type: "train_station_delays"; train_number: string; station_name: string; stats: DelayStats }
    | { analytics_type: "train_delays"; train_number: string; stats: DelayStats }
    | { analytics_type: "overall_delays"; stats: OverallDelayStats }
  );

export interface DelayPredictionResponse extends ApiSuccess {
  train_number: string;
  station_name: string;
  prediction: DelayProbability;
}

export interface SimulatedStop extends StopRecord {
  simulated_delay?: DelaySynthesis;
  weather_condition?: WeatherCondition;
}

export interface RouteSimulationResponse extends ApiSuccess {
  train_number: string;
  stops: SimulatedStop[];
}
