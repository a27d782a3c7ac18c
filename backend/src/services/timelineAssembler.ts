import type {
  CrowdLevel,
  CrowdMetrics,
  StationCrowdLevel,
  StationStatus,
  StationStatusTag,
  TrainStatusReport,
  WeatherCondition,
} from "@railwatch/core";
import type { Stop, Train } from "../models/domain";
import { createLogger } from "../utils/logger";
import { randomInt, type RandomSource } from "../utils/random";
import { fail, ok, type Result } from "../utils/result";
import { addMinutes, parseClockOn } from "../utils/time";
import type { DelayModel } from "./delayModel";
import { currentStopIndex, type PositionEstimator } from "./positionEstimator";

const logger = createLogger("timeline");

const MAJOR_HUBS = ["Dhaka", "Chattogram", "Rajshahi", "Khulna", "Sylhet"];

const CROWD_ADJUSTMENT_RANGE: Record<CrowdLevel, number> = {
  low: 0,
  medium: 2,
  high: 5,
  very_high: 8,
};

export interface TrainLookup {
  getTrain(trainNumber: string): Train | null;
}

export interface CrowdMetricsSource {
  getMetrics(trainNumber: string, now: Date): Result<CrowdMetrics>;
}

export const statusTag = (index: number, currentPosition: number): StationStatusTag => {
  if (index < currentPosition) return "completed";
  if (index === currentPosition) return "current";
  if (index === currentPosition + 1) return "next";
  return "upcoming";
};

export const estimateStationCrowd = (stationName: string, scheduled: Date | null): StationCrowdLevel => {
  if (!scheduled) return "normal";
  const hour = scheduled.getHours();
  const isMajorHub = MAJOR_HUBS.some((hub) => stationName.includes(hub));
  if ((hour >= 7 && hour <= 9) || (hour >= 17 && hour <= 19)) return isMajorHub ? "high" : "medium";
  if (hour >= 22 || hour <= 5) return "low";
  return isMajorHub ? "medium" : "normal";
};

/**
 * Signed random delay correction derived from crowd metrics. Larger crowds widen the
 * range; more than 10 or 20 active users scale it by 1.5 or 2.
 */
export const crowdDelayAdjustment = (metrics: CrowdMetrics, random: RandomSource): number => {
  const range = CROWD_ADJUSTMENT_RANGE[metrics.crowd_level];
  if (range === 0) return 0;
  const base = randomInt(random, -range, range);
  const active = metrics.active_confirmations;
  const scale = active > 20 ? 2 : active > 10 ? 1.5 : 1;
  return Math.trunc(base * scale);
};

/**
 * Applies crowd metrics to a generated report. Only medium and high confidence change
 * anything; otherwise the report is returned as given.
 */
export const adjustWithCrowdData = (
  report: TrainStatusReport,
  metrics: Result<CrowdMetrics>,
  random: RandomSource,
): TrainStatusReport => {
  if (!metrics.ok) return report;
  const crowd = metrics.value;
  if (crowd.confidence !== "medium" && crowd.confidence !== "high") return report;

  const adjusted: TrainStatusReport = {
    ...report,
    delay_minutes: Math.max(0, report.delay_minutes + crowdDelayAdjustment(crowd, random)),
    crowd_validation: {
      confidence: crowd.confidence,
      active_users: crowd.active_users,
      crowd_level: crowd.crowd_level,
      last_updated: crowd.last_updated,
    },
  };
  if (crowd.confidence === "high" && crowd.active_users > 5) {
    adjusted.eta_adjusted_by_crowd = true;
    adjusted.crowd_eta_confidence = "high";
  }
  return adjusted;
};

export interface TimelineAssemblerDeps {
  trains: TrainLookup;
  positions: PositionEstimator;
  delays: DelayModel;
  random: RandomSource;
}

/**
 * Builds the per-station timeline of a train. The position snapshot is taken once per
 * call and drives both the station tags and the summary fields.
 */
export class TimelineAssembler {
  private readonly trains: TrainLookup;
  private readonly positions: PositionEstimator;
  private readonly delays: DelayModel;
  private readonly random: RandomSource;

  constructor(deps: TimelineAssemblerDeps) {
    this.trains = deps.trains;
    this.positions = deps.positions;
    this.delays = deps.delays;
    this.random = deps.random;
  }

  public generateStatus(trainNumber: string, now: Date = new Date()): Result<TrainStatusReport> {
    const train = this.trains.getTrain(trainNumber);
    if (!train) {
      return fail("not_found", `Train ${trainNumber} not found`);
    }

    const route = train.stops;
    const position = this.positions.snapshot(route, now);
    const currentPosition = position.available ? position.current_station_idx : currentStopIndex(route, now);

    const stationStatuses = route.map((stop, index) =>
      this.stationStatus(train.key, route, stop, index, statusTag(index, currentPosition), now),
    );
    const delayMinutes = stationStatuses.reduce((worst, status) => Math.max(worst, status.delay_minutes), 0);

    const report: TrainStatusReport = {
      train_number: train.key,
      train_name: train.name,
      station_statuses: stationStatuses,
      current_speed: this.positions.currentSpeed(position, now),
      distance_covered: position.available ? position.distance_covered : 0,
      distance_to_next: position.available ? position.distance_to_next : 0,
      delay_minutes: delayMinutes,
      estimated_arrival: position.available ? position.eta_to_next : null,
      progress_percentage: position.available ? position.progress_percentage : 0,
      current_station: position.available ? position.current_station : null,
      next_station: position.available ? position.next_station : null,
      position_available: position.available,
      weather_condition: this.delays.weather(undefined, now),
      last_updated: now.toISOString(),
    };

    if (!position.available) {
      logger.warn("Position unavailable for train", { train: train.key, reason: position.reason });
    }
    return ok(report);
  }

  private stationStatus(
    trainNumber: string,
    route: Stop[],
    stop: Stop,
    index: number,
    tag: StationStatusTag,
    now: Date,
  ): StationStatus {
    const scheduledArrival = parseClockOn(now, stop.arrival_time);
    const scheduledDeparture = parseClockOn(now, stop.departure_time);
    const weather = this.delays.weather(stop.city, now);

    const arrivalDelay = this.delayAt(trainNumber, stop.city, scheduledArrival, now, weather);
    const departureDelay = this.delayAt(trainNumber, stop.city, scheduledDeparture, now, weather);

    return {
      station_name: stop.city,
      status: tag,
      scheduled_arrival: scheduledArrival?.toISOString() ?? null,
      scheduled_departure: scheduledDeparture?.toISOString() ?? null,
      actual_arrival: scheduledArrival ? addMinutes(scheduledArrival, arrivalDelay).toISOString() : null,
      actual_departure: scheduledDeparture ? addMinutes(scheduledDeparture, departureDelay).toISOString() : null,
      delay_minutes: Math.max(arrivalDelay, departureDelay),
      halt_duration: stop.halt ?? "---",
      duration: stop.duration ?? "---",
      distance_from_start: this.positions.distanceFromStart(route, index),
      weather_condition: weather,
      crowd_level: estimateStationCrowd(stop.city, scheduledArrival ?? scheduledDeparture),
    };
  }

  private delayAt(
    trainNumber: string,
    stationName: string,
    scheduled: Date | null,
    now: Date,
    weather: WeatherCondition,
  ): number {
    if (!scheduled) return 0;
    return this.delays.synthesizeDelay(trainNumber, stationName, scheduled, now, weather).delay_minutes;
  }

  /** Looks up crowd metrics for the train and applies them to `report`. */
  public adjustWithCrowd(
    trainNumber: string,
    report: TrainStatusReport,
    crowd: CrowdMetricsSource,
    now: Date = new Date(),
  ): TrainStatusReport {
    return adjustWithCrowdData(report, crowd.getMetrics(trainNumber, now), this.random);
  }
}
