import type { PositionResult } from "@railwatch/core";
import type { Coordinate, CoordinateLookup, Stop } from "../models/domain";
import { haversineDistanceKm, roundTo, routeDistanceKm } from "../utils/geo";
import { createLogger } from "../utils/logger";
import { uniform, type RandomSource } from "../utils/random";
import { atClockOn, formatEtaLabel, minutesOfDay, parseClockMinutes } from "../utils/time";

const logger = createLogger("position");

const BASE_SPEED_KMH = 60;
const PEAK_SPEED_MULTIPLIER = 0.8;
const NIGHT_SPEED_MULTIPLIER = 1.2;

export interface CurrentStopScan {
  index: number;
  /** Number of stop clocks that parsed before the scan stopped. */
  parsedDepartures: number;
}

const isBlankClock = (value: string | null): boolean => !value || value.trim() === "---";

/** Departure clock of a stop; a stop without one (the terminus) leaves at its arrival. */
const leavingClock = (stop: Stop): string | null =>
  isBlankClock(stop.departure_time) ? stop.arrival_time : stop.departure_time;

/**
 * Time-of-day scan: the train sits at the stop before the first one whose departure
 * is still ahead of `now`. The calendar date is ignored, so overnight services appear
 * to jump back to the start at midnight.
 */
export const scanCurrentStop = (route: Stop[], now: Date): CurrentStopScan => {
  const nowMinutes = minutesOfDay(now);
  let parsedDepartures = 0;
  for (let i = 0; i < route.length; i += 1) {
    const stop = route[i];
    if (!stop) continue;
    const clock = leavingClock(stop);
    if (!clock || isBlankClock(clock)) continue;
    const departure = parseClockMinutes(clock);
    if (departure === null) {
      logger.warn("Unparseable departure time, skipping stop", { station: stop.city, value: clock });
      continue;
    }
    parsedDepartures += 1;
    if (departure > nowMinutes) {
      return { index: Math.max(0, i - 1), parsedDepartures };
    }
  }
  return { index: Math.max(0, route.length - 1), parsedDepartures };
};

export const currentStopIndex = (route: Stop[], now: Date): number => scanCurrentStop(route, now).index;

export const speedMultiplier = (hour: number): number => {
  if ((hour >= 6 && hour <= 9) || (hour >= 17 && hour <= 20)) return PEAK_SPEED_MULTIPLIER;
  if (hour >= 22 || hour <= 5) return NIGHT_SPEED_MULTIPLIER;
  return 1;
};

export class PositionEstimator {
  constructor(
    private readonly coordinates: CoordinateLookup,
    private readonly random: RandomSource,
  ) {}

  /** Distance between two named stations; unknown stations count as 0 km. */
  public legDistance(from: string, to: string): number {
    const origin = this.coordinates.getCoordinates(from);
    const destination = this.coordinates.getCoordinates(to);
    if (!origin || !destination) {
      logger.warn("Station coordinates not found", { from, to });
      return 0;
    }
    return haversineDistanceKm(origin, destination);
  }

  /**
   * Distance along the route up to stop `index`. A station without coordinates breaks
   * the route into runs, so both legs touching it count as 0 km.
   */
  public distanceFromStart(route: Stop[], index: number): number {
    let total = 0;
    let run: Coordinate[] = [];
    route.slice(0, index + 1).forEach((stop) => {
      const coordinate = this.coordinates.getCoordinates(stop.city);
      if (coordinate) {
        run.push(coordinate);
        return;
      }
      logger.warn("Station coordinates not found", { station: stop.city });
      total += routeDistanceKm(run);
      run = [];
    });
    return roundTo(total + routeDistanceKm(run), 2);
  }

  public totalDistance(route: Stop[]): number {
    return this.distanceFromStart(route, route.length - 1);
  }

  public snapshot(route: Stop[], now: Date): PositionResult {
    const currentTime = now.toISOString();
    const totalStations = route.length;
    if (totalStations === 0) {
      return { available: false, reason: "Route has no stops", total_stations: 0, current_time: currentTime };
    }

    const scan = scanCurrentStop(route, now);
    const current = route[scan.index];
    if (scan.parsedDepartures === 0 || !current) {
      return {
        available: false,
        reason: "No departure time in the route could be parsed",
        total_stations: totalStations,
        current_time: currentTime,
      };
    }

    const next = route[scan.index + 1];
    const progress = totalStations > 1 ? (scan.index / (totalStations - 1)) * 100 : 100;
    return {
      available: true,
      current_station_idx: scan.index,
      current_station: current.city,
      next_station: next?.city ?? null,
      progress_percentage: roundTo(progress, 2),
      distance_covered: this.distanceFromStart(route, scan.index),
      distance_to_next: next ? this.legDistance(current.city, next.city) : 0,
      eta_to_next: next ? this.etaTo(next, now) : null,
      total_stations: totalStations,
      current_time: currentTime,
    };
  }

  private etaTo(stop: Stop, now: Date): string | null {
    const arrival = parseClockMinutes(stop.arrival_time);
    if (arrival === null) return null;
    return formatEtaLabel(atClockOn(now, arrival).getTime() - now.getTime());
  }

  /** Speed reported alongside a position: 0 when the position is unknown. */
  public currentSpeed(position: PositionResult, now: Date): number {
    return position.available ? this.estimateSpeed(now) : 0;
  }

  /** Illustrative speed in km/h, not a measurement. */
  public estimateSpeed(now: Date): number {
    const jitter = uniform(this.random, 0.9, 1.1);
    return roundTo(BASE_SPEED_KMH * speedMultiplier(now.getHours()) * jitter, 1);
  }
}
