import type {
  DelayBucket,
  DelayProbability,
  DelayStats,
  DelaySynthesis,
  OverallDelayStats,
  SimulatedStop,
  WeatherCondition,
} from "@railwatch/core";
import type { Stop } from "../models/domain";
import { BoundedQueue } from "../utils/boundedQueue";
import { roundTo } from "../utils/geo";
import { createLogger } from "../utils/logger";
import { randomInt, uniform, weightedChoice, type RandomSource, type WeightedOptions } from "../utils/random";
import { addMinutes, parseClockOn, weekdayOf, type Weekday } from "../utils/time";

const logger = createLogger("delay-model");

export const WEATHER_FACTORS: Record<WeatherCondition, number> = {
  clear: 1.0,
  cloudy: 1.2,
  rainy: 1.5,
  stormy: 2.0,
  foggy: 1.8,
};

export type TimeOfDayBucket =
  | "early_morning"
  | "morning_rush"
  | "mid_morning"
  | "afternoon"
  | "evening_rush"
  | "late_evening"
  | "night";

export const TIME_OF_DAY_FACTORS: Record<TimeOfDayBucket, number> = {
  early_morning: 0.8,
  morning_rush: 1.4,
  mid_morning: 1.0,
  afternoon: 1.1,
  evening_rush: 1.6,
  late_evening: 1.2,
  night: 0.9,
};

export const DAY_OF_WEEK_FACTORS: Record<Weekday, number> = {
  Monday: 1.3,
  Tuesday: 1.1,
  Wednesday: 1.0,
  Thursday: 1.1,
  Friday: 1.4,
  Saturday: 0.9,
  Sunday: 0.8,
};

// First substring match wins.
const STATION_DELAY_FACTORS: ReadonlyArray<readonly [string, number]> = [
  ["Dhaka", 1.5],
  ["Chattogram", 1.4],
  ["Rajshahi", 1.2],
  ["Khulna", 1.2],
  ["Sylhet", 1.1],
  ["Barisal", 1.1],
  ["Rangpur", 1.1],
  ["Mymensingh", 1.0],
];

const DAYTIME_WEATHER: WeightedOptions<WeatherCondition> = [
  ["clear", 0.6],
  ["cloudy", 0.3],
  ["rainy", 0.1],
];

const NIGHTTIME_WEATHER: WeightedOptions<WeatherCondition> = [
  ["clear", 0.7],
  ["cloudy", 0.2],
  ["foggy", 0.1],
];

const FALLBACK_PROBABILITY: DelayProbability = { probability: 0.3, confidence: "low" };

export const timeOfDayBucket = (date: Date): TimeOfDayBucket => {
  const hour = date.getHours();
  if (hour >= 5 && hour < 8) return "early_morning";
  if (hour >= 8 && hour < 10) return "morning_rush";
  if (hour >= 10 && hour < 12) return "mid_morning";
  if (hour >= 12 && hour < 17) return "afternoon";
  if (hour >= 17 && hour < 20) return "evening_rush";
  if (hour >= 20 && hour < 22) return "late_evening";
  return "night";
};

export const timeOfDayFactor = (date: Date): number => TIME_OF_DAY_FACTORS[timeOfDayBucket(date)];

export const dayOfWeekFactor = (date: Date): number => DAY_OF_WEEK_FACTORS[weekdayOf(date)];

export const stationFactor = (stationName: string): number => {
  const haystack = stationName.toLowerCase();
  const match = STATION_DELAY_FACTORS.find(([pattern]) => haystack.includes(pattern.toLowerCase()));
  return match ? match[1] : 1.0;
};

const bucketFor = (delay: number): DelayBucket => {
  if (delay <= 15) return "0-15 min";
  if (delay <= 30) return "16-30 min";
  if (delay <= 60) return "31-60 min";
  return "60+ min";
};

export const summarizeDelays = (delays: number[]): DelayStats => {
  if (delays.length === 0) {
    return { available: false, reason: "No delay data available" };
  }
  const distribution: Record<DelayBucket, number> = {
    "0-15 min": 0,
    "16-30 min": 0,
    "31-60 min": 0,
    "60+ min": 0,
  };
  delays.forEach((delay) => {
    distribution[bucketFor(delay)] += 1;
  });
  const total = delays.reduce((sum, delay) => sum + delay, 0);
  return {
    available: true,
    total_delays: delays.length,
    average_delay: roundTo(total / delays.length, 1),
    max_delay: Math.max(...delays),
    min_delay: Math.min(...delays),
    delay_distribution: distribution,
  };
};

export interface DelayObservation {
  delayMinutes: number;
  recordedAt: string;
}

export interface DelayModelOptions {
  random: RandomSource;
  baseDelayProbability?: number;
  baseDelayRange?: readonly [number, number];
  maxDelayMinutes?: number;
  historyCapacity?: number;
}

/**
 * Synthetic delay generator. Every synthesized delay is appended to a bounded
 * per-(train, station) history that feeds the statistics and probability estimates.
 *
 * History mutation is synchronous: the append-and-evict step completes within a
 * single turn of the event loop, so concurrent requests never interleave inside it.
 */
export class DelayModel {
  private readonly history = new Map<string, Map<string, BoundedQueue<DelayObservation>>>();
  private readonly random: RandomSource;
  private readonly baseDelayProbability: number;
  private readonly baseDelayRange: readonly [number, number];
  private readonly maxDelayMinutes: number;
  private readonly historyCapacity: number;

  constructor(options: DelayModelOptions) {
    this.random = options.random;
    this.baseDelayProbability = options.baseDelayProbability ?? 0.3;
    this.baseDelayRange = options.baseDelayRange ?? [5, 25];
    this.maxDelayMinutes = options.maxDelayMinutes ?? 120;
    this.historyCapacity = options.historyCapacity ?? 100;
  }

  private baseDelay(): number {
    if (this.random.next() < this.baseDelayProbability) {
      const [min, max] = this.baseDelayRange;
      return randomInt(this.random, min, max);
    }
    return 0;
  }

  public synthesizeDelay(
    trainNumber: string,
    stationName: string,
    scheduledTime: Date,
    now: Date,
    weather: WeatherCondition,
  ): DelaySynthesis {
    const base = this.baseDelay();
    const factors = {
      weather: WEATHER_FACTORS[weather],
      time_of_day: timeOfDayFactor(now),
      day_of_week: dayOfWeekFactor(now),
      station: stationFactor(stationName),
    };
    const scaled = base * factors.weather * factors.time_of_day * factors.day_of_week * factors.station;
    const jittered = Math.trunc(scaled * uniform(this.random, 0.8, 1.2));
    const delayMinutes = Math.max(0, Math.min(jittered, this.maxDelayMinutes));

    this.record(trainNumber, stationName, delayMinutes, now);

    return {
      delay_minutes: delayMinutes,
      scheduled_time: scheduledTime.toISOString(),
      actual_time: addMinutes(scheduledTime, delayMinutes).toISOString(),
      weather_condition: weather,
      factors_applied: factors,
    };
  }

  private record(trainNumber: string, stationName: string, delayMinutes: number, at: Date) {
    let stations = this.history.get(trainNumber);
    if (!stations) {
      stations = new Map();
      this.history.set(trainNumber, stations);
    }
    let bucket = stations.get(stationName);
    if (!bucket) {
      bucket = new BoundedQueue<DelayObservation>(this.historyCapacity);
      stations.set(stationName, bucket);
    }
    bucket.push({ delayMinutes, recordedAt: at.toISOString() });
  }

  public observations(trainNumber: string, stationName: string): DelayObservation[] {
    return this.history.get(trainNumber)?.get(stationName)?.toArray() ?? [];
  }

  public historicalStats(trainNumber: string, stationName?: string): DelayStats {
    const stations = this.history.get(trainNumber);
    if (!stations) {
      return { available: false, reason: "No historical data available" };
    }
    if (stationName !== undefined) {
      const bucket = stations.get(stationName);
      if (!bucket) {
        return { available: false, reason: "No data for this station" };
      }
      return summarizeDelays(bucket.toArray().map((entry) => entry.delayMinutes));
    }
    const delays: number[] = [];
    stations.forEach((bucket) => {
      bucket.toArray().forEach((entry) => delays.push(entry.delayMinutes));
    });
    return summarizeDelays(delays);
  }

  public predictProbability(trainNumber: string, stationName: string, scheduledTime: Date): DelayProbability {
    const observations = this.observations(trainNumber, stationName);
    if (observations.length === 0) {
      return { ...FALLBACK_PROBABILITY };
    }
    const delayedCount = observations.filter((entry) => entry.delayMinutes > 0).length;
    const timeFactor = timeOfDayFactor(scheduledTime);
    const dayFactor = dayOfWeekFactor(scheduledTime);
    const adjusted = (delayedCount / observations.length) * timeFactor * dayFactor;
    const total = observations.length;
    return {
      probability: roundTo(Math.max(0.1, Math.min(adjusted, 0.9)), 3),
      confidence: total >= 50 ? "high" : total >= 20 ? "medium" : "low",
      historical_data_points: total,
      factors_applied: {
        time_of_day: timeFactor,
        day_of_week: dayFactor,
      },
    };
  }

  /**
   * Simulated weather drawn from an hour-dependent distribution. `location` is accepted
   * for API stability but does not influence the draw.
   */
  public weather(_location?: string, now: Date = new Date()): WeatherCondition {
    const hour = now.getHours();
    const options = hour >= 6 && hour <= 18 ? DAYTIME_WEATHER : NIGHTTIME_WEATHER;
    return weightedChoice(this.random, options);
  }

  public overallStats(): OverallDelayStats {
    let trainsWithDelays = 0;
    let sum = 0;
    let count = 0;
    for (const stations of this.history.values()) {
      const delays = Array.from(stations.values()).flatMap((bucket) =>
        bucket.toArray().map((entry) => entry.delayMinutes),
      );
      delays.forEach((delay) => {
        sum += delay;
      });
      count += delays.length;
      if (delays.some((delay) => delay > 0)) trainsWithDelays += 1;
    }
    return {
      total_trains: this.history.size,
      trains_with_delays: trainsWithDelays,
      average_delay: count === 0 ? 0 : roundTo(sum / count, 1),
    };
  }

  /**
   * Walks a route synthesizing departure delays; each stop's simulation clock is the
   * previous stop's delayed departure. Stops without a parseable departure pass through.
   */
  public simulateRouteDelays(trainNumber: string, stops: Stop[], start: Date): SimulatedStop[] {
    let clock = start;
    return stops.map((stop) => {
      const scheduledDeparture = parseClockOn(start, stop.departure_time);
      if (!scheduledDeparture) {
        if (stop.departure_time) {
          logger.warn("Unparseable departure time in route simulation", {
            train: trainNumber,
            station: stop.city,
            value: stop.departure_time,
          });
        }
        return { ...stop };
      }
      const weather = this.weather(stop.city, clock);
      const delay = this.synthesizeDelay(trainNumber, stop.city, scheduledDeparture, clock, weather);
      clock = new Date(delay.actual_time);
      return { ...stop, simulated_delay: delay, weather_condition: weather };
    });
  }
}
