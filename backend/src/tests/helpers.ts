import type { LatLng } from "@railwatch/core";
import { ScheduleStore } from "../data/scheduleStore";
import type { ScheduleSnapshot, Stop, Train } from "../models/domain";
import type { RandomSource } from "../utils/random";

export const constantRandom = (value: number): RandomSource => ({ next: () => value });

/** Replays `values` in order, then keeps returning `fallback`. */
export const scriptedRandom = (values: number[], fallback = 0.99): RandomSource => {
  const queue = [...values];
  return { next: () => queue.shift() ?? fallback };
};

export const makeStop = (
  city: string,
  arrival: string | null,
  departure: string | null,
  extra: Partial<Pick<Stop, "halt" | "duration">> = {},
): Stop => ({
  city,
  arrival_time: arrival,
  departure_time: departure,
  halt: extra.halt ?? null,
  duration: extra.duration ?? null,
});

export const makeTrain = (key: string, stops: Stop[], overrides: Partial<Omit<Train, "key" | "stops">> = {}): Train => ({
  key,
  name: overrides.name ?? `Train ${key}`,
  model: overrides.model ?? key,
  days: overrides.days ?? ["Mon", "Wed"],
  totalDuration: overrides.totalDuration ?? "2h 0m",
  stops,
});

/** Three stations one degree of longitude apart along the equator. */
export const EQUATOR_STATIONS: Record<string, LatLng> = {
  "Station A": { lat: 0, lng: 0 },
  "Station B": { lat: 0, lng: 1 },
  "Station C": { lat: 0, lng: 2 },
};

export const ONE_DEGREE_KM = 111.19;

export const sampleRoute = (): Stop[] => [
  makeStop("Station A", null, "9:00 AM"),
  makeStop("Station B", "10:00 AM", "10:05 AM", { halt: "5 min", duration: "1h" }),
  makeStop("Station C", "11:00 AM BST", null, { duration: "55m" }),
];

export const buildSnapshot = (trains: Train[], stations: Record<string, LatLng> = EQUATOR_STATIONS): ScheduleSnapshot => ({
  stations: new Map(Object.entries(stations)),
  trains: new Map(trains.map((train) => [train.key, train])),
  segmentsCount: 0,
  routeMappings: new Map(),
});

export const storeWith = (trains: Train[], stations: Record<string, LatLng> = EQUATOR_STATIONS): ScheduleStore => {
  const store = new ScheduleStore();
  store.replaceSnapshot(buildSnapshot(trains, stations));
  return store;
};

/** Local wall-clock time; month is 1-based. */
export const localTime = (year: number, month: number, day: number, hour: number, minute: number): Date =>
  new Date(year, month - 1, day, hour, minute, 0, 0);

/** Wednesday 21 October 2026, 10:30 local time. */
export const WEDNESDAY_1030 = localTime(2026, 10, 21, 10, 30);
