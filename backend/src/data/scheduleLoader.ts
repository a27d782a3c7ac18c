import fs from "node:fs";
import path from "node:path";
import type { Coordinate, ScheduleSnapshot, Stop, Train } from "../models/domain";
import { createLogger, describeError } from "../utils/logger";

const logger = createLogger("schedule-loader");

const STATIONS_FILE = "stations.json";
const SEGMENTS_FILE = "segments.json";
const SCHEDULES_DIR = "schedules";
const ROUTE_MAPPING_PATTERN = /train_route_mapping.*\.json$/;

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (value: unknown): string | null => {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
};

const stringList = (value: unknown): string[] =>
  Array.isArray(value) ? value.filter((entry): entry is string => typeof entry === "string") : [];

const readJsonFile = (filePath: string): unknown | undefined => {
  if (!fs.existsSync(filePath)) {
    logger.warn("Data file not found", { file: filePath });
    return undefined;
  }
  try {
    return JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    logger.warn("Failed to read data file", { file: filePath, message: describeError(error) });
    return undefined;
  }
};

export const normalizeStations = (raw: unknown): Map<string, Coordinate> => {
  const stations = new Map<string, Coordinate>();
  if (!isObject(raw)) return stations;
  Object.entries(raw).forEach(([name, value]) => {
    if (!Array.isArray(value) || value.length < 2) {
      logger.warn("Skipping station with malformed coordinates", { station: name });
      return;
    }
    const [lng, lat] = value;
    if (typeof lng !== "number" || typeof lat !== "number" || !Number.isFinite(lng) || !Number.isFinite(lat)) {
      logger.warn("Skipping station with malformed coordinates", { station: name });
      return;
    }
    stations.set(name, { lat, lng });
  });
  return stations;
};

const normalizeStop = (raw: unknown): Stop | null => {
  if (!isObject(raw)) return null;
  const city = optionalString(raw.city);
  if (!city) return null;
  return {
    city,
    arrival_time: optionalString(raw.arrival_time),
    departure_time: optionalString(raw.departure_time),
    halt: optionalString(raw.halt),
    duration: optionalString(raw.duration),
  };
};

export const normalizeSchedule = (key: string, raw: unknown): Train | null => {
  const data = isObject(raw) && isObject(raw.data) ? raw.data : null;
  if (!data) {
    logger.warn("Skipping schedule without a data block", { train: key });
    return null;
  }
  const rawStops = Array.isArray(data.routes) ? data.routes : [];
  const stops: Stop[] = [];
  rawStops.forEach((entry, index) => {
    const stop = normalizeStop(entry);
    if (stop) {
      stops.push(stop);
      return;
    }
    logger.warn("Skipping malformed stop", { train: key, index });
  });
  return {
    key,
    name: optionalString(data.train_name) ?? "Unknown",
    model: optionalString(data.train_model) ?? "",
    days: stringList(data.days),
    totalDuration: optionalString(data.total_duration) ?? "",
    stops,
  };
};

const loadSchedules = (dataDir: string): Map<string, Train> => {
  const schedulesDir = path.join(dataDir, SCHEDULES_DIR);
  const trains = new Map<string, Train>();
  if (!fs.existsSync(schedulesDir)) {
    logger.warn("Schedules directory not found", { dir: schedulesDir });
    return trains;
  }
  fs.readdirSync(schedulesDir)
    .filter((file) => file.endsWith(".json"))
    .sort()
    .forEach((file) => {
      const key = path.basename(file, ".json");
      const raw = readJsonFile(path.join(schedulesDir, file));
      if (raw === undefined) return;
      const train = normalizeSchedule(key, raw);
      if (train) trains.set(key, train);
    });
  return trains;
};

const countSegments = (raw: unknown): number => {
  if (Array.isArray(raw)) return raw.length;
  if (isObject(raw)) return Object.keys(raw).length;
  return 0;
};

const loadRouteMappings = (dataDir: string): Map<string, unknown> => {
  const mappings = new Map<string, unknown>();
  if (!fs.existsSync(dataDir)) return mappings;
  fs.readdirSync(dataDir)
    .filter((file) => ROUTE_MAPPING_PATTERN.test(file))
    .sort()
    .forEach((file) => {
      const raw = readJsonFile(path.join(dataDir, file));
      if (!isObject(raw)) return;
      Object.entries(raw).forEach(([trainKey, mapping]) => mappings.set(trainKey, mapping));
    });
  return mappings;
};

export const loadScheduleSnapshot = (dataDir: string): ScheduleSnapshot => {
  const snapshot: ScheduleSnapshot = {
    stations: normalizeStations(readJsonFile(path.join(dataDir, STATIONS_FILE))),
    trains: loadSchedules(dataDir),
    segmentsCount: countSegments(readJsonFile(path.join(dataDir, SEGMENTS_FILE))),
    routeMappings: loadRouteMappings(dataDir),
  };
  logger.info("Schedule data loaded", {
    stations: snapshot.stations.size,
    schedules: snapshot.trains.size,
    segments: snapshot.segmentsCount,
    routeMappings: snapshot.routeMappings.size,
  });
  return snapshot;
};
