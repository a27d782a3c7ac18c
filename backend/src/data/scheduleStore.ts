import type { DataSourceStatus, StationCoordinates, StationTrainEntry } from "@railwatch/core";
import type { Coordinate, CoordinateLookup, ScheduleSnapshot, Stop, Train } from "../models/domain";
import { createLogger } from "../utils/logger";

const logger = createLogger("schedule-store");

export type ScheduleLoader = () => ScheduleSnapshot;

export interface ScheduleStoreOptions {
  loader?: ScheduleLoader;
  cacheDurationMs?: number;
}

const DEFAULT_CACHE_DURATION_MS = 5 * 60_000;

const emptySnapshot = (): ScheduleSnapshot => ({
  stations: new Map(),
  trains: new Map(),
  segmentsCount: 0,
  routeMappings: new Map(),
});

/**
 * In-memory view of the static reference data: train schedules, station coordinates,
 * segment and route-mapping counts. Lookups are synchronous; the snapshot is replaced
 * wholesale on reload.
 */
export class ScheduleStore implements CoordinateLookup {
  private snapshot: ScheduleSnapshot = emptySnapshot();
  private loadedAt: number | null = null;
  private readonly loader: ScheduleLoader | undefined;
  private readonly cacheDurationMs: number;

  constructor(options: ScheduleStoreOptions = {}) {
    this.loader = options.loader;
    this.cacheDurationMs = options.cacheDurationMs ?? DEFAULT_CACHE_DURATION_MS;
  }

  /** Reloads through the configured loader unless the cached snapshot is still fresh. */
  public load(force = false, now: number = Date.now()): DataSourceStatus {
    if (!this.loader) return this.getStatus(now);
    if (!force && !this.isStale(now)) {
      logger.debug("Using cached schedule data");
      return this.getStatus(now);
    }
    this.replaceSnapshot(this.loader(), now);
    return this.getStatus(now);
  }

  public replaceSnapshot(snapshot: ScheduleSnapshot, now: number = Date.now()) {
    this.snapshot = snapshot;
    this.loadedAt = now;
  }

  public isStale(now: number = Date.now()): boolean {
    if (this.loadedAt === null) return true;
    return now - this.loadedAt >= this.cacheDurationMs;
  }

  public getStatus(now: number = Date.now()): DataSourceStatus {
    return {
      stations_count: this.snapshot.stations.size,
      segments_count: this.snapshot.segmentsCount,
      schedules_count: this.snapshot.trains.size,
      route_mappings_count: this.snapshot.routeMappings.size,
      last_loaded: this.loadedAt === null ? null : new Date(this.loadedAt).toISOString(),
      cache_valid: !this.isStale(now),
    };
  }

  private data(): ScheduleSnapshot {
    if (this.loadedAt === null && this.loader) {
      this.load(true);
    }
    return this.snapshot;
  }

  public getTrain(trainNumber: string): Train | null {
    return this.data().trains.get(trainNumber) ?? null;
  }

  public getRoute(trainNumber: string): Stop[] | null {
    return this.getTrain(trainNumber)?.stops ?? null;
  }

  public getCoordinates(stationName: string): Coordinate | null {
    return this.data().stations.get(stationName) ?? null;
  }

  public getStations(): StationCoordinates {
    const stations: StationCoordinates = {};
    this.data().stations.forEach((coordinate, name) => {
      stations[name] = [coordinate.lng, coordinate.lat];
    });
    return stations;
  }

  public listTrainNumbers(): string[] {
    return Array.from(this.data().trains.keys());
  }

  public listTrains(): Train[] {
    return Array.from(this.data().trains.values());
  }

  /** Trains calling at `from` and later at `to`. */
  public findByStations(from: string, to: string): Train[] {
    const results = this.listTrains().filter((train) => {
      const names = train.stops.map((stop) => stop.city);
      const fromIndex = names.indexOf(from);
      const toIndex = names.indexOf(to);
      return fromIndex !== -1 && toIndex !== -1 && fromIndex < toIndex;
    });
    logger.info("Station search completed", { from, to, matches: results.length });
    return results;
  }

  public findByNumberOrName(query: string): Train[] {
    const needle = query.toLowerCase();
    const results = this.listTrains().filter(
      (train) => train.key.toLowerCase().includes(needle) || train.name.toLowerCase().includes(needle),
    );
    logger.info("Train search completed", { query, matches: results.length });
    return results;
  }

  public findTrainsAtStation(stationName: string): StationTrainEntry[] {
    const entries: StationTrainEntry[] = [];
    this.listTrains().forEach((train) => {
      const stop = train.stops.find((candidate) => candidate.city === stationName);
      if (!stop) return;
      entries.push({
        train_number: train.key,
        train_name: train.name,
        arrival_time: stop.arrival_time,
        departure_time: stop.departure_time,
        halt_duration: stop.halt ?? "---",
        operating_days: [...train.days],
      });
    });
    return entries;
  }
}

export const createScheduleStore = (options: ScheduleStoreOptions = {}) => new ScheduleStore(options);
