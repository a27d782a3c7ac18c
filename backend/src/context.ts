import type { AppConfig } from "./config";
import { createRedisManager, type RedisManager } from "./cache/redisClient";
import {
  createFileCrowdPersistence,
  createRedisCrowdPersistence,
  type CrowdPersistence,
} from "./crowd/persistence";
import { CrowdValidationStore } from "./crowd/crowdValidationStore";
import { loadScheduleSnapshot } from "./data/scheduleLoader";
import { createScheduleStore, type ScheduleStore } from "./data/scheduleStore";
import { DelayModel } from "./services/delayModel";
import { PositionEstimator } from "./services/positionEstimator";
import { TimelineAssembler } from "./services/timelineAssembler";
import { createSeededRandom, mathRandomSource, type RandomSource } from "./utils/random";

export type Clock = () => Date;

export interface AppContext {
  config: AppConfig;
  clock: Clock;
  random: RandomSource;
  redis: RedisManager;
  schedule: ScheduleStore;
  delays: DelayModel;
  positions: PositionEstimator;
  timeline: TimelineAssembler;
  crowd: CrowdValidationStore;
}

export interface AppContextOverrides {
  clock?: Clock;
  random?: RandomSource;
  redis?: RedisManager;
  schedule?: ScheduleStore;
  crowdPersistence?: CrowdPersistence;
}

export const createAppContext = (config: AppConfig, overrides: AppContextOverrides = {}): AppContext => {
  const random =
    overrides.random ?? (config.randomSeed !== undefined ? createSeededRandom(config.randomSeed) : mathRandomSource);
  const redis = overrides.redis ?? createRedisManager(config.redisUrl);
  const schedule =
    overrides.schedule ??
    createScheduleStore({
      loader: () => loadScheduleSnapshot(config.dataDir),
      cacheDurationMs: config.scheduleCacheMs,
    });
  const delays = new DelayModel({
    random,
    baseDelayProbability: config.baseDelayProbability,
    maxDelayMinutes: config.maxDelayMinutes,
    historyCapacity: config.historyCapacity,
  });
  const positions = new PositionEstimator(schedule, random);
  const timeline = new TimelineAssembler({ trains: schedule, positions, delays, random });
  const crowdPersistence =
    overrides.crowdPersistence ??
    (config.redisUrl ? createRedisCrowdPersistence(redis) : createFileCrowdPersistence(config.crowdValidationsFile));
  const crowd = new CrowdValidationStore({
    persistence: crowdPersistence,
    activeWindowMs: config.crowdActiveWindowMs,
  });

  return {
    config,
    clock: overrides.clock ?? (() => new Date()),
    random,
    redis,
    schedule,
    delays,
    positions,
    timeline,
    crowd,
  };
};
