import type { AppContext } from "../context";
import { createLogger, describeError } from "../utils/logger";

const logger = createLogger("refresh");

interface RefreshJob {
  name: string;
  intervalMs: number;
  run: () => Promise<void>;
  initialDelayMs?: number;
  timer?: NodeJS.Timeout;
}

const createJobs = (context: AppContext): RefreshJob[] => [
  {
    name: "schedule-reload",
    intervalMs: context.config.scheduleCacheMs,
    initialDelayMs: context.config.scheduleCacheMs,
    run: async () => {
      const status = context.schedule.load(true, context.clock().getTime());
      logger.debug("Schedule snapshot reloaded", { schedules: status.schedules_count, stations: status.stations_count });
    },
  },
  {
    name: "crowd-cleanup",
    intervalMs: context.config.crowdCleanupIntervalMs,
    initialDelayMs: context.config.crowdCleanupIntervalMs,
    run: async () => {
      await context.crowd.cleanupOldValidations(context.config.crowdRetentionHours, context.clock());
    },
  },
];

export interface RefreshHandle {
  jobs: RefreshJob[];
  stop: () => void;
}

const startJob = (job: RefreshJob, isStopped: () => boolean) => {
  const scheduleNext = (delayMs: number) => {
    if (isStopped()) return;
    job.timer = setTimeout(async () => {
      const start = Date.now();
      try {
        await job.run();
        logger.info("Refresh job completed", { job: job.name, durationMs: Date.now() - start });
      } catch (error) {
        logger.error("Refresh job failed", { job: job.name, message: describeError(error) });
      } finally {
        scheduleNext(job.intervalMs);
      }
    }, Math.max(0, delayMs));
  };

  scheduleNext(job.initialDelayMs ?? 0);
};

export const startRefreshJobs = (context: AppContext): RefreshHandle => {
  const jobs = createJobs(context);
  let stopped = false;
  jobs.forEach((job) => startJob(job, () => stopped));
  return {
    jobs,
    stop: () => {
      stopped = true;
      jobs.forEach((job) => {
        if (job.timer) clearTimeout(job.timer);
      });
    },
  };
};
