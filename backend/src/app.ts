import cors from "cors";
import express, { type NextFunction, type Request, type Response } from "express";
import type {
  DelayAnalyticsResponse,
  LatLng,
  RailwatchErrorResponse,
  RefreshDataResponse,
  TrainSearchResponse,
} from "@railwatch/core";
import type { AppContext } from "./context";
import { toScheduleRecord } from "./models/domain";
import { buildHealth, buildSystemStatus } from "./services/systemStatus";
import { buildTrainSummary } from "./services/trainSummary";
import { createLogger, describeError } from "./utils/logger";
import { parseClockOn } from "./utils/time";

const logger = createLogger("http");

const queryString = (value: unknown): string | undefined => {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseCoordinates = (value: unknown): LatLng | null | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) return null;
  const { lat, lng } = value;
  if (typeof lat !== "number" || typeof lng !== "number" || !Number.isFinite(lat) || !Number.isFinite(lng)) {
    return null;
  }
  return { lat, lng };
};

const sendError = (res: Response, status: number, message: string, now: Date) => {
  const body: RailwatchErrorResponse = { success: false, error: message, timestamp: now.toISOString() };
  return res.status(status).json(body);
};

export const createApp = (context: AppContext) => {
  const app = express();
  const { schedule, positions, delays, timeline, crowd, clock } = context;

  app.use(cors());
  app.use(express.json());

  app.get("/api/health", (_req, res) => {
    res.json(buildHealth(context, clock()));
  });

  app.get("/api/stations", (_req, res) => {
    const stations = schedule.getStations();
    res.json({
      success: true,
      stations,
      total_count: Object.keys(stations).length,
      timestamp: clock().toISOString(),
    });
  });

  app.get("/api/stations/:stationName/trains", (req, res) => {
    const trains = schedule.findTrainsAtStation(req.params.stationName);
    res.json({
      success: true,
      station_name: req.params.stationName,
      trains,
      total_count: trains.length,
      timestamp: clock().toISOString(),
    });
  });

  app.get("/api/trains/search", (req, res) => {
    const now = clock();
    const number = queryString(req.query.number);
    const from = queryString(req.query.from);
    const to = queryString(req.query.to);

    if (number) {
      const results = schedule.findByNumberOrName(number).map(toScheduleRecord);
      const body: TrainSearchResponse = {
        success: true,
        search_type: "train_number",
        query: number,
        results,
        total_count: results.length,
        timestamp: now.toISOString(),
      };
      if (results.length === 0) body.message = "No trains found with the specified number";
      return res.json(body);
    }

    if (from && to) {
      const results = schedule.findByStations(from, to).map(toScheduleRecord);
      const body: TrainSearchResponse = {
        success: true,
        search_type: "station_to_station",
        from_station: from,
        to_station: to,
        results,
        total_count: results.length,
        timestamp: now.toISOString(),
      };
      if (results.length === 0) body.message = `No trains found between ${from} and ${to}`;
      return res.json(body);
    }

    return sendError(
      res,
      400,
      "Invalid search parameters. Use 'from' and 'to' for station search or 'number' for train search.",
      now,
    );
  });

  app.get("/api/trains/:trainNumber/status", (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const result = timeline.generateStatus(trainNumber, now);
    if (!result.ok) {
      return sendError(res, 404, result.error.message, now);
    }
    const status = timeline.adjustWithCrowd(trainNumber, result.value, crowd, now);
    return res.json({ success: true, train_number: trainNumber, status, timestamp: now.toISOString() });
  });

  app.get("/api/trains/:trainNumber/position", (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const route = schedule.getRoute(trainNumber);
    if (!route) {
      return sendError(res, 404, "Train schedule not found", now);
    }
    const position = positions.snapshot(route, now);
    return res.json({
      success: true,
      train_number: trainNumber,
      position,
      current_speed: positions.currentSpeed(position, now),
      timestamp: now.toISOString(),
    });
  });

  app.get("/api/trains/:trainNumber/summary", (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const train = schedule.getTrain(trainNumber);
    if (!train) {
      return sendError(res, 404, "Train schedule not found", now);
    }
    return res.json({
      success: true,
      train_number: trainNumber,
      summary: buildTrainSummary(train, positions, crowd.getCrowdData(trainNumber, now)),
      timestamp: now.toISOString(),
    });
  });

  app.post("/api/trains/:trainNumber/confirm", async (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const body: unknown = req.body;
    if (!isObject(body)) {
      return sendError(res, 400, "Request body must be a JSON object", now);
    }
    const userId = queryString(body.user_id);
    if (!userId) {
      return sendError(res, 400, "user_id is required", now);
    }
    const coordinates = parseCoordinates(body.coordinates);
    if (coordinates === null) {
      return sendError(res, 400, "coordinates must be an object with numeric lat and lng", now);
    }
    try {
      const outcome = await crowd.confirm(
        trainNumber,
        { userId, stationName: queryString(body.station_name), coordinates },
        now,
      );
      if (!outcome.success) {
        return sendError(res, 400, outcome.error, now);
      }
      return res.json(outcome);
    } catch (error) {
      logger.error("Failed to record crowd confirmation", { train: trainNumber, message: describeError(error) });
      return sendError(res, 500, "Unable to record confirmation", now);
    }
  });

  app.delete("/api/trains/:trainNumber/confirm", async (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const userId = queryString(req.query.user_id);
    if (!userId) {
      return sendError(res, 400, "user_id is required", now);
    }
    try {
      const outcome = await crowd.removeConfirmation(trainNumber, userId, now);
      if (!outcome.success) {
        return sendError(res, 404, outcome.error, now);
      }
      return res.json({ ...outcome, timestamp: now.toISOString() });
    } catch (error) {
      logger.error("Failed to remove crowd confirmation", { train: trainNumber, message: describeError(error) });
      return sendError(res, 500, "Unable to remove confirmation", now);
    }
  });

  app.get("/api/trains/:trainNumber/crowd-data", (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    res.json({
      success: true,
      train_number: trainNumber,
      crowd_data: crowd.getCrowdData(trainNumber, now),
      timestamp: now.toISOString(),
    });
  });

  app.get("/api/trains/:trainNumber/delay-prediction", (req, res) => {
    const now = clock();
    const { trainNumber } = req.params;
    const station = queryString(req.query.station);
    if (!station) {
      return sendError(res, 400, "station is required", now);
    }
    if (!schedule.getTrain(trainNumber)) {
      return sendError(res, 404, "Train schedule not found", now);
    }
    const scheduledTime = parseClockOn(now, queryString(req.query.time)) ?? now;
    return res.json({
      success: true,
      train_number: trainNumber,
      station_name: station,
      prediction: delays.predictProbability(trainNumber, station, scheduledTime),
      timestamp: now.toISOString(),
    });
  });

  app.get("/api/trains/:trainNumber/simulated-route", (req, res) => {
    const now = clock();
    const train = schedule.getTrain(req.params.trainNumber);
    if (!train) {
      return sendError(res, 404, "Train schedule not found", now);
    }
    return res.json({
      success: true,
      train_number: train.key,
      stops: delays.simulateRouteDelays(train.key, train.stops, now),
      timestamp: now.toISOString(),
    });
  });

  app.get("/api/analytics/delays", (req, res) => {
    const now = clock();
    const train = queryString(req.query.train);
    const station = queryString(req.query.station);
    let body: DelayAnalyticsResponse;
    if (train && station) {
      body = {
        success: true,
        analytics_type: "train_station_delays",
        train_number: train,
        station_name: station,
        stats: delays.historicalStats(train, station),
      };
    } else if (train) {
      body = { success: true, analytics_type: "train_delays", train_number: train, stats: delays.historicalStats(train) };
    } else {
      body = { success: true, analytics_type: "overall_delays", stats: delays.overallStats() };
    }
    res.json({ ...body, timestamp: now.toISOString() });
  });

  if (context.config.enableAdmin) {
    app.post("/api/admin/refresh-data", async (_req, res) => {
      const now = clock();
      try {
        const dataStatus = schedule.load(true, now.getTime());
        const cleaned = await crowd.cleanupOldValidations(context.config.crowdRetentionHours, now);
        const body: RefreshDataResponse = {
          success: true,
          message: "Data refreshed successfully",
          data_status: dataStatus,
          cleaned_validations: cleaned,
          timestamp: now.toISOString(),
        };
        return res.json(body);
      } catch (error) {
        logger.error("Failed to refresh data", { message: describeError(error) });
        return sendError(res, 500, "Unable to refresh data", now);
      }
    });

    app.get("/api/admin/system-status", (_req, res) => {
      const now = clock();
      schedule.load(false, now.getTime());
      res.json(buildSystemStatus(context, now));
    });
  }

  app.use((_req, res) => {
    sendError(res, 404, "Endpoint not found", clock());
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    logger.error("Unhandled request error", { path: req.path, message: describeError(error) });
    sendError(res, 500, "Internal server error", clock());
  });

  return app;
};
