import type { RequestInitWithSignal } from "./types";
import type { LatLng } from "../models/common";
import type { StationsResponse, StationTrainsResponse, TrainPositionResponse, TrainSearchResponse } from "../models/schedule";
import type { TrainStatusResponse, TrainSummaryResponse } from "../models/trainStatus";
import type {
  ConfirmRequest,
  ConfirmResponse,
  CrowdDataResponse,
  RemoveConfirmationResponse,
} from "../models/crowd";
import type { DelayAnalyticsResponse, DelayPredictionResponse, RouteSimulationResponse } from "../models/delay";
import type { HealthResponse } from "../models/system";

type QueryValue = string | number | undefined;

const trimTrailingSlash = (value: string) => value.replace(/\/+$/, "");
const ensureLeadingSlash = (value: string) => (value.startsWith("/") ? value : `/${value}`);

export const buildUrl = (baseUrl: string, path: string, query?: Record<string, QueryValue>) => {
  const url = new URL(`${trimTrailingSlash(baseUrl)}${ensureLeadingSlash(path)}`);
  if (query) {
    Object.entries(query).forEach(([key, value]) => {
      if (value === undefined) return;
      url.searchParams.set(key, String(value));
    });
  }
  return url.toString();
};

export class RailwatchApiError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "RailwatchApiError";
    this.status = status;
  }
}

const readErrorMessage = async (response: Response): Promise<string> => {
  const body: unknown = await response.json().catch(() => null);
  if (body && typeof body === "object" && "error" in body && typeof body.error === "string") {
    return body.error;
  }
  return response.statusText || "request failed";
};

const handleJson = async <T>(response: Response): Promise<T> => {
  if (!response.ok) {
    const message = await readErrorMessage(response);
    throw new RailwatchApiError(response.status, `Railwatch API request failed (${response.status}): ${message}`);
  }
  return (await response.json()) as T;
};

const trainPath = (trainNumber: string, suffix: string) =>
  `/api/trains/${encodeURIComponent(trainNumber)}/${suffix}`;

export const fetchHealth = async (baseUrl: string, init?: RequestInitWithSignal): Promise<HealthResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/health"), { ...init });
  return handleJson<HealthResponse>(response);
};

export const fetchStations = async (baseUrl: string, init?: RequestInitWithSignal): Promise<StationsResponse> => {
  const response = await fetch(buildUrl(baseUrl, "/api/stations"), { ...init });
  return handleJson<StationsResponse>(response);
};

export const fetchStationTrains = async (
  baseUrl: string,
  stationName: string,
  init?: RequestInitWithSignal,
): Promise<StationTrainsResponse> => {
  const url = buildUrl(baseUrl, `/api/stations/${encodeURIComponent(stationName)}/trains`);
  const response = await fetch(url, { ...init });
  return handleJson<StationTrainsResponse>(response);
};

export type SearchTrainsParams = { number: string } | { from: string; to: string };

export const searchTrains = async (
  baseUrl: string,
  params: SearchTrainsParams,
  init?: RequestInitWithSignal,
): Promise<TrainSearchResponse> => {
  const query = "number" in params ? { number: params.number } : { from: params.from, to: params.to };
  const response = await fetch(buildUrl(baseUrl, "/api/trains/search", query), { ...init });
  return handleJson<TrainSearchResponse>(response);
};

export const fetchTrainStatus = async (
  baseUrl: string,
  trainNumber: string,
  init?: RequestInitWithSignal,
): Promise<TrainStatusResponse> => {
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "status")), { ...init });
  return handleJson<TrainStatusResponse>(response);
};

export const fetchTrainPosition = async (
  baseUrl: string,
  trainNumber: string,
  init?: RequestInitWithSignal,
): Promise<TrainPositionResponse> => {
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "position")), { ...init });
  return handleJson<TrainPositionResponse>(response);
};

export const fetchTrainSummary = async (
  baseUrl: string,
  trainNumber: string,
  init?: RequestInitWithSignal,
): Promise<TrainSummaryResponse> => {
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "summary")), { ...init });
  return handleJson<TrainSummaryResponse>(response);
};

export const fetchCrowdData = async (
  baseUrl: string,
  trainNumber: string,
  init?: RequestInitWithSignal,
): Promise<CrowdDataResponse> => {
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "crowd-data")), { ...init });
  return handleJson<CrowdDataResponse>(response);
};

export interface ConfirmOnTrainParams {
  userId: string;
  stationName?: string;
  coordinates?: LatLng;
}

export const confirmOnTrain = async (
  baseUrl: string,
  trainNumber: string,
  params: ConfirmOnTrainParams,
  init?: RequestInitWithSignal,
): Promise<ConfirmResponse> => {
  const body: ConfirmRequest = { user_id: params.userId };
  if (params.stationName) body.station_name = params.stationName;
  if (params.coordinates) body.coordinates = params.coordinates;
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "confirm")), {
    ...init,
    method: "POST",
    headers: { ...init?.headers, "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
  return handleJson<ConfirmResponse>(response);
};

export const removeConfirmation = async (
  baseUrl: string,
  trainNumber: string,
  userId: string,
  init?: RequestInitWithSignal,
): Promise<RemoveConfirmationResponse> => {
  const url = buildUrl(baseUrl, trainPath(trainNumber, "confirm"), { user_id: userId });
  const response = await fetch(url, { ...init, method: "DELETE" });
  return handleJson<RemoveConfirmationResponse>(response);
};

export interface DelayAnalyticsParams {
  train?: string;
  station?: string;
}

export const fetchDelayAnalytics = async (
  baseUrl: string,
  params: DelayAnalyticsParams = {},
  init?: RequestInitWithSignal,
): Promise<DelayAnalyticsResponse> => {
  const url = buildUrl(baseUrl, "/api/analytics/delays", { train: params.train, station: params.station });
  const response = await fetch(url, { ...init });
  return handleJson<DelayAnalyticsResponse>(response);
};

export const fetchDelayPrediction = async (
  baseUrl: string,
  trainNumber: string,
  stationName: string,
  scheduledTime?: string,
  init?: RequestInitWithSignal,
): Promise<DelayPredictionResponse> => {
  const url = buildUrl(baseUrl, trainPath(trainNumber, "delay-prediction"), {
    station: stationName,
    time: scheduledTime,
  });
  const response = await fetch(url, { ...init });
  return handleJson<DelayPredictionResponse>(response);
};

export const fetchSimulatedRoute = async (
  baseUrl: string,
  trainNumber: string,
  init?: RequestInitWithSignal,
): Promise<RouteSimulationResponse> => {
  const response = await fetch(buildUrl(baseUrl, trainPath(trainNumber, "simulated-route")), { ...init });
  return handleJson<RouteSimulationResponse>(response);
};
