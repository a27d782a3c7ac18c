import test from "node:test";
import assert from "node:assert/strict";
import type { CrowdMetrics, TrainStatusReport } from "@railwatch/core";
import { CrowdValidationStore } from "../crowd/crowdValidationStore";
import { createMemoryCrowdPersistence } from "../crowd/persistence";
import { DelayModel } from "../services/delayModel";
import { PositionEstimator } from "../services/positionEstimator";
import {
  TimelineAssembler,
  adjustWithCrowdData,
  crowdDelayAdjustment,
  estimateStationCrowd,
  statusTag,
} from "../services/timelineAssembler";
import { fail, ok } from "../utils/result";
import type { RandomSource } from "../utils/random";
import {
  ONE_DEGREE_KM,
  WEDNESDAY_1030,
  constantRandom,
  localTime,
  makeStop,
  makeTrain,
  sampleRoute,
  storeWith,
} from "./helpers";

const createAssembler = (random: RandomSource = constantRandom(0.99)) => {
  const schedule = storeWith([
    makeTrain("T1", sampleRoute(), { name: "Test Express" }),
    makeTrain("T2", [
      makeStop("Station A", null, "9:00 AM"),
      makeStop("Station B", "noon-ish", "whenever"),
      makeStop("Station C", "11:00 AM", null),
    ]),
    makeTrain("T3", [makeStop("Station A", null, "soon"), makeStop("Station B", "later", null)]),
  ]);
  const delays = new DelayModel({ random });
  const positions = new PositionEstimator(schedule, random);
  return { assembler: new TimelineAssembler({ trains: schedule, positions, delays, random }), delays };
};

const baseReport = (delayMinutes: number): TrainStatusReport => ({
  train_number: "T1",
  train_name: "Test Express",
  station_statuses: [],
  current_speed: 60,
  distance_covered: 0,
  distance_to_next: 0,
  delay_minutes: delayMinutes,
  estimated_arrival: null,
  progress_percentage: 0,
  current_station: null,
  next_station: null,
  position_available: false,
  weather_condition: "clear",
  last_updated: WEDNESDAY_1030.toISOString(),
});

const metrics = (overrides: Partial<CrowdMetrics>): CrowdMetrics => ({
  crowd_level: "medium",
  confidence: "medium",
  active_confirmations: 4,
  active_users: 4,
  average_time_since_confirmation: "5 minutes ago",
  data_freshness: "high",
  last_updated: WEDNESDAY_1030.toISOString(),
  ...overrides,
});

test("status tags follow the current position", () => {
  assert.deepEqual(
    [0, 1, 2, 3].map((index) => statusTag(index, 1)),
    ["completed", "current", "next", "upcoming"],
  );
});

test("station crowd estimate depends on hour and hub status", () => {
  assert.equal(estimateStationCrowd("Dhaka Airport", localTime(2026, 10, 21, 8, 0)), "high");
  assert.equal(estimateStationCrowd("Feni", localTime(2026, 10, 21, 8, 0)), "medium");
  assert.equal(estimateStationCrowd("Dhaka", localTime(2026, 10, 21, 23, 0)), "low");
  assert.equal(estimateStationCrowd("Dhaka", localTime(2026, 10, 21, 12, 0)), "medium");
  assert.equal(estimateStationCrowd("Feni", localTime(2026, 10, 21, 12, 0)), "normal");
  assert.equal(estimateStationCrowd("Dhaka", null), "normal");
});

test("at 10:30 the timeline tags the three stops completed, current and next", () => {
  const { assembler } = createAssembler();
  const result = assembler.generateStatus("T1", WEDNESDAY_1030);
  assert.equal(result.ok, true);
  if (!result.ok) return;
  const report = result.value;

  assert.deepEqual(
    report.station_statuses.map((status) => status.status),
    ["completed", "current", "next"],
  );
  assert.deepEqual(
    report.station_statuses.map((status) => status.distance_from_start),
    [0, ONE_DEGREE_KM, 222.38],
  );
  assert.equal(report.train_name, "Test Express");
  assert.equal(report.delay_minutes, 0);
  assert.equal(report.progress_percentage, 50);
  assert.equal(report.current_station, "Station B");
  assert.equal(report.next_station, "Station C");
  assert.equal(report.distance_covered, ONE_DEGREE_KM);
  assert.equal(report.estimated_arrival, "30m");
  assert.equal(report.position_available, true);
  assert.equal(report.current_speed, 65.9);
  assert.equal(report.weather_condition, "rainy");
  assert.equal(report.last_updated, WEDNESDAY_1030.toISOString());
});

test("station statuses carry schedule, delay and weather details", () => {
  const { assembler } = createAssembler();
  const result = assembler.generateStatus("T1", WEDNESDAY_1030);
  if (!result.ok) return assert.fail(result.error.message);
  const [origin, middle] = result.value.station_statuses;

  assert.equal(origin?.scheduled_arrival, null);
  assert.equal(origin?.halt_duration, "---");
  assert.deepEqual(middle, {
    station_name: "Station B",
    status: "current",
    scheduled_arrival: localTime(2026, 10, 21, 10, 0).toISOString(),
    scheduled_departure: localTime(2026, 10, 21, 10, 5).toISOString(),
    actual_arrival: localTime(2026, 10, 21, 10, 0).toISOString(),
    actual_departure: localTime(2026, 10, 21, 10, 5).toISOString(),
    delay_minutes: 0,
    halt_duration: "5 min",
    duration: "1h",
    distance_from_start: ONE_DEGREE_KM,
    weather_condition: "rainy",
    crowd_level: "normal",
  });
});

test("the overall delay is the worst station delay", () => {
  // Station A: rainy (0.99), then its departure is delayed (0.1) by a base of 7 (0.1) with jitter 0.84 (0.1).
  const random: RandomSource = (() => {
    const values = [0.99, 0.1, 0.1, 0.1];
    return { next: () => values.shift() ?? 0.99 };
  })();
  const { assembler } = createAssembler(random);
  const result = assembler.generateStatus("T1", WEDNESDAY_1030);
  if (!result.ok) return assert.fail(result.error.message);
  const delays = result.value.station_statuses.map((status) => status.delay_minutes);
  assert.deepEqual(delays, [8, 0, 0]);
  assert.equal(result.value.delay_minutes, 8);
  assert.equal(
    result.value.station_statuses[0]?.actual_departure,
    localTime(2026, 10, 21, 9, 8).toISOString(),
  );
});

test("records every synthesized delay under the real train number", () => {
  const { assembler, delays } = createAssembler();
  assembler.generateStatus("T1", WEDNESDAY_1030);
  assert.equal(delays.observations("T1", "Station A").length, 1);
  assert.equal(delays.observations("T1", "Station B").length, 2);
  assert.equal(delays.observations("T1", "Station C").length, 1);
});

test("a malformed stop does not stop the timeline", () => {
  const { assembler } = createAssembler();
  const result = assembler.generateStatus("T2", WEDNESDAY_1030);
  if (!result.ok) return assert.fail(result.error.message);
  const middle = result.value.station_statuses[1];
  assert.equal(result.value.station_statuses.length, 3);
  assert.equal(middle?.scheduled_arrival, null);
  assert.equal(middle?.scheduled_departure, null);
  assert.equal(middle?.delay_minutes, 0);
  assert.equal(middle?.status, "current");
});

test("a report without a known position claims no speed", () => {
  const { assembler } = createAssembler();
  const result = assembler.generateStatus("T3", WEDNESDAY_1030);
  if (!result.ok) return assert.fail(result.error.message);
  assert.equal(result.value.position_available, false);
  assert.equal(result.value.current_speed, 0);
  assert.equal(result.value.distance_covered, 0);
});

test("an unknown train is not found", () => {
  const { assembler } = createAssembler();
  assert.deepEqual(assembler.generateStatus("NOPE", WEDNESDAY_1030), fail("not_found", "Train NOPE not found"));
});

test("low or missing crowd confidence leaves the report untouched", () => {
  const report = baseReport(10);
  const random = constantRandom(0);
  assert.equal(adjustWithCrowdData(report, ok(metrics({ confidence: "low" })), random), report);
  assert.equal(adjustWithCrowdData(report, ok(metrics({ confidence: "none" })), random), report);
  assert.equal(adjustWithCrowdData(report, fail("not_found", "no data"), random), report);
  assert.equal(report.delay_minutes, 10);
});

test("medium confidence shifts the delay and attaches crowd details", () => {
  const adjusted = adjustWithCrowdData(baseReport(10), ok(metrics({})), constantRandom(0));
  assert.equal(adjusted.delay_minutes, 8);
  assert.deepEqual(adjusted.crowd_validation, {
    confidence: "medium",
    active_users: 4,
    crowd_level: "medium",
    last_updated: WEDNESDAY_1030.toISOString(),
  });
  assert.equal(adjusted.eta_adjusted_by_crowd, undefined);
});

test("the adjusted delay never drops below zero", () => {
  const adjusted = adjustWithCrowdData(baseReport(1), ok(metrics({})), constantRandom(0));
  assert.equal(adjusted.delay_minutes, 0);
});

test("high confidence with many riders scales the shift and flags the ETA", () => {
  const crowd = metrics({ confidence: "high", crowd_level: "high", active_confirmations: 12, active_users: 12 });
  assert.equal(crowdDelayAdjustment(crowd, constantRandom(0.999)), 7);
  const adjusted = adjustWithCrowdData(baseReport(0), ok(crowd), constantRandom(0.999));
  assert.equal(adjusted.delay_minutes, 7);
  assert.equal(adjusted.eta_adjusted_by_crowd, true);
  assert.equal(adjusted.crowd_eta_confidence, "high");
});

test("a low crowd level never shifts the delay", () => {
  assert.equal(crowdDelayAdjustment(metrics({ crowd_level: "low" }), constantRandom(0)), 0);
  const veryHigh = metrics({ crowd_level: "very_high", active_confirmations: 21 });
  assert.equal(crowdDelayAdjustment(veryHigh, constantRandom(0)), -16);
});

test("adjustWithCrowd reads metrics from the crowd store", async () => {
  const { assembler } = createAssembler();
  const crowd = new CrowdValidationStore({ persistence: createMemoryCrowdPersistence() });
  await crowd.confirm("T1", { userId: "rider-1" }, WEDNESDAY_1030);
  const report = baseReport(10);
  assert.equal(assembler.adjustWithCrowd("T1", report, crowd, WEDNESDAY_1030), report);
});
