import test from "node:test";
import assert from "node:assert/strict";
import { DelayModel, stationFactor, summarizeDelays, timeOfDayBucket } from "../services/delayModel";
import { WEDNESDAY_1030, constantRandom, localTime, sampleRoute, scriptedRandom } from "./helpers";

const FRIDAY_1730 = localTime(2026, 10, 23, 17, 30);

test("combines base delay, factors and jitter into whole minutes", () => {
  const model = new DelayModel({ random: scriptedRandom([0.1, 0.5, 0.5]) });
  const scheduled = localTime(2026, 10, 21, 10, 0);
  const result = model.synthesizeDelay("701", "Dhaka", scheduled, WEDNESDAY_1030, "clear");

  assert.equal(result.delay_minutes, 22);
  assert.deepEqual(result.factors_applied, { weather: 1, time_of_day: 1, day_of_week: 1, station: 1.5 });
  assert.equal(result.weather_condition, "clear");
  assert.equal(result.scheduled_time, scheduled.toISOString());
  assert.equal(result.actual_time, localTime(2026, 10, 21, 10, 22).toISOString());
});

test("clamps the delay to the configured maximum", () => {
  const model = new DelayModel({ random: scriptedRandom([0, 0.999, 0.999]) });
  const result = model.synthesizeDelay("701", "Dhaka", FRIDAY_1730, FRIDAY_1730, "stormy");
  assert.equal(result.delay_minutes, 120);
  assert.deepEqual(result.factors_applied, { weather: 2, time_of_day: 1.6, day_of_week: 1.4, station: 1.5 });
});

test("no base delay means no delay regardless of factors", () => {
  const model = new DelayModel({ random: constantRandom(0.99) });
  const scheduled = localTime(2026, 10, 21, 10, 0);
  const result = model.synthesizeDelay("701", "Dhaka", scheduled, FRIDAY_1730, "stormy");
  assert.equal(result.delay_minutes, 0);
  assert.equal(result.actual_time, scheduled.toISOString());
});

test("history keeps the latest 100 observations per train and station", () => {
  const model = new DelayModel({ random: constantRandom(0.99) });
  const base = WEDNESDAY_1030.getTime();
  for (let i = 0; i < 101; i += 1) {
    const now = new Date(base + i * 60_000);
    model.synthesizeDelay("701", "Feni", now, now, "clear");
  }
  const observations = model.observations("701", "Feni");
  assert.equal(observations.length, 100);
  assert.equal(observations[0]?.recordedAt, new Date(base + 60_000).toISOString());
  assert.equal(model.observations("701", "Dhaka").length, 0);
});

test("statistics distinguish missing data from zero delay", () => {
  const model = new DelayModel({ random: constantRandom(0.99) });
  assert.deepEqual(model.historicalStats("701"), { available: false, reason: "No historical data available" });

  model.synthesizeDelay("701", "Feni", WEDNESDAY_1030, WEDNESDAY_1030, "clear");
  assert.deepEqual(model.historicalStats("701", "Laksam"), { available: false, reason: "No data for this station" });
  const stats = model.historicalStats("701", "Feni");
  assert.equal(stats.available, true);
  if (!stats.available) return;
  assert.equal(stats.total_delays, 1);
  assert.equal(stats.average_delay, 0);
});

test("distribution buckets sum to the number of observations", () => {
  const stats = summarizeDelays([0, 15, 16, 30, 31, 60, 61]);
  assert.deepEqual(stats, {
    available: true,
    total_delays: 7,
    average_delay: 30.4,
    max_delay: 61,
    min_delay: 0,
    delay_distribution: { "0-15 min": 2, "16-30 min": 2, "31-60 min": 2, "60+ min": 1 },
  });
});

test("prediction without history is the fixed fallback", () => {
  const model = new DelayModel({ random: constantRandom(0.5) });
  assert.deepEqual(model.predictProbability("701", "Dhaka", WEDNESDAY_1030), { probability: 0.3, confidence: "low" });
});

test("prediction scales the delayed fraction and clamps it", () => {
  const model = new DelayModel({ random: constantRandom(0.1) });
  for (let i = 0; i < 20; i += 1) {
    model.synthesizeDelay("701", "Dhaka", WEDNESDAY_1030, WEDNESDAY_1030, "clear");
  }
  assert.deepEqual(model.predictProbability("701", "Dhaka", WEDNESDAY_1030), {
    probability: 0.9,
    confidence: "medium",
    historical_data_points: 20,
    factors_applied: { time_of_day: 1, day_of_week: 1 },
  });
});

test("weather depends on the hour only", () => {
  const model = new DelayModel({ random: constantRandom(0.65) });
  assert.equal(model.weather("Dhaka", WEDNESDAY_1030), "cloudy");
  assert.equal(model.weather("Dhaka", localTime(2026, 10, 21, 23, 0)), "clear");
  const foggy = new DelayModel({ random: constantRandom(0.95) });
  assert.equal(foggy.weather(undefined, localTime(2026, 10, 21, 23, 0)), "foggy");
});

test("lookup tables resolve buckets and station names", () => {
  assert.equal(timeOfDayBucket(localTime(2026, 10, 21, 8, 15)), "morning_rush");
  assert.equal(timeOfDayBucket(localTime(2026, 10, 21, 3, 0)), "night");
  assert.equal(stationFactor("Dhaka Airport"), 1.5);
  assert.equal(stationFactor("chattogram"), 1.4);
  assert.equal(stationFactor("Feni"), 1);
});

test("overall statistics summarize every train in history", () => {
  const model = new DelayModel({ random: scriptedRandom([0.1, 0.5, 0.5], 0.99) });
  assert.deepEqual(model.overallStats(), { total_trains: 0, trains_with_delays: 0, average_delay: 0 });
  model.synthesizeDelay("701", "Dhaka", WEDNESDAY_1030, WEDNESDAY_1030, "clear");
  model.synthesizeDelay("709", "Feni", WEDNESDAY_1030, WEDNESDAY_1030, "clear");
  assert.deepEqual(model.overallStats(), { total_trains: 2, trains_with_delays: 1, average_delay: 11 });
});

test("route simulation chains each stop's clock and passes through stops without departures", () => {
  const model = new DelayModel({ random: constantRandom(0.99) });
  const stops = model.simulateRouteDelays("701", sampleRoute(), WEDNESDAY_1030);
  assert.equal(stops.length, 3);
  assert.equal(stops[0]?.simulated_delay?.delay_minutes, 0);
  assert.equal(stops[0]?.weather_condition, "rainy");
  assert.equal(stops[1]?.simulated_delay?.scheduled_time, localTime(2026, 10, 21, 10, 5).toISOString());
  assert.equal(stops[2]?.simulated_delay, undefined);
  assert.equal(stops[2]?.city, "Station C");
  assert.equal(model.observations("701", "Station A").length, 1);
});
