import test from "node:test";
import assert from "node:assert/strict";
import { atClockOn, formatEtaLabel, parseClockMinutes, parseClockOn, weekdayOf } from "../utils/time";
import { WEDNESDAY_1030, localTime } from "./helpers";

test("parses schedule clock strings with or without the BST suffix", () => {
  assert.equal(parseClockMinutes("7:45 PM"), 19 * 60 + 45);
  assert.equal(parseClockMinutes("7:45 pm BST"), 19 * 60 + 45);
  assert.equal(parseClockMinutes("12:00 AM"), 0);
  assert.equal(parseClockMinutes("12:30 PM"), 12 * 60 + 30);
  assert.equal(parseClockMinutes(" 9:05 am "), 9 * 60 + 5);
});

test("treats placeholders and malformed clocks as absent", () => {
  assert.equal(parseClockMinutes("---"), null);
  assert.equal(parseClockMinutes(""), null);
  assert.equal(parseClockMinutes(null), null);
  assert.equal(parseClockMinutes("13:00 PM"), null);
  assert.equal(parseClockMinutes("7:60 AM"), null);
  assert.equal(parseClockMinutes("around noon"), null);
});

test("anchors a clock value to the reference day", () => {
  const anchored = atClockOn(WEDNESDAY_1030, 9 * 60 + 5);
  assert.equal(anchored.getTime(), localTime(2026, 10, 21, 9, 5).getTime());
  assert.equal(parseClockOn(WEDNESDAY_1030, "---"), null);
});

test("formats the time left until an arrival", () => {
  assert.equal(formatEtaLabel(0), "Arrived");
  assert.equal(formatEtaLabel(-5000), "Arrived");
  assert.equal(formatEtaLabel(90 * 60_000), "1h 30m");
  assert.equal(formatEtaLabel(45 * 60_000 + 30_000), "45m");
});

test("names the weekday of a date", () => {
  assert.equal(weekdayOf(WEDNESDAY_1030), "Wednesday");
  assert.equal(weekdayOf(localTime(2026, 10, 18, 12, 0)), "Sunday");
});
