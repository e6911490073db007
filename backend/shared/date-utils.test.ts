import assert from "node:assert/strict";
import test from "node:test";
import {
  MS_PER_HOUR,
  formatDate,
  isCalendarDate,
  isWithinDateRange,
  millisecondsSince,
  nextTimestamp,
  toCalendarDate,
} from "./date-utils";

test("accepts only real calendar dates in YYYY-MM-DD form", () => {
  assert.equal(isCalendarDate("2024-02-29"), true);
  assert.equal(isCalendarDate("2023-02-29"), false);
  assert.equal(isCalendarDate("2024-13-01"), false);
  assert.equal(isCalendarDate("2024-3-01"), false);
  assert.equal(isCalendarDate("2024-03-01T00:00:00Z"), false);
});

test("compares date ranges inclusively on the day part", () => {
  assert.equal(toCalendarDate("2024-03-05T17:30:00.000Z"), "2024-03-05");
  assert.equal(isWithinDateRange("2024-03-01", "2024-03-01", "2024-03-31"), true);
  assert.equal(isWithinDateRange("2024-03-31T23:59:59", "2024-03-01", "2024-03-31"), true);
  assert.equal(isWithinDateRange("2024-02-29", "2024-03-01", null), false);
  assert.equal(isWithinDateRange("2024-04-01", undefined, "2024-03-31"), false);
  assert.equal(isWithinDateRange("1999-01-01"), true);
});

test("formats a date from its local calendar fields", () => {
  assert.equal(formatDate(new Date(2024, 0, 9, 15, 0, 0)), "2024-01-09");
});

test("measures elapsed time from an ISO timestamp", () => {
  const now = new Date("2024-03-02T10:00:00.000Z");
  assert.equal(millisecondsSince("2024-03-01T10:00:00.000Z", now), 24 * MS_PER_HOUR);
  assert.equal(Number.isNaN(millisecondsSince("not a timestamp", now)), true);
});

test("never moves a mutation timestamp backwards", () => {
  const now = new Date("2024-03-01T09:00:00.000Z");
  assert.equal(nextTimestamp(now), "2024-03-01T09:00:00.000Z");
  assert.equal(nextTimestamp(now, "2024-03-01T08:00:00.000Z"), "2024-03-01T09:00:00.000Z");
  assert.equal(nextTimestamp(now, "2024-03-01T10:00:00.000Z"), "2024-03-01T10:00:00.000Z");
});
