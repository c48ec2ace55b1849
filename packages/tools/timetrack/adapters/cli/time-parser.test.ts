import { expect, test } from "vitest";
import {
  parseBound,
  parseDateTime,
  resolveRange,
  startOfWeek,
  weekRange,
} from "./time-parser.ts";
import { ALL_TIME } from "../../domain/entities/report-engine.ts";

// TZ=UTC (vitest.config.ts); 2026-03-04 is a Wednesday
const d = (iso: string) => new Date(`${iso}Z`);
const NOW = d("2026-03-04T12:00:00");

// --- parseDateTime ---

test("parseDateTime - time only means today", () => {
  expect(parseDateTime("9:05", NOW)).toEqual(d("2026-03-04T09:05:00"));
  expect(parseDateTime("09:05:30", NOW)).toEqual(d("2026-03-04T09:05:30"));
});

test("parseDateTime - date and time", () => {
  expect(parseDateTime("2026-03-01 23:59:30", NOW))
    .toEqual(d("2026-03-01T23:59:30"));
  expect(parseDateTime("2026-03-01T08:00", NOW))
    .toEqual(d("2026-03-01T08:00:00"));
});

test("parseDateTime - rejects out-of-range values", () => {
  for (const input of ["25:00", "10:60", "2026-02-30 10:00", "yesterday"]) {
    expect(() => parseDateTime(input, NOW)).toThrow(
      `Invalid time: ${input}. Use YYYY-MM-DD, YYYY-MM-DD HH:MM[:SS] or HH:MM[:SS]`,
    );
  }
});

test("parseBound - bare date", () => {
  expect(parseBound("2026-03-01", NOW)).toEqual({
    kind: "date",
    date: d("2026-03-01T00:00:00"),
  });
  expect(parseBound("10:00", NOW)).toEqual({
    kind: "datetime",
    date: d("2026-03-04T10:00:00"),
  });
});

// --- weeks ---

test("startOfWeek - weeks start on Monday", () => {
  expect(startOfWeek(NOW)).toEqual(d("2026-03-02T00:00:00"));
  // Sunday belongs to the week that started six days earlier
  expect(startOfWeek(d("2026-03-08T23:00:00"))).toEqual(d("2026-03-02T00:00:00"));
  expect(startOfWeek(d("2026-03-09T00:00:00"))).toEqual(d("2026-03-09T00:00:00"));
});

// --- resolveRange ---

test("resolveRange - defaults to today", () => {
  expect(resolveRange({}, NOW)).toEqual({
    keyword: "today",
    range: { from: d("2026-03-04T00:00:00"), to: d("2026-03-05T00:00:00") },
  });
});

test("resolveRange - week keyword", () => {
  expect(resolveRange({ filter: "week" }, NOW)).toEqual({
    keyword: "week",
    range: weekRange(NOW),
  });
  expect(weekRange(NOW)).toEqual({
    from: d("2026-03-02T00:00:00"),
    to: d("2026-03-09T00:00:00"),
  });
});

test("resolveRange - all keyword and the all-time default", () => {
  expect(resolveRange({ filter: "all" }, NOW)).toEqual({
    keyword: "all",
    range: ALL_TIME,
  });
  expect(resolveRange({}, NOW, true)).toEqual({
    keyword: "all",
    range: ALL_TIME,
  });
});

test("resolveRange - any other filter matches descriptions today", () => {
  expect(resolveRange({ filter: "review" }, NOW)).toEqual({
    keyword: "today",
    range: { from: d("2026-03-04T00:00:00"), to: d("2026-03-05T00:00:00") },
    description: "review",
  });
});

test("resolveRange - from alone covers that day", () => {
  expect(resolveRange({ from: "2026-03-01" }, NOW)).toEqual({
    keyword: "custom",
    range: { from: d("2026-03-01T00:00:00"), to: d("2026-03-02T00:00:00") },
  });
});

test("resolveRange - a date-only to includes that day", () => {
  const resolved = resolveRange({ from: "2026-03-01", to: "2026-03-02" }, NOW);
  expect(resolved.range).toEqual({
    from: d("2026-03-01T00:00:00"),
    to: d("2026-03-03T00:00:00"),
  });
});

test("resolveRange - datetime bounds are used as given", () => {
  const resolved = resolveRange(
    { filter: "review", from: "2026-03-01 10:00", to: "12:00" },
    NOW,
  );
  expect(resolved).toEqual({
    keyword: "custom",
    range: { from: d("2026-03-01T10:00:00"), to: d("2026-03-04T12:00:00") },
    description: "review",
  });
});

test("resolveRange - to alone starts today", () => {
  expect(resolveRange({ to: "08:00" }, NOW).range).toEqual({
    from: d("2026-03-04T00:00:00"),
    to: d("2026-03-04T08:00:00"),
  });
});

test("resolveRange - to before from is rejected", () => {
  expect(() => resolveRange({ from: "2026-03-05", to: "2026-03-03" }, NOW))
    .toThrow("--to is before --from");
});
