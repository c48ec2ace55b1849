import { expect, test } from "vitest";
import {
  formatDuration,
  formatEntryLine,
  formatError,
  formatImport,
  formatList,
  formatReadableExport,
  formatShow,
  formatStart,
  formatStatus,
  formatStop,
  formatTimestamp,
} from "./formatter.ts";
import { TtError } from "../../domain/entities/errors.ts";
import type { ShowOutput, StopOutput } from "../../domain/entities/outputs.ts";

// TZ=UTC (vitest.config.ts)

const STOPPED: StopOutput = {
  status: "stopped",
  description: "review",
  start: "2026-03-02T09:00:00.000Z",
  end: "2026-03-02T10:30:15.000Z",
  duration_ms: 5_415_000,
};

test("formatDuration - default template", () => {
  expect(formatDuration(5_025_000)).toBe("01:23:45");
  expect(formatDuration(0)).toBe("00:00:00");
  expect(formatDuration(100 * 3_600_000)).toBe("100:00:00");
});

test("formatDuration - custom template and negative values", () => {
  expect(formatDuration(5_025_000, "{h}h {m}m")).toBe("1h 23m");
  expect(formatDuration(-90_000)).toBe("-00:01:30");
});

test("formatTimestamp - local date and time", () => {
  expect(formatTimestamp("2026-03-02T09:05:07.900Z")).toBe("2026-03-02 09:05:07");
});

test("formatStop", () => {
  expect(formatStop(STOPPED)).toBe('Stopped "review" at 10:30:15 (01:30:15)');
  expect(formatStop({ ...STOPPED, description: "" }))
    .toBe("Stopped at 10:30:15 (01:30:15)");
});

test("formatStart - includes an auto-inserted stop", () => {
  expect(formatStart({
    status: "started",
    description: "write docs",
    start: "2026-03-02T10:30:15.000Z",
    stopped: STOPPED,
  })).toBe(
    'Stopped "review" at 10:30:15 (01:30:15)\nStarted "write docs" at 10:30:15',
  );
});

test("formatStatus - tracking", () => {
  expect(formatStatus({
    state: "tracking",
    entry: {
      description: "review",
      start: "2026-03-02T09:00:00.000Z",
      end: null,
    },
    elapsed_ms: 600_000,
  })).toBe(
    "Active: true\nDescription: review\nStart Time: 09:00:00\nElapsed: 00:10:00",
  );
});

test("formatStatus - idle", () => {
  expect(formatStatus({
    state: "idle",
    entry: {
      description: "",
      start: "2026-03-02T09:00:00.000Z",
      end: "2026-03-02T09:30:00.000Z",
    },
    elapsed_ms: null,
  })).toBe("Active: false\nEnd Time: 09:30:00");
  expect(formatStatus({ state: "idle", entry: null, elapsed_ms: null }))
    .toBe("No entries found");
});

test("formatEntryLine - closed and running entries", () => {
  expect(formatEntryLine(STOPPED, STOPPED.duration_ms))
    .toBe("2026-03-02 09:00:00 - 10:30:15  01:30:15  review");
  expect(formatEntryLine(
    { description: "", start: "2026-03-02T11:00:00.000Z", end: null },
    null,
  )).toBe("2026-03-02 11:00:00 - running");
});

test("formatList", () => {
  expect(formatList({ entries: [] })).toBe("No entries");
  expect(formatList({
    entries: [{
      description: "b",
      start: "2026-03-02T11:00:00.000Z",
      end: null,
      duration_ms: 60_000,
      running: true,
    }],
  })).toBe("2026-03-02 11:00:00 - running  00:01:00  b");
});

const SHOW: ShowOutput = {
  days: [
    { day: "2026-03-02", duration_ms: 3_600_000 },
    { day: "2026-03-03", duration_ms: 1_800_000 },
  ],
  total_ms: 5_400_000,
  remaining_ms: -600_000,
};

test("formatShow - one line per day when several days", () => {
  expect(formatShow(SHOW)).toBe(
    "2026-03-02  01:00:00\n2026-03-03  00:30:00\nWork Time: 01:30:00",
  );
  expect(formatShow({ days: SHOW.days.slice(0, 1), total_ms: 3_600_000 }))
    .toBe("Work Time: 01:00:00");
});

test("formatShow - remaining and plain", () => {
  expect(formatShow(SHOW, { remaining: true }))
    .toBe("Remaining Work Time: -00:10:00");
  expect(formatShow(SHOW, { plain: true, template: "{h}:{mm}" })).toBe("1:30");
  expect(formatShow(SHOW, { plain: true, remaining: true })).toBe("-00:10:00");
});

test("formatReadableExport and formatImport", () => {
  expect(formatReadableExport({ entries: [STOPPED] }))
    .toBe("2026-03-02 09:00:00 - 10:30:15  01:30:15  review");
  expect(formatImport({ imported: 3, replaced: 0 }))
    .toBe("imported: 3\nreplaced: 0");
  expect(formatImport({ imported: 1, replaced: null }))
    .toBe("imported: 1\nreplaced: unknown");
});

test("formatError", () => {
  expect(formatError(new TtError("not_tracking", "Time tracking is already stopped")))
    .toBe("error: not_tracking\nTime tracking is already stopped");
});
