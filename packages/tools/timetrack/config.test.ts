import { homedir } from "node:os";
import { join } from "node:path";
import { expect, test } from "vitest";
import { expandHome, loadConfig, parseGoal } from "./config.ts";
import { TtError } from "./domain/entities/errors.ts";

test("loadConfig - defaults", () => {
  expect(loadConfig({})).toEqual({
    dataFile: join(homedir(), ".timetrack", "entries.jsonl"),
    autoInsertStop: false,
    dailyGoalMs: 8 * 3_600_000,
    weeklyGoalMs: 40 * 3_600_000,
    logLevel: "warn",
  });
});

test("loadConfig - reads the environment", () => {
  const config = loadConfig({
    TIMETRACK_DATA_FILE: "/srv/tt/entries.jsonl",
    TIMETRACK_AUTO_INSERT_STOP: "1",
    TIMETRACK_DAILY_GOAL: "7:30",
    TIMETRACK_WEEKLY_GOAL: "37:30",
    LOG_LEVEL: "debug",
  });

  expect(config).toEqual({
    dataFile: "/srv/tt/entries.jsonl",
    autoInsertStop: true,
    dailyGoalMs: 450 * 60_000,
    weeklyGoalMs: 2250 * 60_000,
    logLevel: "debug",
  });
});

test("loadConfig - empty values count as unset", () => {
  expect(loadConfig({ TIMETRACK_DAILY_GOAL: "", LOG_LEVEL: "" }).dailyGoalMs)
    .toBe(8 * 3_600_000);
});

test("loadConfig - rejects invalid values", () => {
  let error: unknown;
  try {
    loadConfig({ TIMETRACK_DAILY_GOAL: "8h", TIMETRACK_AUTO_INSERT_STOP: "yes" });
  } catch (e) {
    error = e;
  }
  expect(error).toBeInstanceOf(TtError);
  expect(error).toMatchObject({
    code: "invalid_config",
    message: expect.stringContaining("dailyGoal: expected H:MM"),
  });
});

test("parseGoal", () => {
  expect(parseGoal("8:00")).toBe(8 * 3_600_000);
  expect(parseGoal("0:45")).toBe(45 * 60_000);
});

test("expandHome", () => {
  expect(expandHome("~/tt/entries.jsonl", "/home/tester"))
    .toBe("/home/tester/tt/entries.jsonl");
  expect(expandHome("~", "/home/tester")).toBe("/home/tester");
  expect(expandHome("/abs/path", "/home/tester")).toBe("/abs/path");
});
