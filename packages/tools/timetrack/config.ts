import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod/mini";
import { TtError } from "./domain/entities/errors.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

const GOAL_PATTERN = /^\d+:[0-5]\d$/;

const ConfigSchema = z.object({
  dataFile: z.optional(z.string()),
  autoInsertStop: z.optional(z.enum(["true", "false", "1", "0"])),
  dailyGoal: z.optional(z.string().check(z.regex(GOAL_PATTERN, "expected H:MM"))),
  weeklyGoal: z.optional(z.string().check(z.regex(GOAL_PATTERN, "expected H:MM"))),
  logLevel: z.optional(z.enum(LOG_LEVELS)),
});

export interface Config {
  readonly dataFile: string;
  readonly autoInsertStop: boolean;
  readonly dailyGoalMs: number;
  readonly weeklyGoalMs: number;
  readonly logLevel: LogLevel;
}

export const DEFAULT_DATA_FILE = "~/.timetrack/entries.jsonl";

/** "8:30" -> milliseconds */
export function parseGoal(value: string): number {
  const [hours = "0", minutes = "0"] = value.split(":");
  return (Number(hours) * 60 + Number(minutes)) * 60_000;
}

export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

export function loadConfig(
  env: Readonly<Record<string, string | undefined>> = process.env,
): Config {
  // Empty strings count as unset
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === "" ? undefined : value;
  };

  const result = ConfigSchema.safeParse({
    dataFile: read("TIMETRACK_DATA_FILE"),
    autoInsertStop: read("TIMETRACK_AUTO_INSERT_STOP"),
    dailyGoal: read("TIMETRACK_DAILY_GOAL"),
    weeklyGoal: read("TIMETRACK_WEEKLY_GOAL"),
    logLevel: read("LOG_LEVEL"),
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      `${issue.path.map(String).join(".")}: ${issue.message}`
    );
    throw new TtError(
      "invalid_config",
      `Configuration validation failed:\n${issues.join("\n")}`,
    );
  }

  const raw = result.data;
  return {
    dataFile: expandHome(raw.dataFile ?? DEFAULT_DATA_FILE),
    autoInsertStop: raw.autoInsertStop === "true" ||
      raw.autoInsertStop === "1",
    dailyGoalMs: parseGoal(raw.dailyGoal ?? "8:00"),
    weeklyGoalMs: parseGoal(raw.weeklyGoal ?? "40:00"),
    logLevel: raw.logLevel ?? "warn",
  };
}
