/**
 * Timestamp and range parsing for command-line options.
 *
 * Everything here reads local time. Ranges are resolved to concrete
 * [from, to) bounds before they reach the domain.
 */

import { TtError } from "../../domain/entities/errors.ts";
import {
  ALL_TIME,
  type EntryFilter,
  type TimeRange,
} from "../../domain/entities/report-engine.ts";

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const DATE_TIME_RE =
  /^(\d{4})-(\d{2})-(\d{2})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/**
 * A parsed --from / --to value. Date-only values cover the whole day.
 */
export type Bound =
  | { readonly kind: "date"; readonly date: Date }
  | { readonly kind: "datetime"; readonly date: Date };

export interface RangeOptions {
  readonly filter?: string;
  readonly from?: string;
  readonly to?: string;
}

export type RangeKeyword = "today" | "week" | "all" | "custom";

export interface ResolvedRange extends EntryFilter {
  readonly keyword: RangeKeyword;
}

export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate() + days);
}

/** Monday 00:00 of the local week containing `date`. */
export function startOfWeek(date: Date): Date {
  const offset = (date.getDay() + 6) % 7;
  return addDays(startOfDay(date), -offset);
}

export function todayRange(now: Date): TimeRange {
  const from = startOfDay(now);
  return { from, to: addDays(from, 1) };
}

export function weekRange(now: Date): TimeRange {
  const from = startOfWeek(now);
  return { from, to: addDays(from, 7) };
}

function localDate(
  year: string,
  month: string,
  day: string,
  input: string,
): Date {
  const date = new Date(Number(year), Number(month) - 1, Number(day));
  if (
    date.getFullYear() !== Number(year) ||
    date.getMonth() !== Number(month) - 1 ||
    date.getDate() !== Number(day)
  ) {
    throw invalid(input);
  }
  return date;
}

function withTime(
  day: Date,
  hours: string,
  minutes: string,
  seconds: string | undefined,
  input: string,
): Date {
  const h = Number(hours);
  const m = Number(minutes);
  const s = Number(seconds ?? "0");
  if (h > 23 || m > 59 || s > 59) {
    throw invalid(input);
  }
  return new Date(day.getFullYear(), day.getMonth(), day.getDate(), h, m, s);
}

function invalid(input: string): TtError {
  return new TtError(
    "invalid_args",
    `Invalid time: ${input}. Use YYYY-MM-DD, YYYY-MM-DD HH:MM[:SS] or HH:MM[:SS]`,
  );
}

/**
 * Parse a point in time for --at: "HH:MM[:SS]" (today) or
 * "YYYY-MM-DD HH:MM[:SS]".
 */
export function parseDateTime(input: string, now: Date): Date {
  const value = input.trim();

  const time = TIME_RE.exec(value);
  if (time) {
    return withTime(startOfDay(now), time[1], time[2], time[3], input);
  }

  const dateTime = DATE_TIME_RE.exec(value);
  if (dateTime) {
    const day = localDate(dateTime[1], dateTime[2], dateTime[3], input);
    return withTime(day, dateTime[4], dateTime[5], dateTime[6], input);
  }

  throw invalid(input);
}

/**
 * Parse a --from / --to value. Also accepts a bare date.
 */
export function parseBound(input: string, now: Date): Bound {
  const date = DATE_RE.exec(input.trim());
  if (date) {
    return { kind: "date", date: localDate(date[1], date[2], date[3], input) };
  }
  return { kind: "datetime", date: parseDateTime(input, now) };
}

/**
 * Turn a filter keyword and optional bounds into a concrete filter.
 *
 * - "week": the current local week, bounds ignored
 * - "all": everything, bounds ignored
 * - anything else filters descriptions; the range defaults to the day of
 *   `from` (today when absent), and a date-only `to` includes that day
 *
 * With `defaultAll`, a call with no filter and no bounds selects everything.
 */
export function resolveRange(
  options: RangeOptions,
  now: Date,
  defaultAll = false,
): ResolvedRange {
  const { filter, from, to } = options;

  if (filter === "week") {
    return { keyword: "week", range: weekRange(now) };
  }
  if (filter === "all" || (defaultAll && !filter && !from && !to)) {
    return { keyword: "all", range: ALL_TIME };
  }

  const description = filter || undefined;
  if (!from && !to) {
    return { keyword: "today", range: todayRange(now), description };
  }

  const fromDate = from ? parseBound(from, now).date : startOfDay(now);

  let toDate: Date;
  if (to) {
    const toBound = parseBound(to, now);
    toDate = toBound.kind === "date"
      ? addDays(toBound.date, 1)
      : toBound.date;
  } else {
    toDate = addDays(startOfDay(fromDate), 1);
  }

  if (toDate < fromDate) {
    throw new TtError("invalid_args", "--to is before --from");
  }

  return {
    keyword: "custom",
    range: { from: fromDate, to: toDate },
    description,
  };
}
