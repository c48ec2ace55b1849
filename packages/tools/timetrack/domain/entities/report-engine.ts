// ReportEngine - read-only aggregation over an entry sequence

import { type Entry, isClosed, isOpen } from "./entry.ts";
import type {
  DayTotal,
  EntryRecord,
  ExportOutput,
  ListOutput,
  ShowOutput,
} from "./outputs.ts";

/**
 * Half-open interval [from, to). A null bound is unbounded.
 */
export type TimeRange = {
  readonly from: Date | null;
  readonly to: Date | null;
};

export const ALL_TIME: TimeRange = { from: null, to: null };

export type EntryFilter = {
  readonly range: TimeRange;
  /** Substring the description must contain. */
  readonly description?: string;
};

export type Goal = {
  readonly range: TimeRange;
  readonly goal_ms: number;
};

/**
 * `minutes` drops the seconds of both timestamps before measuring.
 */
export type Precision = "seconds" | "minutes";

export interface ReportEngineOptions {
  readonly precision?: Precision;
}

export function inRange(date: Date, range: TimeRange): boolean {
  if (range.from && date < range.from) return false;
  if (range.to && date >= range.to) return false;
  return true;
}

export function toEntryRecord(entry: Entry): EntryRecord {
  return {
    description: entry.description,
    start: entry.start.toISOString(),
    end: entry.end ? entry.end.toISOString() : null,
  };
}

/** Local calendar day of a date: "YYYY-MM-DD". */
export function localDay(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}

export class ReportEngine {
  private readonly precision: Precision;

  constructor(options: ReportEngineOptions = {}) {
    this.precision = options.precision ?? "seconds";
  }

  /**
   * Entries whose start lies in the range. Entries crossing a bound are
   * kept whole, never clipped.
   */
  select(entries: readonly Entry[], filter: EntryFilter): Entry[] {
    const needle = filter.description;
    return entries.filter((entry) =>
      inRange(entry.start, filter.range) &&
      (!needle || entry.description.includes(needle))
    );
  }

  /**
   * Totals per local calendar day of each entry's start, plus the grand
   * total. A session running past midnight counts fully on its start day.
   */
  show(
    entries: readonly Entry[],
    filter: EntryFilter,
    now: Date,
  ): ShowOutput {
    const byDay = new Map<string, number>();
    let total = 0;

    for (const entry of this.select(entries, filter)) {
      const duration = this.measure(entry, now);
      const day = localDay(entry.start);
      byDay.set(day, (byDay.get(day) ?? 0) + duration);
      total += duration;
    }

    const days: DayTotal[] = [...byDay.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([day, duration_ms]) => ({ day, duration_ms }));

    return { days, total_ms: total };
  }

  list(
    entries: readonly Entry[],
    filter: EntryFilter,
    now: Date,
  ): ListOutput {
    return {
      entries: this.select(entries, filter).map((entry) => ({
        ...toEntryRecord(entry),
        duration_ms: this.measure(entry, now),
        running: isOpen(entry),
      })),
    };
  }

  /**
   * Lossless dump of the selected entries. The open entry keeps `end: null`
   * and has no duration.
   */
  export(entries: readonly Entry[], filter: EntryFilter): ExportOutput {
    return {
      entries: this.select(entries, filter).map((entry) => ({
        ...toEntryRecord(entry),
        duration_ms: isClosed(entry)
          ? entry.end.getTime() - entry.start.getTime()
          : null,
      })),
    };
  }

  /**
   * Smallest `goal - worked` over the given goals. Negative once a goal is
   * exceeded.
   */
  remaining(
    entries: readonly Entry[],
    goals: readonly Goal[],
    now: Date,
  ): number | null {
    if (goals.length === 0) return null;
    return Math.min(
      ...goals.map((goal) =>
        goal.goal_ms - this.show(entries, { range: goal.range }, now).total_ms
      ),
    );
  }

  /** Open entries count the time elapsed so far, never less than zero. */
  private measure(entry: Entry, now: Date): number {
    if (isClosed(entry)) {
      return this.truncate(entry.end) - this.truncate(entry.start);
    }
    return Math.max(0, this.truncate(now) - this.truncate(entry.start));
  }

  private truncate(date: Date): number {
    const time = date.getTime();
    if (this.precision === "seconds") return time;
    return time - (((time % 60_000) + 60_000) % 60_000);
  }
}
