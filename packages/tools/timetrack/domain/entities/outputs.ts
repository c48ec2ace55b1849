// Command output types - structured results returned by use cases

import type { TrackingState } from "./entry-store.ts";

/**
 * Serialized entry, as persisted and exported.
 * Timestamps are ISO 8601 strings; `end` is null for the open entry.
 */
export interface EntryRecord {
  description: string;
  start: string;
  end: string | null;
}

export interface StartOutput {
  status: "started";
  description: string;
  start: string;
  /** Entry closed by an auto-inserted stop, if any. */
  stopped: StopOutput | null;
}

export interface StopOutput {
  status: "stopped";
  description: string;
  start: string;
  end: string;
  duration_ms: number;
}

export interface StatusOutput {
  state: TrackingState;
  entry: EntryRecord | null;
  elapsed_ms: number | null;
}

export interface ListItem extends EntryRecord {
  duration_ms: number;
  running: boolean;
}

export interface ListOutput {
  entries: ListItem[];
}

export interface DayTotal {
  day: string; // Local calendar day: "YYYY-MM-DD"
  duration_ms: number;
}

export interface ShowOutput {
  days: DayTotal[];
  total_ms: number;
  remaining_ms?: number;
}

export interface ExportItem extends EntryRecord {
  duration_ms: number | null;
}

export interface ExportOutput {
  entries: ExportItem[];
}

export interface ImportOutput {
  imported: number;
  /** Entries previously stored; null when the old store could not be read. */
  replaced: number | null;
}

export interface PathOutput {
  path: string;
}
