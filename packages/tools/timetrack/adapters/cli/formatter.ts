/**
 * CLI output formatters for timetrack commands.
 *
 * All formatX() functions transform command output objects into human-readable strings.
 * These are pure functions with no side effects.
 */

import type { TtError } from "../../domain/entities/errors.ts";
import type {
  EntryRecord,
  ExportOutput,
  ImportOutput,
  ListOutput,
  ShowOutput,
  StartOutput,
  StatusOutput,
  StopOutput,
} from "../../domain/entities/outputs.ts";

export const DEFAULT_DURATION_FORMAT = "{hh}:{mm}:{ss}";

// ============================================================================
// Time helpers
// ============================================================================

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Render a duration through a template.
 * Tokens: {hh} {mm} {ss} (zero padded), {h} {m} {s}.
 */
export function formatDuration(
  ms: number,
  template: string = DEFAULT_DURATION_FORMAT,
): string {
  const sign = ms < 0 ? "-" : "";
  const totalSeconds = Math.floor(Math.abs(ms) / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  return sign + template
    .replaceAll("{hh}", pad(hours))
    .replaceAll("{mm}", pad(minutes))
    .replaceAll("{ss}", pad(seconds))
    .replaceAll("{h}", String(hours))
    .replaceAll("{m}", String(minutes))
    .replaceAll("{s}", String(seconds));
}

/** "2026-03-02 09:05:00" in local time */
export function formatTimestamp(iso: string): string {
  const date = new Date(iso);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${
    pad(date.getDate())
  } ${formatClock(iso)}`;
}

/** "09:05:00" in local time */
export function formatClock(iso: string): string {
  const date = new Date(iso);
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${
    pad(date.getSeconds())
  }`;
}

function quoted(description: string): string {
  return description ? ` "${description}"` : "";
}

// ============================================================================
// Formatters
// ============================================================================

export function formatStart(output: StartOutput): string {
  const lines: string[] = [];
  if (output.stopped) {
    lines.push(formatStop(output.stopped));
  }
  lines.push(
    `Started${quoted(output.description)} at ${formatClock(output.start)}`,
  );
  return lines.join("\n");
}

export function formatStop(output: StopOutput): string {
  return `Stopped${quoted(output.description)} at ${
    formatClock(output.end)
  } (${formatDuration(output.duration_ms)})`;
}

export function formatStatus(output: StatusOutput): string {
  if (!output.entry) {
    return "No entries found";
  }
  const active = output.state === "tracking";
  const lines: string[] = [];
  lines.push(`Active: ${active}`);
  if (output.entry.description) {
    lines.push(`Description: ${output.entry.description}`);
  }
  if (active) {
    lines.push(`Start Time: ${formatClock(output.entry.start)}`);
    if (output.elapsed_ms !== null) {
      lines.push(`Elapsed: ${formatDuration(output.elapsed_ms)}`);
    }
  } else if (output.entry.end) {
    lines.push(`End Time: ${formatClock(output.entry.end)}`);
  }
  return lines.join("\n");
}

/**
 * One line per entry:
 * "2026-03-02 09:00:00 - 10:30:00  01:30:00  review"
 */
export function formatEntryLine(
  entry: EntryRecord,
  durationMs: number | null,
): string {
  const end = entry.end ? formatClock(entry.end) : "running";
  const duration = durationMs === null ? "" : `  ${formatDuration(durationMs)}`;
  const description = entry.description ? `  ${entry.description}` : "";
  return `${formatTimestamp(entry.start)} - ${end}${duration}${description}`;
}

export function formatList(output: ListOutput): string {
  if (output.entries.length === 0) {
    return "No entries";
  }
  return output.entries
    .map((entry) => formatEntryLine(entry, entry.duration_ms))
    .join("\n");
}

export interface ShowFormatOptions {
  readonly template?: string;
  readonly plain?: boolean;
  readonly remaining?: boolean;
}

export function formatShow(
  output: ShowOutput,
  options: ShowFormatOptions = {},
): string {
  const remainingMs = options.remaining ? output.remaining_ms : undefined;
  const time = formatDuration(remainingMs ?? output.total_ms, options.template);

  if (options.plain) {
    return time;
  }

  const lines: string[] = [];
  if (remainingMs === undefined && output.days.length > 1) {
    for (const day of output.days) {
      lines.push(
        `${day.day}  ${formatDuration(day.duration_ms, options.template)}`,
      );
    }
  }
  lines.push(
    remainingMs !== undefined
      ? `Remaining Work Time: ${time}`
      : `Work Time: ${time}`,
  );
  return lines.join("\n");
}

/**
 * Human-readable export. For reading only: it cannot be imported back.
 */
export function formatReadableExport(output: ExportOutput): string {
  return output.entries
    .map((entry) => formatEntryLine(entry, entry.duration_ms))
    .join("\n");
}

export function formatImport(output: ImportOutput): string {
  return `imported: ${output.imported}\nreplaced: ${output.replaced ?? "unknown"}`;
}

export function formatError(error: TtError): string {
  return `error: ${error.code}\n${error.message}`;
}
