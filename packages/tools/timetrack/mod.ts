// Main module exports for timetrack

// ============================================================================
// Domain entities
// ============================================================================

export type { ClosedEntry, Entry } from "./domain/entities/entry.ts";
export { durationOf, isClosed, isOpen } from "./domain/entities/entry.ts";
export type {
  StoppedEntry,
  TrackingState,
} from "./domain/entities/entry-store.ts";
export {
  assertValidSequence,
  EntryStore,
} from "./domain/entities/entry-store.ts";
export type { TtErrorCode } from "./domain/entities/errors.ts";
export { TtError } from "./domain/entities/errors.ts";
export type { Clock } from "./domain/entities/clock.ts";
export { systemClock } from "./domain/entities/clock.ts";
export type {
  EntryFilter,
  Goal,
  Precision,
  ReportEngineOptions,
  TimeRange,
} from "./domain/entities/report-engine.ts";
export {
  ALL_TIME,
  inRange,
  localDay,
  ReportEngine,
  toEntryRecord,
} from "./domain/entities/report-engine.ts";
export type * from "./domain/entities/outputs.ts";

// ============================================================================
// Domain ports (interfaces)
// ============================================================================

export type { FileSystem } from "./domain/ports/filesystem.ts";
export type {
  EntryRepository,
  EntrySource,
} from "./domain/ports/entry-repository.ts";

// ============================================================================
// Use cases
// ============================================================================

export { StartTrackingUseCase } from "./domain/use-cases/tracking/start-tracking.ts";
export { StopTrackingUseCase } from "./domain/use-cases/tracking/stop-tracking.ts";
export { ContinueTrackingUseCase } from "./domain/use-cases/tracking/continue-tracking.ts";
export { GetStatusUseCase } from "./domain/use-cases/tracking/get-status.ts";
export { ListEntriesUseCase } from "./domain/use-cases/report/list-entries.ts";
export { ShowReportUseCase } from "./domain/use-cases/report/show-report.ts";
export { ExportEntriesUseCase } from "./domain/use-cases/report/export-entries.ts";
export { ImportEntriesUseCase } from "./domain/use-cases/report/import-entries.ts";

// ============================================================================
// Adapters
// ============================================================================

export { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
export { InMemoryFileSystem } from "./adapters/filesystem/in-memory-fs.ts";
export {
  JsonlEntryRepository,
  parseEntryLines,
  serializeEntryLines,
} from "./adapters/repositories/jsonl-entry-repo.ts";
export { ExportFileSource } from "./adapters/repositories/export-file-source.ts";
export { resolveRange } from "./adapters/cli/time-parser.ts";
export { type Config, loadConfig } from "./config.ts";
export { main } from "./cli.ts";
