// EntryStore - ordered entry log and the start/stop state machine

import {
  type ClosedEntry,
  durationOf,
  type Entry,
  isOpen,
} from "./entry.ts";
import { TtError } from "./errors.ts";

/**
 * `idle`: no entries, or the last entry is closed.
 * `tracking`: the last entry is open.
 */
export type TrackingState = "idle" | "tracking";

export interface StoppedEntry {
  readonly entry: ClosedEntry;
  readonly durationMs: number;
}

/**
 * Ordered sequence of entries, oldest first.
 *
 * The tracking state is never stored on its own: it is read off the last
 * entry's `end`. Entries are only ever appended or closed. Every operation
 * validates before touching the sequence, so a failure leaves it unchanged.
 */
export class EntryStore {
  private readonly entries: Entry[];

  /**
   * Builds a store from an existing sequence.
   * Throws `corrupt_store` when the sequence breaks an invariant.
   */
  constructor(entries: readonly Entry[] = []) {
    assertValidSequence(entries);
    this.entries = [...entries];
  }

  get state(): TrackingState {
    return this.openEntry() ? "tracking" : "idle";
  }

  get size(): number {
    return this.entries.length;
  }

  last(): Entry | null {
    return this.entries.at(-1) ?? null;
  }

  openEntry(): Entry | null {
    const last = this.last();
    return last && isOpen(last) ? last : null;
  }

  list(): readonly Entry[] {
    return [...this.entries];
  }

  start(description: string, at: Date): Entry {
    if (this.state === "tracking") {
      throw new TtError(
        "already_tracking",
        `Time tracking is already running: "${this.openEntry()?.description ?? ""}"`,
      );
    }

    const last = this.last();
    const notBefore = last ? (last.end ?? last.start) : null;
    if (notBefore && at < notBefore) {
      throw new TtError(
        "invalid_time",
        `Cannot start at ${at.toISOString()}: the previous entry ends at ${notBefore.toISOString()}`,
      );
    }

    const entry: Entry = { description, start: at, end: null };
    this.entries.push(entry);
    return entry;
  }

  stop(at: Date): StoppedEntry {
    const open = this.openEntry();
    if (!open) {
      throw new TtError("not_tracking", "Time tracking is already stopped");
    }
    if (at < open.start) {
      throw new TtError(
        "invalid_time",
        `Cannot stop at ${at.toISOString()}: the entry started at ${open.start.toISOString()}`,
      );
    }

    const entry: ClosedEntry = { ...open, end: at };
    this.entries[this.entries.length - 1] = entry;
    return { entry, durationMs: durationOf(entry, at) };
  }

  /**
   * Starts a new entry with the description of the most recent one.
   */
  continueLast(at: Date): Entry {
    const last = this.last();
    if (!last) {
      throw new TtError(
        "nothing_to_continue",
        "Time tracking couldn't be continued, because there are no entries. Use the start command instead",
      );
    }
    // The new entry must not share the previous start
    const start = at > last.start ? at : new Date(last.start.getTime() + 1);
    return this.start(last.description, start);
  }
}

/**
 * Throws `corrupt_store` unless the sequence is one the state machine could
 * have produced.
 */
export function assertValidSequence(entries: readonly Entry[]): void {
  entries.forEach((entry, i) => {
    const position = i + 1;
    if (isNaN(entry.start.getTime())) {
      throw corrupt(position, "invalid start timestamp");
    }
    if (entry.end !== null) {
      if (isNaN(entry.end.getTime())) {
        throw corrupt(position, "invalid end timestamp");
      }
      if (entry.end < entry.start) {
        throw corrupt(position, "end is before start");
      }
    } else if (i !== entries.length - 1) {
      throw corrupt(position, "open entry is not the last entry");
    }

    const previous = i > 0 ? entries[i - 1] : undefined;
    if (previous && entry.start < previous.start) {
      throw corrupt(position, "start is before the previous entry's start");
    }
  });
}

function corrupt(position: number, reason: string): TtError {
  return new TtError("corrupt_store", `Entry ${position}: ${reason}`);
}
