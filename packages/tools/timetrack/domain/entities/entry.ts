// Entry entity - one logged work session

/**
 * Immutable entry entity.
 * `end` is null while the session is running (open entry).
 */
export type Entry = {
  readonly description: string;
  readonly start: Date;
  readonly end: Date | null;
};

export type ClosedEntry = Entry & { readonly end: Date };

export function isOpen(entry: Entry): boolean {
  return entry.end === null;
}

export function isClosed(entry: Entry): entry is ClosedEntry {
  return entry.end !== null;
}

/**
 * Elapsed milliseconds of an entry. Open entries are measured against `now`,
 * and count zero until their start is reached.
 */
export function durationOf(entry: Entry, now: Date): number {
  if (isClosed(entry)) {
    return entry.end.getTime() - entry.start.getTime();
  }
  return Math.max(0, now.getTime() - entry.start.getTime());
}

