// Entry repository port - persistence interface for the entry log

import type { Entry } from "../entities/entry.ts";

/**
 * Read side: anything entries can be loaded from (the store, an export file).
 */
export interface EntrySource {
  /** Load the full ordered sequence. Throws `corrupt_store` on invalid data. */
  load(): Promise<Entry[]>;
}

/**
 * Repository for persisting and retrieving the entry log.
 */
export interface EntryRepository extends EntrySource {
  /** Replace the stored sequence atomically. */
  save(entries: readonly Entry[]): Promise<void>;

  /** Location of the backing store, for display. */
  location(): string;
}
