/**
 * Adapter: JsonlEntryRepository
 *
 * Implements the EntryRepository port using a JSON Lines file: one entry
 * record per line, oldest first.
 *
 *   {"description":"review","start":"2026-03-02T09:00:00.000Z","end":null}
 *
 * A missing or empty file is an empty log. Loading checks every line and
 * then the sequence invariants, so a log that loads
 * is always one the state machine could have produced.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 */

import type { Logger } from "pino";
import type { Entry } from "../../domain/entities/entry.ts";
import { assertValidSequence } from "../../domain/entities/entry-store.ts";
import { TtError } from "../../domain/entities/errors.ts";
import { toEntryRecord } from "../../domain/entities/report-engine.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { EntryRepository } from "../../domain/ports/entry-repository.ts";
import { createLogger } from "../../logger.ts";
import { decodeEntry } from "./entry-codec.ts";

export class JsonlEntryRepository implements EntryRepository {
  constructor(
    private readonly fs: FileSystem,
    private readonly path: string,
    private readonly logger: Logger = createLogger({
      component: "entry-repository",
    }),
  ) {}

  async load(): Promise<Entry[]> {
    if (!(await this.fs.exists(this.path))) {
      this.logger.debug({ path: this.path }, "No data file yet");
      return [];
    }

    const content = await this.fs.readFile(this.path);
    const entries = parseEntryLines(content);

    assertValidSequence(entries);

    this.logger.debug(
      { path: this.path, count: entries.length },
      "Loaded entries",
    );
    return entries;
  }

  async save(entries: readonly Entry[]): Promise<void> {
    await this.fs.writeFile(this.path, serializeEntryLines(entries));
    this.logger.debug(
      { path: this.path, count: entries.length },
      "Saved entries",
    );
  }

  location(): string {
    return this.path;
  }
}

export function serializeEntryLines(entries: readonly Entry[]): string {
  return entries.map((entry) => JSON.stringify(toEntryRecord(entry)) + "\n")
    .join("");
}

export function parseEntryLines(content: string): Entry[] {
  const entries: Entry[] = [];
  const lines = content.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (line === "") continue;

    let value: unknown;
    try {
      value = JSON.parse(line);
    } catch (e) {
      throw new TtError(
        "corrupt_store",
        `Invalid JSON at line ${i + 1}`,
        { cause: e },
      );
    }
    entries.push(decodeEntry(value, `line ${i + 1}`));
  }

  return entries;
}
