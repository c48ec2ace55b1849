/**
 * Adapter: ExportFileSource
 *
 * Reads entries back from a JSON export (`tt export`):
 *
 *   { "entries": [{ "description", "start", "end", "duration_ms" }] }
 *
 * `duration_ms` is derived data and ignored on the way in.
 *
 * Dependencies:
 *   - FileSystem (port) for file operations
 */

import type { Entry } from "../../domain/entities/entry.ts";
import { TtError } from "../../domain/entities/errors.ts";
import type { FileSystem } from "../../domain/ports/filesystem.ts";
import type { EntrySource } from "../../domain/ports/entry-repository.ts";
import { decodeEntry } from "./entry-codec.ts";

export class ExportFileSource implements EntrySource {
  constructor(
    private readonly fs: FileSystem,
    private readonly path: string,
  ) {}

  async load(): Promise<Entry[]> {
    const content = await this.fs.readFile(this.path);

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (e) {
      throw new TtError(
        "corrupt_store",
        `Export file is not valid JSON: ${this.path}`,
        { cause: e },
      );
    }

    const records = typeof data === "object" && data !== null &&
        "entries" in data
      ? data.entries
      : undefined;
    if (!Array.isArray(records)) {
      throw new TtError(
        "corrupt_store",
        `Export file has no "entries" array: ${this.path}`,
      );
    }

    return records.map((record: unknown, i) =>
      decodeEntry(record, `entry ${i + 1}`)
    );
  }
}
