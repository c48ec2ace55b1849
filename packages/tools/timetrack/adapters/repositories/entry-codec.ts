/**
 * Record -> Entry decoding shared by the store file and export files.
 *
 * Records are validated with zod; anything that does not describe a valid
 * entry is reported as `corrupt_store` with its position in the source.
 */

import { z } from "zod/mini";
import type { Entry } from "../../domain/entities/entry.ts";
import { TtError } from "../../domain/entities/errors.ts";

const EntryRecordSchema = z.object({
  description: z.string(),
  start: z.iso.datetime({ offset: true }),
  end: z.nullable(z.iso.datetime({ offset: true })),
});

/**
 * @param where - position label used in error messages, e.g. "line 3"
 */
export function decodeEntry(value: unknown, where: string): Entry {
  const result = EntryRecordSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.map(String).join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new TtError(
      "corrupt_store",
      `Invalid entry at ${where}: ${issues.join("; ")}`,
    );
  }

  const record = result.data;
  return {
    description: record.description,
    start: new Date(record.start),
    end: record.end === null ? null : new Date(record.end),
  };
}
