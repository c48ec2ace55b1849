import { expect, test } from "vitest";
import { ExportFileSource } from "./export-file-source.ts";
import { InMemoryFileSystem } from "../filesystem/in-memory-fs.ts";
import type { Entry } from "../../domain/entities/entry.ts";
import { ALL_TIME, ReportEngine } from "../../domain/entities/report-engine.ts";

const PATH = "/exports/entries.json";

const d = (iso: string) => new Date(`${iso}Z`);

test("ExportFileSource - reads back what export produced", async () => {
  const entries: Entry[] = [
    { description: "a", start: d("2026-03-02T09:00:00.123"), end: d("2026-03-02T10:00:00") },
    { description: "b", start: d("2026-03-02T11:00:00"), end: null },
  ];
  const fs = new InMemoryFileSystem();
  const output = new ReportEngine().export(entries, { range: ALL_TIME });
  fs.setFile(PATH, JSON.stringify(output, null, 2));

  const loaded = await new ExportFileSource(fs, PATH).load();

  expect(loaded).toEqual(entries);
});

test("ExportFileSource - rejects invalid JSON", async () => {
  const fs = new InMemoryFileSystem();
  fs.setFile(PATH, "[not json");

  await expect(new ExportFileSource(fs, PATH).load()).rejects.toThrow(
    `Export file is not valid JSON: ${PATH}`,
  );
});

test("ExportFileSource - requires an entries array", async () => {
  const fs = new InMemoryFileSystem();
  fs.setFile(PATH, '{"items":[]}');

  await expect(new ExportFileSource(fs, PATH).load()).rejects.toThrow(
    `Export file has no "entries" array: ${PATH}`,
  );
});

test("ExportFileSource - names the invalid entry", async () => {
  const fs = new InMemoryFileSystem();
  fs.setFile(
    PATH,
    '{"entries":[{"description":"a","start":"2026-03-02T09:00:00Z","end":null},{"description":1}]}',
  );

  await expect(new ExportFileSource(fs, PATH).load()).rejects.toThrow(
    /^Invalid entry at entry 2: /,
  );
});

test("ExportFileSource - missing file is an io error", async () => {
  await expect(
    new ExportFileSource(new InMemoryFileSystem(), PATH).load(),
  ).rejects.toMatchObject({ code: "io_error" });
});
