// ExportEntriesUseCase - Machine-readable dump of the entry log

import { EntryStore } from "../../entities/entry-store.ts";
import type { ExportOutput } from "../../entities/outputs.ts";
import {
  ALL_TIME,
  type EntryFilter,
  ReportEngine,
} from "../../entities/report-engine.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export class ExportEntriesUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly engine: ReportEngine = new ReportEngine(),
  ) {}

  async execute(input: EntryFilter = { range: ALL_TIME }): Promise<ExportOutput> {
    const store = new EntryStore(await this.repo.load());
    return this.engine.export(store.list(), input);
  }
}
