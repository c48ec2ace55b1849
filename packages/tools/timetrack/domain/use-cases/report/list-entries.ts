// ListEntriesUseCase - Entries whose start falls in a range

import { type Clock, systemClock } from "../../entities/clock.ts";
import { EntryStore } from "../../entities/entry-store.ts";
import type { ListOutput } from "../../entities/outputs.ts";
import {
  type EntryFilter,
  ReportEngine,
} from "../../entities/report-engine.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export class ListEntriesUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly engine: ReportEngine = new ReportEngine(),
    private readonly now: Clock = systemClock,
  ) {}

  async execute(input: EntryFilter): Promise<ListOutput> {
    const store = new EntryStore(await this.repo.load());
    return this.engine.list(store.list(), input, this.now());
  }
}
