// GetStatusUseCase - Report the latest entry and whether tracking is active

import { type Clock, systemClock } from "../../entities/clock.ts";
import { durationOf, isOpen } from "../../entities/entry.ts";
import { EntryStore } from "../../entities/entry-store.ts";
import type { StatusOutput } from "../../entities/outputs.ts";
import { toEntryRecord } from "../../entities/report-engine.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export class GetStatusUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly now: Clock = systemClock,
  ) {}

  async execute(): Promise<StatusOutput> {
    const store = new EntryStore(await this.repo.load());
    const last = store.last();
    if (!last) {
      return { state: "idle", entry: null, elapsed_ms: null };
    }
    return {
      state: store.state,
      entry: toEntryRecord(last),
      elapsed_ms: isOpen(last) ? durationOf(last, this.now()) : null,
    };
  }
}
