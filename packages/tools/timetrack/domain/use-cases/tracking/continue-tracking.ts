// ContinueTrackingUseCase - Start a new entry with the last description

import { type Clock, systemClock } from "../../entities/clock.ts";
import { EntryStore } from "../../entities/entry-store.ts";
import type { StartOutput } from "../../entities/outputs.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export class ContinueTrackingUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly now: Clock = systemClock,
  ) {}

  async execute(): Promise<StartOutput> {
    const store = new EntryStore(await this.repo.load());
    const entry = store.continueLast(this.now());
    await this.repo.save(store.list());

    return {
      status: "started",
      description: entry.description,
      start: entry.start.toISOString(),
      stopped: null,
    };
  }
}
