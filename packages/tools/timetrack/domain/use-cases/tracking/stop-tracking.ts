// StopTrackingUseCase - Close the open entry

import { type Clock, systemClock } from "../../entities/clock.ts";
import { EntryStore } from "../../entities/entry-store.ts";
import type { StopOutput } from "../../entities/outputs.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";
import { toStopOutput } from "./start-tracking.ts";

export interface StopTrackingInput {
  /** Explicit end time; defaults to now. */
  readonly at?: Date;
}

export class StopTrackingUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly now: Clock = systemClock,
  ) {}

  async execute(input: StopTrackingInput = {}): Promise<StopOutput> {
    const store = new EntryStore(await this.repo.load());
    const stopped = store.stop(input.at ?? this.now());
    await this.repo.save(store.list());
    return toStopOutput(stopped);
  }
}
