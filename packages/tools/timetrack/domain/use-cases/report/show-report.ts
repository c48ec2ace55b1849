// ShowReportUseCase - Worked time per day over a range

import { type Clock, systemClock } from "../../entities/clock.ts";
import { EntryStore } from "../../entities/entry-store.ts";
import type { ShowOutput } from "../../entities/outputs.ts";
import {
  type EntryFilter,
  type Goal,
  ReportEngine,
} from "../../entities/report-engine.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export interface ShowReportInput extends EntryFilter {
  /** When given, the output carries the time left until every goal is met. */
  readonly goals?: readonly Goal[];
}

export class ShowReportUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly engine: ReportEngine = new ReportEngine(),
    private readonly now: Clock = systemClock,
  ) {}

  async execute(input: ShowReportInput): Promise<ShowOutput> {
    const entries = new EntryStore(await this.repo.load()).list();
    const now = this.now();

    const output = this.engine.show(entries, input, now);
    const remaining = this.engine.remaining(entries, input.goals ?? [], now);
    if (remaining !== null) {
      return { ...output, remaining_ms: remaining };
    }
    return output;
  }
}
