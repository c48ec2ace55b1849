// StartTrackingUseCase - Open a new entry

import { type Clock, systemClock } from "../../entities/clock.ts";
import { EntryStore, type StoppedEntry } from "../../entities/entry-store.ts";
import { TtError } from "../../entities/errors.ts";
import type { StartOutput, StopOutput } from "../../entities/outputs.ts";
import type { EntryRepository } from "../../ports/entry-repository.ts";

export interface StartTrackingInput {
  readonly description: string;
  /** Explicit start time; defaults to now. */
  readonly at?: Date;
}

export interface StartTrackingOptions {
  /** Stop a running entry instead of failing with `already_tracking`. */
  readonly autoInsertStop?: boolean;
}

export class StartTrackingUseCase {
  constructor(
    private readonly repo: EntryRepository,
    private readonly options: StartTrackingOptions = {},
    private readonly now: Clock = systemClock,
    private readonly warn: (msg: string) => void = (_msg) => {},
  ) {}

  async execute(input: StartTrackingInput): Promise<StartOutput> {
    const store = new EntryStore(await this.repo.load());
    const now = this.now();

    let stopped: StoppedEntry | null = null;
    const open = store.openEntry();
    if (open && this.options.autoInsertStop) {
      if (input.at) {
        throw new TtError(
          "invalid_args",
          "Auto-inserting a stop is not supported with --at",
        );
      }
      if (open.description === input.description) {
        throw new TtError(
          "already_tracking",
          `Time tracking with the description "${input.description}" is already running`,
        );
      }
      stopped = store.stop(now);
      this.warn(`Stopped "${open.description}" before starting a new entry.`);
    }

    const entry = store.start(input.description, input.at ?? now);
    await this.repo.save(store.list());

    return {
      status: "started",
      description: entry.description,
      start: entry.start.toISOString(),
      stopped: stopped ? toStopOutput(stopped) : null,
    };
  }
}

export function toStopOutput(stopped: StoppedEntry): StopOutput {
  return {
    status: "stopped",
    description: stopped.entry.description,
    start: stopped.entry.start.toISOString(),
    end: stopped.entry.end.toISOString(),
    duration_ms: stopped.durationMs,
  };
}
