#!/usr/bin/env tsx
import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { Command, CommanderError } from "commander";
import { type Config, expandHome, loadConfig } from "./config.ts";
import { setLogLevel } from "./logger.ts";
import { systemClock } from "./domain/entities/clock.ts";
import { TtError } from "./domain/entities/errors.ts";
import type { PathOutput } from "./domain/entities/outputs.ts";
import {
  type Goal,
  ReportEngine,
} from "./domain/entities/report-engine.ts";
import { StartTrackingUseCase } from "./domain/use-cases/tracking/start-tracking.ts";
import { StopTrackingUseCase } from "./domain/use-cases/tracking/stop-tracking.ts";
import { ContinueTrackingUseCase } from "./domain/use-cases/tracking/continue-tracking.ts";
import { GetStatusUseCase } from "./domain/use-cases/tracking/get-status.ts";
import { ListEntriesUseCase } from "./domain/use-cases/report/list-entries.ts";
import { ShowReportUseCase } from "./domain/use-cases/report/show-report.ts";
import { ExportEntriesUseCase } from "./domain/use-cases/report/export-entries.ts";
import { ImportEntriesUseCase } from "./domain/use-cases/report/import-entries.ts";
import { NodeFileSystem } from "./adapters/filesystem/node-fs.ts";
import { JsonlEntryRepository } from "./adapters/repositories/jsonl-entry-repo.ts";
import { ExportFileSource } from "./adapters/repositories/export-file-source.ts";
import {
  parseDateTime,
  resolveRange,
  weekRange,
} from "./adapters/cli/time-parser.ts";
import {
  formatError,
  formatImport,
  formatList,
  formatReadableExport,
  formatShow,
  formatStart,
  formatStatus,
  formatStop,
} from "./adapters/cli/formatter.ts";

// ============================================================================
// Version
// ============================================================================

const VERSION = "0.3.0";

// ============================================================================
// Context
// ============================================================================

type Env = Readonly<Record<string, string | undefined>>;

interface CliContext {
  readonly env: Env;
  exitCode: number;
}

type GlobalOptions = {
  dataFile?: string;
};

interface JsonOption {
  json?: boolean;
}

interface RangeFlags {
  from?: string;
  to?: string;
}

const fs = new NodeFileSystem();

function openStore(
  ctx: CliContext,
  command: Command,
): { config: Config; repo: JsonlEntryRepository } {
  const config = loadConfig(ctx.env);
  setLogLevel(config.logLevel);

  const { dataFile } = command.optsWithGlobals<GlobalOptions>();
  const path = resolve(dataFile ? expandHome(dataFile) : config.dataFile);
  return { config, repo: new JsonlEntryRepository(fs, path) };
}

function handleError(e: unknown, json: boolean, ctx: CliContext): void {
  if (e instanceof TtError) {
    if (json) {
      console.error(JSON.stringify(e.toJSON()));
    } else {
      console.error(formatError(e));
    }
    ctx.exitCode = 1;
    return;
  }
  throw e;
}

// ============================================================================
// Commands
// ============================================================================

function buildProgram(ctx: CliContext): Command {
  const program = new Command()
    .name("tt")
    .version(VERSION)
    .description(
      "Timetrack - Track working time from the command line\n\n" +
        "Core workflow:\n" +
        '  1. tt start "task"      # Start tracking\n' +
        "  2. tt stop              # Stop tracking\n" +
        "  3. tt continue          # Resume with the last description\n" +
        "  4. tt show              # Work time for today\n\n" +
        "See 'tt <command> --help' for details",
    )
    .option("-d, --data-file <path>", "Which data file to use")
    .exitOverride();

  program
    .command("start")
    .description("Start time tracking")
    .argument("[description...]", "A description for the entry", [])
    .option(
      "-a, --at <time>",
      "When the entry started: HH:MM[:SS] or YYYY-MM-DD HH:MM[:SS]",
    )
    .option("--json", "Output as JSON")
    .action(
      async (
        words: string[],
        options: JsonOption & { at?: string },
        command: Command,
      ) => {
        try {
          const { config, repo } = openStore(ctx, command);
          const now = systemClock();
          const output = await new StartTrackingUseCase(
            repo,
            { autoInsertStop: config.autoInsertStop },
            () => now,
            (msg) => console.error(msg),
          ).execute({
            description: words.join(" "),
            at: options.at ? parseDateTime(options.at, now) : undefined,
          });
          console.log(options.json ? JSON.stringify(output) : formatStart(output));
        } catch (e) {
          handleError(e, options.json ?? false, ctx);
        }
      },
    );

  program
    .command("stop")
    .description("Stop time tracking")
    .option(
      "-a, --at <time>",
      "When the entry ended: HH:MM[:SS] or YYYY-MM-DD HH:MM[:SS]",
    )
    .option("--json", "Output as JSON")
    .action(
      async (options: JsonOption & { at?: string }, command: Command) => {
        try {
          const { repo } = openStore(ctx, command);
          const now = systemClock();
          const output = await new StopTrackingUseCase(repo, () => now)
            .execute({
              at: options.at ? parseDateTime(options.at, now) : undefined,
            });
          console.log(options.json ? JSON.stringify(output) : formatStop(output));
        } catch (e) {
          handleError(e, options.json ?? false, ctx);
        }
      },
    );

  program
    .command("continue")
    .description("Continue time tracking with the last description")
    .option("--json", "Output as JSON")
    .action(async (options: JsonOption, command: Command) => {
      try {
        const { repo } = openStore(ctx, command);
        const output = await new ContinueTrackingUseCase(repo).execute();
        console.log(options.json ? JSON.stringify(output) : formatStart(output));
      } catch (e) {
        handleError(e, options.json ?? false, ctx);
      }
    });

  program
    .command("status")
    .description(
      "Show the latest entry. Exits with 0 while tracking is active, 1 otherwise",
    )
    .option("--json", "Output as JSON")
    .action(async (options: JsonOption, command: Command) => {
      try {
        const { repo } = openStore(ctx, command);
        const output = await new GetStatusUseCase(repo).execute();
        console.log(options.json ? JSON.stringify(output) : formatStatus(output));
        if (output.state !== "tracking") {
          ctx.exitCode = 1;
        }
      } catch (e) {
        handleError(e, options.json ?? false, ctx);
      }
    });

  program
    .command("list")
    .description("List entries (default: today)")
    .argument(
      "[filter]",
      'Time span ("week", "all") or part of the description',
    )
    .option("-f, --from <time>", "Entries starting at or after this time")
    .option("-t, --to <time>", "Entries starting before this time")
    .option("--json", "Output as JSON")
    .action(
      async (
        filter: string | undefined,
        options: JsonOption & RangeFlags,
        command: Command,
      ) => {
        try {
          const { repo } = openStore(ctx, command);
          const now = systemClock();
          const resolved = resolveRange({ ...options, filter }, now);
          const output = await new ListEntriesUseCase(
            repo,
            new ReportEngine(),
            () => now,
          ).execute(resolved);
          console.log(options.json ? JSON.stringify(output) : formatList(output));
        } catch (e) {
          handleError(e, options.json ?? false, ctx);
        }
      },
    );

  program
    .command("show")
    .description("Show work time for a time span (default: today)")
    .argument(
      "[filter]",
      'Time span ("week", "all") or part of the description',
    )
    .option("-f, --from <time>", "Entries starting at or after this time")
    .option("-t, --to <time>", "Entries starting before this time")
    .option("-p, --plain", "Show only the time with no additional text")
    .option("-r, --remaining", "Show the time left until the goals are met")
    .option("-s, --seconds", "Include seconds in the time calculation")
    .option(
      "--format <template>",
      "Duration template: {hh} {mm} {ss} {h} {m} {s}",
    )
    .option("--json", "Output as JSON")
    .action(
      async (
        filter: string | undefined,
        options: JsonOption & RangeFlags & {
          plain?: boolean;
          remaining?: boolean;
          seconds?: boolean;
          format?: string;
        },
        command: Command,
      ) => {
        try {
          const { config, repo } = openStore(ctx, command);
          const now = systemClock();
          const resolved = resolveRange({ ...options, filter }, now);

          let goals: Goal[] | undefined;
          if (options.remaining) {
            if (
              resolved.description ||
              (resolved.keyword !== "today" && resolved.keyword !== "week")
            ) {
              throw new TtError(
                "invalid_args",
                'Remaining only works without --from/--to and with no filter or filter "week"',
              );
            }
            const week: Goal = {
              range: weekRange(now),
              goal_ms: config.weeklyGoalMs,
            };
            goals = resolved.keyword === "week"
              ? [week]
              : [{ range: resolved.range, goal_ms: config.dailyGoalMs }, week];
          }

          const engine = new ReportEngine({
            precision: options.seconds ? "seconds" : "minutes",
          });
          const output = await new ShowReportUseCase(repo, engine, () => now)
            .execute({ ...resolved, goals });
          console.log(
            options.json ? JSON.stringify(output) : formatShow(output, {
              template: options.format,
              plain: options.plain,
              remaining: options.remaining,
            }),
          );
        } catch (e) {
          handleError(e, options.json ?? false, ctx);
        }
      },
    );

  program
    .command("export")
    .description("Export entries as JSON (default: all entries, to stdout)")
    .argument("[path]", "Where to write the output file")
    .option(
      "--filter <filter>",
      'Time span ("week", "all") or part of the description',
    )
    .option("-f, --from <time>", "Entries starting at or after this time")
    .option("-t, --to <time>", "Entries starting before this time")
    .option("--pretty", "Pretty print JSON")
    .option(
      "-r, --readable",
      "Human readable format (for reading only, cannot be imported)",
    )
    .action(
      async (
        path: string | undefined,
        options: RangeFlags & {
          filter?: string;
          pretty?: boolean;
          readable?: boolean;
        },
        command: Command,
      ) => {
        try {
          const { repo } = openStore(ctx, command);
          const resolved = resolveRange(options, systemClock(), true);
          const output = await new ExportEntriesUseCase(repo).execute(resolved);

          const content = options.readable
            ? formatReadableExport(output)
            : JSON.stringify(output, null, options.pretty ? 2 : undefined);
          if (path) {
            await fs.writeFile(resolve(expandHome(path)), content + "\n");
          } else {
            console.log(content);
          }
        } catch (e) {
          handleError(e, false, ctx);
        }
      },
    );

  program
    .command("import")
    .description("Replace all entries with the content of a JSON export")
    .argument("<path>", "Which file to import")
    .option("--json", "Output as JSON")
    .action(async (path: string, options: JsonOption, command: Command) => {
      try {
        const { repo } = openStore(ctx, command);
        const source = new ExportFileSource(fs, resolve(expandHome(path)));
        const output = await new ImportEntriesUseCase(repo).execute(source);
        console.log(options.json ? JSON.stringify(output) : formatImport(output));
      } catch (e) {
        handleError(e, options.json ?? false, ctx);
      }
    });

  program
    .command("path")
    .description("Show the path to the data file")
    .option("--json", "Output as JSON")
    .action((options: JsonOption, command: Command) => {
      try {
        const { repo } = openStore(ctx, command);
        const output: PathOutput = { path: repo.location() };
        console.log(options.json ? JSON.stringify(output) : output.path);
      } catch (e) {
        handleError(e, options.json ?? false, ctx);
      }
    });

  return program;
}

// ============================================================================
// Main CLI
// ============================================================================

/**
 * Run one command. Resolves to the process exit code.
 */
export async function main(
  args: string[],
  env: Env = process.env,
): Promise<number> {
  const ctx: CliContext = { env, exitCode: 0 };
  const program = buildProgram(ctx);

  // Show help when no arguments provided
  if (args.length === 0) {
    program.outputHelp();
    return 0;
  }

  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
  return ctx.exitCode;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    // Script path not resolvable (e.g. REPL); not run directly
    return false;
  }
}

// Run if executed directly
if (isEntryPoint()) {
  process.exitCode = await main(process.argv.slice(2));
}
