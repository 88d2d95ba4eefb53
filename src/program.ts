// src/program.ts
import {
  Argument,
  Command,
  InvalidArgumentError,
  Option,
} from "commander";
import { CLI_NAME, VERSION } from "./constants.js";
import { resolveConfig, type Config, type ConfigOverrides } from "./config.js";
import {
  listDuplicates,
  summarizeDuplicates,
  toGroups,
} from "./duplicates.js";
import { errorMessage } from "./errors.js";
import { nodeFileSystem, type FileSystem } from "./fs-ops.js";
import { createFingerprinter, listSupportedHashes } from "./hash.js";
import { collectIgnoreOption } from "./ignore.js";
import { openIndexStore, type IndexStore } from "./index-store.js";
import { ConsoleLogger, LOG_LEVELS, type Logger } from "./logger.js";
import {
  cleanOldFiles,
  findByDateRange,
  findLargeFilesDetailed,
  getStats,
} from "./maintenance.js";
import { createConsoleChooser } from "./prompt.js";
import {
  renderDuplicateGroups,
  renderDuplicateSummaries,
  renderLargeFiles,
  renderOutcome,
  renderStats,
} from "./report.js";
import { resolveDuplicates, type SurvivorChooser } from "./resolve.js";
import { scanTree } from "./scan.js";

export interface ProgramDeps {
  fs?: FileSystem;
  /** interactive survivor selection; defaults to a stdin prompt */
  createChooser?: () => { choose: SurvivorChooser; close: () => void };
  /** throw commander errors instead of exiting (tests) */
  exitOverride?: boolean;
}

export function parseInteger(value: string): number {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    throw new InvalidArgumentError("expected an integer");
  }
  return Number(trimmed);
}

/** Variadic parser for file name suffixes; an empty suffix is refused. */
export function parseSuffix(
  value: string,
  previous: string[] = [],
): string[] {
  if (!value.trim()) {
    throw new InvalidArgumentError("file type suffix must not be empty");
  }
  return [...previous, value];
}

const stringOpt = (v: unknown): string | undefined =>
  typeof v === "string" ? v : undefined;

function globalOverrides(command: Command): ConfigOverrides {
  const globals = command.optsWithGlobals();
  return {
    db: stringOpt(globals.db),
    logLevel: stringOpt(globals.logLevel),
    hash: stringOpt(globals.hash),
    dryRun: globals.dryRun === true,
  };
}

type CommandContext = {
  config: Config;
  store: IndexStore;
  logger: Logger;
};

/**
 * Open the configured index, run one command against it and close it.
 * Failures are printed and turn into exit code 1.
 */
async function withStore(
  command: Command,
  label: string,
  fn: (ctx: CommandContext) => Promise<void> | void,
): Promise<void> {
  let store: IndexStore | undefined;
  try {
    const config = resolveConfig(globalOverrides(command));
    const logger = new ConsoleLogger(config.logLevel);
    store = openIndexStore(config.dbPath, { logger });
    await fn({ config, store, logger: logger.child(label) });
  } catch (err) {
    console.error(`${label} failed: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    store?.close();
  }
}

export function buildProgram(deps: ProgramDeps = {}): Command {
  const fs = deps.fs ?? nodeFileSystem;
  const createChooser = deps.createChooser ?? (() => createConsoleChooser());

  const program = new Command()
    .name(CLI_NAME)
    .description(
      "Index files by content digest, find duplicates and clean up old or large files",
    )
    .version(VERSION);
  if (deps.exitOverride) program.exitOverride();

  // Global flags; defaults come from resolveConfig so env vars can apply
  program
    .option("--db <file>", "path to the SQLite index (env DUPINDEX_DB)")
    .addOption(
      new Option(
        "--log-level <level>",
        "log verbosity (env DUPINDEX_LOG_LEVEL)",
      ).choices(LOG_LEVELS),
    )
    .addOption(
      new Option("--hash <algorithm>", "content digest algorithm").choices(
        listSupportedHashes(),
      ),
    )
    .option("--dry-run", "report what would be deleted without deleting", false)
    // global flags alone, without a command, print usage
    .action((_opts: unknown, command: Command) => {
      if (command.args.length) {
        command.error(`error: unknown command '${command.args[0]}'`);
      }
      command.help();
    });

  program
    .command("create-db")
    .description("Create or open the index database")
    .action(async (_opts: unknown, command: Command) => {
      await withStore(command, "create-db", ({ store }) => {
        console.log(`Index ready at ${store.dbPath}`);
      });
    });

  program
    .command("find-duplicates")
    .description("Scan a directory, index matching files and list duplicates")
    .argument("<directory>", "directory to scan")
    .addArgument(
      new Argument(
        "<file-types...>",
        "file name suffixes to index, e.g. .jpg .png",
      ).argParser(parseSuffix),
    )
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
      [] as string[],
    )
    .action(
      async (
        directory: string,
        fileTypes: string[],
        opts: { ignore: string[] },
        command: Command,
      ) => {
        await withStore(
          command,
          "find-duplicates",
          async ({ config, store, logger }) => {
            const duplicates = await scanTree({
              root: directory,
              extensions: fileTypes,
              store,
              fingerprinter: createFingerprinter(config.hashAlg),
              fs,
              ignore: opts.ignore,
              logger,
            });
            if (!duplicates.size) {
              console.log("No duplicates found.");
              return;
            }
            for (const line of renderDuplicateGroups(duplicates)) {
              console.log(line);
            }
          },
        );
      },
    );

  program
    .command("find-by-date")
    .description("List indexed files modified in a time range (epoch seconds)")
    .argument("<start-date>", "start timestamp, inclusive", parseInteger)
    .option("--end-date <timestamp>", "end timestamp, inclusive", parseInteger)
    .addOption(
      new Option("--end_date <timestamp>").argParser(parseInteger).hideHelp(),
    )
    .action(
      async (
        startDate: number,
        opts: { endDate?: number; end_date?: number },
        command: Command,
      ) => {
        await withStore(command, "find-by-date", ({ store }) => {
          const end = opts.endDate ?? opts.end_date;
          for (const p of findByDateRange(store, startDate, end)) {
            console.log(p);
          }
        });
      },
    );

  program
    .command("find-large-files")
    .description("List indexed files larger than a size in bytes")
    .argument("<size-threshold>", "size threshold in bytes", parseInteger)
    .option("--json", "emit JSON output", false)
    .action(
      async (threshold: number, opts: { json: boolean }, command: Command) => {
        await withStore(command, "find-large-files", ({ store }) => {
          const rows = findLargeFilesDetailed(store, threshold);
          if (opts.json) {
            console.log(JSON.stringify(rows, null, 2));
            return;
          }
          if (!rows.length) {
            console.log(`No indexed files larger than ${threshold} bytes.`);
            return;
          }
          console.log(renderLargeFiles(rows));
        });
      },
    );

  program
    .command("clean-old-files")
    .description(
      "Delete indexed files last modified before a timestamp (epoch seconds)",
    )
    .argument("<age-threshold>", "modification time threshold", parseInteger)
    .action(async (threshold: number, _opts: unknown, command: Command) => {
      await withStore(
        command,
        "clean-old-files",
        async ({ config, store, logger }) => {
          const { removed, pruned } = await cleanOldFiles({
            store,
            threshold,
            fs,
            dryRun: config.dryRun,
            logger,
          });
          const verb = config.dryRun ? "Would delete" : "Cleaned (deleted)";
          for (const p of removed) console.log(`${verb} file: ${p}`);
          for (const p of pruned) {
            console.log(`Dropped missing file from index: ${p}`);
          }
        },
      );
    });

  program
    .command("delete-duplicates-interactive")
    .description("Pick a file to keep in each duplicate group; delete the rest")
    .action(async (_opts: unknown, command: Command) => {
      await withStore(
        command,
        "delete-duplicates-interactive",
        async ({ config, store, logger }) => {
          const groups = toGroups(listDuplicates(store));
          if (!groups.length) {
            console.log("No duplicates found.");
            return;
          }
          const chooser = createChooser();
          try {
            const outcomes = await resolveDuplicates({
              store,
              groups,
              chooseSurvivor: chooser.choose,
              fs,
              dryRun: config.dryRun,
              logger,
            });
            for (const outcome of outcomes) {
              for (const line of renderOutcome(outcome)) console.log(line);
            }
            if (outcomes.some((o) => o.status === "failed")) {
              process.exitCode = 1;
            }
          } finally {
            chooser.close();
          }
        },
      );
    });

  program
    .command("stats")
    .description("Show statistics about the indexed files")
    .option("--json", "emit JSON output", false)
    .action(async (opts: { json: boolean }, command: Command) => {
      await withStore(command, "stats", ({ store }) => {
        const stats = getStats(store);
        console.log(
          opts.json ? JSON.stringify(stats, null, 2) : renderStats(stats),
        );
      });
    });

  program
    .command("show-duplicates")
    .description("Show duplicate files recorded in the index")
    .option("--json", "emit JSON output", false)
    .action(async (opts: { json: boolean }, command: Command) => {
      await withStore(command, "show-duplicates", ({ store }) => {
        const summaries = summarizeDuplicates(store);
        if (opts.json) {
          console.log(JSON.stringify(summaries, null, 2));
          return;
        }
        if (!summaries.length) {
          console.log("No duplicates found.");
          return;
        }
        for (const line of renderDuplicateSummaries(summaries)) {
          console.log(line);
        }
      });
    });

  return program;
}
