#!/usr/bin/env node
import process from "node:process";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { CliUsageError, parseCliOptions, type WordLadderOptions } from "./config/options.js";
import { loadDictionary } from "./dictionary.js";
import { StructuredLogger, type LogSink } from "./logger.js";
import { formatAnswers, writeAnswers } from "./output.js";
import { QueryFormatError, loadQueries } from "./queries.js";
import { WordLadderSolver } from "./solver.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

export interface CliDependencies {
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Receives the answers when `--stdout` is given, and the usage text. */
  readonly stdout?: LogSink;
  readonly createLogger?: (options: WordLadderOptions) => StructuredLogger;
}

const USAGE = [
  "Usage: word-ladder <dictionary> <queries> [--output file | --stdout] [--enforce-query-bound]",
  "                   [--log-file file] [--log-level debug|info|warn|error]",
  "",
  "Examples:",
  "  word-ladder words.dic problems.pal",
  "  word-ladder words.dic problems.pal --stdout --log-level warn",
  "",
].join("\n");

/** Runs the tool and resolves with the process exit code. */
export async function runCli(argv: readonly string[], dependencies: CliDependencies = {}): Promise<number> {
  const stdout = dependencies.stdout ?? process.stdout;
  if (argv.length === 0) {
    stdout.write(`${USAGE}\n`);
    return EXIT_FAILURE;
  }

  let options: WordLadderOptions;
  try {
    options = parseCliOptions(argv, dependencies.env ?? process.env);
  } catch (error) {
    if (error instanceof CliUsageError) {
      process.stderr.write(`${error.message}\n${USAGE}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const logger = dependencies.createLogger
    ? dependencies.createLogger(options)
    : new StructuredLogger({ logFile: options.logFile, minLevel: options.logLevel });

  try {
    const [dictionary, queries] = await Promise.all([
      loadDictionary(options.dictionaryPath),
      loadQueries(options.queriesPath),
    ]);
    logger.info("inputs_loaded", { words: dictionary.length, queries: queries.length });

    const solver = new WordLadderSolver(dictionary, queries, {
      logger,
      enforceQueryBound: options.enforceQueryBound,
    });
    solver.prepare();
    const answers = solver.solveAll();

    if (options.outputPath === null) {
      stdout.write(formatAnswers(answers));
    } else {
      await writeAnswers(options.outputPath, answers);
    }
    logger.info("answers_written", {
      destination: options.outputPath ?? "stdout",
      answers: answers.length,
      unreachable: answers.filter((answer) => answer.status !== "path").length,
    });
    return EXIT_OK;
  } catch (error) {
    if (error instanceof QueryFormatError) {
      logger.error("query_file_invalid", { line: error.line, details: error.details });
      return EXIT_FAILURE;
    }
    logger.error("run_failed", error instanceof Error ? { name: error.name, message: error.message } : { error: String(error) });
    return EXIT_FAILURE;
  } finally {
    await logger.flush();
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  // npm links the bin through a symlink, so compare resolved paths.
  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    return realpathSync(executedFromCli) === thisModulePath;
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = EXIT_FAILURE;
    });
}
