import { format, parse } from "node:path";

import { LOG_LEVELS, isLogLevel, type LogLevel } from "../logger.js";
import { readBool, readEnum, readOptionalString } from "./env.js";

/** Runtime configuration resolved from the command line and the environment. */
export interface WordLadderOptions {
  readonly dictionaryPath: string;
  readonly queriesPath: string;
  /** File receiving the answers, `null` when they go to stdout. */
  readonly outputPath: string | null;
  /**
   * Restrict each search to steps within the query's own permitted distance
   * instead of the largest bound requested for that word length.
   */
  readonly enforceQueryBound: boolean;
  readonly logLevel: LogLevel;
  readonly logFile: string | null;
}

/** Error raised when the command line cannot be turned into {@link WordLadderOptions}. */
export class CliUsageError extends Error {
  public readonly code = "E-CLI-USAGE";

  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const ENV_LOG_LEVEL = "WORD_LADDER_LOG_LEVEL";
export const ENV_LOG_FILE = "WORD_LADDER_LOG_FILE";
export const ENV_ENFORCE_QUERY_BOUND = "WORD_LADDER_ENFORCE_QUERY_BOUND";

/**
 * Output file written next to the query file: same directory and base name
 * with the `.path` extension.
 */
export function defaultOutputPath(queriesPath: string): string {
  const parsed = parse(queriesPath);
  if (parsed.ext === ".path") {
    return `${queriesPath}.path`;
  }
  return format({ dir: parsed.dir, name: parsed.name, ext: ".path" });
}

/**
 * Parses `<dictionary> <queries> [flags]`. Flags override the environment,
 * which overrides the built-in defaults.
 */
export function parseCliOptions(
  argv: readonly string[],
  env: Readonly<Record<string, string | undefined>> = process.env,
): WordLadderOptions {
  const positionals: string[] = [];
  let output: string | undefined;
  let toStdout = false;
  let enforceQueryBound = readBool(ENV_ENFORCE_QUERY_BOUND, false, env);
  let logLevel = readEnum(ENV_LOG_LEVEL, LOG_LEVELS, "info", env);
  let logFile = readOptionalString(ENV_LOG_FILE, env) ?? null;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    switch (token) {
      case "--output": {
        output = expectValue(argv, (i += 1), token);
        break;
      }
      case "--stdout":
        toStdout = true;
        break;
      case "--enforce-query-bound":
        enforceQueryBound = true;
        break;
      case "--log-file": {
        logFile = expectValue(argv, (i += 1), token);
        break;
      }
      case "--log-level": {
        const value = expectValue(argv, (i += 1), token).toLowerCase();
        if (!isLogLevel(value)) {
          throw new CliUsageError(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
        }
        logLevel = value;
        break;
      }
      default:
        if (token.startsWith("--")) {
          throw new CliUsageError(`Unknown argument '${token}'`);
        }
        positionals.push(token);
    }
  }

  if (positionals.length !== 2) {
    throw new CliUsageError("expected exactly two positional arguments: <dictionary> <queries>");
  }
  if (toStdout && output !== undefined) {
    throw new CliUsageError("--stdout and --output are mutually exclusive");
  }

  const [dictionaryPath, queriesPath] = positionals;
  return {
    dictionaryPath,
    queriesPath,
    outputPath: toStdout ? null : (output ?? defaultOutputPath(queriesPath)),
    enforceQueryBound,
    logLevel,
    logFile,
  };
}

function expectValue(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith("--")) {
    throw new CliUsageError(`${flag} expects a value`);
  }
  return value;
}
