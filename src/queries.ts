import { readFile } from "node:fs/promises";
import { z } from "zod";

/** One transformation request: go from {@link source} to {@link target}. */
export interface WordQuery {
  readonly source: string;
  readonly target: string;
  /** Largest number of substitutions allowed in a single step. */
  readonly permittedDistance: number;
  /** 1-based line of the query file the request was read from. */
  readonly line: number;
}

/**
 * Error raised when a line of the query file does not hold exactly two words
 * followed by a non-negative integer bound.
 */
export class QueryFormatError extends Error {
  public readonly code = "E-QUERY-FORMAT";

  constructor(
    readonly line: number,
    readonly details: unknown,
  ) {
    super(`query on line ${line} must read '<word> <word> <non-negative integer>'`);
    this.name = "QueryFormatError";
  }
}

const QueryLineSchema = z.tuple([
  z.string().min(1),
  z.string().min(1),
  z
    .string()
    .regex(/^\d+$/, "permitted distance must be a non-negative integer")
    .transform((value) => Number.parseInt(value, 10))
    .refine((value) => Number.isSafeInteger(value), "permitted distance is too large"),
]);

export function parseQueries(contents: string): WordQuery[] {
  const queries: WordQuery[] = [];
  const lines = contents.split(/\r?\n/);

  lines.forEach((raw, offset) => {
    const tokens = raw.trim().split(/\s+/).filter((token) => token.length > 0);
    if (tokens.length === 0) {
      return;
    }
    const line = offset + 1;
    const parsed = QueryLineSchema.safeParse(tokens);
    if (!parsed.success) {
      throw new QueryFormatError(line, parsed.error.flatten());
    }
    const [source, target, permittedDistance] = parsed.data;
    queries.push({ source, target, permittedDistance, line });
  });

  return queries;
}

/**
 * Largest permitted distance requested for every source word length. The
 * result decides which length groups get a graph and how far apart two words
 * of that group may be to share an edge.
 */
export function computeDistanceBounds(queries: Iterable<WordQuery>): Map<number, number> {
  const bounds = new Map<number, number>();
  for (const query of queries) {
    const length = query.source.length;
    const current = bounds.get(length);
    if (current === undefined || current < query.permittedDistance) {
      bounds.set(length, query.permittedDistance);
    }
  }
  return bounds;
}

export async function loadQueries(path: string): Promise<WordQuery[]> {
  return parseQueries(await readFile(path, "utf8"));
}
