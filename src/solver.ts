import {
  WordGraph,
  WordGraphError,
  pathBetween,
  shortestPath,
  type DistanceFunction,
  type ShortestPathOptions,
} from "../word-graph/src/index.js";
import { groupWordsByLength } from "./dictionary.js";
import { StructuredLogger } from "./logger.js";
import { hammingDistance } from "./metrics/hamming.js";
import { computeDistanceBounds, type WordQuery } from "./queries.js";

export type UnreachableReason = "length-mismatch" | "unknown-word" | "no-path";

export type QueryAnswer =
  | {
      readonly status: "path";
      readonly source: string;
      readonly target: string;
      readonly cost: number;
      readonly words: readonly string[];
    }
  | {
      readonly status: "unreachable";
      readonly source: string;
      readonly target: string;
      readonly reason: UnreachableReason;
    }
  | {
      readonly status: "failed";
      readonly source: string;
      readonly target: string;
      readonly error: { readonly code: string; readonly message: string };
    };

export interface WordLadderSolverOptions {
  readonly logger?: StructuredLogger;
  /** Metric deciding which words share an edge. Defaults to {@link hammingDistance}. */
  readonly distance?: DistanceFunction;
  /** Narrow every search to steps within the query's own permitted distance. */
  readonly enforceQueryBound?: boolean;
}

/** Summary of one length group once {@link WordLadderSolver.prepare} ran. */
export interface LengthGroupSummary {
  readonly length: number;
  readonly maxDistance: number;
  readonly vertexCount: number;
  readonly edgeCount: number;
}

/**
 * Answers word transformation queries against a dictionary.
 *
 * {@link prepare} builds one {@link WordGraph} per word length present in the
 * queries, sized with the largest bound requested for that length. Each query
 * then gets its own shortest-path run over the shared, read-only graph.
 */
export class WordLadderSolver {
  private readonly graphs = new Map<number, WordGraph>();
  private readonly logger: StructuredLogger;
  private readonly distance: DistanceFunction;
  private readonly enforceQueryBound: boolean;
  private prepared = false;

  constructor(
    private readonly dictionary: readonly string[],
    private readonly queries: readonly WordQuery[],
    options: WordLadderSolverOptions = {},
  ) {
    this.logger = options.logger ?? new StructuredLogger();
    this.distance = options.distance ?? hammingDistance;
    this.enforceQueryBound = options.enforceQueryBound ?? false;
  }

  /**
   * Builds the graphs needed by the queries. A length group without any
   * dictionary word is skipped: its queries resolve to `unknown-word`.
   */
  prepare(): LengthGroupSummary[] {
    if (this.prepared) {
      return this.summaries();
    }

    const bounds = computeDistanceBounds(this.queries);
    const groups = groupWordsByLength(this.dictionary, new Set(bounds.keys()));

    for (const [length, maxDistance] of bounds) {
      const words = groups.get(length) ?? [];
      try {
        const graph = WordGraph.create(words.length, maxDistance);
        for (const word of words) {
          graph.insert(word);
        }
        graph.buildEdges(this.distance);
        this.graphs.set(length, graph);
        this.logger.info("graph_built", {
          length,
          max_distance: maxDistance,
          vertices: graph.vertexCount,
          edges: graph.edgeCount,
        });
      } catch (error) {
        if (!(error instanceof WordGraphError)) {
          throw error;
        }
        this.logger.warn("graph_skipped", { length, code: error.code, message: error.message });
      }
    }

    this.prepared = true;
    return this.summaries();
  }

  /** Returns the graph built for `length`, if any. */
  getGraph(length: number): WordGraph | undefined {
    return this.graphs.get(length);
  }

  solve(query: WordQuery): QueryAnswer {
    this.prepare();
    const { source, target } = query;

    if (source.length !== target.length) {
      return { status: "unreachable", source, target, reason: "length-mismatch" };
    }
    const graph = this.graphs.get(source.length);
    const from = graph?.findVertex(source);
    const to = graph?.findVertex(target);
    if (graph === undefined || from === undefined || to === undefined) {
      return { status: "unreachable", source, target, reason: "unknown-word" };
    }

    const options: ShortestPathOptions = this.enforceQueryBound
      ? { maxEdgeWeight: query.permittedDistance * query.permittedDistance }
      : {};
    const tree = shortestPath(graph, from, options);
    const result = pathBetween(graph, tree, to);
    if (!result.ok) {
      return { status: "unreachable", source, target, reason: "no-path" };
    }
    return { status: "path", source, target, cost: result.distance, words: result.words };
  }

  /**
   * Answers every query in order. An engine error aborts only the query that
   * raised it: it is logged and recorded as a `failed` answer.
   */
  solveAll(): QueryAnswer[] {
    this.prepare();
    return this.queries.map((query) => {
      try {
        const answer = this.solve(query);
        this.logger.debug("query_solved", {
          line: query.line,
          source: query.source,
          target: query.target,
          status: answer.status,
          ...(answer.status === "path" ? { cost: answer.cost } : {}),
        });
        return answer;
      } catch (error) {
        if (!(error instanceof WordGraphError)) {
          throw error;
        }
        this.logger.error("query_failed", { line: query.line, code: error.code, message: error.message });
        return {
          status: "failed",
          source: query.source,
          target: query.target,
          error: { code: error.code, message: error.message },
        };
      }
    });
  }

  private summaries(): LengthGroupSummary[] {
    return Array.from(this.graphs, ([length, graph]) => ({
      length,
      maxDistance: graph.maxDistance,
      vertexCount: graph.vertexCount,
      edgeCount: graph.edgeCount,
    }));
  }
}
