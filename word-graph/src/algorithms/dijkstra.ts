import type { VertexIndex, WordGraph } from "../model.js";
import { IndexedPriorityQueue } from "./indexedPriorityQueue.js";

/** Distance recorded for vertices the search never reached. */
export const UNREACHED = Number.POSITIVE_INFINITY;

export interface ShortestPathOptions {
  /**
   * Edges heavier than this weight are ignored during relaxation. Lets a caller
   * narrow a graph built for a coarse bound down to a stricter one without
   * rebuilding it.
   */
  readonly maxEdgeWeight?: number;
}

/**
 * Shortest-path tree rooted at {@link source}. Both arrays are indexed by
 * vertex index and cover every vertex of the graph the run was computed on.
 */
export interface ShortestPathTree {
  readonly source: VertexIndex;
  readonly distances: readonly number[];
  readonly predecessors: ReadonlyArray<VertexIndex | null>;
  /** Vertices in the order their distance was finalised. */
  readonly settledOrder: readonly VertexIndex[];
}

/**
 * Label-setting Dijkstra from a single source over a built {@link WordGraph}.
 *
 * Every vertex is queued up front with an infinite distance except the
 * source. The run stops as soon as the extracted minimum is unreached, since
 * everything left in the queue is then disconnected from the source. The
 * graph is only read, so concurrent runs over the same graph are safe.
 */
export function shortestPath(
  graph: WordGraph,
  source: VertexIndex,
  options: ShortestPathOptions = {},
): ShortestPathTree {
  graph.assertVertex(source);

  const vertexCount = graph.vertexCount;
  const weightLimit = options.maxEdgeWeight ?? Number.POSITIVE_INFINITY;
  const distances = new Array<number>(vertexCount).fill(UNREACHED);
  const predecessors = new Array<VertexIndex | null>(vertexCount).fill(null);
  const settledOrder: VertexIndex[] = [];

  distances[source] = 0;
  const queue = new IndexedPriorityQueue(vertexCount, (index) => distances[index]);
  for (let vertex = 0; vertex < vertexCount; vertex += 1) {
    queue.insert(vertex);
  }

  let current = queue.extractMin();
  while (current !== undefined && distances[current] !== UNREACHED) {
    settledOrder.push(current);
    const base = distances[current];

    for (const edge of graph.getAdjacency(current)) {
      if (edge.weight > weightLimit) {
        continue;
      }
      const candidate = base + edge.weight;
      if (candidate < distances[edge.target]) {
        distances[edge.target] = candidate;
        predecessors[edge.target] = current;
        queue.decreaseKey(edge.target);
      }
    }

    current = queue.extractMin();
  }

  return { source, distances, predecessors, settledOrder };
}
