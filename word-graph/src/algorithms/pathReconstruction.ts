import { GraphStateError, InvalidVertexError } from "../errors.js";
import type { VertexIndex, WordGraph } from "../model.js";
import type { ShortestPathTree } from "./dijkstra.js";

export type ReconstructedPath =
  | { readonly ok: true; readonly vertices: readonly VertexIndex[] }
  | { readonly ok: false; readonly reason: "unreachable" };

export type PathBetweenResult =
  | { readonly ok: true; readonly distance: number; readonly words: readonly string[] }
  | { readonly ok: false; readonly reason: "unreachable" };

const UNREACHABLE = { ok: false, reason: "unreachable" } as const;

/**
 * Walks the predecessor tree backward from `destination` and returns the
 * vertices from `source` to `destination`, both included.
 */
export function reconstructPath(
  predecessors: ReadonlyArray<VertexIndex | null>,
  source: VertexIndex,
  destination: VertexIndex,
): ReconstructedPath {
  assertInRange(predecessors, source);
  assertInRange(predecessors, destination);

  if (destination === source) {
    return { ok: true, vertices: [source] };
  }
  if (predecessors[destination] === null) {
    return UNREACHABLE;
  }

  const reversed: VertexIndex[] = [destination];
  let current = destination;
  while (current !== source) {
    const previous = predecessors[current];
    // A tree of n vertices never needs more than n - 1 hops.
    if (previous === null || reversed.length >= predecessors.length) {
      throw new GraphStateError(`predecessor chain from ${destination} does not reach ${source}`, {
        source,
        destination,
        stalledAt: current,
      });
    }
    reversed.push(previous);
    current = previous;
  }

  return { ok: true, vertices: reversed.reverse() };
}

/** Resolves the path to `destination` in `tree` into the words it visits and its total cost. */
export function pathBetween(graph: WordGraph, tree: ShortestPathTree, destination: VertexIndex): PathBetweenResult {
  if (tree.predecessors.length !== graph.vertexCount) {
    throw new GraphStateError("shortest-path tree was computed against another graph", {
      treeSize: tree.predecessors.length,
      vertexCount: graph.vertexCount,
    });
  }

  const path = reconstructPath(tree.predecessors, tree.source, destination);
  if (!path.ok) {
    return path;
  }
  return {
    ok: true,
    distance: tree.distances[destination],
    words: path.vertices.map((vertex) => graph.getWord(vertex)),
  };
}

function assertInRange(predecessors: ReadonlyArray<VertexIndex | null>, index: VertexIndex): void {
  if (!Number.isInteger(index) || index < 0 || index >= predecessors.length) {
    throw new InvalidVertexError(index, predecessors.length);
  }
}
