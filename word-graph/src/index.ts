import { WordGraph, type DistanceFunction, type VertexIndex } from "./model.js";

export * from "./errors.js";
export * from "./model.js";
export * from "./algorithms/indexedPriorityQueue.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/pathReconstruction.js";

/**
 * Builds the graph of one length group: inserts `words` in order, then
 * connects every pair within `maxDistance`.
 */
export function buildGraph(words: readonly string[], maxDistance: number, distance: DistanceFunction): WordGraph {
  const graph = WordGraph.create(words.length, maxDistance);
  for (const word of words) {
    graph.insert(word);
  }
  graph.buildEdges(distance);
  return graph;
}

export function findVertex(graph: WordGraph, word: string): VertexIndex | undefined {
  return graph.findVertex(word);
}
