import { buildGraph, type WordGraph } from "../../word-graph/src/index.js";
import { hammingDistance } from "../../src/metrics/hamming.js";

/** Four words forming the ladder cat → cot → cog → dog under single substitutions. */
export const LADDER_WORDS = ["cat", "cot", "cog", "dog"] as const;

export function ladderGraph(maxDistance: number): WordGraph {
  return buildGraph(LADDER_WORDS, maxDistance, hammingDistance);
}
