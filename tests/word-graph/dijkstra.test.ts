import { describe, it } from "mocha";
import { expect } from "chai";

import {
  InvalidVertexError,
  UNREACHED,
  WordGraph,
  buildGraph,
  shortestPath,
} from "../../word-graph/src/index.js";
import { hammingDistance } from "../../src/metrics/hamming.js";
import { ladderGraph } from "../helpers/wordGraphs.js";

describe("word-graph shortest path", () => {
  it("walks the single-substitution ladder", () => {
    const graph = ladderGraph(1);
    const tree = shortestPath(graph, 0);

    expect(tree.source).to.equal(0);
    expect(tree.distances).to.deep.equal([0, 1, 2, 3]);
    expect(tree.predecessors).to.deep.equal([null, 0, 1, 2]);
    expect(tree.settledOrder).to.deep.equal([0, 1, 2, 3]);
  });

  it("prefers two single substitutions over one double substitution", () => {
    const graph = ladderGraph(2);
    const tree = shortestPath(graph, 0);

    // cat → cog costs 4 directly but 2 through cot.
    expect(tree.distances).to.deep.equal([0, 1, 2, 3]);
    expect(tree.predecessors).to.deep.equal([null, 0, 1, 2]);
  });

  it("takes a double substitution when no cheaper route exists", () => {
    const graph = buildGraph(["aaa", "abb", "bbb"], 2, hammingDistance);
    const tree = shortestPath(graph, 0);

    expect(tree.distances).to.deep.equal([0, 4, 5]);
    expect(tree.predecessors).to.deep.equal([null, 0, 1]);
  });

  it("stops once the remaining vertices are unreachable", () => {
    const graph = buildGraph(["cat", "cot", "dog", "dig"], 1, hammingDistance);
    const tree = shortestPath(graph, 0);

    expect(tree.distances).to.deep.equal([0, 1, UNREACHED, UNREACHED]);
    expect(tree.predecessors).to.deep.equal([null, 0, null, null]);
    expect(tree.settledOrder).to.deep.equal([0, 1]);
  });

  it("ignores edges heavier than the requested limit", () => {
    const graph = buildGraph(["aaa", "abb", "bbb"], 2, hammingDistance);
    const tree = shortestPath(graph, 2, { maxEdgeWeight: 1 });

    expect(tree.distances).to.deep.equal([UNREACHED, 1, 0]);
    expect(tree.predecessors).to.deep.equal([null, 2, null]);
  });

  it("handles a graph holding a single word", () => {
    const graph = WordGraph.create(1, 3);
    graph.insert("solo");
    graph.buildEdges(hammingDistance);

    expect(shortestPath(graph, 0)).to.deep.equal({
      source: 0,
      distances: [0],
      predecessors: [null],
      settledOrder: [0],
    });
  });

  it("rejects a source outside the graph", () => {
    const graph = ladderGraph(1);

    expect(() => shortestPath(graph, 4)).to.throw(InvalidVertexError);
    expect(() => shortestPath(graph, -1)).to.throw(InvalidVertexError);
  });

  it("returns identical trees on repeated runs and leaves the graph untouched", () => {
    const graph = ladderGraph(2);
    const before = graph.listWords().map((_, vertex) => [...graph.getAdjacency(vertex)]);

    const first = shortestPath(graph, 3);
    const second = shortestPath(graph, 3);

    expect(second).to.deep.equal(first);
    expect(graph.edgeCount).to.equal(5);
    expect(graph.listWords().map((_, vertex) => [...graph.getAdjacency(vertex)])).to.deep.equal(before);
  });
});
