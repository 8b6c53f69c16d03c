import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { buildGraph, reconstructPath, shortestPath, type WordGraph } from "../../word-graph/src/index.js";
import { hammingDistance } from "../../src/metrics/hamming.js";

const word = fc.stringOf(fc.constantFrom("a", "b", "c"), { minLength: 3, maxLength: 3 });
const graphArb = fc
  .tuple(fc.uniqueArray(word, { minLength: 1, maxLength: 10 }), fc.integer({ min: 0, max: 3 }))
  .map(([words, maxDistance]) => buildGraph(words, maxDistance, hammingDistance));
const graphWithVertices = graphArb.chain((graph) =>
  fc.tuple(
    fc.constant(graph),
    fc.nat({ max: graph.vertexCount - 1 }),
    fc.nat({ max: graph.vertexCount - 1 }),
  ),
);

function edgeWeight(graph: WordGraph, from: number, to: number): number | undefined {
  return graph.getAdjacency(from).find((edge) => edge.target === to)?.weight;
}

describe("word-graph properties", () => {
  it("connects exactly the pairs within the bound, with squared weights", () => {
    fc.assert(
      fc.property(graphArb, (graph) => {
        for (let i = 0; i < graph.vertexCount; i += 1) {
          for (let j = 0; j < graph.vertexCount; j += 1) {
            if (i === j) {
              continue;
            }
            const distance = hammingDistance(graph.getWord(i), graph.getWord(j));
            const expected = distance <= graph.maxDistance ? distance * distance : undefined;
            expect(edgeWeight(graph, i, j)).to.equal(expected);
          }
        }
      }),
    );
  });

  it("roots every tree at its source with zero cost", () => {
    fc.assert(
      fc.property(graphWithVertices, ([graph, source]) => {
        const tree = shortestPath(graph, source);
        expect(tree.distances[source]).to.equal(0);
        expect(tree.predecessors[source]).to.equal(null);
      }),
    );
  });

  it("satisfies the triangle inequality on every edge", () => {
    fc.assert(
      fc.property(graphWithVertices, ([graph, source]) => {
        const { distances } = shortestPath(graph, source);
        for (let u = 0; u < graph.vertexCount; u += 1) {
          for (const edge of graph.getAdjacency(u)) {
            expect(distances[edge.target]).to.be.at.most(distances[u] + edge.weight);
          }
        }
      }),
    );
  });

  it("reconstructs simple paths whose edge weights add up to the distance", () => {
    fc.assert(
      fc.property(graphWithVertices, ([graph, source, destination]) => {
        const tree = shortestPath(graph, source);
        const path = reconstructPath(tree.predecessors, source, destination);
        if (!path.ok) {
          expect(tree.distances[destination]).to.equal(Number.POSITIVE_INFINITY);
          return;
        }

        expect(new Set(path.vertices).size).to.equal(path.vertices.length);
        expect(path.vertices[0]).to.equal(source);
        expect(path.vertices[path.vertices.length - 1]).to.equal(destination);
        let total = 0;
        for (let step = 1; step < path.vertices.length; step += 1) {
          const weight = edgeWeight(graph, path.vertices[step - 1], path.vertices[step]);
          expect(weight).to.be.a("number");
          total += weight ?? Number.NaN;
        }
        expect(total).to.equal(tree.distances[destination]);
      }),
    );
  });

  it("finds the same distance in both directions", () => {
    fc.assert(
      fc.property(graphWithVertices, ([graph, a, b]) => {
        expect(shortestPath(graph, a).distances[b]).to.equal(shortestPath(graph, b).distances[a]);
      }),
    );
  });

  it("produces identical trees when run twice", () => {
    fc.assert(
      fc.property(graphWithVertices, ([graph, source]) => {
        expect(shortestPath(graph, source)).to.deep.equal(shortestPath(graph, source));
      }),
    );
  });
});
