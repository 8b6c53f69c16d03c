import {
  CapacityError,
  DistanceBoundError,
  GraphFullError,
  GraphStateError,
  InvalidVertexError,
  MetricError,
} from "./errors.js";

/** Position of a vertex in the graph storage. Stable for the graph lifetime. */
export type VertexIndex = number;

/** One direction of an undirected edge, stored in the adjacency list of its origin. */
export interface WeightedEdge {
  readonly target: VertexIndex;
  readonly weight: number;
}

/**
 * Distance between two words of the same length. The optional `limit` lets a
 * metric stop counting once the result is known to exceed the graph cutoff.
 */
export type DistanceFunction = (left: string, right: string, limit: number) => number;

interface Vertex {
  readonly word: string;
  readonly adjacency: WeightedEdge[];
}

/**
 * Undirected weighted graph over the words of one length group.
 *
 * The graph goes through two phases: words are inserted up to the capacity
 * announced at creation, then {@link buildEdges} connects every pair of words
 * within `maxDistance` of each other. Once edges are built the graph is
 * read-only and may be shared by any number of shortest-path runs.
 */
export class WordGraph {
  private readonly vertices: Vertex[] = [];
  private built = false;
  private edges = 0;
  private weightCutoff: number;

  private constructor(
    readonly capacity: number,
    readonly maxDistance: number,
  ) {
    this.weightCutoff = maxDistance;
  }

  static create(capacity: number, maxDistance: number): WordGraph {
    if (!Number.isSafeInteger(capacity) || capacity <= 0) {
      throw new CapacityError(capacity);
    }
    if (!Number.isSafeInteger(maxDistance) || maxDistance < 0) {
      throw new DistanceBoundError(maxDistance);
    }
    return new WordGraph(capacity, maxDistance);
  }

  /** Number of vertices inserted so far. */
  get vertexCount(): number {
    return this.vertices.length;
  }

  get isFull(): boolean {
    return this.vertices.length === this.capacity;
  }

  get isBuilt(): boolean {
    return this.built;
  }

  /** Number of undirected edges (each is stored twice). */
  get edgeCount(): number {
    return this.edges;
  }

  /** Heaviest edge weight the graph may contain: `maxDistance` until built, `maxDistance²` after. */
  get maxWeight(): number {
    return this.weightCutoff;
  }

  insert(word: string): VertexIndex {
    if (this.built) {
      throw new GraphStateError(`cannot insert '${word}' once edges are built`, { word });
    }
    if (this.isFull) {
      throw new GraphFullError(this.capacity, word);
    }
    const index = this.vertices.length;
    this.vertices.push({ word, adjacency: [] });
    return index;
  }

  /**
   * Connects every unordered pair of vertices whose distance does not exceed
   * `maxDistance`. The weight of an edge is the square of that distance.
   *
   * Runs in O(V²) metric evaluations and may only be called once.
   *
   * @returns the number of undirected edges created.
   */
  buildEdges(distance: DistanceFunction): number {
    if (this.built) {
      throw new GraphStateError("edges are already built", { vertexCount: this.vertexCount });
    }

    for (let i = 0; i < this.vertices.length; i += 1) {
      const current = this.vertices[i];
      for (let j = 0; j < i; j += 1) {
        const other = this.vertices[j];
        const value = distance(current.word, other.word, this.maxDistance);
        if (!Number.isSafeInteger(value) || value < 0) {
          throw new MetricError(current.word, other.word, value);
        }
        if (value <= this.maxDistance) {
          const weight = value * value;
          current.adjacency.push({ target: j, weight });
          other.adjacency.push({ target: i, weight });
          this.edges += 1;
        }
      }
    }

    this.weightCutoff = this.maxDistance * this.maxDistance;
    this.built = true;
    return this.edges;
  }

  /** Returns the index of the first vertex holding `word`, or `undefined`. */
  findVertex(word: string): VertexIndex | undefined {
    const index = this.vertices.findIndex((vertex) => vertex.word === word);
    return index === -1 ? undefined : index;
  }

  getWord(index: VertexIndex): string {
    return this.vertexAt(index).word;
  }

  getAdjacency(index: VertexIndex): readonly WeightedEdge[] {
    return this.vertexAt(index).adjacency;
  }

  listWords(): string[] {
    return this.vertices.map((vertex) => vertex.word);
  }

  /** Throws {@link InvalidVertexError} unless `index` designates an inserted vertex. */
  assertVertex(index: VertexIndex): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.vertices.length) {
      throw new InvalidVertexError(index, this.vertices.length);
    }
  }

  private vertexAt(index: VertexIndex): Vertex {
    this.assertVertex(index);
    return this.vertices[index];
  }
}
