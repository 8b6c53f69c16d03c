/** Stable codes attached to every error raised by the word graph engine. */
export const WORD_GRAPH_ERROR_CODES = {
  CAPACITY: "E-GRAPH-CAPACITY",
  BOUND: "E-GRAPH-BOUND",
  FULL: "E-GRAPH-FULL",
  STATE: "E-GRAPH-STATE",
  METRIC: "E-GRAPH-METRIC",
  VERTEX_RANGE: "E-VERTEX-RANGE",
} as const;

export type WordGraphErrorCode = (typeof WORD_GRAPH_ERROR_CODES)[keyof typeof WORD_GRAPH_ERROR_CODES];

/**
 * Base class of the engine errors. Each subclass carries a stable code and the
 * structured details needed to report the failure without parsing the message.
 */
export class WordGraphError extends Error {
  constructor(
    readonly code: WordGraphErrorCode,
    message: string,
    readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "WordGraphError";
  }
}

/** Raised when a graph is created with a capacity that cannot hold any vertex. */
export class CapacityError extends WordGraphError {
  constructor(capacity: number) {
    super(WORD_GRAPH_ERROR_CODES.CAPACITY, `graph capacity must be a positive integer (received ${capacity})`, {
      capacity,
    });
    this.name = "CapacityError";
  }
}

/** Raised when the distance cutoff of a graph is negative or fractional. */
export class DistanceBoundError extends WordGraphError {
  constructor(maxDistance: number) {
    super(WORD_GRAPH_ERROR_CODES.BOUND, `max distance must be a non-negative integer (received ${maxDistance})`, {
      maxDistance,
    });
    this.name = "DistanceBoundError";
  }
}

/** Raised when more words are inserted than the capacity announced at creation. */
export class GraphFullError extends WordGraphError {
  constructor(capacity: number, word: string) {
    super(WORD_GRAPH_ERROR_CODES.FULL, `graph is full (${capacity} vertices), cannot insert '${word}'`, {
      capacity,
      word,
    });
    this.name = "GraphFullError";
  }
}

/** Raised when an operation does not fit the build/query phase the graph is in. */
export class GraphStateError extends WordGraphError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(WORD_GRAPH_ERROR_CODES.STATE, message, details);
    this.name = "GraphStateError";
  }
}

/** Raised when the injected distance metric returns something other than a non-negative integer. */
export class MetricError extends WordGraphError {
  constructor(left: string, right: string, value: number) {
    super(WORD_GRAPH_ERROR_CODES.METRIC, `distance metric returned ${value} for '${left}' and '${right}'`, {
      left,
      right,
      value,
    });
    this.name = "MetricError";
  }
}

/** Raised when a vertex index falls outside the vertices of a graph. */
export class InvalidVertexError extends WordGraphError {
  constructor(index: number, vertexCount: number) {
    super(WORD_GRAPH_ERROR_CODES.VERTEX_RANGE, `vertex ${index} is out of range [0, ${vertexCount})`, {
      index,
      vertexCount,
    });
    this.name = "InvalidVertexError";
  }
}
