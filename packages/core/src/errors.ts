/**
 * Invariant errors
 *
 * Degenerate geometry is not an error: predicates and the splitter report it
 * through their result variants and the renderer drops the offending
 * triangle. A GeometryInvariantError means the computation itself can no
 * longer be trusted (NaN input, a broken precondition, a case the analysis
 * claims cannot happen), so the render that hit it is abandoned.
 */

/**
 * What went wrong
 */
export type InvariantKind =
  | `unclassifiedSplit` // segment/triangle classification fell through every case
  | `missingCrossing` // interior segment with no forward edge crossing
  | `missingEdgeIntersection` // split requested on an edge the segment does not cross
  | `invalidDepth`; // depth key is NaN, priority order undefined

export class GeometryInvariantError extends Error {
  readonly kind: InvariantKind;
  readonly details?: Record<string, unknown>;

  constructor(kind: InvariantKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.kind = kind;
    this.details = details;
  }
}

export function isGeometryInvariantError(err: unknown): err is GeometryInvariantError {
  return err instanceof GeometryInvariantError;
}
