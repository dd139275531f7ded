/**
 * Renderer options and result types
 */

import type { InvariantKind } from '../errors.js';

/**
 * Options for the occlusion renderer
 */
export interface RendererOptions {
  /** NDC z range that counts as in view: [near, far] */
  depthRange: [number, number];
  /**
   * Tag clockwise (back-facing) triangles `culled` and leave them out of
   * occlusion, instead of flipping them to counter-clockwise
   */
  cullBackFaces: boolean;
  /** Log progress with console.log */
  verbose: boolean;
}

export const DEFAULT_RENDERER_OPTIONS: RendererOptions = {
  depthRange: [-1, 1],
  cullBackFaces: false,
  verbose: false,
};

/**
 * Why a render failed
 */
export interface RenderError {
  category: `invariant`;
  kind: InvariantKind;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Result of a render attempt, as a discriminated union.
 *
 * Usage:
 * ```ts
 * const result = renderer.tryRender();
 * if (result.ok) {
 *   draw(result.value);
 * } else {
 *   console.error(result.error.message);
 * }
 * ```
 */
export type RenderResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: RenderError };

/**
 * Extract the value from a result, throwing if it's a failure
 */
export function unwrapRenderResult<T>(result: RenderResult<T>): T {
  if (result.ok) {
    return result.value;
  }
  throw new Error(`Render failed: ${result.error.message}`);
}
