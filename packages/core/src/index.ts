/**
 * @linecut/core - exact hidden-line rendering to 2D vector output
 *
 * Takes points, line segments and triangles, projects them through a 4x4
 * clip transform and resolves occlusion between triangles geometrically, by
 * cutting farther triangles along the edges of nearer ones. The result is a
 * flat list of 2D points and segments, each segment tagged with its
 * visibility class.
 *
 * ## Primary API
 * - Renderer: collects primitives, render() / tryRender()
 * - RenderOutput helpers: keepOnly, isRenderEmpty, countLinesByEdgeType
 * - exportRenderToSvg: standalone SVG serialization
 *
 * ## Internal Modules (for advanced use)
 * - num: vectors, matrices, tolerances, orientation predicates
 * - geom: primitive model, 2D intersection predicates, triangle splitting
 */

// =============================================================================
// Primary API
// =============================================================================
export { Renderer } from './render/Renderer.js';
export {
  DEFAULT_RENDERER_OPTIONS,
  unwrapRenderResult,
  type RendererOptions,
  type RenderError,
  type RenderResult,
} from './render/types.js';
export {
  EMPTY_RENDER_OUTPUT,
  flattenPrimitives,
  concatRenderOutputs,
  keepOnly,
  isRenderEmpty,
  countLinesByEdgeType,
  groupLinesByEdgeType,
  type RenderedLine,
  type RenderOutput,
} from './render/output.js';
export {
  GeometryInvariantError,
  isGeometryInvariantError,
  type InvariantKind,
} from './errors.js';

// Export module
export {
  exportRenderToSvg,
  formatSvgNumber,
  DEFAULT_SVG_EXPORT_OPTIONS,
  DEFAULT_EDGE_STYLES,
  type SvgExportOptions,
} from './export/svg.js';

// =============================================================================
// Internal modules (for advanced/low-level use)
// =============================================================================

// num: numeric backbone & tolerances
export * from './num/vec2.js';
export * from './num/vec3.js';
export * from './num/vec4.js';
export * from './num/mat4.js';
export * from './num/tolerance.js';
export * from './num/predicates.js';

// geom: primitives, predicates & splitting
export * from './geom/primitive.js';
export * from './geom/intersect2d.js';
export * from './geom/split.js';

// render: work queue
export {
  DepthQueue,
  createDepthSorted,
  alreadyTested,
  extendTested,
  testedEdgeKey,
  type DepthSortedPrimitive,
  type TestedEdgeKey,
} from './render/depthQueue.js';
