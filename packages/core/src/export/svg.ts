/**
 * SVG Export
 *
 * Serializes a RenderOutput to a standalone SVG document. Coordinates stay
 * in normalized device units; a single group transform maps [-1, 1]² onto
 * the page with y pointing up, so stroke widths in the style sheet are in
 * NDC units too.
 */

import type { Vec2 } from '../num/vec2.js';
import type { EdgeType } from '../geom/primitive.js';
import { EDGE_TYPES } from '../geom/primitive.js';
import type { RenderOutput, RenderedLine } from '../render/output.js';
import { groupLinesByEdgeType } from '../render/output.js';

/**
 * Options for SVG export
 */
export interface SvgExportOptions {
  /** Page width in user units (default: 720) */
  width: number;
  /** Page height in user units (default: 720) */
  height: number;
  /** Decimal places for coordinates (default: 6) */
  precision: number;
  /** One <g> per edge type instead of a class on every line (default: false) */
  byLayer: boolean;
  /** Radius of rendered points, in NDC units (default: 0.005) */
  pointRadius: number;
  /** CSS declarations per edge type, overriding DEFAULT_EDGE_STYLES */
  styles: Partial<Record<EdgeType, string>>;
}

export const DEFAULT_EDGE_STYLES: Record<EdgeType, string> = {
  visible: `stroke-width: 0.004; fill: none; stroke: #333333;`,
  invisible: `stroke-width: 0.001; fill: none; stroke: #999999; stroke-dasharray: 0.002 0.002;`,
  hidden: `stroke-width: 0.002; fill: none; stroke: #3344bb; stroke-dasharray: 0.01 0.005;`,
  split: `stroke-width: 0.001; fill: none; stroke: #33aa33; stroke-dasharray: 0.003 0.003;`,
  culled: `stroke-width: 0.001; fill: none; stroke: #bb3333; stroke-dasharray: 0.005 0.005;`,
};

export const DEFAULT_SVG_EXPORT_OPTIONS: SvgExportOptions = {
  width: 720,
  height: 720,
  precision: 6,
  byLayer: false,
  pointRadius: 0.005,
  styles: {},
};

/**
 * Fixed-precision number with trailing zeros removed
 */
export function formatSvgNumber(value: number, precision: number): string {
  return String(parseFloat(value.toFixed(precision)));
}

function lineElement(line: RenderedLine, precision: number, withClass: boolean): string {
  const f = (v: number) => formatSvgNumber(v, precision);
  const cls = withClass ? ` class="${line.edge}"` : ``;
  return `<line${cls} x1="${f(line.p0[0])}" y1="${f(line.p0[1])}" x2="${f(line.p1[0])}" y2="${f(line.p1[1])}"/>`;
}

function pointElement(point: Vec2, radius: number, precision: number): string {
  const f = (v: number) => formatSvgNumber(v, precision);
  return `<circle class="point" cx="${f(point[0])}" cy="${f(point[1])}" r="${f(radius)}"/>`;
}

/**
 * Render output as a standalone SVG document
 */
export function exportRenderToSvg(
  output: RenderOutput,
  options: Partial<SvgExportOptions> = {}
): string {
  const opts: SvgExportOptions = { ...DEFAULT_SVG_EXPORT_OPTIONS, ...options };
  const styles: Record<EdgeType, string> = { ...DEFAULT_EDGE_STYLES, ...opts.styles };
  const halfWidth = opts.width / 2;
  const halfHeight = opts.height / 2;

  const out: string[] = [];
  out.push(
    `<svg xmlns="http://www.w3.org/2000/svg" width="${opts.width}" height="${opts.height}" viewBox="0 0 ${opts.width} ${opts.height}">`
  );
  out.push(`<style>`);
  for (const edge of EDGE_TYPES) {
    out.push(`.${edge} { ${styles[edge]} }`);
  }
  out.push(`.point { fill: #333333; stroke: none; }`);
  out.push(`</style>`);
  out.push(`<g transform="translate(${halfWidth} ${halfHeight}) scale(${halfWidth} ${-halfHeight})">`);

  if (opts.byLayer) {
    for (const group of groupLinesByEdgeType(output)) {
      out.push(`<g class="${group.edge}">`);
      for (const line of group.lines) {
        out.push(lineElement(line, opts.precision, false));
      }
      out.push(`</g>`);
    }
  } else {
    for (const line of output.lines) {
      out.push(lineElement(line, opts.precision, true));
    }
  }

  for (const point of output.points) {
    out.push(pointElement(point, opts.pointRadius, opts.precision));
  }

  out.push(`</g>`);
  out.push(`</svg>`);
  return out.join(`\n`);
}
