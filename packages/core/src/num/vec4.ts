/**
 * Homogeneous points
 *
 * Before projection a Vec4 is an ordinary homogeneous point (x, y, z, w).
 * After projection the renderer stores the perspective-divided form
 * (x/w, y/w, z/w, w): screen position and depth in the first three
 * components, the original clip-space w kept alongside so that points along
 * an edge can still be interpolated correctly in depth.
 */

import type { Vec2 } from './vec2.js';
import type { Vec3 } from './vec3.js';

export type Vec4 = [number, number, number, number];

export function vec4(x: number, y: number, z: number, w: number): Vec4 {
  return [x, y, z, w];
}

/**
 * Lift a 3D point to homogeneous form with w = 1
 */
export function point4(p: Vec3): Vec4 {
  return [p[0], p[1], p[2], 1];
}

/**
 * Screen-space part of a point (z and w dropped)
 */
export function xy(p: Vec4): Vec2 {
  return [p[0], p[1]];
}

/**
 * Perspective divide: (x, y, z, w) -> (x/w, y/w, z/w, w)
 */
export function dehomogenize(p: Vec4): Vec4 {
  const w = p[3];
  return [p[0] / w, p[1] / w, p[2] / w, w];
}

/**
 * Interpolate between two perspective-divided points.
 *
 * x, y and z are already in screen space, so they move linearly with t.
 * The clip-space w does not: 1/w is what varies linearly across the screen,
 * which gives w(t) = w0 * w1 / ((1 - t) * w1 + t * w0), with w(0) = w0 and
 * w(1) = w1.
 */
export function perspectiveLerp(t: number, p0: Vec4, p1: Vec4): Vec4 {
  const s = 1 - t;
  const w = (p0[3] * p1[3]) / (s * p1[3] + t * p0[3]);
  return [s * p0[0] + t * p1[0], s * p0[1] + t * p1[1], s * p0[2] + t * p1[2], w];
}
