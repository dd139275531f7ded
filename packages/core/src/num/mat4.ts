/**
 * 4x4 matrix operations
 *
 * Matrices are represented as 16-element arrays in column-major order:
 * [m00, m10, m20, m30, m01, m11, m21, m31, m02, m12, m22, m32, m03, m13, m23, m33]
 *
 * The renderer's clip transform is one such matrix, usually
 * `mul4(perspective4(...), lookAt4(...))`: points are transformed as
 * `clip = M * p`, so the right-hand factor applies first. Eye space is
 * right-handed with the camera looking down -z; after the divide, the view
 * volume is [-1, 1] on every axis, matching the renderer's default depthRange.
 */

import type { Vec3 } from './vec3.js';
import type { Vec4 } from './vec4.js';
import { cross3, dot3, normalize3, sub3 } from './vec3.js';

export type Mat4 = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

/**
 * Identity matrix
 */
export function identity4(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1,
  ];
}

/**
 * Zero matrix
 */
export function zero4(): Mat4 {
  return [
    0, 0, 0, 0,
    0, 0, 0, 0,
    0, 0, 0, 0,
    0, 0, 0, 0,
  ];
}

/**
 * Multiply two matrices: A * B
 */
export function mul4(a: Mat4, b: Mat4): Mat4 {
  const result = zero4();
  for (let i = 0; i < 4; i++) {
    for (let j = 0; j < 4; j++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) {
        sum += a[i + k * 4] * b[k + j * 4];
      }
      result[i + j * 4] = sum;
    }
  }
  return result;
}

/**
 * Transform a homogeneous point: M * v (w is taken from v, not assumed)
 */
export function transformVec4(m: Mat4, v: Vec4): Vec4 {
  return [
    m[0] * v[0] + m[4] * v[1] + m[8] * v[2] + m[12] * v[3],
    m[1] * v[0] + m[5] * v[1] + m[9] * v[2] + m[13] * v[3],
    m[2] * v[0] + m[6] * v[1] + m[10] * v[2] + m[14] * v[3],
    m[3] * v[0] + m[7] * v[1] + m[11] * v[2] + m[15] * v[3],
  ];
}

/**
 * Perspective projection
 *
 * @param aspect width / height of the view
 * @param fovY vertical field of view in radians
 */
export function perspective4(aspect: number, fovY: number, near: number, far: number): Mat4 {
  const f = 1 / Math.tan(fovY / 2);
  const m = zero4();
  m[0] = f / aspect;
  m[5] = f;
  m[10] = -(far + near) / (far - near);
  m[11] = -1;
  m[14] = (-2 * far * near) / (far - near);
  return m;
}

/**
 * Orthographic projection
 */
export function ortho4(
  left: number,
  right: number,
  bottom: number,
  top: number,
  near: number,
  far: number
): Mat4 {
  const m = identity4();
  m[0] = 2 / (right - left);
  m[5] = 2 / (top - bottom);
  m[10] = -2 / (far - near);
  m[12] = -(right + left) / (right - left);
  m[13] = -(top + bottom) / (top - bottom);
  m[14] = -(far + near) / (far - near);
  return m;
}

/**
 * View matrix for a camera at `eye` looking at `target`
 */
export function lookAt4(eye: Vec3, target: Vec3, up: Vec3): Mat4 {
  const f = normalize3(sub3(target, eye));
  const s = normalize3(cross3(f, up));
  const u = cross3(s, f);

  const m = identity4();
  m[0] = s[0];
  m[4] = s[1];
  m[8] = s[2];
  m[1] = u[0];
  m[5] = u[1];
  m[9] = u[2];
  m[2] = -f[0];
  m[6] = -f[1];
  m[10] = -f[2];
  m[12] = -dot3(s, eye);
  m[13] = -dot3(u, eye);
  m[14] = dot3(f, eye);
  return m;
}
