/**
 * 4x4 Matrix utilities for quad transforms
 * Matrices are stored in column-major order (GLSL upload order)
 *
 * Column-major layout:
 * [0]  [4]  [8]  [12]     m00 m10 m20 m30
 * [1]  [5]  [9]  [13]  =  m01 m11 m21 m31
 * [2]  [6]  [10] [14]     m02 m12 m22 m32
 * [3]  [7]  [11] [15]     m03 m13 m23 m33
 */

import type { Vec4 } from "./vec";

export type Mat4 = Float32Array;

/** Create an identity matrix */
export function create(): Mat4 {
  const m = new Float32Array(16);
  m[0] = 1;
  m[5] = 1;
  m[10] = 1;
  m[15] = 1;
  return m;
}

/** Set a matrix to identity */
export function identity(out: Mat4): Mat4 {
  out.fill(0);
  out[0] = 1;
  out[5] = 1;
  out[10] = 1;
  out[15] = 1;
  return out;
}

/** Copy a matrix */
export function copy(m: Mat4): Mat4 {
  return new Float32Array(m);
}

/**
 * Build a matrix from its four columns, the way a shader assembles
 * `mat4(c0, c1, c2, c3)` from four per-instance vec4 attributes.
 */
export function fromColumns(c0: Vec4, c1: Vec4, c2: Vec4, c3: Vec4): Mat4 {
  return new Float32Array([...c0, ...c1, ...c2, ...c3]);
}

/** Split a matrix back into the four column vectors it is uploaded as */
export function toColumns(m: Mat4): [Vec4, Vec4, Vec4, Vec4] {
  return [
    [m[0]!, m[1]!, m[2]!, m[3]!],
    [m[4]!, m[5]!, m[6]!, m[7]!],
    [m[8]!, m[9]!, m[10]!, m[11]!],
    [m[12]!, m[13]!, m[14]!, m[15]!],
  ];
}

/** Multiply two matrices: out = a * b */
export function multiply(a: Mat4, b: Mat4): Mat4 {
  const out = new Float32Array(16);

  const a00 = a[0]!,
    a01 = a[1]!,
    a02 = a[2]!,
    a03 = a[3]!;
  const a10 = a[4]!,
    a11 = a[5]!,
    a12 = a[6]!,
    a13 = a[7]!;
  const a20 = a[8]!,
    a21 = a[9]!,
    a22 = a[10]!,
    a23 = a[11]!;
  const a30 = a[12]!,
    a31 = a[13]!,
    a32 = a[14]!,
    a33 = a[15]!;

  for (let col = 0; col < 4; col++) {
    const b0 = b[col * 4]!,
      b1 = b[col * 4 + 1]!,
      b2 = b[col * 4 + 2]!,
      b3 = b[col * 4 + 3]!;
    out[col * 4] = b0 * a00 + b1 * a10 + b2 * a20 + b3 * a30;
    out[col * 4 + 1] = b0 * a01 + b1 * a11 + b2 * a21 + b3 * a31;
    out[col * 4 + 2] = b0 * a02 + b1 * a12 + b2 * a22 + b3 * a32;
    out[col * 4 + 3] = b0 * a03 + b1 * a13 + b2 * a23 + b3 * a33;
  }

  return out;
}

/** Multiply a column vector by a matrix: m * v */
export function transformVec4(m: Mat4, v: Vec4): Vec4 {
  const [x, y, z, w] = v;
  return [
    m[0]! * x + m[4]! * y + m[8]! * z + m[12]! * w,
    m[1]! * x + m[5]! * y + m[9]! * z + m[13]! * w,
    m[2]! * x + m[6]! * y + m[10]! * z + m[14]! * w,
    m[3]! * x + m[7]! * y + m[11]! * z + m[15]! * w,
  ];
}

/** Create a translation matrix */
export function translate(x: number, y: number, z: number): Mat4 {
  const out = create();
  out[12] = x;
  out[13] = y;
  out[14] = z;
  return out;
}

/** Create a scale matrix */
export function scale(sx: number, sy: number, sz: number): Mat4 {
  const out = new Float32Array(16);
  out[0] = sx;
  out[5] = sy;
  out[10] = sz;
  out[15] = 1;
  return out;
}

/**
 * Create a left-handed orthographic projection with a 0..1 depth range.
 * Maps (left, bottom) to (-1, -1) and (right, top) to (1, 1).
 */
export function ortho(
  left: number,
  right: number,
  bottom: number,
  top: number,
  near: number,
  far: number
): Mat4 {
  const out = new Float32Array(16);
  const rl = 1 / (right - left);
  const tb = 1 / (top - bottom);
  const fn = 1 / (far - near);

  out[0] = 2 * rl;
  out[5] = 2 * tb;
  out[10] = fn;
  out[12] = -(left + right) * rl;
  out[13] = -(top + bottom) * tb;
  out[14] = -near * fn;
  out[15] = 1;

  return out;
}

/** Compare two matrices component-wise within an epsilon */
export function equals(a: Mat4, b: Mat4, epsilon = 1e-6): boolean {
  for (let i = 0; i < 16; i++) {
    if (Math.abs(a[i]! - b[i]!) > epsilon) return false;
  }
  return true;
}
