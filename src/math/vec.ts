/**
 * Small fixed-size vector tuples shared by the uniform and instance contracts
 */

/** 2D vector as [x, y] */
export type Vec2 = [number, number];

/** 3D vector as [x, y, z] */
export type Vec3 = [number, number, number];

/** 4D vector as [x, y, z, w] */
export type Vec4 = [number, number, number, number];

/** Component-wise product */
export function multiply2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] * b[0], a[1] * b[1]];
}

/** Component-wise sum */
export function add2(a: Vec2, b: Vec2): Vec2 {
  return [a[0] + b[0], a[1] + b[1]];
}

/** True when every component is a finite number */
export function isFiniteVector(v: readonly number[]): boolean {
  return v.every((c) => Number.isFinite(c));
}
