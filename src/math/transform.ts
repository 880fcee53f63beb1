/**
 * Entity transforms (translation / rotation / scale) and their model matrix.
 *
 * The model matrix fed to the "Position" uniform and to per-instance
 * transforms is composed as translate * rotate * scale.
 */

import { mat4 as glMat4 } from "gl-matrix";
import type { Mat4 } from "./mat4";
import type { Vec3, Vec4 } from "./vec";

/** Rotation quaternion as [x, y, z, w] */
export type Quat = Vec4;

export interface Transform {
  translation: Vec3;
  rotation: Quat;
  scale: Vec3;
}

export const IDENTITY_TRANSFORM: Readonly<Transform> = {
  translation: [0, 0, 0],
  rotation: [0, 0, 0, 1],
  scale: [1, 1, 1],
};

/** Create a transform, filling unspecified parts from the identity */
export function createTransform(parts: Partial<Transform> = {}): Transform {
  return {
    translation: parts.translation ?? [...IDENTITY_TRANSFORM.translation],
    rotation: parts.rotation ?? [...IDENTITY_TRANSFORM.rotation],
    scale: parts.scale ?? [...IDENTITY_TRANSFORM.scale],
  };
}

/** Quaternion for a rotation of `angle` radians around the Z axis */
export function rotationZ(angle: number): Quat {
  const half = angle / 2;
  return [0, 0, Math.sin(half), Math.cos(half)];
}

/** Compose the model matrix: scale first, then rotate, then translate */
export function transformToMatrix(t: Transform): Mat4 {
  const out = new Float32Array(16);
  glMat4.fromRotationTranslationScale(out, t.rotation, t.translation, t.scale);
  return out;
}
