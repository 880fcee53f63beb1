/**
 * Quad Program Types
 *
 * Uniform and instance records exchanged between the host and the four
 * quad programs. Records are immutable for the duration of a draw.
 */

import type { Mat4 } from "../math/mat4";
import type { Vec2, Vec3, Vec4 } from "../math/vec";
import type { Color } from "../types/color";

/** Frame camera, bound once per frame (group 0) */
export interface CameraUniform {
  /** View-projection matrix */
  projection: Mat4;
  /** Camera position in world space */
  position: Vec3;
}

/** Entity model transform ("Position" uniform) */
export interface ModelUniform {
  transform: Mat4;
}

/** UI panel parameters ("Ui" uniform) */
export interface PanelUniform {
  /** xy = panel width/height */
  size: Vec4;
  /** Color outside the selection band */
  menuColor: Color;
  /** Color inside the selection band */
  selectionColor: Color;
  /** xy = normalized (start, end) of the selection band along UV.y, both exclusive */
  selectionRangeY: Vec4;
}

/** One explicit corner of the attribute-driven quad */
export interface QuadVertex {
  position: Vec2;
  uv: Vec2;
}

/** Four column vectors forming the instance's model matrix */
export type InstanceTransform = [Vec4, Vec4, Vec4, Vec4];

/** Per-instance record of the attribute-driven sprite program */
export interface QuadInstance {
  size: Vec2;
  transform: InstanceTransform;
  color: Color;
}

/** Per-instance record of the procedural textured program */
export type SpriteInstance = QuadInstance;

/** Per-instance record of the glyph program */
export interface GlyphInstance {
  /** Placement added after scaling */
  glyphPos: Vec2;
  glyphSize: Vec2;
  /** Atlas sub-rectangle */
  uvStart: Vec2;
  uvEnd: Vec2;
  /** Ink color packed 0xAARRGGBB */
  color: number;
}

/** A quad corner as produced by a geometry generator */
export interface QuadCorner {
  /** Local position in {-0.5, 0.5}² */
  position: Vec2;
  uv: Vec2;
}

/** Vertex stage output before rasterization */
export interface VertexOutput<V> {
  clipPosition: Vec4;
  varyings: V;
}

export interface PanelVaryings {
  uv: Vec2;
  selectionRange: Vec2;
}

export interface ColoredVaryings {
  uv: Vec2;
  color: Color;
}
