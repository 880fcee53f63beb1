/**
 * Vertex / instance attribute layouts
 *
 * One table per program. Locations match the `layout(location = N)`
 * declarations in the GLSL sources; strides and offsets match the packers
 * in ./instances.
 */

import type { ShaderVariantName } from "../quad/variants";

// WebGL constants (avoid referencing WebGL2RenderingContext at module load time for testing)
export const GL_FLOAT = 0x1406;
export const GL_UNSIGNED_INT = 0x1405;

export interface AttributeLayout {
  /** Attribute location in shader */
  location: number;
  /** Number of components (1, 2, 3, or 4) */
  size: number;
  /** Component type */
  type: GLenum;
  /** Integer attribute (vertexAttribIPointer) rather than float */
  integer: boolean;
  /** Byte stride between records */
  stride: number;
  /** Byte offset within a record */
  offset: number;
  /** 0 = per vertex, 1 = per instance */
  divisor: 0 | 1;
}

/** position vec2, uv vec2 */
export const QUAD_VERTEX_STRIDE = 16;

/** size vec4 (xy + pad), transform 4 x vec4, color vec4 */
export const SPRITE_INSTANCE_STRIDE = 96;

/** glyphPos, glyphSize, uvStart, uvEnd (vec2 each), color u32 */
export const GLYPH_INSTANCE_STRIDE = 36;

function float(location: number, size: number, stride: number, offset: number, divisor: 0 | 1): AttributeLayout {
  return { location, size, type: GL_FLOAT, integer: false, stride, offset, divisor };
}

function spriteInstanceAttributes(firstLocation: number): AttributeLayout[] {
  const s = SPRITE_INSTANCE_STRIDE;
  return [
    float(firstLocation, 4, s, 0, 1), // size
    float(firstLocation + 1, 4, s, 16, 1), // transform column 0
    float(firstLocation + 2, 4, s, 32, 1),
    float(firstLocation + 3, 4, s, 48, 1),
    float(firstLocation + 4, 4, s, 64, 1), // transform column 3
    float(firstLocation + 5, 4, s, 80, 1), // color
  ];
}

export const QUAD_VERTEX_ATTRIBUTES: readonly AttributeLayout[] = [
  float(0, 2, QUAD_VERTEX_STRIDE, 0, 0), // position
  float(1, 2, QUAD_VERTEX_STRIDE, 8, 0), // uv
];

export const GLYPH_INSTANCE_ATTRIBUTES: readonly AttributeLayout[] = [
  float(0, 2, GLYPH_INSTANCE_STRIDE, 0, 1), // glyphPos
  float(1, 2, GLYPH_INSTANCE_STRIDE, 8, 1), // glyphSize
  float(2, 2, GLYPH_INSTANCE_STRIDE, 16, 1), // uvStart
  float(3, 2, GLYPH_INSTANCE_STRIDE, 24, 1), // uvEnd
  {
    location: 4,
    size: 1,
    type: GL_UNSIGNED_INT,
    integer: true,
    stride: GLYPH_INSTANCE_STRIDE,
    offset: 32,
    divisor: 1,
  }, // color
];

/** A program's attributes, grouped by the buffer that feeds them */
export interface VariantAttributes {
  /** Per-vertex buffer (divisor 0) */
  vertex: readonly AttributeLayout[];
  /** Per-instance buffer (divisor 1) */
  instance: readonly AttributeLayout[];
}

export const VARIANT_ATTRIBUTES: Readonly<Record<ShaderVariantName, VariantAttributes>> = {
  panel: { vertex: [], instance: [] },
  sprite: { vertex: QUAD_VERTEX_ATTRIBUTES, instance: spriteInstanceAttributes(2) },
  texture: { vertex: [], instance: spriteInstanceAttributes(0) },
  glyph: { vertex: [], instance: GLYPH_INSTANCE_ATTRIBUTES },
};

/**
 * Point the currently bound ARRAY_BUFFER at a set of attributes.
 * Call once per buffer with the attributes it holds, e.g.
 * `VARIANT_ATTRIBUTES.sprite.vertex` with the quad buffer bound, then
 * `.instance` with the instance buffer bound.
 */
export function applyAttributeLayout(
  gl: WebGL2RenderingContext,
  attributes: readonly AttributeLayout[]
): void {
  for (const attr of attributes) {
    gl.enableVertexAttribArray(attr.location);
    if (attr.integer) {
      gl.vertexAttribIPointer(attr.location, attr.size, attr.type, attr.stride, attr.offset);
    } else {
      gl.vertexAttribPointer(attr.location, attr.size, attr.type, false, attr.stride, attr.offset);
    }
    gl.vertexAttribDivisor(attr.location, attr.divisor);
  }
}
