/**
 * Quad Geometry Generators
 *
 * Unit quad corners, centered at origin with half-extent 0.5. The ordinal
 * order (top-left, bottom-left, top-right, bottom-right) assembles into a
 * triangle strip (0,1,2) (2,1,3) without an index buffer.
 *
 * Precondition: ordinals are in [0, 3]. Anything else yields a zeroed,
 * degenerate corner rather than an error; hosts must never submit one.
 */

import type { Vec2 } from "../math/vec";
import type { QuadCorner, QuadVertex } from "./types";

/** Number of vertices emitted per quad instance */
export const VERTICES_PER_QUAD = 4;

/** Ordinal -> corner, in strip order */
export const QUAD_CORNERS: readonly QuadCorner[] = [
  { position: [-0.5, 0.5], uv: [0, 0] }, // top-left
  { position: [-0.5, -0.5], uv: [0, 1] }, // bottom-left
  { position: [0.5, 0.5], uv: [1, 0] }, // top-right
  { position: [0.5, -0.5], uv: [1, 1] }, // bottom-right
];

/** Explicit vertex buffer equivalent to the procedural table */
export const UNIT_QUAD_VERTICES: readonly QuadVertex[] = QUAD_CORNERS.map(
  (c) => ({ position: [c.position[0], c.position[1]], uv: [c.uv[0], c.uv[1]] })
);

/** Indices for hosts drawing the explicit quad as an indexed triangle list */
export const UNIT_QUAD_INDICES: readonly number[] = [0, 1, 3, 0, 3, 2];

/** Strip triangles by ordinal, winding preserved */
export const QUAD_STRIP_TRIANGLES: readonly [number, number, number][] = [
  [0, 1, 2],
  [2, 1, 3],
];

/**
 * A source of quad corners. The vertex stage does not care whether the
 * corner came from a built-in ordinal or an explicit vertex record.
 */
export interface GeometryGenerator<TInput> {
  corner(input: TInput): QuadCorner;
}

function zeroCorner(): QuadCorner {
  return { position: [0, 0], uv: [0, 0] };
}

function isOrdinal(ordinal: number): boolean {
  return Number.isInteger(ordinal) && ordinal >= 0 && ordinal < VERTICES_PER_QUAD;
}

/** Corner for a built-in vertex ordinal (panel and plain-textured programs) */
export function proceduralCorner(ordinal: number): QuadCorner {
  const corner = isOrdinal(ordinal) ? QUAD_CORNERS[ordinal] : undefined;
  if (!corner) return zeroCorner();
  return { position: [...corner.position], uv: [...corner.uv] };
}

/** Corner for the glyph program: table position, UV from the atlas rectangle */
export function glyphCorner(ordinal: number, uvStart: Vec2, uvEnd: Vec2): QuadCorner {
  const position = proceduralCorner(ordinal).position;

  switch (ordinal) {
    case 0:
      return { position, uv: [uvStart[0], uvStart[1]] };
    case 1:
      return { position, uv: [uvStart[0], uvEnd[1]] };
    case 2:
      return { position, uv: [uvEnd[0], uvStart[1]] };
    case 3:
      return { position, uv: [uvEnd[0], uvEnd[1]] };
    default:
      return zeroCorner();
  }
}

/** Corner taken verbatim from an explicit vertex record */
export function explicitCorner(vertex: QuadVertex): QuadCorner {
  return { position: [...vertex.position], uv: [...vertex.uv] };
}

export const PROCEDURAL_GENERATOR: GeometryGenerator<number> = {
  corner: proceduralCorner,
};

export const EXPLICIT_GENERATOR: GeometryGenerator<QuadVertex> = {
  corner: explicitCorner,
};

/** Generator bound to one glyph's atlas sub-rectangle */
export function glyphGenerator(uvStart: Vec2, uvEnd: Vec2): GeometryGenerator<number> {
  return { corner: (ordinal) => glyphCorner(ordinal, uvStart, uvEnd) };
}

/**
 * Adapt an explicit vertex buffer to ordinal input, the way a host pairs an
 * instance stream with a 4-vertex buffer. Missing vertices yield a zeroed corner.
 */
export function vertexBufferGenerator(
  vertices: readonly QuadVertex[]
): GeometryGenerator<number> {
  return {
    corner: (index) => {
      const vertex = Number.isInteger(index) ? vertices[index] : undefined;
      return vertex ? explicitCorner(vertex) : zeroCorner();
    },
  };
}
