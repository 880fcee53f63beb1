/**
 * Shared GLSL chunks
 *
 * Uniform blocks and corner functions every quad program includes. The
 * corner tables are generated from the same data the CPU generator uses.
 */

import type { ColorDecoding } from "../color/packedColor";
import { QUAD_CORNERS } from "../quad/corners";

/** Uniform block binding points, equal to the bind group index */
export const UNIFORM_BLOCK_BINDINGS = {
  Camera: 0,
  Ui: 1,
  Position: 2,
} as const;

export type UniformBlockName = keyof typeof UNIFORM_BLOCK_BINDINGS;

/** Texture unit of the group-1 texture/atlas */
export const TEXTURE_UNIT = 0;

/** Format a number as a GLSL float literal */
export function glslFloat(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`Cannot emit non-finite GLSL literal: ${value}`);
  }
  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

function vec2(x: number, y: number): string {
  return `vec2(${glslFloat(x)}, ${glslFloat(y)})`;
}

// Both stages declare the same precision so shared blocks link.
export const header = `#version 300 es
precision highp float;
precision highp int;
`;

export const cameraBlock = `
layout(std140) uniform Camera {
  mat4 u_projection;
  vec3 u_cameraPosition;
};
`;

export const positionBlock = `
layout(std140) uniform Position {
  mat4 u_model;
};
`;

export const uiBlock = `
layout(std140) uniform Ui {
  vec2 u_panelSize;
  vec4 u_menuColor;
  vec4 u_selectionColor;
  vec2 u_selectionRangeY;
};
`;

/**
 * quadCorner(ordinal, position, uv): ordinals outside [0, 3] leave both
 * outputs at zero.
 */
export const quadCornerChunk = `
void quadCorner(int ordinal, out vec2 position, out vec2 uv) {
  position = vec2(0.0);
  uv = vec2(0.0);
  switch (ordinal) {
${QUAD_CORNERS.map(
  (c, i) =>
    `    case ${i}: position = ${vec2(c.position[0], c.position[1])}; uv = ${vec2(c.uv[0], c.uv[1])}; break;`
).join("\n")}
    default: break;
  }
}
`;

export const glyphCornerChunk = `
void glyphCorner(int ordinal, vec2 uvStart, vec2 uvEnd, out vec2 position, out vec2 uv) {
  vec2 unused;
  quadCorner(ordinal, position, unused);
  uv = vec2(0.0);
  switch (ordinal) {
    case 0: uv = uvStart; break;
    case 1: uv = vec2(uvStart.x, uvEnd.y); break;
    case 2: uv = vec2(uvEnd.x, uvStart.y); break;
    case 3: uv = uvEnd; break;
    default: break;
  }
}
`;

/** unpackColor(c): 0xAARRGGBB -> vec4 */
export function unpackColorChunk(decoding: ColorDecoding): string {
  const blue =
    decoding === "legacy"
      ? "float(c & 0x00FF0000u) / 255.0"
      : "float(c & 0xFFu) / 255.0";

  return `
vec4 unpackColor(uint c) {
  float r = float((c >> 16u) & 0xFFu) / 255.0;
  float g = float((c >> 8u) & 0xFFu) / 255.0;
  float b = ${blue};
  float a = float((c >> 24u) & 0xFFu) / 255.0;
  return vec4(r, g, b, a);
}
`;
}

/** Local quad position to clip space, z and w inputs fixed at 1 */
export const toClipChunk = `
vec4 toClip(mat4 model, vec2 scaled) {
  return u_projection * model * vec4(scaled, 1.0, 1.0);
}
`;
