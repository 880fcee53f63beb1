/**
 * Sprite and plain-textured quad shaders
 *
 * Both programs scale a unit quad by the instance size, place it with the
 * per-instance transform and tint the sampled texel with the instance color.
 * The sprite program reads its corners from an explicit 4-vertex buffer,
 * the texture program derives them from gl_VertexID.
 *
 * Bind groups: 0 Camera, 1 texture + sampler.
 */

import { cameraBlock, header, quadCornerChunk, toClipChunk } from "./common";

/** Instance attributes starting at a location */
function instanceInputs(first: number): string {
  return `
layout(location = ${first}) in vec4 a_size;
layout(location = ${first + 1}) in vec4 a_transform0;
layout(location = ${first + 2}) in vec4 a_transform1;
layout(location = ${first + 3}) in vec4 a_transform2;
layout(location = ${first + 4}) in vec4 a_transform3;
layout(location = ${first + 5}) in vec4 a_color;
`;
}

const instanceMain = `
  mat4 transform = mat4(a_transform0, a_transform1, a_transform2, a_transform3);
  gl_Position = toClip(transform, position * a_size.xy);

  v_uv = uv;
  v_color = a_color;
`;

/** Explicit-vertex sprite program */
export const spriteVertexShader = `${header}${cameraBlock}
layout(location = 0) in vec2 a_position;
layout(location = 1) in vec2 a_uv;
${instanceInputs(2)}
out vec2 v_uv;
out vec4 v_color;
${toClipChunk}
void main() {
  vec2 position = a_position;
  vec2 uv = a_uv;
${instanceMain}}
`;

/** Procedural plain-textured program */
export const textureVertexShader = `${header}${cameraBlock}${instanceInputs(0)}
out vec2 v_uv;
out vec4 v_color;
${quadCornerChunk}${toClipChunk}
void main() {
  vec2 position;
  vec2 uv;
  quadCorner(gl_VertexID, position, uv);
${instanceMain}}
`;

/** texel * tint, alpha included */
export const texturedFragmentShader = `${header}
uniform sampler2D u_texture;

in vec2 v_uv;
in vec4 v_color;

out vec4 fragColor;

void main() {
  fragColor = texture(u_texture, v_uv) * v_color;
}
`;
