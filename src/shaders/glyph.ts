/**
 * Glyph atlas shaders
 *
 * The atlas stores coverage in its first channel; the instance supplies the
 * ink color as a packed 0xAARRGGBB integer attribute.
 *
 * Bind groups: 0 Camera, 1 atlas texture + sampler, 2 Position.
 */

import type { ShaderConfig } from "../config";
import {
  cameraBlock,
  glyphCornerChunk,
  header,
  positionBlock,
  quadCornerChunk,
  toClipChunk,
  unpackColorChunk,
} from "./common";

export function glyphVertexShader(config: ShaderConfig): string {
  return `${header}${cameraBlock}${positionBlock}
layout(location = 0) in vec2 a_glyphPos;
layout(location = 1) in vec2 a_glyphSize;
layout(location = 2) in vec2 a_uvStart;
layout(location = 3) in vec2 a_uvEnd;
layout(location = 4) in uint a_color;

out vec2 v_uv;
out vec4 v_color;
${quadCornerChunk}${glyphCornerChunk}${unpackColorChunk(config.colorDecoding)}${toClipChunk}
void main() {
  vec2 position;
  vec2 uv;
  glyphCorner(gl_VertexID, a_uvStart, a_uvEnd, position, uv);

  gl_Position = toClip(u_model, position * a_glyphSize + a_glyphPos);

  v_uv = uv;
  v_color = unpackColor(a_color);
}
`;
}

/** Ink rgb unchanged, alpha masked by coverage */
export const glyphFragmentShader = `${header}
uniform sampler2D u_texture;

in vec2 v_uv;
in vec4 v_color;

out vec4 fragColor;

void main() {
  float coverage = texture(u_texture, v_uv).r;
  fragColor = vec4(v_color.rgb, v_color.a * coverage);
}
`;
