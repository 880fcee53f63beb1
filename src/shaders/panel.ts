/**
 * UI panel shaders
 *
 * A flat quad sized by the Ui block, anchored by the configured divisors
 * and split into a menu color and a selection band along UV.y.
 *
 * Bind groups: 0 Camera, 1 Ui, 2 Position. No vertex buffers.
 */

import type { ShaderConfig } from "../config";
import {
  cameraBlock,
  glslFloat,
  header,
  positionBlock,
  quadCornerChunk,
  toClipChunk,
  uiBlock,
} from "./common";

export function panelVertexShader(config: ShaderConfig): string {
  return `${header}${cameraBlock}${uiBlock}${positionBlock}
const float ANCHOR_X = ${glslFloat(config.panelAnchor.x)};
const float ANCHOR_Y = ${glslFloat(config.panelAnchor.y)};

out vec2 v_uv;
out vec2 v_selectionRange;
${quadCornerChunk}${toClipChunk}
void main() {
  vec2 position;
  vec2 uv;
  quadCorner(gl_VertexID, position, uv);

  vec2 offset = vec2(u_panelSize.x / ANCHOR_X, -u_panelSize.y / ANCHOR_Y);
  gl_Position = toClip(u_model, position * u_panelSize + offset);

  v_uv = uv;
  v_selectionRange = u_selectionRangeY;
}
`;
}

/** Strict (start, end) test: boundaries take the menu color */
export function panelFragmentShader(): string {
  return `${header}${uiBlock}
in vec2 v_uv;
in vec2 v_selectionRange;

out vec4 fragColor;

void main() {
  bool selected = v_selectionRange.x < v_uv.y && v_uv.y < v_selectionRange.y;
  fragColor = selected ? u_selectionColor : u_menuColor;
}
`;
}
