/**
 * Vertex Transform Stage
 *
 * clip = projection * model * vec4(p_scaled, 1, 1)
 *
 * The local-to-clip vector always carries 1 in both z and w. This is the
 * 2D convention of every quad program, not a perspective depth.
 */

import { decodePackedColor, type ColorDecoding } from "../color/packedColor";
import type { PanelAnchor } from "../config";
import * as mat4 from "../math/mat4";
import type { Mat4 } from "../math/mat4";
import { add2, multiply2, type Vec2, type Vec4 } from "../math/vec";
import { explicitCorner, glyphCorner, proceduralCorner } from "./corners";
import type {
  CameraUniform,
  ColoredVaryings,
  GlyphInstance,
  InstanceTransform,
  ModelUniform,
  PanelUniform,
  PanelVaryings,
  QuadInstance,
  QuadVertex,
  SpriteInstance,
  VertexOutput,
} from "./types";

/** Project a scaled local position through a model matrix and the camera */
export function toClip(camera: CameraUniform, model: Mat4, scaled: Vec2): Vec4 {
  const world = mat4.transformVec4(model, [scaled[0], scaled[1], 1, 1]);
  return mat4.transformVec4(camera.projection, world);
}

/** Offset that anchors a panel relative to its local origin */
export function panelOffset(size: Vec2, anchor: PanelAnchor): Vec2 {
  return [size[0] / anchor.x, -size[1] / anchor.y];
}

function instanceMatrix(transform: InstanceTransform): Mat4 {
  return mat4.fromColumns(transform[0], transform[1], transform[2], transform[3]);
}

/** Panel program: p * size + anchor offset, entity model transform */
export function panelVertex(
  ordinal: number,
  camera: CameraUniform,
  panel: PanelUniform,
  model: ModelUniform,
  anchor: PanelAnchor
): VertexOutput<PanelVaryings> {
  const corner = proceduralCorner(ordinal);
  const size: Vec2 = [panel.size[0], panel.size[1]];
  const scaled = add2(multiply2(corner.position, size), panelOffset(size, anchor));

  return {
    clipPosition: toClip(camera, model.transform, scaled),
    varyings: {
      uv: corner.uv,
      selectionRange: [panel.selectionRangeY[0], panel.selectionRangeY[1]],
    },
  };
}

/** Attribute-driven sprite program: explicit vertex, per-instance transform */
export function spriteVertex(
  vertex: QuadVertex,
  instance: QuadInstance,
  camera: CameraUniform
): VertexOutput<ColoredVaryings> {
  const corner = explicitCorner(vertex);
  const scaled = multiply2(corner.position, instance.size);

  return {
    clipPosition: toClip(camera, instanceMatrix(instance.transform), scaled),
    varyings: { uv: corner.uv, color: [...instance.color] },
  };
}

/** Procedural textured program: ordinal corner, per-instance transform */
export function textureVertex(
  ordinal: number,
  instance: SpriteInstance,
  camera: CameraUniform
): VertexOutput<ColoredVaryings> {
  const corner = proceduralCorner(ordinal);
  const scaled = multiply2(corner.position, instance.size);

  return {
    clipPosition: toClip(camera, instanceMatrix(instance.transform), scaled),
    varyings: { uv: corner.uv, color: [...instance.color] },
  };
}

/** Glyph program: p * glyphSize + glyphPos, entity model transform */
export function glyphVertex(
  ordinal: number,
  instance: GlyphInstance,
  camera: CameraUniform,
  model: ModelUniform,
  decoding: ColorDecoding
): VertexOutput<ColoredVaryings> {
  const corner = glyphCorner(ordinal, instance.uvStart, instance.uvEnd);
  const scaled = add2(multiply2(corner.position, instance.glyphSize), instance.glyphPos);

  return {
    clipPosition: toClip(camera, model.transform, scaled),
    varyings: {
      uv: corner.uv,
      color: decodePackedColor(instance.color, decoding),
    },
  };
}
