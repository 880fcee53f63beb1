/**
 * CPU Quad Programs
 *
 * Each variant's vertex and fragment stage bound into one object with the
 * same shape, so a backend can drive any of them without knowing which.
 * Varyings cross the rasterizer as flat float slots, like GPU interpolators.
 */

import type { ShaderConfig } from "../config";
import type { Color } from "../types/color";
import { UNIT_QUAD_VERTICES } from "./corners";
import { glyphFragment, panelFragment, texturedFragment } from "./fragmentStage";
import type { ColoredVaryings, GlyphInstance, PanelVaryings, QuadVertex, SpriteInstance, VertexOutput } from "./types";
import type { GlyphBindings, PanelBindings, ShaderVariantName, TexturedBindings } from "./variants";
import { glyphVertex, panelVertex, spriteVertex, textureVertex } from "./vertexStage";

export interface QuadProgram<TInstance, TBindings, TVaryings> {
  readonly variant: ShaderVariantName;
  /** Number of float slots the varyings occupy */
  readonly varyingSlots: number;
  vertex(index: number, instance: TInstance, bindings: TBindings): VertexOutput<TVaryings>;
  fragment(varyings: TVaryings, bindings: TBindings): Color;
  encodeVaryings(varyings: TVaryings): number[];
  decodeVaryings(slots: ArrayLike<number>): TVaryings;
}

export type PanelProgram = QuadProgram<null, PanelBindings, PanelVaryings>;
export type TexturedProgram = QuadProgram<SpriteInstance, TexturedBindings, ColoredVaryings>;
export type GlyphProgram = QuadProgram<GlyphInstance, GlyphBindings, ColoredVaryings>;

export interface QuadPrograms {
  panel: PanelProgram;
  sprite: TexturedProgram;
  texture: TexturedProgram;
  glyph: GlyphProgram;
}

function slot(slots: ArrayLike<number>, i: number): number {
  return slots[i] ?? 0;
}

const coloredVaryings = {
  varyingSlots: 6,
  encodeVaryings: (v: ColoredVaryings): number[] => [...v.uv, ...v.color],
  decodeVaryings: (s: ArrayLike<number>): ColoredVaryings => ({
    uv: [slot(s, 0), slot(s, 1)],
    color: [slot(s, 2), slot(s, 3), slot(s, 4), slot(s, 5)],
  }),
};

/**
 * Build the CPU programs for one configuration.
 *
 * @param config - Resolved shader configuration
 * @param spriteVertices - Explicit vertex buffer paired with sprite instances
 */
export function createQuadPrograms(
  config: ShaderConfig,
  spriteVertices: readonly QuadVertex[] = UNIT_QUAD_VERTICES
): QuadPrograms {
  const panel: PanelProgram = {
    variant: "panel",
    varyingSlots: 4,
    vertex: (ordinal, _instance, b) =>
      panelVertex(ordinal, b.camera, b.panel, b.model, config.panelAnchor),
    fragment: (v, b) => panelFragment(v.uv[1], v.selectionRange, b.panel),
    encodeVaryings: (v) => [...v.uv, ...v.selectionRange],
    decodeVaryings: (s) => ({
      uv: [slot(s, 0), slot(s, 1)],
      selectionRange: [slot(s, 2), slot(s, 3)],
    }),
  };

  const sprite: TexturedProgram = {
    variant: "sprite",
    ...coloredVaryings,
    vertex: (index, instance, b) => {
      const vertex = spriteVertices[index] ?? { position: [0, 0], uv: [0, 0] };
      return spriteVertex(vertex, instance, b.camera);
    },
    fragment: (v, b) => texturedFragment(v.uv, v.color, b.texture),
  };

  const texture: TexturedProgram = {
    variant: "texture",
    ...coloredVaryings,
    vertex: (ordinal, instance, b) => textureVertex(ordinal, instance, b.camera),
    fragment: (v, b) => texturedFragment(v.uv, v.color, b.texture),
  };

  const glyph: GlyphProgram = {
    variant: "glyph",
    ...coloredVaryings,
    vertex: (ordinal, instance, b) =>
      glyphVertex(ordinal, instance, b.camera, b.model, config.colorDecoding),
    fragment: (v, b) => glyphFragment(v.uv, v.color, b.atlas),
  };

  return { panel, sprite, texture, glyph };
}
