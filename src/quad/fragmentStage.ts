/**
 * Fragment Compositors
 *
 * One compositing rule per program family. None of them blend with the
 * target; blending is render-target state owned by the host.
 */

import type { Vec2 } from "../math/vec";
import { multiplyColors, type Color } from "../types/color";
import type { Sampler } from "./sampler";
import type { PanelUniform } from "./types";

/**
 * True when uvY lies strictly inside (start, end).
 * Both boundaries resolve to outside.
 */
export function inSelection(uvY: number, range: Vec2): boolean {
  return range[0] < uvY && uvY < range[1];
}

/** Panel: flat two-color selection band, no texture */
export function panelFragment(
  uvY: number,
  range: Vec2,
  panel: Pick<PanelUniform, "menuColor" | "selectionColor">
): Color {
  return inSelection(uvY, range) ? [...panel.selectionColor] : [...panel.menuColor];
}

/** Sprite / plain-textured: texel tinted by the instance color */
export function texturedFragment(uv: Vec2, color: Color, sampler: Sampler): Color {
  return multiplyColors(sampler.sample(uv), color);
}

/** Glyph: instance ink color, alpha masked by atlas coverage (channel 0) */
export function glyphFragment(uv: Vec2, color: Color, atlas: Sampler): Color {
  const coverage = atlas.sample(uv)[0];
  return [color[0], color[1], color[2], color[3] * coverage];
}
