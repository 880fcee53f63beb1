/**
 * Blend Mode Implementation
 *
 * Render-target blending for the quad programs, as WebGL state and as the
 * equivalent per-pixel operation for the software backend.
 */

import type { BlendMode } from "../quad/variants";
import type { Color } from "../types/color";

/**
 * Set the WebGL blend state for a mode.
 *
 * @param gl - WebGL2 rendering context
 * @param mode - Blend mode to apply
 */
export function setBlendMode(gl: WebGL2RenderingContext, mode: BlendMode): void {
  switch (mode) {
    case "alpha":
      // RGB: src * srcAlpha + dst * (1 - srcAlpha); Alpha: src + dst * (1 - srcAlpha)
      gl.enable(gl.BLEND);
      gl.blendFuncSeparate(
        gl.SRC_ALPHA,
        gl.ONE_MINUS_SRC_ALPHA,
        gl.ONE,
        gl.ONE_MINUS_SRC_ALPHA
      );
      break;

    case "replace":
      gl.disable(gl.BLEND);
      break;
  }
}

/** Blend a fragment over a destination pixel */
export function blendPixel(src: Color, dst: Color, mode: BlendMode): Color {
  switch (mode) {
    case "alpha": {
      const a = src[3];
      const inv = 1 - a;
      return [
        src[0] * a + dst[0] * inv,
        src[1] * a + dst[1] * inv,
        src[2] * a + dst[2] * inv,
        a + dst[3] * inv,
      ];
    }

    case "replace":
      return [src[0], src[1], src[2], src[3]];
  }
}
