/**
 * Packed glyph colors
 *
 * Glyph instances carry their ink color as one unsigned 32-bit value laid
 * out 0xAARRGGBB (alpha in the most significant byte). The host packs it
 * with `packColor`; the glyph program unpacks it per vertex.
 */

import type { Color } from "../types/color";

/**
 * How the blue lane is recovered from a packed color.
 *
 * - `"argb"`: bits 7:0, the conventional layout.
 * - `"legacy"`: bits 23:16 left unshifted, exactly as the first glyph
 *   program shipped. Blue comes out as `(c & 0x00ff0000) / 255`, which is
 *   far outside [0, 1] whenever red is non-zero. Only needed to render
 *   data captured against that program.
 */
export type ColorDecoding = "argb" | "legacy";

export const COLOR_DECODINGS: readonly ColorDecoding[] = ["argb", "legacy"];

/** Pack a float color into 0xAARRGGBB (unsigned) */
export function packColor(color: Color): number {
  const [r, g, b, a] = color;
  return (
    ((toByte(a) << 24) | (toByte(r) << 16) | (toByte(g) << 8) | toByte(b)) >>>
    0
  );
}

/** Unpack 0xAARRGGBB into a float color */
export function decodePackedColor(
  packed: number,
  decoding: ColorDecoding = "argb"
): Color {
  const c = packed >>> 0;

  const r = ((c >>> 16) & 0xff) / 255;
  const g = ((c >>> 8) & 0xff) / 255;
  const a = ((c >>> 24) & 0xff) / 255;
  const b =
    decoding === "legacy" ? (c & 0x00ff0000) / 255 : (c & 0xff) / 255;

  return [r, g, b, a];
}

function toByte(channel: number): number {
  const clamped = channel < 0 ? 0 : channel > 1 ? 1 : channel;
  return Math.round(clamped * 255);
}
