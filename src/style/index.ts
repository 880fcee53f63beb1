/**
 * Blending Module
 */

export { setBlendMode, blendPixel } from "./blendMode";
