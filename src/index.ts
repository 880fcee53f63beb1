/**
 * quadshade - Shader layer for instanced 2D quads: UI panels, sprites,
 * textured quads and atlas glyphs, as WebGL2 programs and as a CPU
 * reference backend
 */

export const VERSION = "0.1.0";

export {
  DEFAULT_SHADER_CONFIG,
  resolveShaderConfig,
  type PanelAnchor,
  type ShaderConfig,
} from "./config";
export * as mat4 from "./math/mat4";
export type { Mat4 } from "./math/mat4";
export type { Vec2, Vec3, Vec4 } from "./math/vec";
export {
  IDENTITY_TRANSFORM,
  createTransform,
  rotationZ,
  transformToMatrix,
  type Quat,
  type Transform,
} from "./math/transform";
export { multiplyColors, type Color } from "./types/color";
export {
  COLOR_DECODINGS,
  packColor,
  decodePackedColor,
  type ColorDecoding,
} from "./color/packedColor";
export * from "./quad";
export * from "./layout";
export * from "./shaders";
export * from "./style";
export * from "./software";
