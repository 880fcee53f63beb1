/**
 * Quad program contract: records, geometry, stages and variants
 */

export * from "./types";
export {
  VERTICES_PER_QUAD,
  QUAD_CORNERS,
  UNIT_QUAD_VERTICES,
  UNIT_QUAD_INDICES,
  QUAD_STRIP_TRIANGLES,
  PROCEDURAL_GENERATOR,
  EXPLICIT_GENERATOR,
  proceduralCorner,
  glyphCorner,
  explicitCorner,
  glyphGenerator,
  vertexBufferGenerator,
  type GeometryGenerator,
} from "./corners";
export {
  toClip,
  panelOffset,
  panelVertex,
  spriteVertex,
  textureVertex,
  glyphVertex,
} from "./vertexStage";
export { inSelection, panelFragment, texturedFragment, glyphFragment } from "./fragmentStage";
export {
  DEFAULT_SAMPLER,
  ImageTexture,
  createSampler,
  solidSampler,
  type AddressMode,
  type FilterMode,
  type Sampler,
  type SamplerDescriptor,
  type Texture2D,
} from "./sampler";
export * from "./variants";
export * from "./programs";
