/**
 * GLSL ES 3.00 sources and WebGL2 program setup
 */

export {
  UNIFORM_BLOCK_BINDINGS,
  TEXTURE_UNIT,
  glslFloat,
  type UniformBlockName,
} from "./common";
export { panelVertexShader, panelFragmentShader } from "./panel";
export { spriteVertexShader, textureVertexShader, texturedFragmentShader } from "./sprite";
export { glyphVertexShader, glyphFragmentShader } from "./glyph";
export { compileShader, createProgram, bindUniformBlock } from "./compile";
export {
  getShaderSources,
  createQuadProgramInfo,
  createQuadProgramInfos,
  usePipeline,
  type QuadProgramInfo,
  type ShaderSources,
} from "./programs";
