import type { ShaderConfig } from "../config";
import { VARIANT_ATTRIBUTES, type VariantAttributes } from "../layout/attributes";
import { VARIANTS, type ShaderVariantName } from "../quad/variants";
import { setBlendMode } from "../style/blendMode";
import { TEXTURE_UNIT, type UniformBlockName } from "./common";
import { bindUniformBlock, createProgram } from "./compile";
import { glyphFragmentShader, glyphVertexShader } from "./glyph";
import { panelFragmentShader, panelVertexShader } from "./panel";
import { spriteVertexShader, texturedFragmentShader, textureVertexShader } from "./sprite";

export interface ShaderSources {
  vertex: string;
  fragment: string;
}

export interface QuadProgramInfo {
  variant: ShaderVariantName;
  program: WebGLProgram;
  /** Uniform block indices, by block name */
  blocks: Partial<Record<UniformBlockName, number>>;
  /** Location of the texture/atlas sampler, for textured programs */
  texture: WebGLUniformLocation | null;
  /** Attribute tables, one per source buffer */
  attributes: VariantAttributes;
}

const VARIANT_BLOCKS: Record<ShaderVariantName, readonly UniformBlockName[]> = {
  panel: ["Camera", "Ui", "Position"],
  sprite: ["Camera"],
  texture: ["Camera"],
  glyph: ["Camera", "Position"],
};

/** GLSL sources of one variant under a configuration */
export function getShaderSources(
  variant: ShaderVariantName,
  config: ShaderConfig
): ShaderSources {
  switch (variant) {
    case "panel":
      return { vertex: panelVertexShader(config), fragment: panelFragmentShader() };
    case "sprite":
      return { vertex: spriteVertexShader, fragment: texturedFragmentShader };
    case "texture":
      return { vertex: textureVertexShader, fragment: texturedFragmentShader };
    case "glyph":
      return { vertex: glyphVertexShader(config), fragment: glyphFragmentShader };
  }
}

/**
 * Compile and link one variant and wire its binding contract: uniform
 * blocks to their binding points, the sampler to its texture unit.
 *
 * @throws if compilation or linking fails, or a block/sampler is missing
 */
export function createQuadProgramInfo(
  gl: WebGL2RenderingContext,
  variant: ShaderVariantName,
  config: ShaderConfig
): QuadProgramInfo {
  const sources = getShaderSources(variant, config);
  const program = createProgram(gl, sources.vertex, sources.fragment);

  try {
    const blocks: Partial<Record<UniformBlockName, number>> = {};
    for (const name of VARIANT_BLOCKS[variant]) {
      blocks[name] = bindUniformBlock(gl, program, name);
    }

    let texture: WebGLUniformLocation | null = null;
    if (VARIANTS[variant].capabilities.hasTexture) {
      texture = gl.getUniformLocation(program, "u_texture");
      if (!texture) {
        throw new Error(`Sampler "u_texture" not found in ${variant} program`);
      }
      gl.useProgram(program);
      gl.uniform1i(texture, TEXTURE_UNIT);
    }

    return { variant, program, blocks, texture, attributes: VARIANT_ATTRIBUTES[variant] };
  } catch (err) {
    console.error(`[QuadProgram] Failed to wire ${variant} program bindings`);
    gl.deleteProgram(program);
    throw err;
  }
}

/** Build all four programs */
export function createQuadProgramInfos(
  gl: WebGL2RenderingContext,
  config: ShaderConfig
): Record<ShaderVariantName, QuadProgramInfo> {
  return {
    panel: createQuadProgramInfo(gl, "panel", config),
    sprite: createQuadProgramInfo(gl, "sprite", config),
    texture: createQuadProgramInfo(gl, "texture", config),
    glyph: createQuadProgramInfo(gl, "glyph", config),
  };
}

/**
 * Make a program current with the pipeline state it was designed for:
 * blending and back-face culling (counter-clockwise front faces).
 */
export function usePipeline(gl: WebGL2RenderingContext, info: QuadProgramInfo): void {
  const descriptor = VARIANTS[info.variant];

  gl.useProgram(info.program);
  setBlendMode(gl, descriptor.blend);

  if (descriptor.cullBackFaces) {
    gl.enable(gl.CULL_FACE);
    gl.frontFace(gl.CCW);
    gl.cullFace(gl.BACK);
  } else {
    gl.disable(gl.CULL_FACE);
  }
}
