/**
 * Shader compilation utilities
 */

import type { UniformBlockName } from "./common";
import { UNIFORM_BLOCK_BINDINGS } from "./common";

// Returned by getUniformBlockIndex for a block the program does not declare
const GL_INVALID_INDEX = 0xffffffff;

/** Compile one stage from source */
export function compileShader(
  gl: WebGL2RenderingContext,
  type: number,
  source: string
): WebGLShader {
  const shader = gl.createShader(type);
  if (!shader) {
    throw new Error("Failed to create shader");
  }

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader);
    const stage = type === gl.VERTEX_SHADER ? "vertex" : "fragment";
    gl.deleteShader(shader);
    throw new Error(`Shader compilation failed (${stage}): ${log}`);
  }

  return shader;
}

/** Compile both stages and link them; the shader objects are released either way */
export function createProgram(
  gl: WebGL2RenderingContext,
  vertexSource: string,
  fragmentSource: string
): WebGLProgram {
  const vs = compileShader(gl, gl.VERTEX_SHADER, vertexSource);
  const fs = compileShader(gl, gl.FRAGMENT_SHADER, fragmentSource);

  const program = gl.createProgram();
  if (!program) {
    gl.deleteShader(vs);
    gl.deleteShader(fs);
    throw new Error("Failed to create program");
  }

  gl.attachShader(program, vs);
  gl.attachShader(program, fs);
  gl.linkProgram(program);

  gl.deleteShader(vs);
  gl.deleteShader(fs);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program);
    gl.deleteProgram(program);
    throw new Error(`Program linking failed: ${log}`);
  }

  return program;
}

/**
 * Attach a named uniform block to its fixed binding point.
 *
 * @throws if the program does not declare the block
 */
export function bindUniformBlock(
  gl: WebGL2RenderingContext,
  program: WebGLProgram,
  name: UniformBlockName
): number {
  const index = gl.getUniformBlockIndex(program, name);
  if (index === GL_INVALID_INDEX) {
    throw new Error(`Uniform block "${name}" not found in program`);
  }
  gl.uniformBlockBinding(program, index, UNIFORM_BLOCK_BINDINGS[name]);
  return index;
}
