/**
 * WebGL Program Setup Tests
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { DEFAULT_SHADER_CONFIG } from "../config";
import { VARIANT_ATTRIBUTES } from "../layout/attributes";
import { bindUniformBlock, compileShader, createProgram } from "./compile";
import { createQuadProgramInfo, createQuadProgramInfos, getShaderSources, usePipeline } from "./programs";
import { textureVertexShader } from "./sprite";

const BLOCKS = ["Camera", "Ui", "Position"];
const INVALID_INDEX = 0xffffffff;

interface MockOptions {
  compiles?: boolean;
  links?: boolean;
  sampler?: boolean;
  blocks?: string[];
}

// Mock WebGL2 context
function createMockGL(options: MockOptions = {}): WebGL2RenderingContext {
  const { compiles = true, links = true, sampler = true, blocks = BLOCKS } = options;
  const gl = {
    createShader: vi.fn(() => ({})),
    shaderSource: vi.fn(),
    compileShader: vi.fn(),
    getShaderParameter: vi.fn(() => compiles),
    getShaderInfoLog: vi.fn(() => "ERROR: 0:1: syntax error"),
    deleteShader: vi.fn(),
    createProgram: vi.fn(() => ({})),
    attachShader: vi.fn(),
    linkProgram: vi.fn(),
    getProgramParameter: vi.fn(() => links),
    getProgramInfoLog: vi.fn(() => "link error"),
    deleteProgram: vi.fn(),
    getUniformBlockIndex: vi.fn((_program: WebGLProgram, name: string) =>
      blocks.includes(name) ? BLOCKS.indexOf(name) : INVALID_INDEX
    ),
    uniformBlockBinding: vi.fn(),
    getUniformLocation: vi.fn(() => (sampler ? {} : null)),
    useProgram: vi.fn(),
    uniform1i: vi.fn(),
    enable: vi.fn(),
    disable: vi.fn(),
    blendFuncSeparate: vi.fn(),
    cullFace: vi.fn(),
    frontFace: vi.fn(),
    VERTEX_SHADER: 0x8b31,
    FRAGMENT_SHADER: 0x8b30,
    COMPILE_STATUS: 0x8b81,
    LINK_STATUS: 0x8b82,
    BLEND: 0x0be2,
    CULL_FACE: 0x0b44,
    BACK: 0x0405,
    CCW: 0x0901,
    ONE: 1,
    SRC_ALPHA: 0x0302,
    ONE_MINUS_SRC_ALPHA: 0x0303,
  } as unknown as WebGL2RenderingContext;
  return gl;
}

const config = { ...DEFAULT_SHADER_CONFIG };

describe("compileShader", () => {
  it("compiles a shader from source", () => {
    const gl = createMockGL();
    compileShader(gl, gl.VERTEX_SHADER, "void main() {}");
    expect(gl.shaderSource).toHaveBeenCalledWith(expect.anything(), "void main() {}");
    expect(gl.compileShader).toHaveBeenCalled();
  });

  it("throws with the info log on failure", () => {
    const gl = createMockGL({ compiles: false });
    expect(() => compileShader(gl, gl.VERTEX_SHADER, "bad")).toThrow(
      "Shader compilation failed (vertex): ERROR: 0:1: syntax error"
    );
    expect(gl.deleteShader).toHaveBeenCalledTimes(1);
  });
});

describe("createProgram", () => {
  it("links and releases both shaders", () => {
    const gl = createMockGL();
    createProgram(gl, "vs", "fs");
    expect(gl.attachShader).toHaveBeenCalledTimes(2);
    expect(gl.linkProgram).toHaveBeenCalledTimes(1);
    expect(gl.deleteShader).toHaveBeenCalledTimes(2);
  });

  it("throws with the info log on link failure", () => {
    const gl = createMockGL({ links: false });
    expect(() => createProgram(gl, "vs", "fs")).toThrow("Program linking failed: link error");
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
  });
});

describe("bindUniformBlock", () => {
  it("binds a block to its fixed binding point", () => {
    const gl = createMockGL();
    const program = {};
    expect(bindUniformBlock(gl, program, "Position")).toBe(2);
    expect(gl.uniformBlockBinding).toHaveBeenCalledWith(program, 2, 2);
  });

  it("throws for a block the program lacks", () => {
    const gl = createMockGL({ blocks: ["Camera"] });
    expect(() => bindUniformBlock(gl, {}, "Ui")).toThrow('Uniform block "Ui" not found in program');
  });
});

describe("createQuadProgramInfo", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("wires the panel's three uniform blocks", () => {
    const gl = createMockGL();
    const info = createQuadProgramInfo(gl, "panel", config);

    expect(info.blocks).toEqual({ Camera: 0, Ui: 1, Position: 2 });
    expect(gl.uniformBlockBinding).toHaveBeenCalledWith(info.program, 1, 1);
    expect(info.texture).toBeNull();
    expect(gl.uniform1i).not.toHaveBeenCalled();
    expect(info.attributes).toEqual({ vertex: [], instance: [] });
  });

  it("assigns the glyph atlas to texture unit 0", () => {
    const gl = createMockGL();
    const info = createQuadProgramInfo(gl, "glyph", config);

    expect(info.blocks).toEqual({ Camera: 0, Position: 2 });
    expect(gl.getUniformLocation).toHaveBeenCalledWith(info.program, "u_texture");
    expect(gl.useProgram).toHaveBeenCalledWith(info.program);
    expect(gl.uniform1i).toHaveBeenCalledWith(info.texture, 0);
    expect(info.attributes).toBe(VARIANT_ATTRIBUTES.glyph);
  });

  it("only binds the camera for textured quads", () => {
    const gl = createMockGL({ blocks: ["Camera"] });
    const info = createQuadProgramInfo(gl, "sprite", config);
    expect(info.blocks).toEqual({ Camera: 0 });
  });

  it("deletes the program when a block is missing", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const gl = createMockGL({ blocks: ["Camera"] });

    expect(() => createQuadProgramInfo(gl, "panel", config)).toThrow(
      'Uniform block "Ui" not found in program'
    );
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
  });

  it("deletes the program when the sampler is missing", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const gl = createMockGL({ sampler: false });

    expect(() => createQuadProgramInfo(gl, "texture", config)).toThrow(
      'Sampler "u_texture" not found in texture program'
    );
    expect(gl.deleteProgram).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith("[QuadProgram] Failed to wire texture program bindings");
  });

  it("builds all four programs", () => {
    const gl = createMockGL();
    const infos = createQuadProgramInfos(gl, config);
    expect(Object.keys(infos)).toEqual(["panel", "sprite", "texture", "glyph"]);
    expect(gl.linkProgram).toHaveBeenCalledTimes(4);
  });
});

describe("getShaderSources", () => {
  it("pairs the texture program with the procedural vertex shader", () => {
    expect(getShaderSources("texture", config).vertex).toBe(textureVertexShader);
  });
});

describe("usePipeline", () => {
  it("enables blending and back-face culling for the panel", () => {
    const gl = createMockGL();
    const info = createQuadProgramInfo(gl, "panel", config);
    usePipeline(gl, info);

    expect(gl.useProgram).toHaveBeenCalledWith(info.program);
    expect(gl.enable).toHaveBeenCalledWith(gl.BLEND);
    expect(gl.blendFuncSeparate).toHaveBeenCalledWith(
      gl.SRC_ALPHA,
      gl.ONE_MINUS_SRC_ALPHA,
      gl.ONE,
      gl.ONE_MINUS_SRC_ALPHA
    );
    expect(gl.enable).toHaveBeenCalledWith(gl.CULL_FACE);
    expect(gl.frontFace).toHaveBeenCalledWith(gl.CCW);
    expect(gl.cullFace).toHaveBeenCalledWith(gl.BACK);
  });

  it("blends and culls back faces for glyphs", () => {
    const gl = createMockGL();
    const info = createQuadProgramInfo(gl, "glyph", config);
    usePipeline(gl, info);

    expect(gl.enable).toHaveBeenCalledWith(gl.BLEND);
    expect(gl.enable).toHaveBeenCalledWith(gl.CULL_FACE);
    expect(gl.frontFace).toHaveBeenCalledWith(gl.CCW);
    expect(gl.cullFace).toHaveBeenCalledWith(gl.BACK);
    expect(gl.disable).not.toHaveBeenCalledWith(gl.CULL_FACE);
  });

  it("replaces without culling for sprites", () => {
    const gl = createMockGL();
    const info = createQuadProgramInfo(gl, "sprite", config);
    usePipeline(gl, info);

    expect(gl.disable).toHaveBeenCalledWith(gl.BLEND);
    expect(gl.disable).toHaveBeenCalledWith(gl.CULL_FACE);
    expect(gl.enable).not.toHaveBeenCalled();
  });
});
