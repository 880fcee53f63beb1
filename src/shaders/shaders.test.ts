/**
 * GLSL Source Tests
 */

import { describe, it, expect } from "vitest";
import { DEFAULT_SHADER_CONFIG } from "../config";
import type { ShaderConfig } from "../config";
import { VARIANT_ATTRIBUTES } from "../layout/attributes";
import { SHADER_VARIANTS } from "../quad/variants";
import { glslFloat, quadCornerChunk } from "./common";
import { glyphFragmentShader, glyphVertexShader } from "./glyph";
import { panelFragmentShader, panelVertexShader } from "./panel";
import { getShaderSources } from "./programs";
import { spriteVertexShader, texturedFragmentShader, textureVertexShader } from "./sprite";

const config: ShaderConfig = { ...DEFAULT_SHADER_CONFIG };
const legacy: ShaderConfig = { ...DEFAULT_SHADER_CONFIG, colorDecoding: "legacy" };

const COMPONENTS: Record<string, number> = { uint: 1, float: 1, vec2: 2, vec3: 3, vec4: 4 };

/** Attribute declarations of a vertex shader as [location, components] */
function declaredAttributes(source: string): [number, number][] {
  const found: [number, number][] = [];
  for (const match of source.matchAll(/layout\(location = (\d+)\) in (\w+) \w+;/g)) {
    found.push([Number(match[1]), COMPONENTS[match[2] ?? ""] ?? 0]);
  }
  return found;
}

describe("glslFloat", () => {
  it("always emits a decimal point or exponent", () => {
    expect(glslFloat(2)).toBe("2.0");
    expect(glslFloat(2.5)).toBe("2.5");
    expect(glslFloat(-0.5)).toBe("-0.5");
    expect(glslFloat(1e21)).toBe("1e+21");
  });

  it("rejects non-finite values", () => {
    expect(() => glslFloat(NaN)).toThrow("Cannot emit non-finite GLSL literal: NaN");
  });
});

describe("shared chunks", () => {
  it("generates the corner switch from the corner table", () => {
    expect(quadCornerChunk).toContain(
      "case 0: position = vec2(-0.5, 0.5); uv = vec2(0.0, 0.0); break;"
    );
    expect(quadCornerChunk).toContain(
      "case 3: position = vec2(0.5, -0.5); uv = vec2(1.0, 1.0); break;"
    );
    expect(quadCornerChunk).toContain("default: break;");
  });
});

describe("program sources", () => {
  it("targets GLSL ES 3.00 in every stage", () => {
    for (const variant of SHADER_VARIANTS) {
      const { vertex, fragment } = getShaderSources(variant, config);
      expect(vertex.startsWith("#version 300 es\n")).toBe(true);
      expect(fragment.startsWith("#version 300 es\n")).toBe(true);
    }
  });

  it("declares the attributes the layout tables bind", () => {
    for (const variant of SHADER_VARIANTS) {
      const { vertex } = getShaderSources(variant, config);
      const { vertex: perVertex, instance } = VARIANT_ATTRIBUTES[variant];
      const expected = [...perVertex, ...instance].map((a): [number, number] => [a.location, a.size]);
      expect(declaredAttributes(vertex)).toEqual(expected);
    }
  });

  it("feeds z = 1 and w = 1 to the camera", () => {
    expect(panelVertexShader(config)).toContain("u_projection * model * vec4(scaled, 1.0, 1.0)");
  });
});

describe("panel", () => {
  it("bakes the anchor divisors", () => {
    const source = panelVertexShader(config);
    expect(source).toContain("const float ANCHOR_X = 2.0;");
    expect(source).toContain("const float ANCHOR_Y = 2.5;");
    expect(source).toContain("vec2 offset = vec2(u_panelSize.x / ANCHOR_X, -u_panelSize.y / ANCHOR_Y);");
  });

  it("bakes a custom anchor", () => {
    const source = panelVertexShader({ ...config, panelAnchor: { x: 4, y: 3 } });
    expect(source).toContain("const float ANCHOR_X = 4.0;");
    expect(source).toContain("const float ANCHOR_Y = 3.0;");
  });

  it("uses a strict selection test", () => {
    expect(panelFragmentShader()).toContain(
      "bool selected = v_selectionRange.x < v_uv.y && v_uv.y < v_selectionRange.y;"
    );
  });

  it("reads all three uniform blocks", () => {
    const source = panelVertexShader(config);
    expect(source).toContain("uniform Camera {");
    expect(source).toContain("uniform Ui {");
    expect(source).toContain("uniform Position {");
  });
});

describe("sprite and texture", () => {
  it("reads explicit vertices in the sprite program", () => {
    expect(spriteVertexShader).toContain("vec2 position = a_position;");
    expect(spriteVertexShader).not.toContain("gl_VertexID");
  });

  it("derives corners from gl_VertexID in the texture program", () => {
    expect(textureVertexShader).toContain("quadCorner(gl_VertexID, position, uv);");
  });

  it("tints the texel", () => {
    expect(texturedFragmentShader).toContain("fragColor = texture(u_texture, v_uv) * v_color;");
  });
});

describe("glyph", () => {
  it("unpacks blue from the low byte by default", () => {
    expect(glyphVertexShader(config)).toContain("float b = float(c & 0xFFu) / 255.0;");
  });

  it("reproduces the unshifted blue lane in legacy mode", () => {
    expect(glyphVertexShader(legacy)).toContain("float b = float(c & 0x00FF0000u) / 255.0;");
  });

  it("places the glyph before the model transform", () => {
    expect(glyphVertexShader(config)).toContain(
      "gl_Position = toClip(u_model, position * a_glyphSize + a_glyphPos);"
    );
  });

  it("masks alpha by the first atlas channel", () => {
    expect(glyphFragmentShader).toContain("float coverage = texture(u_texture, v_uv).r;");
    expect(glyphFragmentShader).toContain("fragColor = vec4(v_color.rgb, v_color.a * coverage);");
  });
});
