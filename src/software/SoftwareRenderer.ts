/**
 * Software Renderer
 *
 * Reference backend for the quad programs. Runs the CPU vertex stage for the
 * four corners of every instance, assembles the triangle strip, rasterizes
 * into a Framebuffer and blends with the variant's blend mode.
 */

import { resolveShaderConfig, type ShaderConfig } from "../config";
import { QUAD_STRIP_TRIANGLES, VERTICES_PER_QUAD } from "../quad/corners";
import { createQuadPrograms, type QuadProgram, type QuadPrograms } from "../quad/programs";
import type { GlyphInstance, QuadVertex, SpriteInstance } from "../quad/types";
import { VARIANTS, validateBindings, type BindGroup } from "../quad/variants";
import { blendPixel } from "../style/blendMode";
import type { Framebuffer } from "./Framebuffer";
import { clipToViewport, isFrontFacing, rasterizeTriangle, type ScreenVertex } from "./rasterize";

export interface SoftwareRendererOptions extends Partial<ShaderConfig> {
  /** Explicit vertex buffer for the sprite program (default: unit quad) */
  spriteVertices?: readonly QuadVertex[];
}

export interface DrawStats {
  /** Triangles submitted after strip assembly */
  triangles: number;
  /** Triangles dropped by back-face culling or w <= 0 */
  culled: number;
  /** Fragments written to the framebuffer */
  fragments: number;
}

type Groups = readonly (BindGroup | undefined)[];

export class SoftwareRenderer {
  readonly target: Framebuffer;
  readonly config: ShaderConfig;
  private readonly programs: QuadPrograms;

  constructor(target: Framebuffer, options: SoftwareRendererOptions = {}) {
    const { spriteVertices, ...config } = options;
    this.target = target;
    this.config = resolveShaderConfig(config);
    this.programs = createQuadPrograms(this.config, spriteVertices);
  }

  /** Draw one UI panel (a single, instance-less quad) */
  drawPanel(groups: Groups): DrawStats {
    const bindings = validateBindings("panel", groups);
    return this.draw(this.programs.panel, [null], bindings);
  }

  /** Draw sprite instances paired with the explicit vertex buffer */
  drawSprites(groups: Groups, instances: readonly SpriteInstance[]): DrawStats {
    const bindings = validateBindings("sprite", groups);
    return this.draw(this.programs.sprite, instances, bindings);
  }

  /** Draw procedural textured quads */
  drawTextures(groups: Groups, instances: readonly SpriteInstance[]): DrawStats {
    const bindings = validateBindings("texture", groups);
    return this.draw(this.programs.texture, instances, bindings);
  }

  /** Draw glyph quads from an atlas */
  drawGlyphs(groups: Groups, instances: readonly GlyphInstance[]): DrawStats {
    const bindings = validateBindings("glyph", groups);
    return this.draw(this.programs.glyph, instances, bindings);
  }

  private draw<I, B, V>(
    program: QuadProgram<I, B, V>,
    instances: readonly I[],
    bindings: B
  ): DrawStats {
    const { width, height } = this.target;
    const variant = VARIANTS[program.variant];
    const stats: DrawStats = { triangles: 0, culled: 0, fragments: 0 };

    for (const instance of instances) {
      const corners: (ScreenVertex | null)[] = [];
      for (let i = 0; i < VERTICES_PER_QUAD; i++) {
        const out = program.vertex(i, instance, bindings);
        const screen = clipToViewport(out.clipPosition, width, height);
        corners.push(screen && { ...screen, slots: program.encodeVaryings(out.varyings) });
      }

      for (const [i0, i1, i2] of QUAD_STRIP_TRIANGLES) {
        stats.triangles++;
        const a = corners[i0];
        const b = corners[i1];
        const c = corners[i2];
        if (!a || !b || !c || (variant.cullBackFaces && !isFrontFacing(a, b, c))) {
          stats.culled++;
          continue;
        }

        rasterizeTriangle(a, b, c, width, height, (x, y, slots) => {
          const color = program.fragment(program.decodeVaryings(slots), bindings);
          this.target.setPixel(x, y, blendPixel(color, this.target.getPixel(x, y), variant.blend));
          stats.fragments++;
        });
      }
    }

    return stats;
  }
}
