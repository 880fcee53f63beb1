/**
 * Vertex Stage Tests
 */

import { describe, it, expect } from "vitest";
import * as mat4 from "../math/mat4";
import { glyphVertex, panelOffset, panelVertex, spriteVertex, textureVertex, toClip } from "./vertexStage";
import type { CameraUniform, GlyphInstance, PanelUniform, QuadInstance } from "./types";

const identityCamera: CameraUniform = { projection: mat4.create(), position: [0, 0, 0] };

const panel: PanelUniform = {
  size: [4, 5, 0, 0],
  menuColor: [0, 0, 0, 1],
  selectionColor: [1, 1, 1, 1],
  selectionRangeY: [0.25, 0.5, 0, 0],
};

const instance: QuadInstance = {
  size: [10, 20],
  transform: [
    [1, 0, 0, 0],
    [0, 1, 0, 0],
    [0, 0, 1, 0],
    [5, 6, 0, 1],
  ],
  color: [1, 0.5, 0.25, 1],
};

describe("toClip", () => {
  it("feeds z = 1 and w = 1 into the matrices", () => {
    expect(toClip(identityCamera, mat4.create(), [2, 3])).toEqual([2, 3, 1, 1]);
  });

  it("applies the model before the projection", () => {
    const camera: CameraUniform = { projection: mat4.scale(2, 2, 1), position: [0, 0, 0] };
    expect(toClip(camera, mat4.translate(1, 0, 0), [1, 1])).toEqual([4, 2, 1, 1]);
  });

  it("carries z = 1 through a translation in z", () => {
    expect(toClip(identityCamera, mat4.translate(0, 0, 3), [0, 0])).toEqual([0, 0, 4, 1]);
  });
});

describe("panelOffset", () => {
  it("divides the size by the anchor and flips y", () => {
    expect(panelOffset([4, 5], { x: 2, y: 2.5 })).toEqual([2, -2]);
  });
});

describe("panelVertex", () => {
  const model = { transform: mat4.create() };
  const anchor = { x: 2, y: 2.5 };

  it("scales by the panel size and adds the anchor offset", () => {
    const top = panelVertex(0, identityCamera, panel, model, anchor);
    expect(top.clipPosition).toEqual([0, 0.5, 1, 1]);
    const bottom = panelVertex(3, identityCamera, panel, model, anchor);
    expect(bottom.clipPosition).toEqual([4, -4.5, 1, 1]);
  });

  it("passes uv and the selection range xy", () => {
    expect(panelVertex(1, identityCamera, panel, model, anchor).varyings).toEqual({
      uv: [0, 1],
      selectionRange: [0.25, 0.5],
    });
  });

  it("honors a custom anchor", () => {
    const out = panelVertex(0, identityCamera, panel, model, { x: 4, y: 5 });
    // (-2, 2.5) + (1, -1)
    expect(out.clipPosition).toEqual([-1, 1.5, 1, 1]);
  });

  it("collapses an out-of-range ordinal onto the offset", () => {
    const out = panelVertex(9, identityCamera, panel, model, anchor);
    expect(out.clipPosition).toEqual([2, -2, 1, 1]);
    expect(out.varyings.uv).toEqual([0, 0]);
  });
});

describe("spriteVertex", () => {
  const camera: CameraUniform = { projection: mat4.scale(0.5, 0.25, 1), position: [0, 0, 0] };

  it("scales the explicit vertex and applies the instance transform", () => {
    const out = spriteVertex({ position: [-0.5, 0.5], uv: [0, 0] }, instance, camera);
    // (-5, 10) + (5, 6) = (0, 16) -> (0, 4)
    expect(out.clipPosition).toEqual([0, 4, 1, 1]);
    expect(out.varyings).toEqual({ uv: [0, 0], color: [1, 0.5, 0.25, 1] });
  });

  it("uses the vertex as given, not the unit table", () => {
    const out = spriteVertex({ position: [1, 1], uv: [0.5, 0.25] }, instance, identityCamera);
    expect(out.clipPosition).toEqual([15, 26, 1, 1]);
    expect(out.varyings.uv).toEqual([0.5, 0.25]);
  });
});

describe("textureVertex", () => {
  it("matches the sprite program over the unit quad", () => {
    const out = textureVertex(3, instance, identityCamera);
    // (5, -10) + (5, 6)
    expect(out.clipPosition).toEqual([10, -4, 1, 1]);
    expect(out.varyings.uv).toEqual([1, 1]);
  });
});

describe("glyphVertex", () => {
  const glyph: GlyphInstance = {
    glyphPos: [3, 4],
    glyphSize: [2, 2],
    uvStart: [0, 0.5],
    uvEnd: [0.5, 1],
    color: 0xff00ff00,
  };
  const model = { transform: mat4.translate(1, 1, 0) };

  it("places the glyph and applies the entity model", () => {
    const out = glyphVertex(3, glyph, identityCamera, model, "argb");
    // (0.5, -0.5) * 2 + (3, 4) = (4, 3), then + (1, 1)
    expect(out.clipPosition).toEqual([5, 4, 1, 1]);
    expect(out.varyings).toEqual({ uv: [0.5, 1], color: [0, 1, 0, 1] });
  });

  it("decodes the packed color with the requested decoding", () => {
    const red = { ...glyph, color: 0xffff0000 };
    expect(glyphVertex(0, red, identityCamera, model, "argb").varyings.color).toEqual([1, 0, 0, 1]);
    expect(glyphVertex(0, red, identityCamera, model, "legacy").varyings.color).toEqual([
      1, 0, 65536, 1,
    ]);
  });
});
