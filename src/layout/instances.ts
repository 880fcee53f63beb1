/**
 * Vertex and instance buffer packing
 *
 * Little-endian byte images matching the attribute tables in ./attributes.
 */

import type { GlyphInstance, QuadVertex, SpriteInstance } from "../quad/types";
import {
  GLYPH_INSTANCE_STRIDE,
  QUAD_VERTEX_STRIDE,
  SPRITE_INSTANCE_STRIDE,
} from "./attributes";

/** Pack explicit quad vertices: position, uv */
export function packQuadVertices(vertices: readonly QuadVertex[]): Float32Array {
  const out = new Float32Array((vertices.length * QUAD_VERTEX_STRIDE) / 4);
  vertices.forEach((v, i) => {
    out.set([...v.position, ...v.uv], i * 4);
  });
  return out;
}

/** Pack sprite / textured instances: size (+pad), transform columns, color */
export function packSpriteInstances(instances: readonly SpriteInstance[]): Float32Array {
  const floats = SPRITE_INSTANCE_STRIDE / 4;
  const out = new Float32Array(instances.length * floats);

  instances.forEach((inst, i) => {
    const base = i * floats;
    out.set([inst.size[0], inst.size[1], 0, 0], base);
    inst.transform.forEach((column, c) => out.set(column, base + 4 + c * 4));
    out.set(inst.color, base + 20);
  });

  return out;
}

/** Pack glyph instances; the color is written as an unsigned 32-bit integer */
export function packGlyphInstances(instances: readonly GlyphInstance[]): ArrayBuffer {
  const buffer = new ArrayBuffer(instances.length * GLYPH_INSTANCE_STRIDE);
  const view = new DataView(buffer);

  instances.forEach((inst, i) => {
    const base = i * GLYPH_INSTANCE_STRIDE;
    const floats = [...inst.glyphPos, ...inst.glyphSize, ...inst.uvStart, ...inst.uvEnd];
    floats.forEach((value, f) => view.setFloat32(base + f * 4, value, true));
    view.setUint32(base + 32, inst.color >>> 0, true);
  });

  return buffer;
}

/**
 * Read glyph instances back from a packed buffer.
 *
 * @throws if the byte length is not a whole number of records
 */
export function readGlyphInstances(buffer: ArrayBuffer): GlyphInstance[] {
  if (buffer.byteLength % GLYPH_INSTANCE_STRIDE !== 0) {
    throw new Error(
      `Glyph buffer length ${buffer.byteLength} is not a multiple of ${GLYPH_INSTANCE_STRIDE}`
    );
  }

  const view = new DataView(buffer);
  const instances: GlyphInstance[] = [];

  for (let base = 0; base < buffer.byteLength; base += GLYPH_INSTANCE_STRIDE) {
    const f = (i: number): number => view.getFloat32(base + i * 4, true);
    instances.push({
      glyphPos: [f(0), f(1)],
      glyphSize: [f(2), f(3)],
      uvStart: [f(4), f(5)],
      uvEnd: [f(6), f(7)],
      color: view.getUint32(base + 32, true),
    });
  }

  return instances;
}

/**
 * Number of whole records in a buffer.
 *
 * @throws if the byte length is not a multiple of the stride
 */
export function recordCount(byteLength: number, stride: number): number {
  if (byteLength % stride !== 0) {
    throw new Error(`Buffer length ${byteLength} is not a multiple of stride ${stride}`);
  }
  return byteLength / stride;
}
