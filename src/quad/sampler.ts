/**
 * Textures and samplers for the CPU backend
 *
 * Filtering and addressing mirror the usual GPU sampler semantics so the
 * reference compositors read the same texel a GPU would.
 */

import type { Vec2 } from "../math/vec";
import type { Color } from "../types/color";

export type FilterMode = "nearest" | "linear";
export type AddressMode = "clamp-to-edge" | "repeat";

export interface SamplerDescriptor {
  /** Magnification/minification filter (default: linear) */
  filter?: FilterMode;
  /** Addressing for both axes (default: clamp-to-edge) */
  addressMode?: AddressMode;
}

export const DEFAULT_SAMPLER: Required<SamplerDescriptor> = {
  filter: "linear",
  addressMode: "clamp-to-edge",
};

/** Read-only 2D texel source */
export interface Texture2D {
  readonly width: number;
  readonly height: number;
  /** Texel at integer coordinates, already in range */
  texel(x: number, y: number): Color;
}

/** Anything that can be sampled at a UV coordinate */
export interface Sampler {
  sample(uv: Vec2): Color;
}

/**
 * RGBA texture over 8-bit (normalized) or float storage, row-major,
 * first row at v = 0.
 */
export class ImageTexture implements Texture2D {
  readonly width: number;
  readonly height: number;
  private readonly data: Uint8Array | Uint8ClampedArray | Float32Array;
  private readonly scale: number;

  constructor(
    width: number,
    height: number,
    data: Uint8Array | Uint8ClampedArray | Float32Array
  ) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid texture size ${width}x${height}`);
    }
    if (data.length !== width * height * 4) {
      throw new Error(
        `Texture data length ${data.length} does not match ${width}x${height} RGBA`
      );
    }

    this.width = width;
    this.height = height;
    this.data = data;
    this.scale = data instanceof Float32Array ? 1 : 1 / 255;
  }

  /** Single-texel texture of one color */
  static solid(color: Color): ImageTexture {
    return new ImageTexture(1, 1, new Float32Array(color));
  }

  /** Single-channel coverage mask, stored in the red channel */
  static fromCoverage(width: number, height: number, coverage: ArrayLike<number>): ImageTexture {
    const data = new Float32Array(width * height * 4);
    for (let i = 0; i < width * height; i++) {
      data[i * 4] = coverage[i] ?? 0;
      data[i * 4 + 3] = 1;
    }
    return new ImageTexture(width, height, data);
  }

  texel(x: number, y: number): Color {
    const i = (y * this.width + x) * 4;
    const d = this.data;
    const s = this.scale;
    return [d[i]! * s, d[i + 1]! * s, d[i + 2]! * s, d[i + 3]! * s];
  }
}

function address(coord: number, size: number, mode: AddressMode): number {
  if (mode === "repeat") {
    return ((coord % size) + size) % size;
  }
  return coord < 0 ? 0 : coord >= size ? size - 1 : coord;
}

function lerpColor(a: Color, b: Color, t: number): Color {
  return [
    a[0] + (b[0] - a[0]) * t,
    a[1] + (b[1] - a[1]) * t,
    a[2] + (b[2] - a[2]) * t,
    a[3] + (b[3] - a[3]) * t,
  ];
}

/** Bind a texture to a sampler descriptor */
export function createSampler(
  texture: Texture2D,
  descriptor: SamplerDescriptor = {}
): Sampler {
  const filter = descriptor.filter ?? DEFAULT_SAMPLER.filter;
  const mode = descriptor.addressMode ?? DEFAULT_SAMPLER.addressMode;
  const { width, height } = texture;

  const fetch = (x: number, y: number): Color =>
    texture.texel(address(x, width, mode), address(y, height, mode));

  if (filter === "nearest") {
    return {
      sample: ([u, v]) => fetch(Math.floor(u * width), Math.floor(v * height)),
    };
  }

  return {
    sample: ([u, v]) => {
      const x = u * width - 0.5;
      const y = v * height - 0.5;
      const x0 = Math.floor(x);
      const y0 = Math.floor(y);
      const fx = x - x0;
      const fy = y - y0;

      const top = lerpColor(fetch(x0, y0), fetch(x0 + 1, y0), fx);
      const bottom = lerpColor(fetch(x0, y0 + 1), fetch(x0 + 1, y0 + 1), fx);
      return lerpColor(top, bottom, fy);
    },
  };
}

/** Sampler that returns the same color everywhere */
export function solidSampler(color: Color): Sampler {
  return { sample: () => [...color] };
}
