/**
 * RGBA float render target for the software backend
 */

import type { Color } from "../types/color";

export class Framebuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Float32Array;

  constructor(width: number, height: number) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new Error(`Invalid framebuffer size ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.data = new Float32Array(width * height * 4);
  }

  /** Fill every pixel with one color */
  clear(color: Color = [0, 0, 0, 0]): void {
    for (let i = 0; i < this.data.length; i += 4) {
      this.data.set(color, i);
    }
  }

  getPixel(x: number, y: number): Color {
    this.checkBounds(x, y);
    const i = (y * this.width + x) * 4;
    const d = this.data;
    return [d[i]!, d[i + 1]!, d[i + 2]!, d[i + 3]!];
  }

  setPixel(x: number, y: number, color: Color): void {
    this.checkBounds(x, y);
    this.data.set(color, (y * this.width + x) * 4);
  }

  private checkBounds(x: number, y: number): void {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new Error(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} framebuffer`);
    }
  }
}
