/**
 * Triangle rasterization for the software backend
 *
 * Pixels are sampled at their centers. Edges follow the top-left fill rule,
 * so two triangles sharing an edge never both cover a pixel on it.
 * Varyings are interpolated linearly in screen space.
 */

import type { Vec4 } from "../math/vec";

export interface ScreenVertex {
  /** Viewport x, left to right */
  x: number;
  /** Viewport y, top to bottom */
  y: number;
  /** Flat varying slots */
  slots: readonly number[];
}

export type FragmentVisitor = (x: number, y: number, slots: Float64Array) => void;

/**
 * Clip space -> viewport pixels, y flipped so +1 NDC is the top row.
 * Returns null when w is not positive.
 */
export function clipToViewport(
  clip: Vec4,
  width: number,
  height: number
): { x: number; y: number } | null {
  const w = clip[3];
  if (!(w > 0)) return null;
  const ndcX = clip[0] / w;
  const ndcY = clip[1] / w;
  return {
    x: ((ndcX + 1) / 2) * width,
    y: ((1 - ndcY) / 2) * height,
  };
}

/**
 * Counter-clockwise in NDC (y up) is front facing. In viewport space (y down)
 * that is a negative signed area.
 */
export function isFrontFacing(a: ScreenVertex, b: ScreenVertex, c: ScreenVertex): boolean {
  return edge(a, b, c.x, c.y) < 0;
}

function edge(p: ScreenVertex, q: ScreenVertex, x: number, y: number): number {
  return (q.x - p.x) * (y - p.y) - (q.y - p.y) * (x - p.x);
}

// With positive area in y-down space, top edges run left to right and
// left edges run upward.
function isTopLeft(p: ScreenVertex, q: ScreenVertex): boolean {
  const dy = q.y - p.y;
  const dx = q.x - p.x;
  return (dy === 0 && dx > 0) || dy < 0;
}

function covers(w: number, topLeft: boolean): boolean {
  return w > 0 || (w === 0 && topLeft);
}

/** Visit every pixel whose center the triangle covers */
export function rasterizeTriangle(
  v0: ScreenVertex,
  v1: ScreenVertex,
  v2: ScreenVertex,
  width: number,
  height: number,
  visit: FragmentVisitor
): void {
  let a = v0;
  let b = v1;
  let c = v2;
  let area = edge(a, b, c.x, c.y);
  if (area === 0 || !Number.isFinite(area)) return;
  if (area < 0) {
    [b, c] = [c, b];
    area = -area;
  }

  const minX = Math.max(0, Math.floor(Math.min(a.x, b.x, c.x)));
  const maxX = Math.min(width - 1, Math.ceil(Math.max(a.x, b.x, c.x)));
  const minY = Math.max(0, Math.floor(Math.min(a.y, b.y, c.y)));
  const maxY = Math.min(height - 1, Math.ceil(Math.max(a.y, b.y, c.y)));

  const tlA = isTopLeft(b, c);
  const tlB = isTopLeft(c, a);
  const tlC = isTopLeft(a, b);

  const slotCount = Math.min(a.slots.length, b.slots.length, c.slots.length);
  const slots = new Float64Array(slotCount);

  for (let y = minY; y <= maxY; y++) {
    const py = y + 0.5;
    for (let x = minX; x <= maxX; x++) {
      const px = x + 0.5;
      const wa = edge(b, c, px, py);
      const wb = edge(c, a, px, py);
      const wc = edge(a, b, px, py);
      if (!covers(wa, tlA) || !covers(wb, tlB) || !covers(wc, tlC)) continue;

      const la = wa / area;
      const lb = wb / area;
      const lc = wc / area;
      for (let i = 0; i < slotCount; i++) {
        slots[i] = a.slots[i]! * la + b.slots[i]! * lb + c.slots[i]! * lc;
      }
      visit(x, y, slots);
    }
  }
}
