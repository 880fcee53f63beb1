/** RGBA color as [r, g, b, a] with values 0-1 */
export type Color = [number, number, number, number];

/** Component-wise product of two colors, alpha included */
export function multiplyColors(a: Color, b: Color): Color {
  return [a[0] * b[0], a[1] * b[1], a[2] * b[2], a[3] * b[3]];
}
