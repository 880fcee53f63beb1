/**
 * Shader configuration
 *
 * Settings that change what the programs compute. They are baked into the
 * generated GLSL and passed to the CPU stages, so both backends agree.
 */

import { COLOR_DECODINGS, type ColorDecoding } from "./color/packedColor";

/**
 * Divisors of the panel anchor offset.
 * offset = (size.x / x, -size.y / y)
 */
export interface PanelAnchor {
  x: number;
  y: number;
}

export interface ShaderConfig {
  /** Blue-lane decoding for packed glyph colors (default: "argb") */
  colorDecoding: ColorDecoding;
  /** Panel anchor divisors (default: { x: 2, y: 2.5 }) */
  panelAnchor: PanelAnchor;
}

/** Default configuration values (frozen, nested objects included) */
export const DEFAULT_SHADER_CONFIG: {
  readonly colorDecoding: ColorDecoding;
  readonly panelAnchor: Readonly<PanelAnchor>;
} = Object.freeze({
  colorDecoding: "argb",
  // Horizontally centered, vertically pulled toward the top edge.
  panelAnchor: Object.freeze({ x: 2, y: 2.5 }),
});

/**
 * Fill in defaults and validate a partial configuration.
 *
 * @throws if a divisor is zero, negative or not finite, or the decoding is unknown
 */
export function resolveShaderConfig(
  options: Partial<ShaderConfig> = {}
): ShaderConfig {
  const config: ShaderConfig = {
    colorDecoding: options.colorDecoding ?? DEFAULT_SHADER_CONFIG.colorDecoding,
    panelAnchor: {
      ...DEFAULT_SHADER_CONFIG.panelAnchor,
      ...options.panelAnchor,
    },
  };

  if (!COLOR_DECODINGS.includes(config.colorDecoding)) {
    throw new Error(`Unknown color decoding: ${String(config.colorDecoding)}`);
  }

  for (const axis of ["x", "y"] as const) {
    const divisor = config.panelAnchor[axis];
    if (!Number.isFinite(divisor) || divisor <= 0) {
      throw new Error(
        `Panel anchor divisor ${axis} must be a positive number, got ${divisor}`
      );
    }
  }

  if (config.colorDecoding === "legacy") {
    console.warn(
      "[ShaderConfig] Legacy packed-color decoding selected: blue is read from the red byte unshifted"
    );
  }

  return config;
}
