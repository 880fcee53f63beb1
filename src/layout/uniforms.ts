/**
 * Uniform block packing (std140)
 *
 * Byte images of the Camera, Position and Ui blocks, ready for
 * bufferData/bufferSubData on a UNIFORM_BUFFER. Offsets match the block
 * declarations in the GLSL sources.
 */

import type { CameraUniform, ModelUniform, PanelUniform } from "../quad/types";

/** mat4 projection @0, vec3 position @64, 4 bytes padding */
export const CAMERA_UNIFORM_SIZE = 80;

/** mat4 transform @0 */
export const MODEL_UNIFORM_SIZE = 64;

/** size vec2 @0 (+pad), menuColor @16, selectionColor @32, range vec2 @48 (+pad) */
export const PANEL_UNIFORM_SIZE = 64;

export const PANEL_UNIFORM_OFFSETS = {
  size: 0,
  menuColor: 16,
  selectionColor: 32,
  selectionRangeY: 48,
} as const;

function target(
  size: number,
  buffer: ArrayBuffer | undefined,
  byteOffset: number
): Float32Array {
  const out = buffer ?? new ArrayBuffer(size);
  if (byteOffset % 4 !== 0) {
    throw new Error(`Uniform offset ${byteOffset} is not 4-byte aligned`);
  }
  if (byteOffset + size > out.byteLength) {
    throw new Error(
      `Uniform of ${size} bytes at offset ${byteOffset} overflows a ${out.byteLength}-byte buffer`
    );
  }
  return new Float32Array(out, byteOffset, size / 4);
}

/** Write the Camera block; returns the view written into */
export function writeCameraUniform(
  camera: CameraUniform,
  buffer?: ArrayBuffer,
  byteOffset = 0
): Float32Array {
  const f = target(CAMERA_UNIFORM_SIZE, buffer, byteOffset);
  f.set(camera.projection, 0);
  f.set(camera.position, 16);
  f[19] = 0;
  return f;
}

/** Write the Position block */
export function writeModelUniform(
  model: ModelUniform,
  buffer?: ArrayBuffer,
  byteOffset = 0
): Float32Array {
  const f = target(MODEL_UNIFORM_SIZE, buffer, byteOffset);
  f.set(model.transform, 0);
  return f;
}

/**
 * Write the Ui block. Only xy of size and selectionRangeY are meaningful;
 * zw are written as padding zeros.
 */
export function writePanelUniform(
  panel: PanelUniform,
  buffer?: ArrayBuffer,
  byteOffset = 0
): Float32Array {
  const f = target(PANEL_UNIFORM_SIZE, buffer, byteOffset);
  f.set([panel.size[0], panel.size[1], 0, 0], PANEL_UNIFORM_OFFSETS.size / 4);
  f.set(panel.menuColor, PANEL_UNIFORM_OFFSETS.menuColor / 4);
  f.set(panel.selectionColor, PANEL_UNIFORM_OFFSETS.selectionColor / 4);
  f.set(
    [panel.selectionRangeY[0], panel.selectionRangeY[1], 0, 0],
    PANEL_UNIFORM_OFFSETS.selectionRangeY / 4
  );
  return f;
}
