/**
 * Byte layouts of uniform blocks, vertex and instance buffers
 */

export * from "./uniforms";
export * from "./attributes";
export * from "./instances";
