/**
 * Software reference backend
 */

export { Framebuffer } from "./Framebuffer";
export {
  SoftwareRenderer,
  type DrawStats,
  type SoftwareRendererOptions,
} from "./SoftwareRenderer";
export {
  clipToViewport,
  isFrontFacing,
  rasterizeTriangle,
  type FragmentVisitor,
  type ScreenVertex,
} from "./rasterize";
