// Export pipeline module exports

export {
  type AspectCropMode,
  type AspectCropResult,
  ASPECT_TOLERANCE,
  calculateAspectCrop,
  describeCropMode,
} from './aspectRatio';

export {
  type RasterImage,
  type RgbColor,
  type OutputFormat,
  type ImageBackend,
  rasterSize,
  getPixel,
  countPixels,
} from './imageBackend';

export {
  type MonitorPlacement,
  type CompositePlan,
  buildCompositePlan,
} from './plan';

export { sharpBackend } from './sharpBackend';

export {
  type CompositorConfig,
  type CompositeResult,
  SENTINEL_COLOR,
  createCompositorConfig,
  Compositor,
  createCompositor,
} from './compositor';
