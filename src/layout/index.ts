// Barrel export for layout module

export type {
  MonitorSpec,
  LayoutConfig,
  MonitorGeometry,
  Layout,
  NormalizedRect,
  PixelRect,
  PixelPoint,
  Size,
} from './types';

export {
  validateMonitorSpec,
  physicalSize,
  scaledPixels,
  computeMonitorGeometry,
} from './monitor';

export {
  computeLayout,
  computeLayoutFromConfig,
  getLayoutAspect,
  computeMonitorSampleRegion,
  computeSampleRegions,
  toPixelRect,
} from './layoutEngine';
