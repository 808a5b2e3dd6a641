export { DEFAULT_BOUNDS, initialExplorerConfig } from "./config";
export type { ExplorerConfig } from "./config";

export type { FractalAlgorithm, IterationResult } from "./fractals/algorithms/base";
export { isKnownInterior, MandelbrotAlgorithm, mandelbrotAlgorithm } from "./fractals/algorithms/mandelbrot";
export {
  colorAt,
  createHistogramMapper,
  generatePalette,
  RAINBOW_STOPS,
  randomStops,
  sampleGradient,
} from "./fractals/algorithms/coloring";
export type { ColoringStrategy, GradientStop, Palette, PaletteRecipe, RGB } from "./fractals/algorithms/coloring";

export { FractalExplorer } from "./fractals/render/explorer";
export type { ExplorerOptions, ExplorerStats } from "./fractals/render/explorer";
export { composeFrame } from "./fractals/render/compositor";
export { computeIterationField, createIterationField } from "./fractals/render/iteration-field";
export type { IterationField } from "./fractals/render/iteration-field";

export { createExplorerStore, getRenderState } from "./state/explorer-store";
export type { ExplorerState, ExplorerStore, RenderState } from "./state/explorer-store";

export { InvalidArgumentError } from "./lib/errors";
export { createRandom } from "./lib/prng";
export type { RandomSource } from "./lib/prng";
export { createViewport, resizeViewport, toPixel, toPlane, zoomViewport } from "./lib/viewport";
export type { PlaneBounds, Point, Viewport } from "./lib/viewport";
