import type { ColoringStrategy, PaletteRecipe } from "./fractals/algorithms/coloring";
import type { PlaneBounds } from "./lib/viewport";

export type ExplorerConfig = {
  width: number;
  height: number;
  maxIterations: number;
  /** Plane bounds at width x height; the default framing when omitted */
  bounds?: PlaneBounds;
  palette: PaletteRecipe;
  coloring: ColoringStrategy;
  /** Seed for the random palette recipe */
  seed: string | number;
  /** Height in pixels of each row band evaluated per progress step */
  rowsPerChunk: number;
  debug: boolean;
};

/** Plane bounds that frame the whole set at the reference resolution. */
export const DEFAULT_BOUNDS: PlaneBounds = {
  xMin: -2.0,
  xMax: 0.47,
  yMin: -1.12,
  yMax: 1.12,
};

export const REFERENCE_WIDTH = 640;
export const REFERENCE_HEIGHT = 480;

export const initialExplorerConfig: ExplorerConfig = {
  width: REFERENCE_WIDTH,
  height: REFERENCE_HEIGHT,
  maxIterations: 1000,
  palette: "rainbow",
  coloring: "smooth",
  seed: "mandelbrot",
  rowsPerChunk: 32,
  debug: false,
};
