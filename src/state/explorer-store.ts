import { createStore } from "zustand/vanilla";
import type { StoreApi } from "zustand/vanilla";

import type { ExplorerConfig } from "../config";
import type { ColoringStrategy, Palette } from "../fractals/algorithms/coloring";
import { generatePalette } from "../fractals/algorithms/coloring";
import { assertPositiveInteger, InvalidArgumentError } from "../lib/errors";
import type { RandomSource } from "../lib/prng";
import type { Point, Viewport } from "../lib/viewport";
import { createViewport, resizeViewport, zoomViewport } from "../lib/viewport";

/**
 * The two dirty flags seen as one state. Invalidating the field always invalidates
 * the frame as well, so commands never leave the store in `needs-recalc` alone.
 */
export type RenderState = "clean" | "needs-recalc" | "needs-redraw" | "needs-both";

export type DirtyFlags = {
  /** The viewport or iteration cap changed since the iteration field was built */
  recalcNeeded: boolean;
  /** The iteration field, palette or coloring changed since the frame was composited */
  redrawNeeded: boolean;
};

type State = DirtyFlags & {
  viewport: Viewport;
  maxIterations: number;
  palette: Palette;
  coloring: ColoringStrategy;
  /** Bumped by every command that invalidates the iteration field */
  fieldRevision: number;
  /** Bumped by every command that invalidates the frame */
  frameRevision: number;
};

type Actions = {
  zoom: (point: Point, factor: number) => void;
  resize: (width: number, height: number) => void;
  randomizePalette: () => void;
  reset: () => void;
  setMaxIterations: (maxIterations: number) => void;
  setColoring: (coloring: ColoringStrategy) => void;
  /** Clears recalcNeeded if nothing invalidated the field since `fieldRevision` was read */
  markRecomputed: (fieldRevision: number) => void;
  /** Clears redrawNeeded if nothing invalidated the frame since `frameRevision` was read */
  markRedrawn: (frameRevision: number) => void;
};

export type ExplorerState = State & Actions;
export type ExplorerStore = StoreApi<ExplorerState>;

export function getRenderState({ recalcNeeded, redrawNeeded }: DirtyFlags): RenderState {
  if (recalcNeeded && redrawNeeded) return "needs-both";
  if (recalcNeeded) return "needs-recalc";
  if (redrawNeeded) return "needs-redraw";
  return "clean";
}

const COLORING_STRATEGIES: readonly ColoringStrategy[] = ["smooth", "histogram"];

/**
 * Creates the store holding every input of a frame. Actions validate their
 * arguments before calling `set`, so a rejected command leaves the state untouched.
 */
export function createExplorerStore(config: ExplorerConfig, random: RandomSource): ExplorerStore {
  assertPositiveInteger(config.maxIterations, "maxIterations");

  const initialViewport = createViewport(config.width, config.height, config.bounds);

  return createStore<ExplorerState>()((set, get) => {
    const invalidateField = (next: Partial<State>) =>
      set((state) => ({
        ...next,
        recalcNeeded: true,
        redrawNeeded: true,
        fieldRevision: state.fieldRevision + 1,
        frameRevision: state.frameRevision + 1,
      }));

    const invalidateFrame = (next: Partial<State>) =>
      set((state) => ({
        ...next,
        redrawNeeded: true,
        frameRevision: state.frameRevision + 1,
      }));

    return {
      viewport: initialViewport,
      maxIterations: config.maxIterations,
      palette: generatePalette(config.palette, config.maxIterations, random),
      coloring: config.coloring,
      recalcNeeded: true,
      redrawNeeded: true,
      fieldRevision: 0,
      frameRevision: 0,

      zoom: (point, factor) => invalidateField({ viewport: zoomViewport(get().viewport, point, factor) }),

      resize: (width, height) => invalidateField({ viewport: resizeViewport(get().viewport, width, height) }),

      randomizePalette: () =>
        invalidateFrame({ palette: generatePalette("random", get().maxIterations, random) }),

      reset: () => {
        const { viewport, maxIterations } = get();
        invalidateField({
          viewport: resizeViewport(initialViewport, viewport.width, viewport.height),
          palette: generatePalette("rainbow", maxIterations, random),
        });
      },

      setMaxIterations: (maxIterations) => {
        assertPositiveInteger(maxIterations, "maxIterations");
        // Keep the recipe; a random palette is redrawn from fresh stops
        invalidateField({ maxIterations, palette: generatePalette(get().palette.recipe, maxIterations, random) });
      },

      setColoring: (coloring) => {
        if (!COLORING_STRATEGIES.includes(coloring)) {
          throw new InvalidArgumentError(`Unknown coloring strategy "${coloring}"`, "coloring");
        }
        invalidateFrame({ coloring });
      },

      markRecomputed: (fieldRevision) =>
        set((state) => ({
          recalcNeeded: state.fieldRevision === fieldRevision ? false : state.recalcNeeded,
          redrawNeeded: true,
        })),

      markRedrawn: (frameRevision) =>
        set((state) => ({
          redrawNeeded: state.frameRevision === frameRevision && !state.recalcNeeded ? false : state.redrawNeeded,
        })),
    };
  });
}
