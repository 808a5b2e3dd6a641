import { beforeEach, describe, expect, it } from "vitest";

import { DEFAULT_BOUNDS, initialExplorerConfig } from "../config";
import { InvalidArgumentError } from "../lib/errors";
import { createRandom } from "../lib/prng";
import type { ExplorerStore } from "./explorer-store";
import { createExplorerStore, getRenderState } from "./explorer-store";

function markClean(store: ExplorerStore): void {
  const { fieldRevision, markRecomputed } = store.getState();
  markRecomputed(fieldRevision);
  const { frameRevision, markRedrawn } = store.getState();
  markRedrawn(frameRevision);
}

describe("getRenderState", () => {
  it("should name every combination of the dirty flags", () => {
    expect(getRenderState({ recalcNeeded: false, redrawNeeded: false })).toBe("clean");
    expect(getRenderState({ recalcNeeded: true, redrawNeeded: false })).toBe("needs-recalc");
    expect(getRenderState({ recalcNeeded: false, redrawNeeded: true })).toBe("needs-redraw");
    expect(getRenderState({ recalcNeeded: true, redrawNeeded: true })).toBe("needs-both");
  });
});

describe("createExplorerStore", () => {
  let store: ExplorerStore;

  beforeEach(() => {
    store = createExplorerStore({ ...initialExplorerConfig, maxIterations: 50 }, createRandom("test-seed"));
  });

  it("should start with both flags set", () => {
    const state = store.getState();
    expect(getRenderState(state)).toBe("needs-both");
    expect(state.viewport).toEqual({ width: 640, height: 480, ...DEFAULT_BOUNDS });
    expect(state.palette.recipe).toBe("rainbow");
    expect(state.palette.colors).toHaveLength(51);
  });

  it("should resolve recalc before redraw", () => {
    const { fieldRevision, markRecomputed } = store.getState();
    markRecomputed(fieldRevision);
    expect(getRenderState(store.getState())).toBe("needs-redraw");

    const { frameRevision, markRedrawn } = store.getState();
    markRedrawn(frameRevision);
    expect(getRenderState(store.getState())).toBe("clean");
  });

  it("should not clear redraw while a recalc is still pending", () => {
    const { frameRevision, markRedrawn } = store.getState();
    markRedrawn(frameRevision);
    expect(getRenderState(store.getState())).toBe("needs-both");
  });

  it("should mark both flags on zoom", () => {
    markClean(store);
    store.getState().zoom({ x: 320, y: 240 }, 0.5);
    expect(getRenderState(store.getState())).toBe("needs-both");
    expect(store.getState().viewport.xMax - store.getState().viewport.xMin).toBeCloseTo(1.235, 12);
  });

  it("should mark both flags on resize", () => {
    markClean(store);
    store.getState().resize(800, 600);
    expect(getRenderState(store.getState())).toBe("needs-both");
    expect(store.getState().viewport.width).toBe(800);
    expect(store.getState().viewport.height).toBe(600);
  });

  it("should mark only redraw on palette changes", () => {
    markClean(store);
    store.getState().randomizePalette();
    expect(getRenderState(store.getState())).toBe("needs-redraw");
    expect(store.getState().palette.recipe).toBe("random");
    expect(store.getState().palette.colors).toHaveLength(51);

    markClean(store);
    store.getState().setColoring("histogram");
    expect(getRenderState(store.getState())).toBe("needs-redraw");
    expect(store.getState().coloring).toBe("histogram");
  });

  it("should keep the recalc flag when the viewport changed during a recompute", () => {
    const { fieldRevision } = store.getState();
    store.getState().zoom({ x: 0, y: 0 }, 2);
    store.getState().markRecomputed(fieldRevision);
    expect(getRenderState(store.getState())).toBe("needs-both");
  });

  it("should leave the state untouched when a command is rejected", () => {
    markClean(store);
    const before = store.getState();

    expect(() => before.zoom({ x: 10, y: 10 }, 0)).toThrow(InvalidArgumentError);
    expect(() => before.resize(0, 480)).toThrow(InvalidArgumentError);
    expect(() => before.setMaxIterations(-3)).toThrow(InvalidArgumentError);

    expect(store.getState()).toBe(before);
    expect(getRenderState(store.getState())).toBe("clean");
  });

  it("should regenerate the palette when the iteration cap changes", () => {
    markClean(store);
    store.getState().setMaxIterations(20);
    const state = store.getState();
    expect(state.maxIterations).toBe(20);
    expect(state.palette.maxIterations).toBe(20);
    expect(state.palette.colors).toHaveLength(21);
    expect(getRenderState(state)).toBe("needs-both");
  });

  it("should restore the default bounds and rainbow palette on reset", () => {
    store.getState().zoom({ x: 100, y: 100 }, 0.25);
    store.getState().randomizePalette();
    markClean(store);

    store.getState().reset();
    const state = store.getState();
    expect(state.viewport).toEqual({ width: 640, height: 480, ...DEFAULT_BOUNDS });
    expect(state.palette.recipe).toBe("rainbow");
    expect(getRenderState(state)).toBe("needs-both");
  });

  it("should reset to the default framing at the current size", () => {
    store.getState().resize(1280, 960);
    store.getState().zoom({ x: 10, y: 10 }, 0.5);
    store.getState().reset();

    const { viewport } = store.getState();
    expect(viewport.width).toBe(1280);
    expect(viewport.xMin).toBeCloseTo(-3.235, 12);
    expect(viewport.xMax).toBeCloseTo(1.705, 12);
  });
});
