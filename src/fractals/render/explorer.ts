// ABOUTME: Command surface of the renderer: zoom, resize, palette, reset and draw
// ABOUTME: Recomputes the iteration field and recomposites the frame only when dirty

import type { ExplorerConfig } from "../../config";
import { initialExplorerConfig } from "../../config";
import { InvalidArgumentError } from "../../lib/errors";
import { PerformanceMonitor } from "../../lib/performance-monitor";
import type { RenderSessionMetrics } from "../../lib/performance-monitor";
import type { RandomSource } from "../../lib/prng";
import { createRandom } from "../../lib/prng";
import type { Point, Viewport } from "../../lib/viewport";
import type { ExplorerStore, RenderState } from "../../state/explorer-store";
import { createExplorerStore, getRenderState } from "../../state/explorer-store";
import type { FractalAlgorithm } from "../algorithms/base";
import type { ColoringStrategy, Palette } from "../algorithms/coloring";
import { mandelbrotAlgorithm } from "../algorithms/mandelbrot";
import { createChunks } from "./chunks";
import { composeFrame } from "./compositor";
import type { IterationField } from "./iteration-field";
import { computeIterationField, createIterationField } from "./iteration-field";

export interface ExplorerOptions extends Partial<ExplorerConfig> {
  /** Evaluator used for every pixel (default: the Mandelbrot algorithm) */
  algorithm?: FractalAlgorithm;
  /** Random source for palettes (default: seeded from `seed`) */
  random?: RandomSource;
  /** Called with a percentage after each chunk of a recompute */
  onProgress?: (percent: number) => void;
}

export interface ExplorerStats {
  /** Completed iteration field recomputes */
  recomputes: number;
  /** Completed frame composites */
  redraws: number;
  lastRecompute: RenderSessionMetrics | null;
}

/**
 * Owns the viewport, iteration field, palette and frame buffer, and turns host
 * commands into frames.
 *
 * Commands only update the store and its dirty flags. The work happens in
 * {@link FractalExplorer.draw}: the field is recomputed first when the viewport
 * changed, then the frame is recomposited when the field or palette changed, and only
 * then is the finished frame copied out. A draw with nothing dirty is a plain copy.
 *
 * Usage:
 * ```typescript
 * const explorer = new FractalExplorer({ width: 640, height: 480 });
 * const frame = new Uint8Array(640 * 480 * 4);
 * explorer.zoom({ x: 320, y: 240 }, 0.5);
 * explorer.draw(frame);
 * ```
 */
export class FractalExplorer {
  readonly store: ExplorerStore;

  private readonly config: ExplorerConfig;
  private readonly algorithm: FractalAlgorithm;
  private readonly onProgress?: (percent: number) => void;
  private readonly performanceMonitor = new PerformanceMonitor();

  private field: IterationField;
  private frame: Uint8ClampedArray;
  private drawing = false;
  private redraws = 0;

  constructor(options: ExplorerOptions = {}) {
    const { algorithm, random, onProgress, ...overrides } = options;
    this.config = { ...initialExplorerConfig, ...overrides };
    this.algorithm = algorithm ?? mandelbrotAlgorithm;
    this.onProgress = onProgress;
    this.store = createExplorerStore(this.config, random ?? createRandom(this.config.seed));

    const { width, height } = this.store.getState().viewport;
    this.field = createIterationField(width, height);
    this.frame = new Uint8ClampedArray(width * height * 4).fill(0xff);
  }

  zoom(point: Point, factor: number): void {
    this.store.getState().zoom(point, factor);
  }

  resize(width: number, height: number): void {
    this.store.getState().resize(width, height);
  }

  randomizePalette(): void {
    this.store.getState().randomizePalette();
  }

  reset(): void {
    this.store.getState().reset();
  }

  setMaxIterations(maxIterations: number): void {
    this.store.getState().setMaxIterations(maxIterations);
  }

  setColoring(coloring: ColoringStrategy): void {
    this.store.getState().setColoring(coloring);
  }

  getViewport(): Viewport {
    return this.store.getState().viewport;
  }

  getPalette(): Palette {
    return this.store.getState().palette;
  }

  getRenderState(): RenderState {
    return getRenderState(this.store.getState());
  }

  getStats(): ExplorerStats {
    return {
      recomputes: this.performanceMonitor.getStats().totalRenders,
      redraws: this.redraws,
      lastRecompute: this.performanceMonitor.getLastRenderMetrics(),
    };
  }

  /**
   * Fills `output` (RGBA8, exactly width * height * 4 bytes) with the current frame,
   * resolving any pending recompute and redraw first.
   *
   * A draw issued while another is in progress (e.g. from `onProgress`) starts no
   * work of its own and receives the last complete frame.
   */
  draw(output: Uint8Array | Uint8ClampedArray): void {
    if (this.drawing) {
      this.copyFrame(output);
      return;
    }

    const { width, height } = this.store.getState().viewport;
    if (output.length !== width * height * 4) {
      throw new InvalidArgumentError(
        `Output buffer holds ${output.length} bytes, expected ${width * height * 4} for ${width}x${height}`,
        "output"
      );
    }

    this.drawing = true;
    try {
      this.update();
    } finally {
      this.drawing = false;
    }

    this.copyFrame(output);
  }

  private update(): void {
    let state = this.store.getState();

    if (state.recalcNeeded) {
      this.recompute(state.viewport, state.maxIterations);
      state.markRecomputed(state.fieldRevision);
      state = this.store.getState();
    }

    if (state.redrawNeeded) {
      if (this.frame.length !== this.field.values.length * 4) {
        this.frame = new Uint8ClampedArray(this.field.values.length * 4);
      }
      composeFrame(this.field, state.palette, state.coloring, this.frame);
      this.redraws++;
      state.markRedrawn(state.frameRevision);
    }
  }

  private recompute(viewport: Viewport, maxIterations: number): void {
    const { width, height } = viewport;
    if (this.field.width !== width || this.field.height !== height) {
      this.field = createIterationField(width, height);
    }

    const chunks = createChunks(width, height, this.config.rowsPerChunk);
    const sessionId = this.performanceMonitor.startRender(chunks.length, width * height);
    let chunkStart = performance.now();

    computeIterationField(this.field, viewport, maxIterations, this.algorithm, chunks, (completed) => {
      const now = performance.now();
      this.performanceMonitor.recordChunk(sessionId, completed - 1, now - chunkStart);
      chunkStart = now;
      this.onProgress?.(this.performanceMonitor.getProgress(sessionId) ?? 100);
    });

    const metrics = this.performanceMonitor.endRender(sessionId);
    if (this.config.debug) {
      console.debug(
        `FractalExplorer: recomputed ${width}x${height} at ${maxIterations} iterations in ${metrics.duration.toFixed(1)}ms`
      );
    }
  }

  private copyFrame(output: Uint8Array | Uint8ClampedArray): void {
    if (output.length !== this.frame.length) {
      throw new InvalidArgumentError(
        `Output buffer holds ${output.length} bytes, expected ${this.frame.length}`,
        "output"
      );
    }
    output.set(this.frame);
  }
}
