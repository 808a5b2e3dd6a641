// ABOUTME: Iteration field storage and the eager evaluation pass that fills it
// ABOUTME: One smoothed escape value per pixel, evaluated band by band

import type { Viewport } from "../../lib/viewport";
import { toPlane } from "../../lib/viewport";
import type { FractalAlgorithm } from "../algorithms/base";
import type { RenderChunk } from "./chunks";

/**
 * Smoothed iteration counts for every pixel, row-major from the top-left corner.
 * A value equal to maxIterations marks an interior point.
 */
export type IterationField = {
  width: number;
  height: number;
  values: Float64Array;
};

export function createIterationField(width: number, height: number): IterationField {
  return { width, height, values: new Float64Array(width * height) };
}

/**
 * Evaluates every pixel of `chunk` into `field`. Chunks touch disjoint index ranges,
 * so any number of them could be evaluated independently.
 */
export function computeChunk(
  field: IterationField,
  chunk: RenderChunk,
  viewport: Viewport,
  maxIterations: number,
  algorithm: FractalAlgorithm
): void {
  const { values, width } = field;
  const endY = chunk.startY + chunk.height;
  const endX = chunk.startX + chunk.width;

  for (let py = chunk.startY; py < endY; py++) {
    for (let px = chunk.startX; px < endX; px++) {
      const c = toPlane(viewport, px, py);
      values[py * width + px] = algorithm.computePoint(c.x, c.y, maxIterations).value;
    }
  }
}

/**
 * Refills the whole field for `viewport`. `onChunk` runs after each completed chunk
 * with the number of chunks done so far.
 */
export function computeIterationField(
  field: IterationField,
  viewport: Viewport,
  maxIterations: number,
  algorithm: FractalAlgorithm,
  chunks: RenderChunk[],
  onChunk?: (completed: number, total: number) => void
): void {
  if (field.width !== viewport.width || field.height !== viewport.height) {
    throw new Error(
      `Iteration field is ${field.width}x${field.height} but the viewport is ${viewport.width}x${viewport.height}`
    );
  }

  chunks.forEach((chunk, index) => {
    computeChunk(field, chunk, viewport, maxIterations, algorithm);
    onChunk?.(index + 1, chunks.length);
  });
}
