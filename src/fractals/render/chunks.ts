import { assertPositiveInteger } from "../../lib/errors";

export interface RenderChunk {
  startX: number;
  startY: number;
  width: number;
  height: number;
}

/**
 * Divides a width x height grid into full-width row bands of `rowsPerChunk` rows
 * (the last band may be shorter). Bands are disjoint and cover every pixel once,
 * top to bottom.
 */
export function createChunks(width: number, height: number, rowsPerChunk: number): RenderChunk[] {
  assertPositiveInteger(width, "width");
  assertPositiveInteger(height, "height");
  assertPositiveInteger(rowsPerChunk, "rowsPerChunk");

  const chunks: RenderChunk[] = [];
  for (let startY = 0; startY < height; startY += rowsPerChunk) {
    chunks.push({
      startX: 0,
      startY,
      width,
      height: Math.min(rowsPerChunk, height - startY),
    });
  }
  return chunks;
}
