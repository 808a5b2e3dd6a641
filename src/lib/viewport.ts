import { DEFAULT_BOUNDS, REFERENCE_HEIGHT, REFERENCE_WIDTH } from "../config";
import { assertFinite, assertPositiveInteger, InvalidArgumentError } from "./errors";

export type Point = {
  x: number;
  y: number;
};

export type PlaneBounds = {
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
};

/**
 * The rectangle of the complex plane currently mapped onto the pixel grid.
 * Pixel (0, 0) is the top-left corner and maps to (xMin, yMin).
 */
export type Viewport = PlaneBounds & {
  width: number;
  height: number;
};

/**
 * Linearly remaps `n` from [rMin, rMax] to [tMin, tMax].
 * A degenerate source range maps everything onto tMin.
 */
export function normalize(n: number, rMin: number, rMax: number, tMin: number, tMax: number): number {
  if (rMax === rMin) return tMin;
  return ((n - rMin) / (rMax - rMin)) * (tMax - tMin) + tMin;
}

function assertBounds(bounds: PlaneBounds): void {
  for (const key of ["xMin", "xMax", "yMin", "yMax"] as const) {
    assertFinite(bounds[key], key);
  }
  // The spans must stay finite too: toPlane multiplies by them
  const xSpan = bounds.xMax - bounds.xMin;
  const ySpan = bounds.yMax - bounds.yMin;
  if (!(xSpan > 0 && ySpan > 0 && Number.isFinite(xSpan) && Number.isFinite(ySpan))) {
    throw new InvalidArgumentError(
      `Plane bounds must be non-empty and finite, got x=[${bounds.xMin}, ${bounds.xMax}] y=[${bounds.yMin}, ${bounds.yMax}]`,
      "bounds"
    );
  }
}

/**
 * Converts a pixel coordinate to its point in the complex plane.
 * The last pixel of each axis lands exactly on the max bound.
 */
export function toPlane(viewport: Viewport, px: number, py: number): Point {
  return {
    x: normalize(px, 0, viewport.width - 1, viewport.xMin, viewport.xMax),
    y: normalize(py, 0, viewport.height - 1, viewport.yMin, viewport.yMax),
  };
}

/** Inverse of {@link toPlane}; the result may be fractional or off-grid. */
export function toPixel(viewport: Viewport, x: number, y: number): Point {
  return {
    x: normalize(x, viewport.xMin, viewport.xMax, 0, viewport.width - 1),
    y: normalize(y, viewport.yMin, viewport.yMax, 0, viewport.height - 1),
  };
}

/**
 * Recenters the viewport on the plane point under `point` and scales both axis
 * ranges by `factor`. Factors below 1 zoom in, above 1 zoom out.
 *
 * Recentring goes through {@link toPlane}, so the pixel-to-plane convention is the
 * same one used for every rendered pixel. Throws when the result would overflow or
 * collapse below the resolution of a double.
 */
export function zoomViewport(viewport: Viewport, point: Point, factor: number): Viewport {
  assertFinite(point.x, "point.x");
  assertFinite(point.y, "point.y");
  if (!Number.isFinite(factor) || factor <= 0) {
    throw new InvalidArgumentError(`Zoom factor must be a positive finite number, got ${factor}`, "factor");
  }

  const center = toPlane(viewport, point.x, point.y);
  const halfX = ((viewport.xMax - viewport.xMin) * factor) / 2;
  const halfY = ((viewport.yMax - viewport.yMin) * factor) / 2;

  const zoomed: Viewport = {
    ...viewport,
    xMin: center.x - halfX,
    xMax: center.x + halfX,
    yMin: center.y - halfY,
    yMax: center.y + halfY,
  };
  assertBounds(zoomed);
  return zoomed;
}

/**
 * Changes the pixel dimensions while keeping plane units per pixel constant:
 * enlarging the canvas reveals more of the plane instead of stretching it.
 * Each axis grows (or shrinks) by the extra range, split evenly around its center.
 */
export function resizeViewport(viewport: Viewport, width: number, height: number): Viewport {
  assertPositiveInteger(width, "width");
  assertPositiveInteger(height, "height");

  const xRatio = width / viewport.width;
  const yRatio = height / viewport.height;

  const xRange = Math.abs(viewport.xMax - viewport.xMin);
  const yRange = Math.abs(viewport.yMax - viewport.yMin);

  const xDiff = xRatio * xRange - xRange;
  const yDiff = yRatio * yRange - yRange;

  const resized: Viewport = {
    width,
    height,
    xMin: viewport.xMin - xDiff / 2,
    xMax: viewport.xMax + xDiff / 2,
    yMin: viewport.yMin - yDiff / 2,
    yMax: viewport.yMax + yDiff / 2,
  };
  assertBounds(resized);
  return resized;
}

/**
 * Creates a viewport of the given size. Explicit bounds are used as-is. Without
 * them, the default framing is rescaled from the reference resolution with the
 * resize rule, so the set appears at the same scale at any canvas size.
 */
export function createViewport(width: number, height: number, bounds?: PlaneBounds): Viewport {
  assertPositiveInteger(width, "width");
  assertPositiveInteger(height, "height");

  if (bounds) {
    assertBounds(bounds);
    return { width, height, ...bounds };
  }

  const reference: Viewport = { width: REFERENCE_WIDTH, height: REFERENCE_HEIGHT, ...DEFAULT_BOUNDS };
  return resizeViewport(reference, width, height);
}
