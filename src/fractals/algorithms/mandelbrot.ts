// ABOUTME: Mandelbrot set escape-time algorithm
// ABOUTME: Smooth iteration counts with cardioid, bulb and periodicity short-circuits

import type { FractalAlgorithm, IterationResult } from "./base";

/** Squared escape radius: |z|² > 4 means the orbit has escaped. */
export const ESCAPE_RADIUS_SQUARED = 4;

/** Iterations between orbit snapshots used for periodicity checking. */
export const PERIOD_CHECK_INTERVAL = 20;

/**
 * True when c lies in the main cardioid or the period-2 bulb. Both regions are
 * known to be inside the set, so their points never need iterating.
 */
export function isKnownInterior(x0: number, y0: number): boolean {
  const y2 = y0 * y0;

  const p = Math.sqrt((x0 - 0.25) * (x0 - 0.25) + y2);
  if (x0 <= p - 2 * p * p + 0.25) return true;

  return (x0 + 1) * (x0 + 1) + y2 <= 1 / 16;
}

/**
 * Mandelbrot Set algorithm implementation.
 *
 * For each point c in the complex plane, we iterate:
 *   z₀ = 0
 *   z_{n+1} = z_n² + c
 *
 * and count how many iterations it takes for |z|² to exceed 4. Escaped points get
 * a continuous count `n + 1 - log2(log2 |z|²)`, which removes the banding a plain
 * integer count produces. Points that never escape report exactly maxIterations.
 */
export class MandelbrotAlgorithm implements FractalAlgorithm {
  readonly name = "Mandelbrot Set";
  readonly description = "The classic Mandelbrot set: z → z² + c, starting from z = 0";

  computePoint(real: number, imag: number, maxIterations: number): IterationResult {
    if (isKnownInterior(real, imag)) {
      return { value: maxIterations, iter: 0 };
    }

    let x = 0;
    let y = 0;
    let x2 = 0;
    let y2 = 0;
    let iter = 0;

    // Orbit snapshot for periodicity checking
    let xOld = 0;
    let yOld = 0;
    let period = 0;

    while (x2 + y2 <= ESCAPE_RADIUS_SQUARED && iter < maxIterations) {
      y = 2 * x * y + imag;
      x = x2 - y2 + real;
      x2 = x * x;
      y2 = y * y;
      iter++;

      if (x === xOld && y === yOld) {
        // The orbit came back to a point it already visited: bounded forever
        return { value: maxIterations, iter };
      }

      period++;
      if (period === PERIOD_CHECK_INTERVAL) {
        period = 0;
        xOld = x;
        yOld = y;
      }
    }

    if (iter >= maxIterations) {
      return { value: maxIterations, iter };
    }

    // x2 + y2 > 4 here, so both logarithms are defined and the inner one is > 1
    const nu = Math.log2(Math.log2(x2 + y2));
    return { value: Math.max(0, iter + 1 - nu), iter };
  }
}

/**
 * Default instance of the Mandelbrot algorithm for convenient importing.
 */
export const mandelbrotAlgorithm = new MandelbrotAlgorithm();
