import { assertPositiveInteger } from "../../lib/errors";
import type { RandomSource } from "../../lib/prng";

/** Color with channels in [0, 255]. Channels stay fractional until a frame is written. */
export type RGB = [r: number, g: number, b: number];

export type GradientStop = {
  /** Relative position; stops only need to be ordered, not evenly spaced or bounded to [0, 1] */
  position: number;
  color: RGB;
};

export type PaletteRecipe = "rainbow" | "random";

/**
 * How an iteration value picks its palette position.
 * - smooth: the smoothed count indexes the palette directly
 * - histogram: counts are equalized over the escaped pixels of the current field
 */
export type ColoringStrategy = "smooth" | "histogram";

/**
 * Lookup table of maxIterations + 1 colors; `colors[maxIterations]` is the interior color.
 */
export type Palette = {
  recipe: PaletteRecipe;
  maxIterations: number;
  colors: RGB[];
};

/** Fixed recipe cycling red → green → blue → green → red. */
export const RAINBOW_STOPS: readonly GradientStop[] = [
  { position: 0.0, color: [255, 0, 0] },
  { position: 2.5, color: [0, 255, 0] },
  { position: 5.0, color: [0, 0, 255] },
  { position: 7.5, color: [0, 255, 0] },
  { position: 10.0, color: [255, 0, 0] },
];

/** Positions used by the random recipe. Early stops are packed tight so low counts vary most. */
export const RANDOM_STOP_POSITIONS: readonly number[] = [0.0, 1.0, 2.5, 5.0, 10.0];

export function lerpColor(a: RGB, b: RGB, t: number): RGB {
  return [a[0] + (b[0] - a[0]) * t, a[1] + (b[1] - a[1]) * t, a[2] + (b[2] - a[2]) * t];
}

/**
 * Evaluates a piecewise-linear gradient. Positions before the first stop or past
 * the last one clamp to the end colors.
 */
export function sampleGradient(stops: readonly GradientStop[], position: number): RGB {
  if (stops.length === 0) {
    throw new Error("Cannot sample a gradient without stops");
  }

  const first = stops[0];
  const last = stops[stops.length - 1];
  if (position <= first.position) return [...first.color];
  if (position >= last.position) return [...last.color];

  for (let i = 1; i < stops.length; i++) {
    const hi = stops[i];
    if (position <= hi.position) {
      const lo = stops[i - 1];
      const span = hi.position - lo.position;
      return span > 0 ? lerpColor(lo.color, hi.color, (position - lo.position) / span) : [...hi.color];
    }
  }

  return [...last.color];
}

/**
 * Stops of the random recipe: every channel of every stop is drawn independently
 * and uniformly from [0, 1) and scaled to the byte range.
 */
export function randomStops(random: RandomSource): GradientStop[] {
  return RANDOM_STOP_POSITIONS.map((position): GradientStop => ({
    position,
    color: [random() * 255, random() * 255, random() * 255],
  }));
}

/**
 * Builds a palette lookup table by sampling the recipe's gradient at
 * maxIterations + 1 evenly spaced points over its whole domain.
 */
export function generatePalette(recipe: PaletteRecipe, maxIterations: number, random: RandomSource): Palette {
  assertPositiveInteger(maxIterations, "maxIterations");

  const stops = recipe === "rainbow" ? RAINBOW_STOPS : randomStops(random);
  const start = stops[0].position;
  const end = stops[stops.length - 1].position;

  const colors: RGB[] = [];
  for (let i = 0; i <= maxIterations; i++) {
    colors.push(sampleGradient(stops, start + ((end - start) * i) / maxIterations));
  }

  return { recipe, maxIterations, colors };
}

/**
 * Color for a smoothed iteration value: interpolates between the two palette
 * entries around it. The lower index is clamped to maxIterations - 1, so a value of
 * exactly maxIterations yields the interior color.
 */
export function colorAt(palette: Palette, value: number): RGB {
  const { colors, maxIterations } = palette;
  const i = Math.max(0, Math.min(Math.floor(value), maxIterations - 1));
  const f = Math.max(0, Math.min(value - i, 1));
  return lerpColor(colors[i], colors[i + 1], f);
}

/**
 * Histogram equalization over escaped values. Returns a mapper from a smoothed value
 * to a position in [0, maxIterations - 1] proportional to the share of escaped pixels
 * that escaped no later than it. Interior values are not counted.
 */
export function createHistogramMapper(values: ArrayLike<number>, maxIterations: number): (value: number) => number {
  const counts = new Float64Array(maxIterations);
  let total = 0;

  for (let i = 0; i < values.length; i++) {
    const v = values[i];
    // Interior values (and anything that is not a number) are not counted
    if (!(v >= 0 && v < maxIterations)) continue;
    counts[Math.floor(v)]++;
    total++;
  }

  // counts becomes the cumulative distribution in place
  let running = 0;
  for (let i = 0; i < maxIterations; i++) {
    running += counts[i];
    counts[i] = total > 0 ? running / total : 0;
  }

  const span = maxIterations - 1;
  return (value: number) => {
    const i = Math.max(0, Math.min(Math.floor(value), maxIterations - 1));
    const below = i > 0 ? counts[i - 1] : 0;
    const share = below + (counts[i] - below) * (value - i);
    return share * span;
  };
}
