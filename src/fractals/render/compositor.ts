import { InvalidArgumentError } from "../../lib/errors";
import type { ColoringStrategy, Palette } from "../algorithms/coloring";
import { colorAt, createHistogramMapper } from "../algorithms/coloring";
import type { IterationField } from "./iteration-field";

/**
 * Converts an iteration field into RGBA8 bytes (row-major, top-left origin, alpha
 * 255). Palette channels are written as-is, without linearization.
 */
export function composeFrame(
  field: IterationField,
  palette: Palette,
  strategy: ColoringStrategy,
  target: Uint8ClampedArray
): void {
  const { values } = field;
  const { maxIterations, colors } = palette;

  if (target.length !== values.length * 4) {
    throw new InvalidArgumentError(
      `Frame buffer holds ${target.length} bytes, expected ${values.length * 4} for ${field.width}x${field.height}`,
      "target"
    );
  }
  if (colors.length !== maxIterations + 1) {
    throw new Error(`Palette has ${colors.length} colors, expected ${maxIterations + 1}`);
  }

  const position = strategy === "histogram" ? createHistogramMapper(values, maxIterations) : undefined;
  const interior = colors[maxIterations];

  for (let i = 0; i < values.length; i++) {
    const value = values[i];
    const [r, g, b] =
      value >= maxIterations ? interior : colorAt(palette, position ? position(value) : value);

    const offset = i * 4;
    target[offset] = Math.round(r);
    target[offset + 1] = Math.round(g);
    target[offset + 2] = Math.round(b);
    target[offset + 3] = 255;
  }
}
