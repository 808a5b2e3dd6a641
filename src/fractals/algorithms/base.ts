/**
 * Result of evaluating a single point of the complex plane.
 */
export interface IterationResult {
  /**
   * Smoothed (fractional) escape count in [0, maxIterations].
   * Exactly maxIterations means the point was classified as non-escaping.
   */
  value: number;
  /** Integer iterations actually performed; 0 when a closed-form interior test matched */
  iter: number;
}

/**
 * Interface every escape-time algorithm implements, so the explorer can evaluate
 * a viewport without knowing which recurrence produces the field.
 */
export interface FractalAlgorithm {
  /** Human-readable name of the algorithm (e.g., "Mandelbrot Set") */
  readonly name: string;

  readonly description?: string;

  /**
   * Evaluates the point c = real + imag·i.
   *
   * Must be a pure function of its arguments: the explorer may evaluate pixels in
   * any order.
   */
  computePoint(real: number, imag: number, maxIterations: number): IterationResult;
}
