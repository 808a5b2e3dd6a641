/**
 * Thrown when a caller hands the explorer geometry or settings it cannot honor
 * (zero-sized canvas, non-positive zoom factor, wrongly sized output buffer...).
 * Commands validate before touching state, so the last good frame stays drawable.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    readonly argument?: string
  ) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

export function assertPositiveInteger(value: number, argument: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidArgumentError(`${argument} must be a positive integer, got ${value}`, argument);
  }
}

export function assertFinite(value: number, argument: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(`${argument} must be a finite number, got ${value}`, argument);
  }
}
