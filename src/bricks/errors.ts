// Error types raised by the brick tiling and its lookups

export class BrickError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BrickError";
  }
}

/** Raised when a tiling is requested with an unusable brick size. */
export class ConfigurationError extends BrickError {
  constructor(
    message: string,
    public readonly bricksize: number,
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type Coordinate = "ra" | "dec";

function outOfRangeMessage(coordinate: Coordinate, value: number, index?: number): string {
  const where = index === undefined ? "" : ` at index ${index}`;
  const expected =
    coordinate === "dec" ? "a finite value in [-90, 90]" : "a finite value";
  return `${coordinate.toUpperCase()} ${value}${where} out of range (expected ${expected})`;
}

/**
 * Raised when a coordinate falls outside the sky: Dec beyond [-90, 90] or a
 * non-finite RA/Dec. `index` is the position in the batch, if any.
 */
export class OutOfRangeError extends BrickError {
  constructor(
    public readonly coordinate: Coordinate,
    public readonly value: number,
    public readonly index?: number,
  ) {
    super(outOfRangeMessage(coordinate, value, index));
    this.name = "OutOfRangeError";
  }
}
