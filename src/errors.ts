/**
 * Geometry that cannot be un-applied exactly: the inferred input extent is
 * non-positive, a parameter is out of range, or the forward output-size
 * identity does not round-trip.
 */
export class InvalidGeometryError extends Error {
  name = "InvalidGeometryError";

  constructor(
    message: string,
    readonly axis: string,
    readonly output: number,
    readonly kernel: number,
    readonly padding: number,
    readonly stride: number,
  ) {
    super(message);
  }
}

export class OracleError extends Error {
  name = "OracleError";
}

export class UsageError extends Error {
  name = "UsageError";
}
