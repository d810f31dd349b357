/**
 * Convolution/pooling extent arithmetic.
 *
 * Pure functions, importable from any layer.
 */

import { InvalidGeometryError } from "../errors";

/** Forward output-size identity: `floor((i + 2p - k) / s) + 1`. */
export function outputDim(
  input: number,
  kernel: number,
  padding: number,
  stride: number,
): number {
  return Math.floor((input + 2 * padding - kernel) / stride) + 1;
}

function inferAxis(
  axis: string,
  output: number,
  kernel: number,
  padding: number,
  stride: number,
): number {
  const fail = (reason: string): never => {
    throw new InvalidGeometryError(
      `Invalid geometry on ${axis}: ${reason} (output=${output}, kernel=${kernel}, padding=${padding}, stride=${stride})`,
      axis,
      output,
      kernel,
      padding,
      stride,
    );
  };

  for (const value of [output, kernel, padding, stride]) {
    if (!Number.isInteger(value)) {
      fail("all values must be integers");
    }
  }
  if (stride < 1) fail("stride must be >= 1");
  if (output < 1) fail("output must be >= 1");
  if (kernel < 1) fail("kernel must be >= 1");
  if (padding < 0) fail("padding must be >= 0");

  const input = (output - 1) * stride - 2 * padding + kernel;
  if (input <= 0) {
    fail(`inferred input size ${input} is not positive`);
  }
  if (outputDim(input, kernel, padding, stride) !== output) {
    fail(`inferred input size ${input} does not reproduce the output`);
  }
  return input;
}

/**
 * Un-apply a convolution per spatial axis: given the post-operation extents,
 * return the pre-operation extents that produce them exactly.
 *
 * The four sequences are parallel arrays; `axes` names them in diagnostics.
 */
export function inferInputDims(
  outputDims: readonly number[],
  kernels: readonly number[],
  paddings: readonly number[],
  strides: readonly number[],
  axes?: readonly string[],
): number[] {
  const rank = outputDims.length;
  if (
    kernels.length !== rank ||
    paddings.length !== rank ||
    strides.length !== rank ||
    (axes !== undefined && axes.length !== rank)
  ) {
    throw new InvalidGeometryError(
      `Invalid geometry: expected ${rank} kernels, paddings and strides, got ${kernels.length}, ${paddings.length} and ${strides.length}`,
      "all",
      Number.NaN,
      Number.NaN,
      Number.NaN,
      Number.NaN,
    );
  }
  return outputDims.map((output, i) =>
    inferAxis(axes?.[i] ?? `axis ${i}`, output, kernels[i], paddings[i], strides[i]),
  );
}
