/**
 * Symbolic vocabulary shared by descriptors, the CLI and the oracle bridge.
 *
 * Each enumeration is a string-literal union backed by a readonly tuple of
 * its values, so the CLI can validate choices and tests can enumerate them.
 */

export const VPU_DEVICES = ["VPU_2_0", "VPU_2_1", "VPU_2_7", "VPU_4_0"] as const;
export type VPUDevice = (typeof VPU_DEVICES)[number];

export const OPERATIONS = [
  "CONVOLUTION",
  "DW_CONVOLUTION",
  "ELTWISE",
  "MAXPOOL",
  "CM_CONVOLUTION",
] as const;
export type Operation = (typeof OPERATIONS)[number];

export const DATA_TYPES = ["UINT8", "INT8", "FLOAT16", "BFLOAT16"] as const;
export type DataType = (typeof DATA_TYPES)[number];

export const LAYOUTS = ["ZXY", "XZY", "YXZ", "YZX", "ZYX", "XYZ"] as const;
export type Layout = (typeof LAYOUTS)[number];

export const ACTIVATION_FUNCTIONS = [
  "NONE",
  "RELU",
  "MULT",
  "LRELU",
  "ADD",
  "SUB",
] as const;
export type ActivationFunction = (typeof ACTIVATION_FUNCTIONS)[number];

export const MPE_MODES = ["4x4", "16x1", "4x1"] as const;
export type MpeMode = (typeof MPE_MODES)[number];

export const NTHW_NTK_MODES = ["4x16", "8x8", "16x4"] as const;
export type NthwNtk = (typeof NTHW_NTK_MODES)[number];

export const ISI_STRATEGIES = [
  "CLUSTERING",
  "SPLIT_OVER_H",
  "SPLIT_OVER_K",
] as const;
export type ISIStrategy = (typeof ISI_STRATEGIES)[number];

export const MEMORY_LOCATIONS = ["DRAM", "CMX"] as const;
export type MemoryLocation = (typeof MEMORY_LOCATIONS)[number];

export const EXECUTION_MODES = [
  "MATRIX",
  "VECTOR",
  "VECTOR_FP16",
  "CUBOID_4x16",
  "CUBOID_8x16",
  "CUBOID_16x16",
] as const;
export type ExecutionMode = (typeof EXECUTION_MODES)[number];

/** Highest swizzling key the binding accepts (`Swizzling.KEY_0` .. `KEY_5`). */
export const MAX_SWIZZLING_KEY = 5;

/**
 * One hardware operation as the user describes it. Spatial extents are the
 * post-operation (output) extents; kernel, padding and stride are symmetric
 * across both spatial axes.
 */
export type OperationParameters = Readonly<{
  device: VPUDevice;
  operation: Operation;
  width: number;
  height: number;
  inputChannels: number;
  outputChannels: number;
  batch: number;
  kernel: number;
  padding: number;
  strides: number;
  inputDtype: DataType;
  outputDtype: DataType;
  outputLayout: Layout;
  activation: ActivationFunction;
  actSparsity: number;
  paramSparsityEnabled: boolean;
  paramSparsity: number;
  inputSwizzling: number;
  paramSwizzling: number;
  outputSwizzling: number;
  isiStrategy: ISIStrategy;
  outputWriteTiles: number;
  /** Only consulted for VPU_2_0 / VPU_2_1. Unrecognized values fall back. */
  mpeMode: string;
  /** Only consulted for VPU_2_7 / VPU_4_0. Unrecognized values fall back. */
  nthwNtk: string;
}>;

export function isOneOf<T extends string>(
  values: readonly T[],
  value: string,
): value is T {
  return values.some((candidate) => candidate === value);
}
