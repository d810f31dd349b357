/**
 * Workload descriptors.
 *
 * Descriptors are typed and frozen inside the library. The binding the oracle
 * runs on wants flat keyword arguments whose enum values are qualified with
 * their type name (`"VPUDevice.VPU_2_7"`); that encoding happens only in
 * `toOracleArguments`.
 */

import { inferInputDims } from "./geometry";
import type {
  DataType,
  ExecutionMode,
  ISIStrategy,
  Layout,
  MemoryLocation,
  Operation,
  OperationParameters,
  VPUDevice,
} from "./types";

export type DpuWorkload = Readonly<{
  kind: "dpu";
  device: VPUDevice;
  operation: Operation;
  inputWidth: number;
  inputHeight: number;
  inputChannels: number;
  inputBatch: number;
  outputChannels: number;
  inputDtype: DataType;
  outputDtype: DataType;
  outputLayout: Layout;
  executionMode: ExecutionMode;
  kernelHeight: number;
  kernelWidth: number;
  strideHeight: number;
  strideWidth: number;
  padTop: number;
  padLeft: number;
  inputSparsityRate: number;
  weightSparsityEnabled: boolean;
  weightSparsityRate: number;
  inputSwizzling: number;
  weightSwizzling: number;
  outputSwizzling: number;
  outputWriteTiles: number;
  isiStrategy: ISIStrategy;
}>;

/** Width, height, channels, batch. */
export type TensorDims = readonly [number, number, number, number];

export type DmaWorkload = Readonly<{
  kind: "dma";
  device: VPUDevice;
  inputDimension: TensorDims;
  outputDimension: TensorDims;
  inputLocation: MemoryLocation;
  outputLocation: MemoryLocation;
  inputDtype: DataType;
  outputDtype: DataType;
}>;

export type Workload = DpuWorkload | DmaWorkload;

export type OracleValue = string | number | boolean | number[];
export type OracleArguments = Record<string, OracleValue>;

// DMA workloads always describe a DRAM -> CMX fetch of the pre-operation tensor.
export const DMA_SOURCE: MemoryLocation = "DRAM";
export const DMA_DESTINATION: MemoryLocation = "CMX";

export function buildDpuWorkload(
  params: OperationParameters,
  executionMode: ExecutionMode,
): DpuWorkload {
  return Object.freeze({
    kind: "dpu",
    device: params.device,
    operation: params.operation,
    inputWidth: params.width,
    inputHeight: params.height,
    inputChannels: params.inputChannels,
    inputBatch: params.batch,
    outputChannels: params.outputChannels,
    inputDtype: params.inputDtype,
    outputDtype: params.outputDtype,
    outputLayout: params.outputLayout,
    executionMode,
    kernelHeight: params.kernel,
    kernelWidth: params.kernel,
    strideHeight: params.strides,
    strideWidth: params.strides,
    padTop: params.padding,
    padLeft: params.padding,
    inputSparsityRate: params.actSparsity,
    weightSparsityEnabled: params.paramSparsityEnabled,
    weightSparsityRate: params.paramSparsity,
    inputSwizzling: params.inputSwizzling,
    weightSwizzling: params.paramSwizzling,
    outputSwizzling: params.outputSwizzling,
    outputWriteTiles: params.outputWriteTiles,
    isiStrategy: params.isiStrategy,
  });
}

/**
 * The user's width/height are the destination extents; the source tensor is
 * reconstructed by un-applying the operation's kernel, padding and stride.
 */
export function buildDmaWorkload(params: OperationParameters): DmaWorkload {
  const [inputHeight, inputWidth] = inferInputDims(
    [params.height, params.width],
    [params.kernel, params.kernel],
    [params.padding, params.padding],
    [params.strides, params.strides],
    ["height", "width"],
  );
  return Object.freeze({
    kind: "dma",
    device: params.device,
    inputDimension: Object.freeze([
      inputWidth,
      inputHeight,
      params.inputChannels,
      params.batch,
    ] as const),
    outputDimension: Object.freeze([
      params.width,
      params.height,
      params.outputChannels,
      params.batch,
    ] as const),
    inputLocation: DMA_SOURCE,
    outputLocation: DMA_DESTINATION,
    inputDtype: params.inputDtype,
    outputDtype: params.outputDtype,
  });
}

export function toOracleArguments(workload: Workload): OracleArguments {
  if (workload.kind === "dma") {
    return {
      device: `VPUDevice.${workload.device}`,
      input_dimension: [...workload.inputDimension],
      output_dimension: [...workload.outputDimension],
      input_location: `MemoryLocation.${workload.inputLocation}`,
      output_location: `MemoryLocation.${workload.outputLocation}`,
      input_dtype: `DataType.${workload.inputDtype}`,
      output_dtype: `DataType.${workload.outputDtype}`,
    };
  }
  return {
    device: `VPUDevice.${workload.device}`,
    operation: `Operation.${workload.operation}`,
    input_0_width: workload.inputWidth,
    input_0_height: workload.inputHeight,
    input_0_channels: workload.inputChannels,
    input_0_batch: workload.inputBatch,
    output_0_channels: workload.outputChannels,
    input_0_datatype: `DataType.${workload.inputDtype}`,
    output_0_datatype: `DataType.${workload.outputDtype}`,
    output_0_layout: `Layout.${workload.outputLayout}`,
    execution_order: `ExecutionMode.${workload.executionMode}`,
    kernel_height: workload.kernelHeight,
    kernel_width: workload.kernelWidth,
    kernel_stride_height: workload.strideHeight,
    kernel_stride_width: workload.strideWidth,
    kernel_pad_top: workload.padTop,
    kernel_pad_left: workload.padLeft,
    input_sparsity_rate: workload.inputSparsityRate,
    weight_sparsity_enabled: workload.weightSparsityEnabled,
    weight_sparsity_rate: workload.weightSparsityRate,
    input_0_swizzling: `Swizzling.KEY_${workload.inputSwizzling}`,
    input_1_swizzling: `Swizzling.KEY_${workload.weightSwizzling}`,
    output_0_swizzling: `Swizzling.KEY_${workload.outputSwizzling}`,
    output_write_tiles: workload.outputWriteTiles,
    isi_strategy: `ISIStrategy.${workload.isiStrategy}`,
  };
}
