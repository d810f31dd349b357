import { describe, expect, it } from "vitest";

import { InvalidGeometryError } from "../src/errors";
import { describeWorkload } from "../src/oracle/describe";
import {
  buildDmaWorkload,
  buildDpuWorkload,
  toOracleArguments,
} from "../src/workload/descriptor";
import { convParams } from "./helpers/recording-oracle";

describe("buildDpuWorkload", () => {
  it("carries the parameters through with symmetric kernel, stride and padding", () => {
    const workload = buildDpuWorkload(
      convParams({ padding: 2, strides: 2, kernel: 5 }),
      "CUBOID_8x16",
    );
    expect(workload.kind).toBe("dpu");
    expect([workload.kernelHeight, workload.kernelWidth]).toEqual([5, 5]);
    expect([workload.strideHeight, workload.strideWidth]).toEqual([2, 2]);
    expect([workload.padTop, workload.padLeft]).toEqual([2, 2]);
    expect(workload.executionMode).toBe("CUBOID_8x16");
  });

  it("is frozen", () => {
    expect(Object.isFrozen(buildDpuWorkload(convParams(), "MATRIX"))).toBe(true);
  });

  it("encodes oracle arguments with qualified enum names", () => {
    const args = toOracleArguments(
      buildDpuWorkload(
        convParams({ actSparsity: 0.25, paramSwizzling: 5 }),
        "CUBOID_8x16",
      ),
    );
    expect(args).toEqual({
      device: "VPUDevice.VPU_2_7",
      operation: "Operation.CONVOLUTION",
      input_0_width: 56,
      input_0_height: 56,
      input_0_channels: 16,
      input_0_batch: 1,
      output_0_channels: 32,
      input_0_datatype: "DataType.UINT8",
      output_0_datatype: "DataType.UINT8",
      output_0_layout: "Layout.ZXY",
      execution_order: "ExecutionMode.CUBOID_8x16",
      kernel_height: 3,
      kernel_width: 3,
      kernel_stride_height: 1,
      kernel_stride_width: 1,
      kernel_pad_top: 1,
      kernel_pad_left: 1,
      input_sparsity_rate: 0.25,
      weight_sparsity_enabled: false,
      weight_sparsity_rate: 0,
      input_0_swizzling: "Swizzling.KEY_0",
      input_1_swizzling: "Swizzling.KEY_5",
      output_0_swizzling: "Swizzling.KEY_0",
      output_write_tiles: 1,
      isi_strategy: "ISIStrategy.CLUSTERING",
    });
  });
});

describe("buildDmaWorkload", () => {
  it("reconstructs the source tensor from the destination extents", () => {
    const workload = buildDmaWorkload(
      convParams({ width: 56, height: 28, kernel: 3, padding: 1, strides: 2 }),
    );
    expect(workload.inputDimension).toEqual([111, 55, 16, 1]);
    expect(workload.outputDimension).toEqual([56, 28, 32, 1]);
    expect(workload.inputLocation).toBe("DRAM");
    expect(workload.outputLocation).toBe("CMX");
  });

  it("keeps extents for same-padded stride-1 kernels", () => {
    const workload = buildDmaWorkload(convParams({ batch: 4 }));
    expect(workload.inputDimension).toEqual([56, 56, 16, 4]);
    expect(workload.outputDimension).toEqual([56, 56, 32, 4]);
  });

  it("freezes the workload and its dimensions", () => {
    const workload = buildDmaWorkload(convParams());
    expect(Object.isFrozen(workload)).toBe(true);
    expect(Object.isFrozen(workload.inputDimension)).toBe(true);
    expect(Object.isFrozen(workload.outputDimension)).toBe(true);
  });

  it("fails on geometry that cannot be un-applied", () => {
    expect(() =>
      buildDmaWorkload(convParams({ height: 1, kernel: 1, padding: 5 })),
    ).toThrow(InvalidGeometryError);
  });

  it("encodes oracle arguments", () => {
    const args = toOracleArguments(
      buildDmaWorkload(
        convParams({ device: "VPU_4_0", inputDtype: "FLOAT16", kernel: 1, padding: 0 }),
      ),
    );
    expect(args).toEqual({
      device: "VPUDevice.VPU_4_0",
      input_dimension: [56, 56, 16, 1],
      output_dimension: [56, 56, 32, 1],
      input_location: "MemoryLocation.DRAM",
      output_location: "MemoryLocation.CMX",
      input_dtype: "DataType.FLOAT16",
      output_dtype: "DataType.UINT8",
    });
  });
});

describe("describeWorkload", () => {
  it("prints one line per argument between rules", () => {
    const lines = describeWorkload(
      toOracleArguments(buildDmaWorkload(convParams({ kernel: 1, padding: 0 }))),
    );
    expect(lines).toEqual([
      "====================== Operation ======================",
      "\tdevice = VPUDevice.VPU_2_7",
      "\tinput_dimension = [56, 56, 16, 1]",
      "\toutput_dimension = [56, 56, 32, 1]",
      "\tinput_location = MemoryLocation.DRAM",
      "\toutput_location = MemoryLocation.CMX",
      "\tinput_dtype = DataType.UINT8",
      "\toutput_dtype = DataType.UINT8",
      "=======================================================",
    ]);
  });

  it("prints booleans and numbers verbatim", () => {
    const lines = describeWorkload({ weight_sparsity_enabled: true, kernel_height: 3 });
    expect(lines.slice(1, 3)).toEqual([
      "\tweight_sparsity_enabled = true",
      "\tkernel_height = 3",
    ]);
  });
});
