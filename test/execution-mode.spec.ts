import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
  isCuboidDevice,
  resolveExecutionMode,
  selectExecutionMode,
} from "../src/workload/execution-mode";
import {
  DATA_TYPES,
  EXECUTION_MODES,
  MPE_MODES,
  NTHW_NTK_MODES,
  VPU_DEVICES,
} from "../src/workload/types";

describe("selectExecutionMode", () => {
  it("maps nthw-ntk modes to cuboids on newer devices", () => {
    expect(selectExecutionMode("VPU_2_7", "UINT8", "4x4", "4x16")).toBe("CUBOID_4x16");
    expect(selectExecutionMode("VPU_2_7", "UINT8", "4x4", "8x8")).toBe("CUBOID_8x16");
    expect(selectExecutionMode("VPU_4_0", "FLOAT16", "16x1", "16x4")).toBe("CUBOID_16x16");
  });

  it("ignores the MPE mode on newer devices", () => {
    expect(selectExecutionMode("VPU_4_0", "UINT8", "16x1", "8x8")).toBe("CUBOID_8x16");
  });

  it("prefers the float vector mode on older devices", () => {
    expect(selectExecutionMode("VPU_2_0", "FLOAT16", "4x4", "8x8")).toBe("VECTOR_FP16");
    expect(selectExecutionMode("VPU_2_1", "BFLOAT16", "16x1", "8x8")).toBe("VECTOR_FP16");
  });

  it("uses the MPE mode for integer inputs on older devices", () => {
    expect(selectExecutionMode("VPU_2_0", "UINT8", "4x4", "8x8")).toBe("MATRIX");
    expect(selectExecutionMode("VPU_2_0", "INT8", "16x1", "8x8")).toBe("VECTOR");
    expect(selectExecutionMode("VPU_2_1", "UINT8", "4x1", "8x8")).toBe("VECTOR");
  });
});

describe("resolveExecutionMode", () => {
  it("reports no advisory for recognized modes", () => {
    expect(resolveExecutionMode("VPU_2_7", "UINT8", "4x4", "8x8")).toEqual({
      mode: "CUBOID_8x16",
    });
    expect(resolveExecutionMode("VPU_2_0", "UINT8", "4x4", "8x8")).toEqual({
      mode: "MATRIX",
    });
  });

  it("falls back to CUBOID_16x16 for an unknown nthw-ntk mode", () => {
    expect(resolveExecutionMode("VPU_4_0", "UINT8", "4x4", "2x2")).toEqual({
      mode: "CUBOID_16x16",
      advisory: 'Unrecognized nthw-ntk mode "2x2" for VPU_4_0; using CUBOID_16x16',
    });
  });

  it("does not treat inherited keys as nthw-ntk modes", () => {
    expect(resolveExecutionMode("VPU_2_7", "UINT8", "4x4", "toString").mode).toBe(
      "CUBOID_16x16",
    );
  });

  it("falls back to VECTOR for an unknown MPE mode", () => {
    expect(resolveExecutionMode("VPU_2_0", "UINT8", "8x8", "8x8")).toEqual({
      mode: "VECTOR",
      advisory: 'Unrecognized MPE mode "8x8" for VPU_2_0; using VECTOR',
    });
  });

  it("does not consult the MPE mode for float inputs", () => {
    expect(resolveExecutionMode("VPU_2_0", "FLOAT16", "bogus", "8x8")).toEqual({
      mode: "VECTOR_FP16",
    });
  });
});

describe("isCuboidDevice", () => {
  it("is true only for VPU_2_7 and VPU_4_0", () => {
    expect(VPU_DEVICES.filter(isCuboidDevice)).toEqual(["VPU_2_7", "VPU_4_0"]);
  });
});

describe("property tests: execution mode selection", () => {
  const modeString = (known: readonly string[]) =>
    fc.oneof(fc.constantFrom(...known), fc.string({ maxLength: 6 }));

  it("is total and returns a known execution mode", () => {
    fc.assert(
      fc.property(
        fc.constantFrom(...VPU_DEVICES),
        fc.constantFrom(...DATA_TYPES),
        modeString(MPE_MODES),
        modeString(NTHW_NTK_MODES),
        (device, dtype, mpe, nthw) => {
          const { mode, advisory } = resolveExecutionMode(device, dtype, mpe, nthw);
          expect(EXECUTION_MODES).toContain(mode);
          expect(mode.startsWith("CUBOID")).toBe(isCuboidDevice(device));
          if (advisory !== undefined) {
            expect(mode === "CUBOID_16x16" || mode === "VECTOR").toBe(true);
          }
        },
      ),
      { numRuns: 300 },
    );
  });
});
