import type { DataType, ExecutionMode, VPUDevice } from "./types";

const CUBOID_DEVICES: readonly VPUDevice[] = ["VPU_2_7", "VPU_4_0"];

const CUBOID_BY_NTHW_NTK: Readonly<Record<string, ExecutionMode>> = {
  "4x16": "CUBOID_4x16",
  "8x8": "CUBOID_8x16",
  "16x4": "CUBOID_16x16",
};

const FLOAT_TYPES: readonly DataType[] = ["FLOAT16", "BFLOAT16"];
const VECTOR_MPE_MODES: readonly string[] = ["16x1", "4x1"];

export type ExecutionModeResolution = {
  mode: ExecutionMode;
  /** Set when an unrecognized mode value was absorbed by a fallback. */
  advisory?: string;
};

/** Devices whose DPU runs NTHW/NTK cuboids instead of MPE grids. */
export function isCuboidDevice(device: VPUDevice): boolean {
  return CUBOID_DEVICES.includes(device);
}

/**
 * First match wins: device generation, then input dtype, then MPE mode.
 * Never throws; unknown mode strings land on the documented fallback.
 */
export function resolveExecutionMode(
  device: VPUDevice,
  inputDtype: DataType,
  mpeMode: string,
  nthwNtk: string,
): ExecutionModeResolution {
  if (isCuboidDevice(device)) {
    const mode = Object.hasOwn(CUBOID_BY_NTHW_NTK, nthwNtk)
      ? CUBOID_BY_NTHW_NTK[nthwNtk]
      : undefined;
    if (mode) return { mode };
    return {
      mode: "CUBOID_16x16",
      advisory: `Unrecognized nthw-ntk mode "${nthwNtk}" for ${device}; using CUBOID_16x16`,
    };
  }

  if (FLOAT_TYPES.includes(inputDtype)) {
    return { mode: "VECTOR_FP16" };
  }
  if (mpeMode === "4x4") {
    return { mode: "MATRIX" };
  }
  if (VECTOR_MPE_MODES.includes(mpeMode)) {
    return { mode: "VECTOR" };
  }
  return {
    mode: "VECTOR",
    advisory: `Unrecognized MPE mode "${mpeMode}" for ${device}; using VECTOR`,
  };
}

export function selectExecutionMode(
  device: VPUDevice,
  inputDtype: DataType,
  mpeMode: string,
  nthwNtk: string,
): ExecutionMode {
  return resolveExecutionMode(device, inputDtype, mpeMode, nthwNtk).mode;
}
