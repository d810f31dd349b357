export { defaultModelPath, resolveConfig, type CostConfig } from "./config";
export {
  COST_TARGETS,
  type CostTarget,
  DMA_ROUTES,
  DPU_ROUTES,
  type DispatcherOptions,
  WORKLOAD_MODES,
  WorkloadDispatcher,
  type WorkloadMode,
} from "./dispatch/dispatcher";
export { InvalidGeometryError, OracleError, UsageError } from "./errors";
export { describeWorkload } from "./oracle/describe";
export {
  type BridgeProcess,
  parseOracleResponse,
  ProcessOracle,
  type ProcessOracleOptions,
  type SpawnBridge,
} from "./oracle/process-oracle";
export type { BindingMethod, CostOracle } from "./oracle/types";
export {
  buildDmaWorkload,
  buildDpuWorkload,
  DMA_DESTINATION,
  DMA_SOURCE,
  type DmaWorkload,
  type DpuWorkload,
  type OracleArguments,
  type OracleValue,
  type TensorDims,
  toOracleArguments,
  type Workload,
} from "./workload/descriptor";
export {
  type ExecutionModeResolution,
  isCuboidDevice,
  resolveExecutionMode,
  selectExecutionMode,
} from "./workload/execution-mode";
export { inferInputDims, outputDim } from "./workload/geometry";
export * from "./workload/types";
