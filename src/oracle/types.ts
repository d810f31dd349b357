import type { DmaWorkload, DpuWorkload } from "../workload/descriptor";

/**
 * The external performance model, reached through five scalar queries.
 *
 * Implementations return the model's raw answer; a degraded oracle still
 * answers, at lower fidelity.
 */
export interface CostOracle {
  computeCycles(workload: DpuWorkload): Promise<number>;
  computeActivityFactor(workload: DpuWorkload): Promise<number>;
  computeUtilization(workload: DpuWorkload): Promise<number>;
  dataMovementCycles(workload: DmaWorkload): Promise<number>;
  dataMovementPower(workload: DmaWorkload): Promise<number>;
  isDegraded(): boolean;
  close(): void;
}

/** Method names exposed by the Python binding's cost model object. */
export type BindingMethod =
  | "DPU"
  | "DPUActivityFactor"
  | "hw_utilization"
  | "DMA"
  | "DMAPower";
