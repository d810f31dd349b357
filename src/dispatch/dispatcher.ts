import type { CostOracle } from "../oracle/types";
import {
  buildDmaWorkload,
  buildDpuWorkload,
  type DmaWorkload,
  type DpuWorkload,
} from "../workload/descriptor";
import { resolveExecutionMode } from "../workload/execution-mode";
import type { OperationParameters } from "../workload/types";

export const WORKLOAD_MODES = ["DPU", "DMA"] as const;
/** `DPU` is the compute engine, `DMA` the data-movement engine. */
export type WorkloadMode = (typeof WORKLOAD_MODES)[number];

export const COST_TARGETS = ["cycles", "power", "utilization"] as const;
export type CostTarget = (typeof COST_TARGETS)[number];

type DpuQuery = (oracle: CostOracle, workload: DpuWorkload) => Promise<number>;
type DmaQuery = (oracle: CostOracle, workload: DmaWorkload) => Promise<number>;

export const DPU_ROUTES: Readonly<Record<CostTarget, DpuQuery>> = {
  cycles: (oracle, workload) => oracle.computeCycles(workload),
  power: (oracle, workload) => oracle.computeActivityFactor(workload),
  utilization: (oracle, workload) => oracle.computeUtilization(workload),
};

// Utilization is a compute-engine concept; DMA answers it with power.
export const DMA_ROUTES: Readonly<Record<CostTarget, DmaQuery>> = {
  cycles: (oracle, workload) => oracle.dataMovementCycles(workload),
  power: (oracle, workload) => oracle.dataMovementPower(workload),
  utilization: (oracle, workload) => oracle.dataMovementPower(workload),
};

export type DispatcherOptions = {
  warn?: (message: string) => void;
};

/**
 * Turns one parameter set into one descriptor and exactly one oracle query.
 *
 * Holds no per-call state: concurrent `run` calls are independent as long as
 * the oracle itself tolerates concurrent queries.
 */
export class WorkloadDispatcher {
  private readonly warn: (message: string) => void;

  constructor(
    private readonly oracle: CostOracle,
    options: DispatcherOptions = {},
  ) {
    this.warn = options.warn ?? console.warn;
  }

  async run(
    params: OperationParameters,
    mode: WorkloadMode,
    target: CostTarget,
  ): Promise<number> {
    if (mode === "DPU") {
      const { mode: executionMode, advisory } = resolveExecutionMode(
        params.device,
        params.inputDtype,
        params.mpeMode,
        params.nthwNtk,
      );
      if (advisory) {
        this.warn(advisory);
      }
      return DPU_ROUTES[target](
        this.oracle,
        buildDpuWorkload(params, executionMode),
      );
    }

    // Throws InvalidGeometryError before the oracle is touched.
    const workload = buildDmaWorkload(params);
    if (target === "utilization") {
      this.warn("DMA has no utilization query; reporting DMA power instead");
    }
    return DMA_ROUTES[target](this.oracle, workload);
  }
}
