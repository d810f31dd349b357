import { parseArgs } from "node:util";

import {
  COST_TARGETS,
  type CostTarget,
  WORKLOAD_MODES,
  type WorkloadMode,
} from "../dispatch/dispatcher";
import { UsageError } from "../errors";
import {
  ACTIVATION_FUNCTIONS,
  DATA_TYPES,
  ISI_STRATEGIES,
  isOneOf,
  LAYOUTS,
  MAX_SWIZZLING_KEY,
  MPE_MODES,
  NTHW_NTK_MODES,
  OPERATIONS,
  type OperationParameters,
  VPU_DEVICES,
} from "../workload/types";

export const USAGE = `
vpucost: query the VPU cost model for one DPU or DMA operation

Usage:
  vpucost --device <VPU_x_y> --width <n> --height <n> --input_channels <n> --output_channels <n> [options]

Options:
  -m, --model <path>             Model path (default: <model dir>/<device>.vpunn)
      --mode <DPU|DMA>           Profiling mode (default: DPU)
      --target <t>               cycles | power | utilization (default: cycles)
  -d, --device <d>               ${VPU_DEVICES.join(" | ")}
      --operation <op>           ${OPERATIONS.join(" | ")} (default: CONVOLUTION)
      --mpe_mode <m>             ${MPE_MODES.join(" | ")} (default: 4x4)
      --nthw-ntk <m>             ${NTHW_NTK_MODES.join(" | ")} (default: 8x8)
      --activation <a>           ${ACTIVATION_FUNCTIONS.join(" | ")} (default: NONE)
  -x, --width <n>                Tensor width
  -y, --height <n>               Tensor height
      --input_channels <n>       Tensor input channels
      --output_channels <n>      Tensor output channels
  -b, --batch <n>                Tensor batch (default: 1)
  -k, --kernel <n>               Operation kernel (default: 1)
  -p, --padding <n>              Operation padding (default: 0)
  -s, --strides <n>              Operation strides (default: 1)
      --input_dtype <t>          ${DATA_TYPES.join(" | ")} (default: UINT8)
      --output_dtype <t>         ${DATA_TYPES.join(" | ")} (default: UINT8)
      --output_layout <l>        ${LAYOUTS.join(" | ")} (default: ZXY)
      --isi_strategy <s>         clustering | split_over_h | split_over_k (default: clustering)
      --act-sparsity <r>         Activation tensor sparsity (default: 0)
      --param-sparsity-enabled   Weight tensor sparsity enabled
      --param-sparsity <r>       Weight tensor sparsity (default: 0)
      --input-swizzling <k>      Input tensor swizzling key (default: 0)
      --param-swizzling <k>      Weight tensor swizzling key (default: 0)
      --output-swizzling <k>     Output tensor swizzling key (default: 0)
      --output-write-tiles <n>   Tiles the DPU broadcasts to, 1 = no broadcast (default: 1)
  -q, --quiet                    Do not print the workload descriptor
  -h, --help                     Show this help
`.trim();

const OPTIONS = {
  model: { type: "string", short: "m" },
  mode: { type: "string", default: "DPU" },
  target: { type: "string", default: "cycles" },
  device: { type: "string", short: "d" },
  operation: { type: "string", default: "CONVOLUTION" },
  mpe_mode: { type: "string", default: "4x4" },
  "nthw-ntk": { type: "string", default: "8x8" },
  activation: { type: "string", default: "NONE" },
  width: { type: "string", short: "x" },
  height: { type: "string", short: "y" },
  input_channels: { type: "string" },
  output_channels: { type: "string" },
  batch: { type: "string", short: "b", default: "1" },
  kernel: { type: "string", short: "k", default: "1" },
  padding: { type: "string", short: "p", default: "0" },
  strides: { type: "string", short: "s", default: "1" },
  input_dtype: { type: "string", default: "UINT8" },
  output_dtype: { type: "string", default: "UINT8" },
  output_layout: { type: "string", default: "ZXY" },
  isi_strategy: { type: "string", default: "clustering" },
  "act-sparsity": { type: "string", default: "0" },
  "param-sparsity-enabled": { type: "boolean", default: false },
  "param-sparsity": { type: "string", default: "0" },
  "input-swizzling": { type: "string", default: "0" },
  "param-swizzling": { type: "string", default: "0" },
  "output-swizzling": { type: "string", default: "0" },
  "output-write-tiles": { type: "string", default: "1" },
  quiet: { type: "boolean", short: "q", default: false },
  help: { type: "boolean", short: "h", default: false },
} as const;

export type CliCommand =
  | { help: true }
  | {
      help: false;
      mode: WorkloadMode;
      target: CostTarget;
      model?: string;
      quiet: boolean;
      params: OperationParameters;
    };

function required(name: string, raw: string | undefined): string {
  if (raw === undefined || raw === "") {
    throw new UsageError(`--${name} is required`);
  }
  return raw;
}

function choice<T extends string>(
  name: string,
  values: readonly T[],
  raw: string | undefined,
): T {
  const value = required(name, raw);
  if (!isOneOf(values, value)) {
    throw new UsageError(
      `--${name} must be one of ${values.join(", ")} (got "${value}")`,
    );
  }
  return value;
}

function integer(
  name: string,
  raw: string | undefined,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const text = required(name, raw);
  if (!/^-?\d+$/.test(text)) {
    throw new UsageError(`--${name} must be an integer (got "${text}")`);
  }
  const value = Number.parseInt(text, 10);
  if (value < min || value > max) {
    throw new UsageError(
      `--${name} must be between ${min} and ${max} (got ${value})`,
    );
  }
  return value;
}

function rate(name: string, raw: string | undefined): number {
  const text = required(name, raw);
  const value = Number(text);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new UsageError(
      `--${name} must be a number between 0 and 1 (got "${text}")`,
    );
  }
  return value;
}

function parseValues(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, strict: true }).values;
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const values = parseValues(argv);

  if (values.help) {
    return { help: true };
  }

  const device = choice("device", VPU_DEVICES, values.device?.toUpperCase());
  const params: OperationParameters = {
    device,
    operation: choice("operation", OPERATIONS, values.operation),
    width: integer("width", values.width, 1),
    height: integer("height", values.height, 1),
    inputChannels: integer("input_channels", values.input_channels, 1),
    outputChannels: integer("output_channels", values.output_channels, 1),
    batch: integer("batch", values.batch, 1),
    kernel: integer("kernel", values.kernel, 1),
    padding: integer("padding", values.padding, 0),
    strides: integer("strides", values.strides, 1),
    inputDtype: choice("input_dtype", DATA_TYPES, values.input_dtype),
    outputDtype: choice("output_dtype", DATA_TYPES, values.output_dtype),
    outputLayout: choice("output_layout", LAYOUTS, values.output_layout),
    activation: choice("activation", ACTIVATION_FUNCTIONS, values.activation),
    actSparsity: rate("act-sparsity", values["act-sparsity"]),
    paramSparsityEnabled: values["param-sparsity-enabled"] ?? false,
    paramSparsity: rate("param-sparsity", values["param-sparsity"]),
    inputSwizzling: integer(
      "input-swizzling",
      values["input-swizzling"],
      0,
      MAX_SWIZZLING_KEY,
    ),
    paramSwizzling: integer(
      "param-swizzling",
      values["param-swizzling"],
      0,
      MAX_SWIZZLING_KEY,
    ),
    outputSwizzling: integer(
      "output-swizzling",
      values["output-swizzling"],
      0,
      MAX_SWIZZLING_KEY,
    ),
    isiStrategy: choice(
      "isi_strategy",
      ISI_STRATEGIES,
      values.isi_strategy?.toUpperCase(),
    ),
    outputWriteTiles: integer(
      "output-write-tiles",
      values["output-write-tiles"],
      1,
    ),
    mpeMode: choice("mpe_mode", MPE_MODES, values.mpe_mode),
    nthwNtk: choice("nthw-ntk", NTHW_NTK_MODES, values["nthw-ntk"]),
  };

  return {
    help: false,
    mode: choice("mode", WORKLOAD_MODES, values.mode),
    target: choice("target", COST_TARGETS, values.target),
    // An empty --model means the default path.
    model: values.model || undefined,
    quiet: values.quiet ?? false,
    params,
  };
}
