import { defaultModelPath, resolveConfig } from "../config";
import { WorkloadDispatcher } from "../dispatch/dispatcher";
import { InvalidGeometryError, OracleError, UsageError } from "../errors";
import {
  ProcessOracle,
  type ProcessOracleOptions,
} from "../oracle/process-oracle";
import type { CostOracle } from "../oracle/types";
import { buildDmaWorkload } from "../workload/descriptor";
import { type CliCommand, parseCliArgs, USAGE } from "./args";

export type CliDeps = {
  env?: NodeJS.ProcessEnv;
  openOracle?: (options: ProcessOracleOptions) => Promise<CostOracle>;
  log?: (line: string) => void;
  warn?: (message: string) => void;
  error?: (message: string) => void;
};

/**
 * Run one query end to end and return the process exit code:
 * 0 on success or help, 1 on a failed query, 2 on a usage error.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.log ?? console.log;
  const warn = deps.warn ?? console.warn;
  const error = deps.error ?? console.error;
  const openOracle = deps.openOracle ?? ProcessOracle.open;

  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      error(`error: ${err.message}`);
      error(USAGE);
      return 2;
    }
    throw err;
  }
  if (command.help) {
    log(USAGE);
    return 0;
  }

  const { mode, target, params } = command;
  const config = resolveConfig(deps.env);
  try {
    if (mode === "DMA") {
      // Bad geometry is reported before the bridge spends time loading a model.
      buildDmaWorkload(params);
    }
    const oracle = await openOracle({
      python: config.python,
      script: config.bridgeScript,
      modelPath: command.model ?? defaultModelPath(config, params.device),
      profile: config.profile,
      verbose: !command.quiet,
      log,
      warn,
    });
    try {
      const dispatcher = new WorkloadDispatcher(oracle, { warn });
      const result = await dispatcher.run(params, mode, target);
      log(`${mode} execution ${target}: ${result}`);
      return 0;
    } finally {
      oracle.close();
    }
  } catch (err) {
    if (err instanceof InvalidGeometryError || err instanceof OracleError) {
      error(`error: ${err.message}`);
      return 1;
    }
    throw err;
  }
}
