/**
 * Runtime configuration, read from the environment.
 *
 * VPUCOST_PYTHON         interpreter hosting the cost-model binding
 * VPUCOST_BRIDGE_SCRIPT  bridge script spawned under that interpreter
 * VPUCOST_MODEL_DIR      directory holding `<device>.vpunn` model files
 * VPUCOST_PROFILE=1      ask the binding to profile inference
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import type { VPUDevice } from "./workload/types";

// src/ when run from sources, dist/ when bundled; both sit one level down.
const packageRoot = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "..",
);

export type CostConfig = {
  python: string;
  bridgeScript: string;
  modelDir: string;
  profile: boolean;
};

function findPython(cwd: string): string {
  const candidates = [
    path.resolve(cwd, ".venv", "bin", "python"),
    path.resolve(cwd, ".venv", "Scripts", "python.exe"),
  ];
  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return "python3";
}

export function resolveConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): CostConfig {
  return {
    python: env.VPUCOST_PYTHON || findPython(cwd),
    bridgeScript:
      env.VPUCOST_BRIDGE_SCRIPT ||
      path.resolve(packageRoot, "tools", "vpu_oracle", "vpu_oracle.py"),
    modelDir: env.VPUCOST_MODEL_DIR || path.resolve(packageRoot, "models"),
    profile: env.VPUCOST_PROFILE === "1",
  };
}

export function defaultModelPath(config: CostConfig, device: VPUDevice): string {
  return path.join(config.modelDir, `${device.toLowerCase()}.vpunn`);
}
