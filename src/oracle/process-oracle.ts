import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import fs from "node:fs";
import type { Readable, Writable } from "node:stream";

import { OracleError } from "../errors";
import {
  type DmaWorkload,
  type DpuWorkload,
  type Workload,
  toOracleArguments,
} from "../workload/descriptor";
import { describeWorkload } from "./describe";
import type { BindingMethod, CostOracle } from "./types";

/** The slice of a child process the bridge talks to. */
export interface BridgeProcess extends EventEmitter {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnBridge = (command: string, args: string[]) => BridgeProcess;

export type ProcessOracleOptions = {
  python: string;
  script: string;
  modelPath: string;
  profile?: boolean;
  /** Log each descriptor before querying it. */
  verbose?: boolean;
  spawn?: SpawnBridge;
  log?: (line: string) => void;
  warn?: (message: string) => void;
};

type PendingRequest = {
  resolve: (value: number) => void;
  reject: (error: Error) => void;
};

const spawnPython: SpawnBridge = (command, args) =>
  spawn(command, args, { stdio: ["pipe", "pipe", "pipe"] });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseJsonLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}

/**
 * Decode one response line from the bridge.
 * `{"ok": true, "value": n}` yields `n`; anything else throws.
 */
export function parseOracleResponse(line: string): number {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new OracleError(
      `Oracle returned invalid JSON: ${err instanceof Error ? err.message : String(err)}\n${line}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new OracleError(`Oracle returned an unexpected response: ${line}`);
  }
  if (parsed.ok !== true) {
    const detail =
      typeof parsed.error === "string" ? parsed.error : "Unknown error";
    throw new OracleError(`Oracle query failed: ${detail}`);
  }
  if (typeof parsed.value !== "number") {
    throw new OracleError(`Oracle returned a non-numeric value: ${line}`);
  }
  return parsed.value;
}

/**
 * Cost oracle hosted by a persistent Python child process.
 *
 * The bridge announces itself with one `{"ready": true, "initialized": bool}`
 * line, then answers one JSON line per request, in request order. A model
 * that failed to load still answers (the binding falls back to its
 * simplistic estimates); that state is fixed at `open()` and reported by
 * `isDegraded()`.
 */
export class ProcessOracle implements CostOracle {
  private readonly proc: BridgeProcess;
  private readonly log: (line: string) => void;
  private readonly warn: (message: string) => void;
  private readonly verbose: boolean;
  private ready = false;
  private closed = false;
  private degraded = false;
  private buffer = "";
  private stderr = "";
  private pending: PendingRequest[] = [];
  private readonly started: Promise<void>;
  private settleStartup: {
    resolve: () => void;
    reject: (error: Error) => void;
  } | null = null;

  private constructor(options: ProcessOracleOptions) {
    this.log = options.log ?? console.log;
    this.warn = options.warn ?? console.warn;
    this.verbose = options.verbose ?? false;

    const args = [options.script, "--model", options.modelPath];
    if (options.profile) {
      args.push("--profile");
    }

    this.started = new Promise<void>((resolve, reject) => {
      this.settleStartup = { resolve, reject };
    });

    const proc = (options.spawn ?? spawnPython)(options.python, args);
    this.proc = proc;
    proc.stdout.on("data", this.onData);
    proc.stderr.on("data", (chunk: Buffer | string) => {
      this.stderr += chunk.toString();
    });
    proc.stdin.on("error", this.onStdinError);
    proc.on("error", this.onError);
    proc.on("close", this.onClose);
  }

  static async open(options: ProcessOracleOptions): Promise<ProcessOracle> {
    const warn = options.warn ?? console.warn;
    if (!fs.existsSync(options.modelPath)) {
      warn(`WARNING: file ${options.modelPath} does not exist`);
    }

    const oracle = new ProcessOracle(options);
    try {
      await oracle.started;
    } catch (err) {
      oracle.close();
      throw err;
    }
    if (oracle.degraded) {
      warn("WARNING: VPUNN model not initialized... using simplistic model");
    }
    return oracle;
  }

  isDegraded(): boolean {
    return this.degraded;
  }

  computeCycles(workload: DpuWorkload): Promise<number> {
    return this.query("DPU", workload);
  }

  computeActivityFactor(workload: DpuWorkload): Promise<number> {
    return this.query("DPUActivityFactor", workload);
  }

  computeUtilization(workload: DpuWorkload): Promise<number> {
    return this.query("hw_utilization", workload);
  }

  dataMovementCycles(workload: DmaWorkload): Promise<number> {
    return this.query("DMA", workload);
  }

  dataMovementPower(workload: DmaWorkload): Promise<number> {
    return this.query("DMAPower", workload);
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.proc.stdin.end();
      this.proc.kill();
    }
    this.failStartup(new OracleError("Oracle bridge shut down"));
    this.rejectAll(new OracleError("Oracle bridge shut down"));
  }

  private query(method: BindingMethod, workload: Workload): Promise<number> {
    const args = toOracleArguments(workload);
    if (this.verbose) {
      for (const line of describeWorkload(args)) {
        this.log(line);
      }
    }
    if (this.closed) {
      return Promise.reject(new OracleError("Oracle bridge is closed"));
    }

    return new Promise<number>((resolve, reject) => {
      const request: PendingRequest = { resolve, reject };
      this.pending.push(request);
      const line =
        JSON.stringify({ method, kind: workload.kind, workload: args }) + "\n";
      this.proc.stdin.write(line, (err) => {
        if (err) {
          const idx = this.pending.indexOf(request);
          if (idx !== -1) this.pending.splice(idx, 1);
          reject(
            new OracleError(`Failed to write to oracle bridge: ${err.message}`),
          );
        }
      });
    });
  }

  private onData = (chunk: Buffer | string) => {
    this.buffer += chunk.toString();
    while (true) {
      const nlIdx = this.buffer.indexOf("\n");
      if (nlIdx === -1) break;

      const line = this.buffer.slice(0, nlIdx);
      this.buffer = this.buffer.slice(nlIdx + 1);
      if (!line.trim()) continue;

      if (this.ready) {
        this.handleResponse(line);
      } else {
        this.handleReady(line);
      }
    }
  };

  private handleReady(line: string) {
    const parsed = parseJsonLine(line);
    if (isRecord(parsed) && parsed.ready === true) {
      this.ready = true;
      this.degraded = parsed.initialized !== true;
      const settle = this.settleStartup;
      this.settleStartup = null;
      settle?.resolve();
      return;
    }
    this.failStartup(
      new OracleError(
        `Oracle bridge sent unexpected startup message: ${line}. stderr: ${this.stderr}`,
      ),
    );
  }

  private handleResponse(line: string) {
    // Stray output (a native library printing to stdout) must not consume a
    // pending request; every protocol line is a JSON object.
    if (!isRecord(parseJsonLine(line))) {
      this.warn(`Ignoring non-protocol output from oracle bridge: ${line}`);
      return;
    }
    const request = this.pending.shift();
    if (!request) return;
    try {
      request.resolve(parseOracleResponse(line));
    } catch (err) {
      request.reject(
        err instanceof Error ? err : new OracleError(String(err)),
      );
    }
  }

  private onError = (err: Error) => {
    this.closed = true;
    this.failStartup(
      new OracleError(`Failed to start oracle bridge: ${err.message}`),
    );
    this.rejectAll(new OracleError(`Oracle bridge error: ${err.message}`));
  };

  // A broken pipe also reaches each write callback; this covers the
  // stream-level event so it never goes unhandled.
  private onStdinError = (err: Error) => {
    this.rejectAll(
      new OracleError(`Failed to write to oracle bridge: ${err.message}`),
    );
  };

  private onClose = (code: number | null) => {
    this.closed = true;
    this.failStartup(
      new OracleError(
        `Oracle bridge exited during startup (code ${code}). ${this.stderr}`,
      ),
    );
    this.rejectAll(
      new OracleError(`Oracle bridge exited unexpectedly (code ${code})`),
    );
  };

  private failStartup(error: Error) {
    const settle = this.settleStartup;
    this.settleStartup = null;
    settle?.reject(error);
  }

  private rejectAll(error: Error) {
    for (const request of this.pending.splice(0)) {
      request.reject(error);
    }
  }
}
