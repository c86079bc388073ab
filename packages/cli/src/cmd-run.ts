/**
 * tally run - execute Tally programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  VirtualMachine,
  validate,
  formatDiagnostics,
  formatDiagnostic,
  makeProgramDiag,
  wordsToJson,
} from "@tally/core";
import type { TraceEvent } from "@tally/core";
import { parseProgram } from "./program-file.js";
import { resolveConfig, ConfigError } from "./config.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

function traceWriter(fd: number): (event: TraceEvent) => void {
  return (event) => {
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      throw new CliIoError(`Error writing trace file: ${msg}`);
    }
  };
}

export interface RunOptions {
  trace?: string;
  maxSteps?: number;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;
  const emitCliError = (code: string, message: string): void => {
    console.error(formatDiagnostic({ code, message }, pretty));
  };

  // Read source
  let source: string;
  try {
    source = fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_IO", `Error reading file: ${msg}`);
    return 4;
  }

  // Assemble
  const loaded = parseProgram(source, file);
  if (loaded.diagnostics.length > 0 || !loaded.program) {
    console.error(formatDiagnostics(loaded.diagnostics, pretty));
    return 2;
  }
  const program = loaded.program;

  // Validate
  const validationDiags = validate(program);
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, pretty));
    return 2;
  }

  // Limits
  let maxSteps: number | undefined;
  let memoryLimit: number;
  let heapLimit: number;
  try {
    const { config } = resolveConfig(opts.cwd, opts.homeDir);
    maxSteps = opts.maxSteps ?? config.maxSteps;
    memoryLimit = config.memoryLimit;
    heapLimit = config.heapLimit;
  } catch (e) {
    if (e instanceof ConfigError) {
      emitCliError("E_CONFIG", e.message);
      return 2;
    }
    throw e;
  }

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`);
      return 4;
    }
  }

  const traceHandler = traceFd !== null ? traceWriter(traceFd) : undefined;

  // Execute
  try {
    const vm = new VirtualMachine(program, {
      maxSteps,
      memoryLimit,
      heapLimit,
      trace: traceHandler,
      runId: crypto.randomUUID(),
    });
    const result = vm.run();

    if (result.status === "faulted") {
      const diag = makeProgramDiag(result.fault.code, result.fault.message, result.at);
      console.error(formatDiagnostic(diag, pretty));
      return 4;
    }

    const state = vm.snapshot();
    console.log(
      JSON.stringify(
        {
          status: result.status,
          steps: result.steps,
          stack: wordsToJson(state.stack),
          memory: wordsToJson(state.memory),
          heap: wordsToJson(state.heap),
        },
        null,
        2
      )
    );
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitCliError("E_IO", e.message);
      return 4;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitCliError("E_RUNTIME", msg);
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitCliError("E_IO", `Error closing trace file: ${msg}`);
      }
    }
  }
}
