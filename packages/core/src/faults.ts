/**
 * Tally error classes: run-time faults and malformed programs.
 */
import type { Diagnostic } from "./diagnostics.js";

export type FaultCode =
  | "E_STACK_UNDERFLOW"
  | "E_FETCH_RANGE"
  | "E_DIV_ZERO"
  | "E_OVERFLOW"
  | "E_ADDRESS"
  | "E_ALLOC"
  | "E_STEP_LIMIT";

export class VmFault extends Error {
  code: FaultCode;

  constructor(code: FaultCode, message: string) {
    super(message);
    this.name = "VmFault";
    this.code = code;
  }
}

export class ProgramError extends Error {
  diagnostics: Diagnostic[];

  constructor(diagnostics: Diagnostic[]) {
    const first = diagnostics[0];
    super(first ? `Malformed program: ${first.message}` : "Malformed program.");
    this.name = "ProgramError";
    this.diagnostics = diagnostics;
  }
}
