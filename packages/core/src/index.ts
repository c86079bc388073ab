/**
 * @tally/core - Tally virtual machine, instruction set and assembler
 */
export * from "./diagnostics.js";
export * from "./instruction.js";
export {
  WORD_MIN,
  WORD_MAX,
  isWord,
  toBool,
  fromBool,
  applyBinary,
  applyUnary,
  wordToJson,
  wordsToJson,
} from "./words.js";
export type { Word, BinaryOperator, UnaryOperator } from "./words.js";
export { VmFault, ProgramError } from "./faults.js";
export type { FaultCode } from "./faults.js";
export { VirtualMachine, DEFAULT_MEMORY_LIMIT, DEFAULT_HEAP_LIMIT } from "./vm.js";
export type {
  VmOptions,
  RunResult,
  MachineState,
  TraceEvent,
  TraceEventType,
  TraceData,
} from "./vm.js";
export { checkStructure, validate } from "./validator.js";
export { assemble } from "./assembler.js";
export type { AssembleResult } from "./assembler.js";
export { format } from "./formatter.js";
export type * as AST from "./ast.js";
export type { Visitor } from "./visitor.js";
export { walkStmt, walkExpr } from "./visitor.js";
export { lower } from "./lower.js";
export type { LowerResult } from "./lower.js";
