/**
 * Tally instruction set.
 */
import type { BinaryOperator, UnaryOperator, Word } from "./words.js";

export type JumpOpcode = "jump" | "jumpz";

export type NullaryOpcode =
  | "load"
  | "store"
  | "pop"
  | "new"
  | "halt"
  | BinaryOperator
  | UnaryOperator;

export type Opcode = "loadc" | JumpOpcode | NullaryOpcode;

export type Instruction =
  | { readonly op: "loadc"; readonly value: Word }
  | { readonly op: JumpOpcode; readonly target: number }
  | { readonly op: NullaryOpcode };

export type Program = readonly Instruction[];

export type ImmediateKind = "word" | "target" | "none";

export interface OpcodeInfo {
  immediate: ImmediateKind;
  pops: number;
  pushes: number;
  summary: string;
}

export const OPCODES: Readonly<Record<Opcode, OpcodeInfo>> = {
  loadc: { immediate: "word", pops: 0, pushes: 1, summary: "push a constant" },
  load: { immediate: "none", pops: 1, pushes: 1, summary: "push memory[address]" },
  store: { immediate: "none", pops: 1, pushes: 0, summary: "memory[address] := top, top stays" },
  pop: { immediate: "none", pops: 1, pushes: 0, summary: "discard the top" },
  new: { immediate: "none", pops: 1, pushes: 1, summary: "allocate a zeroed heap block, push its base" },
  jump: { immediate: "target", pops: 0, pushes: 0, summary: "continue at target" },
  jumpz: { immediate: "target", pops: 1, pushes: 0, summary: "continue at target if the popped value is 0" },
  halt: { immediate: "none", pops: 0, pushes: 0, summary: "stop successfully" },
  add: { immediate: "none", pops: 2, pushes: 1, summary: "b + a" },
  sub: { immediate: "none", pops: 2, pushes: 1, summary: "b - a" },
  mul: { immediate: "none", pops: 2, pushes: 1, summary: "b * a" },
  div: { immediate: "none", pops: 2, pushes: 1, summary: "b / a, truncated" },
  mod: { immediate: "none", pops: 2, pushes: 1, summary: "b % a" },
  and: { immediate: "none", pops: 2, pushes: 1, summary: "b && a" },
  or: { immediate: "none", pops: 2, pushes: 1, summary: "b || a" },
  eq: { immediate: "none", pops: 2, pushes: 1, summary: "b == a" },
  neq: { immediate: "none", pops: 2, pushes: 1, summary: "b != a" },
  lt: { immediate: "none", pops: 2, pushes: 1, summary: "b < a" },
  le: { immediate: "none", pops: 2, pushes: 1, summary: "b <= a" },
  gt: { immediate: "none", pops: 2, pushes: 1, summary: "b > a" },
  ge: { immediate: "none", pops: 2, pushes: 1, summary: "b >= a" },
  neg: { immediate: "none", pops: 1, pushes: 1, summary: "-a" },
  not: { immediate: "none", pops: 1, pushes: 1, summary: "!a" },
};

export const MNEMONICS: readonly Opcode[] = Object.keys(OPCODES).filter(isOpcode);

export function isOpcode(text: string): text is Opcode {
  return Object.prototype.hasOwnProperty.call(OPCODES, text);
}

// --- Constructors ---

export function loadc(value: Word | number): Instruction {
  return { op: "loadc", value: BigInt(value) };
}

export function jump(target: number): Instruction {
  return { op: "jump", target };
}

export function jumpz(target: number): Instruction {
  return { op: "jumpz", target };
}

export function op(name: NullaryOpcode): Instruction {
  return { op: name };
}

export function formatInstruction(ins: Instruction): string {
  switch (ins.op) {
    case "loadc":
      return `loadc ${ins.value}`;
    case "jump":
    case "jumpz":
      return `${ins.op} ${ins.target}`;
    default:
      return ins.op;
  }
}
