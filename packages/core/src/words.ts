/**
 * Tally word arithmetic: signed 64-bit integers carried as bigint.
 */
import { VmFault } from "./faults.js";

export type Word = bigint;

export const WORD_MIN: Word = -(1n << 63n);
export const WORD_MAX: Word = (1n << 63n) - 1n;

export type BinaryOperator =
  | "add" | "sub" | "mul" | "div" | "mod"
  | "and" | "or"
  | "eq" | "neq" | "lt" | "le" | "gt" | "ge";

export type UnaryOperator = "neg" | "not";

export function isWord(v: bigint): boolean {
  return v >= WORD_MIN && v <= WORD_MAX;
}

function checked(result: bigint, op: string): Word {
  if (!isWord(result)) {
    throw new VmFault("E_OVERFLOW", `Integer overflow in '${op}'.`);
  }
  return result;
}

// Only exactly 1 counts as true. Other non-zero words are false.
export function toBool(w: Word): boolean {
  return w === 1n;
}

export function fromBool(b: boolean): Word {
  return b ? 1n : 0n;
}

/**
 * Applies a binary operator with `lhs` being the second-popped operand.
 */
export function applyBinary(op: BinaryOperator, lhs: Word, rhs: Word): Word {
  switch (op) {
    case "add":
      return checked(lhs + rhs, op);
    case "sub":
      return checked(lhs - rhs, op);
    case "mul":
      return checked(lhs * rhs, op);
    case "div":
      if (rhs === 0n) throw new VmFault("E_DIV_ZERO", "Division by zero.");
      return checked(lhs / rhs, op);
    case "mod":
      if (rhs === 0n) throw new VmFault("E_DIV_ZERO", "Modulo by zero.");
      // bigint remainder of MIN by -1 is 0, but the quotient overflows
      if (lhs === WORD_MIN && rhs === -1n) {
        throw new VmFault("E_OVERFLOW", `Integer overflow in '${op}'.`);
      }
      return lhs % rhs;
    case "and":
      return fromBool(toBool(lhs) && toBool(rhs));
    case "or":
      return fromBool(toBool(lhs) || toBool(rhs));
    case "eq":
      return fromBool(lhs === rhs);
    case "neq":
      return fromBool(lhs !== rhs);
    case "lt":
      return fromBool(lhs < rhs);
    case "le":
      return fromBool(lhs <= rhs);
    case "gt":
      return fromBool(lhs > rhs);
    case "ge":
      return fromBool(lhs >= rhs);
  }
}

export function applyUnary(op: UnaryOperator, v: Word): Word {
  switch (op) {
    case "neg":
      return checked(-v, op);
    case "not":
      return fromBool(!toBool(v));
  }
}

/**
 * JSON-safe rendering: safe integers as numbers, anything larger as a decimal string.
 */
export function wordToJson(w: Word): number | string {
  const n = Number(w);
  return Number.isSafeInteger(n) ? n : w.toString();
}

export function wordsToJson(ws: readonly Word[]): (number | string)[] {
  return ws.map(wordToJson);
}
