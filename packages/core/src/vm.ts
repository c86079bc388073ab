/**
 * Tally virtual machine: fetch-decode-execute over an operand stack,
 * a growable variable memory and a bump-allocated heap.
 */
import type { Instruction, Program } from "./instruction.js";
import { formatInstruction } from "./instruction.js";
import { VmFault, ProgramError } from "./faults.js";
import { checkStructure } from "./validator.js";
import type { Word } from "./words.js";
import { applyBinary, applyUnary, wordsToJson } from "./words.js";

export const DEFAULT_MEMORY_LIMIT = 1 << 20;
export const DEFAULT_HEAP_LIMIT = 1 << 20;

// Longest array a region can be backed by.
const MAX_REGION_LENGTH = 2 ** 32 - 1;

// --- Trace events ---
export type TraceEventType = "run_start" | "step" | "run_end";

export type TraceData = { [key: string]: number | string | null | (number | string)[] };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  data?: TraceData;
}

/**
 * Execution limits. None of them change what a program computes; they only
 * bound how far it may run or grow before faulting. The memory and heap
 * defaults are hardening limits, and `Infinity` lifts either one up to the
 * largest region an array can hold.
 */
export interface VmOptions {
  /** Fault with E_STEP_LIMIT once this many instructions have executed. Positive integer. */
  maxSteps?: number;
  /** Addresses at or above this fault with E_ADDRESS. Non-negative integer or Infinity. */
  memoryLimit?: number;
  /** Total heap words before `new` faults with E_ALLOC. Non-negative integer or Infinity. */
  heapLimit?: number;
  trace?: (event: TraceEvent) => void;
  runId?: string;
}

export type RunResult =
  | { status: "halted"; steps: number }
  | { status: "faulted"; steps: number; fault: VmFault; at: number };

export interface MachineState {
  stack: Word[];
  memory: Word[];
  heap: Word[];
  pc: number;
  steps: number;
}

function growTo(region: Word[], length: number): void {
  const old = region.length;
  if (old < length) {
    region.length = length;
    region.fill(0n, old);
  }
}

function regionLimit(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (value === Infinity) return MAX_REGION_LENGTH;
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`${name} must be a non-negative integer or Infinity, got ${value}.`);
  }
  return Math.min(value, MAX_REGION_LENGTH);
}

function stepLimit(value: number | undefined): number | undefined {
  if (value !== undefined && (!Number.isSafeInteger(value) || value <= 0)) {
    throw new RangeError(`maxSteps must be a positive integer, got ${value}.`);
  }
  return value;
}

export class VirtualMachine {
  private readonly program: Program;
  private readonly stack: Word[] = [];
  private readonly memory: Word[] = [];
  private readonly heap: Word[] = [];
  private pc = 0;
  private steps = 0;
  private started = false;

  private readonly maxSteps?: number;
  private readonly memoryLimit: number;
  private readonly heapLimit: number;
  private readonly traceFn?: (event: TraceEvent) => void;
  private readonly runId: string;

  constructor(program: readonly Instruction[], options: VmOptions = {}) {
    const diags = checkStructure(program);
    if (diags.length > 0) {
      throw new ProgramError(diags);
    }
    this.program = Object.freeze(program.map((ins) => Object.freeze({ ...ins })));
    this.maxSteps = stepLimit(options.maxSteps);
    this.memoryLimit = regionLimit("memoryLimit", options.memoryLimit, DEFAULT_MEMORY_LIMIT);
    this.heapLimit = regionLimit("heapLimit", options.heapLimit, DEFAULT_HEAP_LIMIT);
    this.traceFn = options.trace;
    this.runId = options.runId ?? "run";
  }

  /**
   * Runs until `halt` or the first fault. An instance runs once.
   */
  run(): RunResult {
    if (this.started) {
      throw new Error("VirtualMachine.run() may only be called once per instance.");
    }
    this.started = true;

    this.emitTrace("run_start", { instructions: this.program.length });
    let current = this.pc;
    try {
      for (;;) {
        current = this.pc;
        if (this.maxSteps !== undefined && this.steps >= this.maxSteps) {
          throw new VmFault("E_STEP_LIMIT", `Step limit of ${this.maxSteps} reached.`);
        }
        const ins = this.fetch();
        this.pc++;
        if (this.traceFn) {
          this.emitTrace("step", {
            pc: current,
            instr: formatInstruction(ins),
            stack: wordsToJson(this.stack),
            memory: wordsToJson(this.memory),
          });
        }
        this.steps++;
        if (this.execute(ins)) {
          this.emitTrace("run_end", { status: "halted", steps: this.steps });
          return { status: "halted", steps: this.steps };
        }
      }
    } catch (e) {
      if (!(e instanceof VmFault)) throw e;
      this.emitTrace("run_end", {
        status: "faulted",
        steps: this.steps,
        at: current,
        error: e.code,
        message: e.message,
      });
      return { status: "faulted", steps: this.steps, fault: e, at: current };
    }
  }

  snapshot(): MachineState {
    return {
      stack: [...this.stack],
      memory: [...this.memory],
      heap: [...this.heap],
      pc: this.pc,
      steps: this.steps,
    };
  }

  private fetch(): Instruction {
    const ins = this.program[this.pc];
    if (ins === undefined) {
      throw new VmFault(
        "E_FETCH_RANGE",
        `Program counter ${this.pc} is outside the program (length ${this.program.length}).`
      );
    }
    return ins;
  }

  /** Returns true when the instruction halts the machine. */
  private execute(ins: Instruction): boolean {
    switch (ins.op) {
      case "loadc":
        this.push(ins.value);
        break;
      case "load": {
        const addr = this.address(this.pop());
        growTo(this.memory, addr + 1);
        this.push(this.memory[addr]);
        break;
      }
      case "store": {
        const addr = this.address(this.pop());
        const value = this.top();
        growTo(this.memory, addr + 1);
        this.memory[addr] = value;
        break;
      }
      case "pop":
        this.pop();
        break;
      case "new": {
        const length = this.pop();
        const base = this.heap.length;
        if (length < 0n || Number(length) > this.heapLimit - base) {
          throw new VmFault(
            "E_ALLOC",
            `Cannot allocate ${length} words at heap offset ${base} (limit ${this.heapLimit}).`
          );
        }
        growTo(this.heap, base + Number(length));
        this.push(BigInt(base));
        break;
      }
      case "jump":
        this.pc = ins.target;
        break;
      case "jumpz":
        if (this.pop() === 0n) {
          this.pc = ins.target;
        }
        break;
      case "halt":
        return true;
      case "neg":
      case "not":
        this.push(applyUnary(ins.op, this.pop()));
        break;
      case "add":
      case "sub":
      case "mul":
      case "div":
      case "mod":
      case "and":
      case "or":
      case "eq":
      case "neq":
      case "lt":
      case "le":
      case "gt":
      case "ge": {
        const a = this.pop();
        const b = this.pop();
        this.push(applyBinary(ins.op, b, a));
        break;
      }
      default: {
        const _exhaustive: never = ins;
        throw new Error(`Unknown instruction: ${JSON.stringify(_exhaustive)}`);
      }
    }
    return false;
  }

  private address(w: Word): number {
    if (w < 0n || Number(w) >= this.memoryLimit) {
      throw new VmFault(
        "E_ADDRESS",
        `Address ${w} is outside variable memory (limit ${this.memoryLimit}).`
      );
    }
    return Number(w);
  }

  private push(w: Word): void {
    this.stack.push(w);
  }

  private top(): Word {
    const w = this.stack[this.stack.length - 1];
    if (w === undefined) {
      throw new VmFault("E_STACK_UNDERFLOW", "Operand stack is empty.");
    }
    return w;
  }

  private pop(): Word {
    const w = this.top();
    this.stack.pop();
    return w;
  }

  private emitTrace(event: TraceEventType, data?: TraceData): void {
    if (this.traceFn) {
      this.traceFn({
        ts: new Date().toISOString(),
        runId: this.runId,
        event,
        data,
      });
    }
  }
}
