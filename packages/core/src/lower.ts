/**
 * Tally lowering pass: AST statements to an instruction sequence.
 *
 * Variables live in memory slots assigned in order of first declaration.
 * There is no block scoping and no call instruction, so functions are rejected.
 */
import type * as AST from "./ast.js";
import type { Instruction } from "./instruction.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import type { Visitor } from "./visitor.js";
import { walkExpr, walkStmt } from "./visitor.js";
import type { BinaryOperator, UnaryOperator } from "./words.js";
import { isWord } from "./words.js";

const BINARY_OPCODES: Record<AST.BinaryOp, BinaryOperator> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "mod",
  "&&": "and",
  "||": "or",
  "==": "eq",
  "!=": "neq",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
};

const UNARY_OPCODES: Record<AST.UnaryOp, UnaryOperator> = {
  "-": "neg",
  "!": "not",
};

class Lowerer implements Visitor {
  readonly code: Instruction[] = [];
  readonly diagnostics: Diagnostic[] = [];
  private readonly slots = new Map<string, number>();

  visitStmt(s: AST.Stmt): void {
    switch (s.kind) {
      case "BlockStmt":
        walkStmt(this, s);
        return;
      case "DeclarationStmt": {
        this.visitExpr(s.value);
        let slot = this.slots.get(s.name);
        if (slot === undefined) {
          slot = this.slots.size;
          this.slots.set(s.name, slot);
        }
        this.emitStore(slot);
        return;
      }
      case "AssignmentStmt": {
        if (s.target.kind !== "Identifier") {
          this.diagnostics.push(
            makeDiag(
              "E_LVALUE",
              `Cannot assign to a ${s.target.kind}.`,
              s.target.span ?? s.span,
              "Only variables can be assigned."
            )
          );
          return;
        }
        const slot = this.resolve(s.target);
        this.visitExpr(s.value);
        if (slot !== undefined) this.emitStore(slot);
        return;
      }
      case "IfStmt": {
        this.visitExpr(s.test);
        const skipThen = this.emit({ op: "jumpz", target: 0 });
        this.visitStmt(s.then);
        if (s.else) {
          const skipElse = this.emit({ op: "jump", target: 0 });
          this.patch(skipThen);
          this.visitStmt(s.else);
          this.patch(skipElse);
        } else {
          this.patch(skipThen);
        }
        return;
      }
      case "WhileStmt": {
        const top = this.code.length;
        this.visitExpr(s.test);
        const exit = this.emit({ op: "jumpz", target: 0 });
        this.visitStmt(s.body);
        this.emit({ op: "jump", target: top });
        this.patch(exit);
        return;
      }
      case "ForStmt": {
        // for (init; test; update) body  ==  init; while (test) { body; update }
        this.visitStmt(s.init);
        const top = this.code.length;
        this.visitExpr(s.test);
        const exit = this.emit({ op: "jumpz", target: 0 });
        this.visitStmt(s.body);
        this.visitStmt(s.update);
        this.emit({ op: "jump", target: top });
        this.patch(exit);
        return;
      }
      case "ReturnStmt":
        walkStmt(this, s);
        this.emit({ op: "halt" });
        return;
      case "FunDeclStmt":
        this.diagnostics.push(
          makeDiag(
            "E_UNSUPPORTED",
            `Function '${s.name}' cannot be lowered: the machine has no call instruction.`,
            s.span
          )
        );
        return;
    }
  }

  visitExpr(e: AST.Expr): void {
    switch (e.kind) {
      case "Identifier": {
        const slot = this.resolve(e);
        if (slot !== undefined) {
          this.emit({ op: "loadc", value: BigInt(slot) });
          this.emit({ op: "load" });
        }
        return;
      }
      case "IntLiteral":
        if (!isWord(e.value)) {
          this.diagnostics.push(
            makeDiag("E_RANGE", `Literal ${e.value} is outside the 64-bit word range.`, e.span)
          );
          return;
        }
        this.emit({ op: "loadc", value: e.value });
        return;
      case "BoolLiteral":
        this.emit({ op: "loadc", value: e.value ? 1n : 0n });
        return;
      case "BinaryExpr":
        walkExpr(this, e);
        this.emit({ op: BINARY_OPCODES[e.op] });
        return;
      case "UnaryExpr":
        walkExpr(this, e);
        this.emit({ op: UNARY_OPCODES[e.op] });
        return;
      case "FunCallExpr":
        this.diagnostics.push(
          makeDiag(
            "E_UNSUPPORTED",
            `Call to '${e.name}' cannot be lowered: the machine has no call instruction.`,
            e.span
          )
        );
        return;
    }
  }

  private resolve(id: AST.Identifier): number | undefined {
    const slot = this.slots.get(id.name);
    if (slot === undefined) {
      this.diagnostics.push(
        makeDiag("E_UNBOUND", `Unbound name '${id.name}'.`, id.span, "Declare variables before use.")
      );
    }
    return slot;
  }

  // Statement-level store: the stored value stays on the stack, so drop it.
  private emitStore(slot: number): void {
    this.emit({ op: "loadc", value: BigInt(slot) });
    this.emit({ op: "store" });
    this.emit({ op: "pop" });
  }

  private emit(ins: Instruction): number {
    this.code.push(ins);
    return this.code.length - 1;
  }

  /** Points the jump at `index` to the next instruction to be emitted. */
  private patch(index: number): void {
    const ins = this.code[index];
    if (ins.op !== "jump" && ins.op !== "jumpz") {
      throw new Error(`Cannot patch non-jump instruction at ${index}`);
    }
    this.code[index] = { op: ins.op, target: this.code.length };
  }
}

export interface LowerResult {
  program?: Instruction[];
  diagnostics: Diagnostic[];
}

export function lower(statements: AST.Stmt[]): LowerResult {
  const lowerer = new Lowerer();
  for (const stmt of statements) {
    lowerer.visitStmt(stmt);
  }
  lowerer.code.push({ op: "halt" });

  if (lowerer.diagnostics.length > 0) {
    return { diagnostics: lowerer.diagnostics };
  }
  return { program: lowerer.code, diagnostics: [] };
}
