/**
 * Tally assembler using Chevrotain.
 * Turns line-oriented assembly text into an instruction sequence.
 */
import { CstParser, type IToken, type CstNode } from "chevrotain";
import { allTokens, Colon, Ident, IntLit, Mnemonic, Newline, TallyLexer } from "./lexer.js";
import type { Instruction } from "./instruction.js";
import { OPCODES, isOpcode } from "./instruction.js";
import type { Diagnostic, Span } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { isWord } from "./words.js";

class TallyCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.MANY(() => {
      this.SUBRULE(this.line);
    });
  });

  line = this.RULE("line", () => {
    this.MANY(() => {
      this.SUBRULE(this.label);
    });
    this.OPTION(() => {
      this.SUBRULE(this.instruction);
    });
    this.CONSUME(Newline);
  });

  label = this.RULE("label", () => {
    this.CONSUME(Ident);
    this.CONSUME(Colon);
  });

  instruction = this.RULE("instruction", () => {
    this.CONSUME(Mnemonic);
    this.OPTION(() => {
      this.SUBRULE(this.operand);
    });
  });

  operand = this.RULE("operand", () => {
    this.OR([
      { ALT: () => this.CONSUME(IntLit) },
      { ALT: () => this.CONSUME(Ident) },
    ]);
  });
}

// Singleton parser instance
const cstParser = new TallyCstParser();

// --- CST to source lines ---

interface AsmOperand {
  kind: "int" | "label";
  token: IToken;
}

interface AsmInstruction {
  mnemonic: IToken;
  operand?: AsmOperand;
}

interface AsmLine {
  labels: IToken[];
  instruction?: AsmInstruction;
}

function pos(n: number | undefined): number {
  return n !== undefined && Number.isFinite(n) ? n : 1;
}

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: pos(token.startLine),
    startCol: pos(token.startColumn),
    endLine: pos(token.endLine),
    endCol: pos(token.endColumn) + 1,
  };
}

function firstToken(cst: CstNode, key: string): IToken | undefined {
  const tokens = cst.children[key] as IToken[] | undefined;
  return tokens?.[0];
}

function firstNode(cst: CstNode, key: string): CstNode | undefined {
  const nodes = cst.children[key] as CstNode[] | undefined;
  return nodes?.[0];
}

function visitProgram(cst: CstNode): AsmLine[] {
  const lines = (cst.children["line"] as CstNode[] | undefined) ?? [];
  return lines.map(visitLine);
}

function visitLine(cst: CstNode): AsmLine {
  const labels = ((cst.children["label"] as CstNode[] | undefined) ?? [])
    .map((l) => firstToken(l, "Ident"))
    .filter((t): t is IToken => t !== undefined);
  const instrNode = firstNode(cst, "instruction");
  return { labels, instruction: instrNode ? visitInstruction(instrNode) : undefined };
}

function visitInstruction(cst: CstNode): AsmInstruction {
  const mnemonic = firstToken(cst, "Mnemonic");
  if (!mnemonic) {
    throw new Error("Instruction without mnemonic");
  }
  const operandNode = firstNode(cst, "operand");
  if (!operandNode) {
    return { mnemonic };
  }
  const intTok = firstToken(operandNode, "IntLit");
  if (intTok) {
    return { mnemonic, operand: { kind: "int", token: intTok } };
  }
  const labelTok = firstToken(operandNode, "Ident");
  if (!labelTok) {
    throw new Error("Operand without token");
  }
  return { mnemonic, operand: { kind: "label", token: labelTok } };
}

// --- Label resolution and encoding ---

function collectLabels(
  lines: AsmLine[],
  file: string,
  diagnostics: Diagnostic[]
): Map<string, number> {
  const labels = new Map<string, number>();
  let index = 0;
  for (const line of lines) {
    for (const tok of line.labels) {
      if (labels.has(tok.image)) {
        diagnostics.push(
          makeDiag(
            "E_DUP_LABEL",
            `Label '${tok.image}' is already defined.`,
            tokenSpan(tok, file),
            "Each label may be defined once."
          )
        );
        continue;
      }
      labels.set(tok.image, index);
    }
    if (line.instruction) index++;
  }
  return labels;
}

function resolveOperand(
  operand: AsmOperand,
  labels: Map<string, number>,
  file: string,
  diagnostics: Diagnostic[]
): bigint | undefined {
  const tok = operand.token;
  if (operand.kind === "label") {
    const target = labels.get(tok.image);
    if (target === undefined) {
      diagnostics.push(
        makeDiag("E_UNKNOWN_LABEL", `Unknown label '${tok.image}'.`, tokenSpan(tok, file))
      );
      return undefined;
    }
    return BigInt(target);
  }
  const value = BigInt(tok.image);
  if (!isWord(value)) {
    diagnostics.push(
      makeDiag(
        "E_RANGE",
        `Constant ${tok.image} is outside the 64-bit word range.`,
        tokenSpan(tok, file)
      )
    );
    return undefined;
  }
  return value;
}

function encode(
  instr: AsmInstruction,
  labels: Map<string, number>,
  file: string,
  diagnostics: Diagnostic[]
): Instruction | undefined {
  const name = instr.mnemonic.image;
  if (!isOpcode(name)) {
    diagnostics.push(
      makeDiag("E_PARSE", `Unknown mnemonic '${name}'.`, tokenSpan(instr.mnemonic, file))
    );
    return undefined;
  }

  if (name !== "loadc" && name !== "jump" && name !== "jumpz") {
    if (instr.operand) {
      diagnostics.push(
        makeDiag(
          "E_OPERAND",
          `'${name}' takes no operand.`,
          tokenSpan(instr.operand.token, file)
        )
      );
      return undefined;
    }
    return { op: name };
  }

  if (!instr.operand) {
    const wanted = OPCODES[name].immediate === "word" ? "a constant" : "a jump target";
    diagnostics.push(
      makeDiag("E_OPERAND", `'${name}' requires ${wanted}.`, tokenSpan(instr.mnemonic, file))
    );
    return undefined;
  }

  const value = resolveOperand(instr.operand, labels, file, diagnostics);
  if (value === undefined) return undefined;

  if (name === "loadc") {
    return { op: "loadc", value };
  }
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    diagnostics.push(
      makeDiag(
        "E_TARGET",
        `Jump target must be a non-negative instruction index, found ${value}.`,
        tokenSpan(instr.operand.token, file)
      )
    );
    return undefined;
  }
  return { op: name, target: Number(value) };
}

// --- Public API ---

export interface AssembleResult {
  program?: Instruction[];
  diagnostics: Diagnostic[];
}

export function assemble(source: string, file: string = "<stdin>"): AssembleResult {
  const text = source.endsWith("\n") ? source : source + "\n";
  const lexResult = TallyLexer.tokenize(text);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: pos(err.line),
          startCol: pos(err.column),
          endLine: pos(err.line),
          endCol: pos(err.column) + (err.length ?? 1),
        },
        "Check for invalid characters or malformed numbers."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.program();

  for (const err of cstParser.errors) {
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        tokenSpan(err.token, file),
        "Write one instruction per line, optionally preceded by 'label:'."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  const lines = visitProgram(cst);
  const labels = collectLabels(lines, file, diagnostics);
  const program: Instruction[] = [];
  for (const line of lines) {
    if (!line.instruction) continue;
    const ins = encode(line.instruction, labels, file, diagnostics);
    if (ins) program.push(ins);
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }
  return { program, diagnostics: [] };
}
