/**
 * Program loading for the CLI: assembly text, or a JSON instruction array
 * when the file name ends in .json.
 */
import { z } from "zod";
import { assemble, isOpcode, OPCODES, makeDiag, makeProgramDiag } from "@tally/core";
import type { Diagnostic, Instruction, NullaryOpcode } from "@tally/core";

function isNullaryOpcode(text: string): text is NullaryOpcode {
  return isOpcode(text) && OPCODES[text].immediate === "none";
}

function nullaryMismatch(op: string): string {
  if (!isOpcode(op)) return `Unknown opcode '${op}'.`;
  return OPCODES[op].immediate === "word" ? `'${op}' requires a value.` : `'${op}' requires a target.`;
}

// Words beyond 2^53 must be written as decimal strings.
const wordSchema = z
  .union([
    z.number().int().refine(Number.isSafeInteger, "Integer is not exactly representable; write it as a string."),
    z.string().regex(/^-?\d+$/, "Expected a decimal integer string."),
  ])
  .transform((v) => BigInt(v));

const instructionSchema = z.union(
  [
    z.object({ op: z.literal("loadc"), value: wordSchema }).strict(),
    z.object({ op: z.enum(["jump", "jumpz"]), target: z.number().int() }).strict(),
    z
      .object({
        op: z.string().refine(isNullaryOpcode, (op) => ({ message: nullaryMismatch(op) })),
      })
      .strict(),
  ],
  {
    errorMap: () => ({
      message: "Expected {op: 'loadc', value}, {op: 'jump' | 'jumpz', target} or {op: <mnemonic>}.",
    }),
  }
);

const programSchema = z.array(instructionSchema);

export interface LoadResult {
  program?: Instruction[];
  diagnostics: Diagnostic[];
}

export function isJsonProgram(file: string): boolean {
  return file.toLowerCase().endsWith(".json");
}

export function parseJsonProgram(source: string): LoadResult {
  let data: unknown;
  try {
    data = JSON.parse(source);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { diagnostics: [makeDiag("E_PROGRAM_JSON", `Invalid JSON: ${msg}`)] };
  }

  const parsed = programSchema.safeParse(data);
  if (!parsed.success) {
    const diagnostics = parsed.error.issues.map((issue) => {
      const [index, ...rest] = issue.path;
      const where = rest.length > 0 ? `${rest.join(".")}: ` : "";
      return typeof index === "number"
        ? makeProgramDiag("E_PROGRAM_JSON", where + issue.message, index)
        : makeDiag("E_PROGRAM_JSON", issue.message, undefined, "A program is a JSON array of instructions.");
    });
    return { diagnostics };
  }
  return { program: parsed.data, diagnostics: [] };
}

export function parseProgram(source: string, file: string): LoadResult {
  return isJsonProgram(file) ? parseJsonProgram(source) : assemble(source, file);
}
