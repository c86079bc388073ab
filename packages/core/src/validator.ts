/**
 * Tally program validator.
 * Checks instruction sequences for well-formedness before they are run.
 */
import type { Instruction } from "./instruction.js";
import { OPCODES, isOpcode } from "./instruction.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeProgramDiag } from "./diagnostics.js";
import { isWord } from "./words.js";

/**
 * Structural checks that do not depend on the program length.
 * The engine refuses programs that fail these.
 */
export function checkStructure(program: readonly Instruction[]): Diagnostic[] {
  const diags: Diagnostic[] = [];

  program.forEach((ins, i) => {
    // Programs may come from untyped input, so read fields loosely.
    const raw: Record<string, unknown> = { ...ins };
    const op = raw["op"];
    if (typeof op !== "string" || !isOpcode(op)) {
      diags.push(
        makeProgramDiag("E_OPCODE", `Unknown opcode '${String(op)}'.`, i)
      );
      return;
    }

    const info = OPCODES[op];
    if (info.immediate === "word") {
      const value = raw["value"];
      if (typeof value !== "bigint") {
        diags.push(
          makeProgramDiag(
            "E_IMMEDIATE",
            `'${op}' requires an integer value.`,
            i,
            "Build constants with loadc(value)."
          )
        );
      } else if (!isWord(value)) {
        diags.push(
          makeProgramDiag("E_RANGE", `Constant ${value} is outside the 64-bit word range.`, i)
        );
      }
    }

    if (info.immediate === "target") {
      const target = raw["target"];
      if (target === undefined) {
        diags.push(
          makeProgramDiag("E_IMMEDIATE", `'${op}' requires a jump target.`, i)
        );
      } else if (typeof target !== "number" || !Number.isInteger(target) || target < 0) {
        diags.push(
          makeProgramDiag(
            "E_TARGET",
            `Jump target must be a non-negative instruction index, found ${String(target)}.`,
            i
          )
        );
      }
    }
  });

  return diags;
}

export function validate(program: readonly Instruction[]): Diagnostic[] {
  const diags = checkStructure(program);

  if (program.length === 0) {
    diags.push({
      code: "E_EMPTY",
      message: "Program has no instructions.",
      hint: "End every program with 'halt'.",
    });
  }

  program.forEach((ins, i) => {
    if ((ins.op === "jump" || ins.op === "jumpz") && Number.isInteger(ins.target) && ins.target >= program.length) {
      diags.push(
        makeProgramDiag(
          "E_JUMP_RANGE",
          `Jump target ${ins.target} is past the last instruction (${program.length - 1}).`,
          i
        )
      );
    }
  });

  return diags;
}
