/**
 * Tally canonical formatter (disassembler).
 * Produces deterministic assembly that reassembles to the same program.
 */
import type { Instruction } from "./instruction.js";

const INDENT = "  ";

function labelFor(target: number): string {
  return `L${target}`;
}

export function format(program: readonly Instruction[]): string {
  const targets = new Set<number>();
  for (const ins of program) {
    if (ins.op === "jump" || ins.op === "jumpz") {
      targets.add(ins.target);
    }
  }

  const lines: string[] = [];
  program.forEach((ins, i) => {
    if (targets.has(i)) {
      lines.push(`${labelFor(i)}:`);
    }
    lines.push(INDENT + formatOperation(ins));
  });

  // Any target at or past the end reassembles to the program length.
  const trailing = [...targets].filter((t) => t >= program.length).sort((a, b) => a - b);
  if (trailing.length > 0) {
    lines.push(trailing.map((t) => `${labelFor(t)}:`).join(" "));
  }

  return lines.join("\n") + "\n";
}

function formatOperation(ins: Instruction): string {
  switch (ins.op) {
    case "loadc":
      return `loadc ${ins.value}`;
    case "jump":
    case "jumpz":
      return `${ins.op} ${labelFor(ins.target)}`;
    default:
      return ins.op;
  }
}
