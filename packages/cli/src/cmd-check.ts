/**
 * tally check - static validation command
 */
import * as fs from "node:fs";
import { validate, formatDiagnostics, formatDiagnostic } from "@tally/core";
import { parseProgram } from "./program-file.js";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, !!opts.pretty));
    return 4;
  }

  const loaded = parseProgram(source, file);
  if (loaded.diagnostics.length > 0 || !loaded.program) {
    console.error(formatDiagnostics(loaded.diagnostics, !!opts.pretty));
    return 2;
  }

  const validationDiags = validate(loaded.program);
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, !!opts.pretty));
    return 2;
  }

  if (opts.pretty) {
    console.log(`No errors found (${loaded.program.length} instructions).`);
  } else {
    console.log("[]");
  }
  return 0;
}
