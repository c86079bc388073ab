/**
 * tally fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { format, formatDiagnostics, formatDiagnostic } from "@tally/core";
import { isJsonProgram, parseProgram } from "./program-file.js";

export async function runFmt(file: string, opts: { write?: boolean }): Promise<number> {
  let source: string;
  try {
    source = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error reading file: ${msg}` }, true));
    return 4;
  }

  const loaded = parseProgram(source, file);
  if (loaded.diagnostics.length > 0 || !loaded.program) {
    console.error(formatDiagnostics(loaded.diagnostics, true));
    return 2;
  }

  if (opts.write && isJsonProgram(file)) {
    console.error(
      formatDiagnostic({ code: "E_IO", message: "Refusing to overwrite a JSON program with assembly." }, true)
    );
    return 4;
  }

  if (!isJsonProgram(file) && source.includes("#")) {
    console.error("warning: formatting will remove comments from the output.");
  }

  const formatted = format(loaded.program);

  try {
    if (opts.write) {
      fs.writeFileSync(file, formatted, "utf-8");
    } else {
      process.stdout.write(formatted);
    }
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic({ code: "E_IO", message: `Error writing file: ${msg}` }, true));
    return 4;
  }

  return 0;
}
