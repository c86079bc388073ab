#!/usr/bin/env node
/**
 * tally - Tally virtual machine CLI
 */
import { createRequire } from "node:module";
import { Command, InvalidArgumentError } from "commander";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

function parseStepLimit(value: string): number {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || n <= 0) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return n;
}

const program = new Command();

program
  .name("tally")
  .description("Tally: a stack-based bytecode virtual machine")
  .version(pkg.version);

program
  .command("check")
  .description("Assemble and validate without execution")
  .argument("<file>", "Assembly (.tasm) or instruction array (.json) to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("run")
  .description("Run a Tally program")
  .argument("<file>", "Assembly (.tasm) or instruction array (.json) to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--max-steps <n>", "Fault after this many executed instructions", parseStepLimit)
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { trace?: string; maxSteps?: number; pretty?: boolean }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Canonical assembly formatter")
  .argument("<file>", "Assembly (.tasm) or instruction array (.json) to format")
  .option("--write", "Overwrite file in place", false)
  .action(async (file: string, opts: { write?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective execution limits and their source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["check", "run", "fmt", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync();
