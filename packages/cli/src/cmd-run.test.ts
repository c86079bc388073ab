/**
 * Tests for tally run command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { createRequire, syncBuiltinESMExports } from "node:module";
import { runRun } from "./cmd-run.js";
import type { RunOptions } from "./cmd-run.js";

const require = createRequire(import.meta.url);

async function captureRun(
  file: string,
  opts: RunOptions
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runRun(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

function withTmpDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tally-cli-run-test-"));
  return fn(tmpDir).finally(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });
}

const LOOP = "loop:\n  jump loop\n";

describe("tally run", () => {
  it("prints the final machine state after halt", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "sum.tasm");
      fs.writeFileSync(programPath, "  loadc 2\n  loadc 3\n  add\n  loadc 0\n  store\n  halt\n", "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.equal(result.stderr, "");
      assert.deepEqual(JSON.parse(result.stdout), {
        status: "halted",
        steps: 6,
        stack: [5],
        memory: [5],
        heap: [],
      });
    });
  });

  it("runs JSON instruction arrays with large words as strings", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "big.json");
      fs.writeFileSync(
        programPath,
        JSON.stringify([{ op: "loadc", value: "9223372036854775807" }, { op: "loadc", value: 1 }, { op: "new" }, { op: "halt" }]),
        "utf-8"
      );

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        status: "halted",
        steps: 4,
        stack: ["9223372036854775807", 0],
        memory: [],
        heap: [0],
      });
    });
  });

  it("exits 2 with diagnostics when assembly fails", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "bad.tasm");
      fs.writeFileSync(programPath, "  jump nowhere\n", "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 2);
      assert.equal(result.stdout, "");
      const diags = JSON.parse(result.stderr) as Array<{ code: string }>;
      assert.deepEqual(diags.map((d) => d.code), ["E_UNKNOWN_LABEL"]);
    });
  });

  it("exits 2 when validation fails", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "range.tasm");
      fs.writeFileSync(programPath, "  jump 5\n  halt\n", "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 2);
      const diags = JSON.parse(result.stderr) as Array<{ code: string; at?: number }>;
      assert.deepEqual(diags, [
        { code: "E_JUMP_RANGE", message: "Jump target 5 is past the last instruction (1).", at: 0 },
      ]);
    });
  });

  it("exits 4 and reports the faulting instruction", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "div.tasm");
      fs.writeFileSync(programPath, "  loadc 1\n  loadc 0\n  div\n  halt\n", "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.equal(result.stdout, "");
      assert.equal(result.stderr, '{"code":"E_DIV_ZERO","message":"Division by zero.","at":2}');
    });
  });

  it("formats faults for humans with --pretty", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "pop.tasm");
      fs.writeFileSync(programPath, "  pop\n  halt\n", "utf-8");

      const result = await captureRun(programPath, { pretty: true, cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.equal(result.stderr, "error[E_STACK_UNDERFLOW]: Operand stack is empty.\n  --> instruction 0");
    });
  });

  it("stops runaway programs with --max-steps", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "loop.tasm");
      fs.writeFileSync(programPath, LOOP, "utf-8");

      const result = await captureRun(programPath, { maxSteps: 10, cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.equal(result.stderr, '{"code":"E_STEP_LIMIT","message":"Step limit of 10 reached.","at":0}');
    });
  });

  it("takes the step limit from project configuration unless overridden", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "loop.tasm");
      fs.writeFileSync(programPath, LOOP, "utf-8");
      fs.writeFileSync(path.join(dir, ".tallyrc.json"), JSON.stringify({ maxSteps: 3 }), "utf-8");

      const fromConfig = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(fromConfig.code, 4);
      assert.equal(JSON.parse(fromConfig.stderr).message, "Step limit of 3 reached.");

      const fromFlag = await captureRun(programPath, { maxSteps: 5, cwd: dir, homeDir: dir });
      assert.equal(JSON.parse(fromFlag.stderr).message, "Step limit of 5 reached.");
    });
  });

  it("applies configured memory limits", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "store.tasm");
      fs.writeFileSync(programPath, "  loadc 7\n  loadc 4\n  store\n  halt\n", "utf-8");
      fs.writeFileSync(path.join(dir, ".tallyrc.json"), JSON.stringify({ memoryLimit: 4 }), "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.equal(JSON.parse(result.stderr).code, "E_ADDRESS");
    });
  });

  it("exits 2 when the configuration file is invalid", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "ok.tasm");
      fs.writeFileSync(programPath, "  halt\n", "utf-8");
      fs.writeFileSync(path.join(dir, ".tallyrc.json"), "{ not json", "utf-8");

      const result = await captureRun(programPath, { cwd: dir, homeDir: dir });
      assert.equal(result.code, 2);
      assert.equal(JSON.parse(result.stderr).code, "E_CONFIG");
    });
  });

  it("exits 4 when the program file is missing", async () => {
    await withTmpDir(async (dir) => {
      const result = await captureRun(path.join(dir, "missing.tasm"), { cwd: dir, homeDir: dir });
      assert.equal(result.code, 4);
      assert.equal(JSON.parse(result.stderr).code, "E_IO");
    });
  });

  it("writes a JSONL trace of every step", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "push.tasm");
      const tracePath = path.join(dir, "trace.jsonl");
      fs.writeFileSync(programPath, "  loadc 4\n  halt\n", "utf-8");

      const result = await captureRun(programPath, { trace: tracePath, cwd: dir, homeDir: dir });
      assert.equal(result.code, 0);

      const events = fs
        .readFileSync(tracePath, "utf-8")
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line) as { runId: string; event: string; data?: Record<string, unknown> });
      assert.deepEqual(events.map((e) => e.event), ["run_start", "step", "step", "run_end"]);
      assert.equal(new Set(events.map((e) => e.runId)).size, 1);
      assert.deepEqual(events[2].data, { pc: 1, instr: "halt", stack: [4], memory: [] });
      assert.deepEqual(events[3].data, { status: "halted", steps: 2 });
    });
  });

  it("returns E_IO when trace write fails after trace file is opened", async () => {
    await withTmpDir(async (dir) => {
      const programPath = path.join(dir, "ok.tasm");
      const tracePath = path.join(dir, "trace.jsonl");
      fs.writeFileSync(programPath, "  halt\n", "utf-8");

      const fsCjs = require("fs") as typeof import("node:fs");
      const originalWriteSync = fsCjs.writeSync;

      fsCjs.writeSync = (() => {
        throw new Error("simulated trace write failure");
      }) as typeof fsCjs.writeSync;
      syncBuiltinESMExports();

      try {
        const result = await captureRun(programPath, { trace: tracePath, cwd: dir, homeDir: dir });
        assert.equal(result.code, 4);
        assert.equal(
          result.stderr,
          '{"code":"E_IO","message":"Error writing trace file: simulated trace write failure"}'
        );
      } finally {
        fsCjs.writeSync = originalWriteSync;
        syncBuiltinESMExports();
      }
    });
  });
});
