/**
 * Tests for tally check command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";

async function captureCheck(
  file: string,
  opts: { pretty?: boolean }
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(file, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("tally check", () => {
  it("prints [] on success by default", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tally-cli-check-test-"));
    const filePath = path.join(tmpDir, "ok.tasm");
    fs.writeFileSync(filePath, "  loadc 1\n  halt\n", "utf-8");

    try {
      const result = await captureCheck(filePath, {});
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "[]");
      assert.equal(result.stderr, "");
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("prints a summary with --pretty", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tally-cli-check-test-"));
    const filePath = path.join(tmpDir, "ok.json");
    fs.writeFileSync(filePath, JSON.stringify([{ op: "loadc", value: 1 }, { op: "halt" }]), "utf-8");

    try {
      const result = await captureCheck(filePath, { pretty: true });
      assert.equal(result.code, 0);
      assert.equal(result.stdout, "No errors found (2 instructions).");
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("reports assembly and validation errors with exit 2", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "tally-cli-check-test-"));
    const asmPath = path.join(tmpDir, "bad.tasm");
    const emptyPath = path.join(tmpDir, "empty.tasm");
    fs.writeFileSync(asmPath, "  halt 3\n", "utf-8");
    fs.writeFileSync(emptyPath, "# nothing here\n", "utf-8");

    try {
      const asm = await captureCheck(asmPath, {});
      assert.equal(asm.code, 2);
      assert.equal(asm.stdout, "");
      assert.equal((JSON.parse(asm.stderr) as Array<{ code: string }>)[0].code, "E_OPERAND");

      const empty = await captureCheck(emptyPath, { pretty: true });
      assert.equal(empty.code, 2);
      assert.equal(
        empty.stderr,
        "error[E_EMPTY]: Program has no instructions.\n  --> <unknown>\n  hint: End every program with 'halt'."
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("returns 4 when the file cannot be read", async () => {
    const result = await captureCheck(path.join(os.tmpdir(), "tally-does-not-exist.tasm"), {});
    assert.equal(result.code, 4);
    assert.equal((JSON.parse(result.stderr) as { code: string }).code, "E_IO");
  });
});
