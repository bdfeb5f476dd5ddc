/**
 * Tests for mathterm check.
 */
import { describe, it, before, after } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runCheck } from "./cmd-check.js";
import type { CheckOptions } from "./cmd-check.js";

async function captureCheck(
  expression: string | undefined,
  opts: CheckOptions
): Promise<{ code: number; stdout: string; stderr: string }> {
  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runCheck(expression, opts);
    return { code, stdout: out.join("\n"), stderr: err.join("\n") };
  } finally {
    console.log = origLog;
    console.error = origError;
  }
}

describe("mathterm check", () => {
  let tmpDir: string;

  before(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mathterm-cli-check-"));
  });

  after(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("prints an empty diagnostic list for valid input", async () => {
    const result = await captureCheck("x + 1", { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 0);
    assert.equal(result.stdout, "[]");
  });

  it("names the accepting grammar with --pretty", async () => {
    const result = await captureCheck("a or b", { cwd: tmpDir, homeDir: tmpDir, pretty: true });
    assert.equal(result.stdout, "No errors found (bool grammar).");
  });

  it("reports one diagnostic per attempted grammar", async () => {
    const result = await captureCheck("1 +", { cwd: tmpDir, homeDir: tmpDir });
    assert.equal(result.code, 2);
    const diags = JSON.parse(result.stderr) as { code: string; message: string }[];
    assert.deepEqual(
      diags.map((d) => d.message.split(":")[0]),
      ["term grammar", "bool grammar", "list grammar"]
    );
    assert.ok(diags.every((d) => d.code === "E_PARSE"));
  });

  it("points at the location in pretty mode", async () => {
    const result = await captureCheck("1 # 2", { cwd: tmpDir, homeDir: tmpDir, grammar: "term", pretty: true });
    assert.equal(result.code, 2);
    assert.equal(
      result.stderr,
      "error[E_LEX]: term grammar: Unexpected character '#'\n  --> <input>:1:3\n  hint: Check syntax near this location."
    );
  });
});
