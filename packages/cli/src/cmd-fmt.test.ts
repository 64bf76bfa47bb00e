/**
 * Tests for minasm fmt command.
 */
import { describe, it, beforeEach, afterEach } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runFmt } from "./cmd-fmt.js";

async function capture(fn: () => Promise<number>): Promise<{ code: number; stdout: string; err: string[] }> {
  const origWrite = process.stdout.write;
  const origError = console.error;
  let stdout = "";
  const err: string[] = [];
  process.stdout.write = (chunk: string | Uint8Array): boolean => {
    stdout += typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf-8");
    return true;
  };
  console.error = (...args: unknown[]) => {
    err.push(args.map(String).join(" "));
  };
  try {
    const code = await fn();
    return { code, stdout, err };
  } finally {
    process.stdout.write = origWrite;
    console.error = origError;
  }
}

describe("minasm fmt", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "minasm-cli-fmt-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeProgram(source: string): string {
    const file = path.join(tmpDir, "prog.minasm");
    fs.writeFileSync(file, source, "utf-8");
    return file;
  }

  it("prints the canonical layout with comments in place", async () => {
    const file = writeProgram("// done\n(2)   stop\n// test x\n(1) if (x == 0) goto 02\n");
    const res = await capture(() => runFmt(file, {}));

    assert.equal(res.code, 0);
    assert.equal(res.stdout, "// test x\n(1) if (x == 0) goto 2\n// done\n(2) stop\n");
    assert.deepEqual(res.err, []);
  });

  it("rewrites the file with --write", async () => {
    const file = writeProgram("(1)  x = x + 1\r\n(2) z = abs(x - y)  \r\n// tail\r\n(3) stop");
    const res = await capture(() => runFmt(file, { write: true }));

    assert.equal(res.code, 0);
    assert.equal(res.stdout, "");
    assert.equal(
      fs.readFileSync(file, "utf-8"),
      "(1) x = x + 1\n(2) z = abs(x - y)\n// tail\n(3) stop\n"
    );
  });

  it("exits 1 with --check when the layout would change", async () => {
    const source = "(2) stop\n(1) x = 0\n";
    const file = writeProgram(source);
    const res = await capture(() => runFmt(file, { check: true }));

    assert.equal(res.code, 1);
    assert.deepEqual(res.err, [`${file}: not in canonical layout`]);
    assert.equal(fs.readFileSync(file, "utf-8"), source);
  });

  it("exits 0 with --check on a canonical file", async () => {
    const file = writeProgram("// clear\n(1) x = 0\n(2) stop\n");
    const res = await capture(() => runFmt(file, { check: true }));

    assert.equal(res.code, 0);
    assert.equal(res.stdout, "");
    assert.deepEqual(res.err, []);
  });

  it("leaves the file untouched on a parse error", async () => {
    const source = "(1) x=x+1\n";
    const file = writeProgram(source);
    const res = await capture(() => runFmt(file, { write: true }));

    assert.equal(res.code, 2);
    assert.equal(res.err[0].startsWith("error[E_SYNTAX]: No matching instruction could be found for the line: x=x+1"), true);
    assert.equal(fs.readFileSync(file, "utf-8"), source);
  });

  it("refuses --write for stdin", async () => {
    const res = await capture(() => runFmt("-", { write: true }));

    assert.equal(res.code, 4);
    assert.equal(res.err[0].startsWith("error[E_IO]: Cannot use --write with stdin."), true);
  });

  it("returns 4 when the file cannot be read", async () => {
    const res = await capture(() => runFmt(path.join(tmpDir, "missing.minasm"), {}));

    assert.equal(res.code, 4);
    assert.equal(res.err[0].startsWith("error[E_IO]: Error reading file: "), true);
  });
});
