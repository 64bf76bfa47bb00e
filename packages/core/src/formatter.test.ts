/**
 * Tests for the minasm canonical formatter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { format, formatInstruction, formatSource } from "./formatter.js";
import type * as AST from "./ast.js";

function programOf(src: string): AST.Program {
  const pr = parse(src, "test.asm", { extensionLevel: 2 });
  assert.ok(pr.program, `parse failed: ${JSON.stringify(pr.diagnostics)}`);
  return pr.program;
}

describe("minasm Formatter", () => {
  it("prints every instruction kind canonically", () => {
    const program = programOf(
      [
        "(1) if (a == 0) goto 09",
        "(2)   b = b + 1",
        "(3) c = c - 1  ",
        "(4) goto 1",
        "(5) stop",
        "(6) d = 0",
        "(7) e = f",
        "(8) g = g + h",
        "(9) \ti = abs(j - k)",
      ].join("\n")
    );
    assert.deepEqual(program.instructions.map(formatInstruction), [
      "if (a == 0) goto 9",
      "b = b + 1",
      "c = c - 1",
      "goto 1",
      "stop",
      "d = 0",
      "e = f",
      "g = g + h",
      "i = abs(j - k)",
    ]);
  });

  it("orders lines by number and drops comments", () => {
    const out = format(programOf("// loop\n(2) goto 1\n(1)   x = x + 1"));
    assert.equal(out, "(1) x = x + 1\n(2) goto 1\n");
  });

  it("normalizes leading zeros in jump targets", () => {
    assert.equal(format(programOf("(1) goto 001")), "(1) goto 1\n");
  });

  it("is idempotent", () => {
    const once = format(programOf("(1) if (x == 0) goto 3\n(2) y = x\n(3) stop"));
    const twice = format(programOf(once));
    assert.equal(twice, once);
  });

  it("reparses to the same instructions", () => {
    const program = programOf("(1) z = abs(x - y)\n(2) x = x + z\n(3) stop");
    const reparsed = programOf(format(program));
    assert.deepEqual(
      reparsed.instructions.map(({ span: _span, ...rest }) => rest),
      program.instructions.map(({ span: _span, ...rest }) => rest)
    );
  });

  it("formats an empty program as an empty string", () => {
    assert.equal(format(programOf("")), "");
  });
});

describe("minasm formatSource", () => {
  it("keeps comments attached to the instruction below them", () => {
    const result = formatSource("// count up\n(2) goto 1\n// entry\n(1)   x = x + 1  \n// end   \n");
    assert.deepEqual(result.diagnostics, []);
    assert.equal(result.output, "// entry\n(1) x = x + 1\n// count up\n(2) goto 1\n// end\n");
  });

  it("is idempotent", () => {
    const once = formatSource("(2) stop\n// first\n(1) goto 02\n");
    assert.equal(once.output, "// first\n(1) goto 2\n(2) stop\n");
    assert.equal(formatSource(once.output ?? "").output, once.output);
  });

  it("keeps a file of comments only", () => {
    assert.equal(formatSource("// nothing yet\n").output, "// nothing yet\n");
    assert.equal(formatSource("").output, "");
  });

  it("returns parse diagnostics instead of output", () => {
    const result = formatSource("(1) x=x+1\n", "loop.asm");
    assert.equal(result.output, undefined);
    assert.equal(result.diagnostics.length, 1);
    assert.equal(result.diagnostics[0].code, "E_SYNTAX");
  });

  it("accepts extension instructions only at their level", () => {
    assert.equal(formatSource("(1) x = y\n").output, undefined);
    assert.equal(formatSource("(1) x = y\n", "t.asm", { extensionLevel: 0 }).output, "(1) x = y\n");
  });
});
