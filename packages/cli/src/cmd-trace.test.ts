/**
 * Tests for minasm trace summary.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runTrace, summarizeTrace } from "./cmd-trace.js";

function event(ts: string, name: string, data?: Record<string, unknown>): string {
  return JSON.stringify({ ts, runId: "run-1", event: name, data });
}

const HALTED = [
  event("2024-01-01T00:00:00.000Z", "run_start", { file: "p.minasm", instructions: 2, maxSteps: 300 }),
  event("2024-01-01T00:00:00.010Z", "step", { step: 1, line: 1, kind: "SetZero", effect: "x = 0" }),
  event("2024-01-01T00:00:00.020Z", "step", { step: 2, line: 2, kind: "Halt", effect: "halt" }),
  event("2024-01-01T00:00:00.025Z", "run_end", { steps: 2, halted: true, stepLimitReached: false }),
].join("\n");

describe("summarizeTrace", () => {
  it("summarizes a halted run", () => {
    const summary = summarizeTrace(HALTED + "\n");
    assert.deepEqual(summary, {
      runId: "run-1",
      totalEvents: 4,
      malformedLines: 0,
      steps: 2,
      instructionsByKind: { SetZero: 1, Halt: 1 },
      outcome: "halted",
      lastLine: 2,
      startTime: "2024-01-01T00:00:00.000Z",
      endTime: "2024-01-01T00:00:00.025Z",
      durationMs: 25,
    });
  });

  it("reports a run stopped by the step limit", () => {
    const content = [
      event("2024-01-01T00:00:00.000Z", "run_start"),
      event("2024-01-01T00:00:00.001Z", "step", { step: 1, line: 1, kind: "Jump", effect: "jump to 1" }),
      event("2024-01-01T00:00:00.002Z", "step_limit", { limit: 1 }),
      event("2024-01-01T00:00:00.003Z", "run_end", { steps: 1, halted: false, stepLimitReached: true }),
    ].join("\n");

    const summary = summarizeTrace(content);
    assert.equal(summary?.outcome, "step_limit");
    assert.equal(summary?.steps, 1);
  });

  it("reports the error code of a failed run", () => {
    const content = [
      event("2024-01-01T00:00:00.000Z", "run_start"),
      event("2024-01-01T00:00:00.001Z", "run_end", { steps: 0, error: "E_UNINIT", message: "boom" }),
    ].join("\n");

    const summary = summarizeTrace(content);
    assert.equal(summary?.outcome, "error");
    assert.equal(summary?.error, "E_UNINIT");
  });

  it("counts malformed lines and marks a truncated trace incomplete", () => {
    const content = [event("2024-01-01T00:00:00.000Z", "run_start"), "{ truncated"].join("\n");

    const summary = summarizeTrace(content);
    assert.equal(summary?.malformedLines, 1);
    assert.equal(summary?.totalEvents, 1);
    assert.equal(summary?.outcome, "incomplete");
    assert.equal(summary?.durationMs, undefined);
  });

  it("returns null when no line parses", () => {
    assert.equal(summarizeTrace("\n\nnot json\n"), null);
  });
});

describe("minasm trace", () => {
  async function capture(fn: () => Promise<number>): Promise<{ code: number; out: string[]; err: string[] }> {
    const origLog = console.log;
    const origError = console.error;
    const out: string[] = [];
    const err: string[] = [];
    console.log = (...args: unknown[]) => {
      out.push(args.map(String).join(" "));
    };
    console.error = (...args: unknown[]) => {
      err.push(args.map(String).join(" "));
    };
    try {
      const code = await fn();
      return { code, out, err };
    } finally {
      console.log = origLog;
      console.error = origError;
    }
  }

  function withTraceFile<T>(content: string, fn: (file: string) => Promise<T>): Promise<T> {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "minasm-cli-trace-test-"));
    const file = path.join(tmpDir, "trace.jsonl");
    fs.writeFileSync(file, content, "utf-8");
    return fn(file).finally(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });
  }

  it("prints a text summary", async () => {
    const res = await withTraceFile(HALTED, (file) => capture(() => runTrace(file, {})));

    assert.equal(res.code, 0);
    assert.deepEqual(res.out, [
      "Trace Summary",
      "  Run ID:          run-1",
      "  Total events:    4",
      "  Steps:           2",
      "  Instructions:",
      "    SetZero: 1",
      "    Halt: 1",
      "  Outcome:         halted",
      "  Last line:       2",
      "  Duration:        25ms",
    ]);
  });

  it("prints JSON with --json", async () => {
    const res = await withTraceFile(HALTED, (file) => capture(() => runTrace(file, { json: true })));

    assert.equal(res.code, 0);
    const parsed = JSON.parse(res.out.join("\n"));
    assert.equal(parsed.outcome, "halted");
    assert.equal(parsed.steps, 2);
  });

  it("returns 4 for a trace with no events", async () => {
    const res = await withTraceFile("", (file) => capture(() => runTrace(file, {})));

    assert.equal(res.code, 4);
    assert.deepEqual(res.err, ["No valid trace events found."]);
  });

  it("returns 4 when the file cannot be read", async () => {
    const res = await capture(() => runTrace(path.join(os.tmpdir(), "minasm-no-such-trace.jsonl"), {}));

    assert.equal(res.code, 4);
    assert.equal(res.err[0].startsWith("Error reading trace file: "), true);
  });
});
