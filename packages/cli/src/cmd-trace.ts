/**
 * minasm trace - trace summary command
 */
import * as fs from "node:fs";

interface TraceLine {
  ts: string;
  runId: string;
  event: string;
  span?: unknown;
  data?: Record<string, unknown>;
}

export type TraceOutcome = "halted" | "step_limit" | "error" | "incomplete";

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  malformedLines: number;
  steps: number;
  instructionsByKind: Record<string, number>;
  outcome: TraceOutcome;
  error?: string;
  lastLine?: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

export function summarizeTrace(content: string): TraceSummary | null {
  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let malformedLines = 0;

  for (const line of lines) {
    try {
      events.push(JSON.parse(line) as TraceLine);
    } catch {
      malformedLines++;
    }
  }

  if (events.length === 0) return null;

  const summary: TraceSummary = {
    runId: events[0].runId,
    totalEvents: events.length,
    malformedLines,
    steps: 0,
    instructionsByKind: {},
    outcome: "incomplete",
  };

  for (const ev of events) {
    const data = ev.data ?? {};
    if (ev.event === "run_start") {
      summary.startTime = ev.ts;
    }
    if (ev.event === "step") {
      summary.steps++;
      const kind = typeof data["kind"] === "string" ? data["kind"] : "unknown";
      summary.instructionsByKind[kind] = (summary.instructionsByKind[kind] ?? 0) + 1;
      if (typeof data["line"] === "number") {
        summary.lastLine = data["line"];
      }
    }
    if (ev.event === "step_limit") {
      summary.outcome = "step_limit";
    }
    if (ev.event === "run_end") {
      summary.endTime = ev.ts;
      if (typeof data["error"] === "string") {
        summary.outcome = "error";
        summary.error = data["error"];
      } else if (data["halted"] === true) {
        summary.outcome = "halted";
      } else if (data["stepLimitReached"] === true) {
        summary.outcome = "step_limit";
      }
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  return summary;
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const summary = summarizeTrace(content);
  if (!summary) {
    console.error("No valid trace events found.");
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`Trace Summary`);
    console.log(`  Run ID:          ${summary.runId}`);
    console.log(`  Total events:    ${summary.totalEvents}`);
    console.log(`  Steps:           ${summary.steps}`);
    if (Object.keys(summary.instructionsByKind).length > 0) {
      console.log(`  Instructions:`);
      for (const [kind, count] of Object.entries(summary.instructionsByKind)) {
        console.log(`    ${kind}: ${count}`);
      }
    }
    console.log(`  Outcome:         ${summary.outcome}${summary.error ? ` (${summary.error})` : ""}`);
    if (summary.lastLine !== undefined) {
      console.log(`  Last line:       ${summary.lastLine}`);
    }
    if (summary.malformedLines > 0) {
      console.log(`  Malformed lines: ${summary.malformedLines}`);
    }
    if (summary.durationMs !== undefined) {
      console.log(`  Duration:        ${summary.durationMs}ms`);
    }
  }

  return 0;
}
