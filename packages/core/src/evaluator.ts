/**
 * minasm Evaluator - executes programs one instruction at a time.
 */
import { randomUUID } from "node:crypto";
import type * as AST from "./ast.js";
import type { Identifier, Span } from "./ast.js";
import type { DiagnosticCode } from "./diagnostics.js";
import { formatInstruction } from "./formatter.js";

// --- Value types ---

/** `null` is "no value", distinct from 0. */
export type Value = number | null;
export type VariableTable = Map<Identifier, Value>;
export type Variables = Record<Identifier, Value>;

export type TraceData = Record<string, string | number | boolean | null>;

// --- Trace events ---
export type TraceEventType = "run_start" | "step" | "step_limit" | "run_end";

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// --- Runtime error ---
export type RuntimeErrorCode = Extract<DiagnosticCode, "E_JUMP_TARGET" | "E_UNINIT" | "E_OVERFLOW">;

export class MinasmRuntimeError extends Error {
  code: RuntimeErrorCode;
  /** Line being executed (for E_JUMP_TARGET: the missing target). */
  line: number;
  span?: Span;
  details?: TraceData;

  constructor(code: RuntimeErrorCode, message: string, line: number, span?: Span, details?: TraceData) {
    super(message);
    this.name = "MinasmRuntimeError";
    this.code = code;
    this.line = line;
    this.span = span;
    this.details = details;
  }
}

// --- Execution context ---

/**
 * `strict` raises E_UNINIT whenever an instruction reads a variable with no
 * value. `permissive` lets Transfer copy the missing value instead.
 */
export type UninitializedMode = "strict" | "permissive";

export const DEFAULT_MAX_STEPS = 300;

export interface ExecOptions {
  /** Initial values; ignored when `variables` is given. */
  bindings?: Record<Identifier, number>;
  /** Live table to run against; mutated in place. */
  variables?: VariableTable;
  maxSteps?: number;
  uninitialized?: UninitializedMode;
  trace?: (event: TraceEvent) => void;
  runId?: string;
  verbose?: boolean;
  log?: (line: string) => void;
}

export interface ExecResult {
  variables: Variables;
  halted: boolean;
  stepLimitReached: boolean;
  steps: number;
  /** Line of the last executed instruction, null if nothing ran. */
  lastLine: number | null;
}

/**
 * Every identifier in the program starts with no value, then the bindings are
 * laid over it. Bindings for names the program never uses are kept.
 */
export function createVariableTable(
  program: AST.Program,
  bindings: Record<Identifier, number> = {}
): VariableTable {
  const table: VariableTable = new Map();
  for (const name of program.identifiers) {
    table.set(name, null);
  }
  for (const [name, value] of Object.entries(bindings)) {
    table.set(name, value);
  }
  return table;
}

export function snapshot(table: VariableTable): Variables {
  const out: Variables = {};
  for (const name of [...table.keys()].sort()) {
    out[name] = table.get(name) ?? null;
  }
  return out;
}

type StepOutcome =
  | { halt: true; effect: string }
  | { halt: false; next: number; effect: string };

function read(
  table: VariableTable,
  name: Identifier,
  instr: AST.Instruction,
  verb: string
): number {
  const value = table.get(name) ?? null;
  if (value === null) {
    throw new MinasmRuntimeError(
      "E_UNINIT",
      `${verb} variable '${name}' which has no value on line ${instr.line}.`,
      instr.line,
      instr.span,
      { variable: name }
    );
  }
  return value;
}

// Values stay exact only within the safe integer range.
function exact(result: number, dest: Identifier, instr: AST.Instruction): number {
  if (!Number.isSafeInteger(result)) {
    throw new MinasmRuntimeError(
      "E_OVERFLOW",
      `Result for variable '${dest}' on line ${instr.line} is outside the exact integer range.`,
      instr.line,
      instr.span,
      { variable: dest, result: String(result) }
    );
  }
  return result;
}

function assign(table: VariableTable, name: Identifier, value: Value, next: number): StepOutcome {
  table.set(name, value);
  return { halt: false, next, effect: `${name} = ${value === null ? "(no value)" : value}` };
}

function step(instr: AST.Instruction, table: VariableTable, mode: UninitializedMode): StepOutcome {
  const next = instr.line + 1;

  switch (instr.kind) {
    case "JumpIfZero":
      if (table.get(instr.name) === 0) {
        return { halt: false, next: instr.target, effect: `jump to ${instr.target}` };
      }
      return { halt: false, next, effect: `continue to ${next}` };

    case "Increment": {
      const value = read(table, instr.name, instr, "Incrementing");
      return assign(table, instr.name, exact(value + 1, instr.name, instr), next);
    }

    case "Decrement": {
      const value = read(table, instr.name, instr, "Decrementing");
      return assign(table, instr.name, exact(value - 1, instr.name, instr), next);
    }

    case "Jump":
      return { halt: false, next: instr.target, effect: `jump to ${instr.target}` };

    case "Halt":
      return { halt: true, effect: "halt" };

    case "SetZero":
      return assign(table, instr.name, 0, next);

    case "Transfer": {
      const value = mode === "permissive"
        ? (table.get(instr.src) ?? null)
        : read(table, instr.src, instr, "Reading");
      return assign(table, instr.dest, value, next);
    }

    case "Add": {
      const dest = read(table, instr.dest, instr, "Adding to");
      const src = read(table, instr.src, instr, "Adding");
      return assign(table, instr.dest, exact(dest + src, instr.dest, instr), next);
    }

    case "AbsDiff": {
      const lhs = read(table, instr.lhs, instr, "Subtracting from");
      const rhs = read(table, instr.rhs, instr, "Subtracting");
      return assign(table, instr.dest, exact(Math.abs(lhs - rhs), instr.dest, instr), next);
    }
  }
}

// --- Evaluator ---

export function execute(program: AST.Program, options: ExecOptions = {}): ExecResult {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps < 0) {
    throw new RangeError(`maxSteps must be a non-negative integer (got ${maxSteps}).`);
  }
  const mode = options.uninitialized ?? "strict";
  const table = options.variables ?? createVariableTable(program, options.bindings);
  const log = options.log ?? ((line: string) => console.log(line));
  const runId = options.trace ? (options.runId ?? randomUUID()) : "";

  const emitTrace = (event: TraceEventType, span?: Span, data?: TraceData) => {
    if (options.trace) {
      options.trace({
        ts: new Date().toISOString(),
        runId,
        event,
        span,
        data,
      });
    }
  };

  const byLine = new Map<number, AST.Instruction>();
  for (const instr of program.instructions) {
    byLine.set(instr.line, instr);
  }

  emitTrace("run_start", undefined, {
    file: program.file,
    instructions: program.instructions.length,
    maxSteps,
  });

  let pc = 1;
  let steps = 0;
  let halted = false;
  let last: AST.Instruction | undefined;

  try {
    while (steps < maxSteps) {
      const instr = byLine.get(pc);
      if (!instr) {
        throw new MinasmRuntimeError(
          "E_JUMP_TARGET",
          `Jumped to line ${pc} which does not exist.`,
          pc,
          last?.span,
          { target: pc, from: last?.line ?? null }
        );
      }

      const outcome = step(instr, table, mode);
      steps++;
      last = instr;

      emitTrace("step", instr.span, { step: steps, line: instr.line, kind: instr.kind, effect: outcome.effect });
      if (options.verbose) {
        log(`${instr.line}: ${formatInstruction(instr)} -> ${outcome.effect}`);
      }

      if (outcome.halt) {
        halted = true;
        break;
      }
      pc = outcome.next;
    }
  } catch (e) {
    const errorData: TraceData = { steps };
    if (e instanceof MinasmRuntimeError) {
      errorData["error"] = e.code;
      errorData["message"] = e.message;
    } else {
      errorData["error"] = "E_RUNTIME";
      errorData["message"] = e instanceof Error ? e.message : String(e);
    }
    emitTrace("run_end", undefined, errorData);
    throw e;
  }

  const stepLimitReached = !halted;
  if (stepLimitReached) {
    emitTrace("step_limit", last?.span, { limit: maxSteps });
    if (options.verbose) {
      log(`Step limit of ${maxSteps} reached; stopping.`);
    }
  }
  emitTrace("run_end", undefined, { steps, halted, stepLimitReached });

  return {
    variables: snapshot(table),
    halted,
    stepLimitReached,
    steps,
    lastLine: last?.line ?? null,
  };
}
