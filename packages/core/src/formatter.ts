/**
 * minasm Canonical Formatter.
 * Produces deterministic, idempotent output that reparses to the same program.
 */
import type * as AST from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { parse, splitSourceLines } from "./parser.js";
import type { ParseOptions } from "./parser.js";

export function formatInstruction(instr: AST.Instruction): string {
  switch (instr.kind) {
    case "JumpIfZero":
      return `if (${instr.name} == 0) goto ${instr.target}`;
    case "Increment":
      return `${instr.name} = ${instr.name} + 1`;
    case "Decrement":
      return `${instr.name} = ${instr.name} - 1`;
    case "Jump":
      return `goto ${instr.target}`;
    case "Halt":
      return "stop";
    case "SetZero":
      return `${instr.name} = 0`;
    case "Transfer":
      return `${instr.dest} = ${instr.src}`;
    case "Add":
      return `${instr.dest} = ${instr.dest} + ${instr.src}`;
    case "AbsDiff":
      return `${instr.dest} = abs(${instr.lhs} - ${instr.rhs})`;
  }
}

function numbered(instr: AST.Instruction): string {
  return `(${instr.line}) ${formatInstruction(instr)}`;
}

export function format(program: AST.Program): string {
  if (program.instructions.length === 0) return "";
  return program.instructions.map(numbered).join("\n") + "\n";
}

export interface FormatResult {
  output?: string;
  diagnostics: Diagnostic[];
}

interface Block {
  comments: string[];
  instr: AST.Instruction;
}

/**
 * Format a whole source file. Comment lines travel with the instruction below
 * them when lines are reordered; trailing comments stay last.
 */
export function formatSource(
  source: string,
  file: string = "<stdin>",
  options: ParseOptions = {}
): FormatResult {
  const parsed = parse(source, file, options);
  if (!parsed.program) {
    return { diagnostics: parsed.diagnostics };
  }

  // Every non-comment line parsed into exactly one instruction.
  const bySourceLine = new Map<number, AST.Instruction>();
  for (const instr of parsed.program.instructions) {
    bySourceLine.set(instr.span.startLine, instr);
  }

  const blocks: Block[] = [];
  let pending: string[] = [];
  splitSourceLines(source).forEach((raw, i) => {
    const instr = bySourceLine.get(i + 1);
    if (instr) {
      blocks.push({ comments: pending, instr });
      pending = [];
    } else {
      pending.push(raw.trimEnd());
    }
  });
  blocks.sort((a, b) => a.instr.line - b.instr.line);

  const lines = blocks.flatMap((b) => [...b.comments, numbered(b.instr)]).concat(pending);
  return { output: lines.length > 0 ? lines.join("\n") + "\n" : "", diagnostics: [] };
}
