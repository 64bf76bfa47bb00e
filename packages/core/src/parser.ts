/**
 * minasm source loader.
 * Splits source text into "(N) statement" lines, skips comments and hands each
 * statement body to the recognizer.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { identifiersOf } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import { Recognizer } from "./recognizer.js";

const LINE_MARKER = /^\((\d+)\) (.*)$/;

export interface ParseOptions {
  /** -1 (default) enables no extension instructions. */
  extensionLevel?: number;
}

export interface ParseResult {
  program?: AST.Program;
  diagnostics: Diagnostic[];
}

// Recognizers are stateless, so one per extension level is enough.
const recognizers = new Map<number, Recognizer>();

function recognizerFor(extensionLevel: number): Recognizer {
  let recognizer = recognizers.get(extensionLevel);
  if (!recognizer) {
    recognizer = new Recognizer(extensionLevel);
    recognizers.set(extensionLevel, recognizer);
  }
  return recognizer;
}

function lineSpan(file: string, sourceLine: number, startCol: number, endCol: number): Span {
  return { file, startLine: sourceLine, startCol, endLine: sourceLine, endCol };
}

export function splitSourceLines(source: string): string[] {
  const lines = source.split("\n").map((l) => (l.endsWith("\r") ? l.slice(0, -1) : l));
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function parse(
  source: string,
  file: string = "<stdin>",
  options: ParseOptions = {}
): ParseResult {
  const recognizer = recognizerFor(options.extensionLevel ?? -1);
  const byLine = new Map<number, AST.Instruction>();
  const lines = splitSourceLines(source);

  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const sourceLine = i + 1;

    if (raw.startsWith("//")) continue;

    const marker = LINE_MARKER.exec(raw);
    if (!marker) {
      return {
        diagnostics: [
          makeDiag(
            "E_LINE_NUMBER",
            "Missing line number.",
            lineSpan(file, sourceLine, 1, raw.length + 1),
            "Every instruction line starts with '(N) ', e.g. '(1) stop'."
          ),
        ],
      };
    }

    const line = parseInt(marker[1], 10);
    const body = marker[2];
    const bodyStart = raw.length - body.length + 1;

    if (byLine.has(line)) {
      return {
        diagnostics: [
          makeDiag(
            "E_DUP_LINE",
            `Duplicate line number ${line}.`,
            lineSpan(file, sourceLine, 1, bodyStart),
            "Each line number may appear only once."
          ),
        ],
      };
    }

    const leading = body.length - body.trimStart().length;
    const statement = body.trim();
    const span = lineSpan(file, sourceLine, bodyStart + leading, bodyStart + leading + statement.length);
    const result = recognizer.recognize(line, statement, span);
    if (!result.ok) {
      return { diagnostics: [result.diagnostic] };
    }
    byLine.set(line, result.instruction);
  }

  const instructions = [...byLine.values()].sort((a, b) => a.line - b.line);
  const identifiers = new Set<string>();
  for (const instr of instructions) {
    for (const name of identifiersOf(instr)) {
      identifiers.add(name);
    }
  }

  return {
    program: {
      kind: "Program",
      file,
      instructions,
      identifiers: [...identifiers].sort(),
    },
    diagnostics: [],
  };
}
