/**
 * AssemblyProgram - parse once, run against an owned variable table.
 */
import * as fs from "node:fs";
import type * as AST from "./ast.js";
import type { Identifier } from "./ast.js";
import { makeDiag, MinasmSyntaxError } from "./diagnostics.js";
import { parse } from "./parser.js";
import { validate, checkBindings } from "./validator.js";
import type { Bindings } from "./validator.js";
import { execute, createVariableTable, snapshot } from "./evaluator.js";
import type { ExecOptions, ExecResult, VariableTable, Variables } from "./evaluator.js";

export interface ProgramOptions {
  /** Initial values, e.g. { x: 2, y: 5 }. */
  bindings?: Record<Identifier, number>;
  /** Extension instructions enabled cumulatively; -1 (default) enables none. */
  extensionLevel?: number;
  /** Reject bindings for variables the program never uses. */
  strictBindings?: boolean;
  file?: string;
}

export type RunOptions = Omit<ExecOptions, "bindings" | "variables">;

export class AssemblyProgram {
  readonly program: AST.Program;
  readonly extensionLevel: number;
  private readonly initial: Bindings;
  private table: VariableTable;

  private constructor(program: AST.Program, initial: Bindings, extensionLevel: number) {
    this.program = program;
    this.initial = initial;
    this.extensionLevel = extensionLevel;
    this.table = createVariableTable(program, initial);
  }

  /**
   * Parse and validate source text. Throws MinasmSyntaxError on the first
   * problem found.
   */
  static fromSource(source: string, options: ProgramOptions = {}): AssemblyProgram {
    const extensionLevel = options.extensionLevel ?? -1;
    const parsed = parse(source, options.file ?? "<stdin>", { extensionLevel });
    if (parsed.diagnostics.length > 0 || !parsed.program) {
      throw new MinasmSyntaxError(parsed.diagnostics[0] ?? makeDiag("E_SYNTAX", "Parse produced no program."));
    }

    const [numbering] = validate(parsed.program);
    if (numbering) {
      throw new MinasmSyntaxError(numbering);
    }

    const checked = checkBindings(parsed.program, options.bindings, { strict: options.strictBindings });
    if (!checked.bindings) {
      throw new MinasmSyntaxError(checked.diagnostics[0]);
    }

    return new AssemblyProgram(parsed.program, checked.bindings, extensionLevel);
  }

  // File system errors propagate unchanged.
  static load(filePath: string, options: Omit<ProgramOptions, "file"> = {}): AssemblyProgram {
    const source = fs.readFileSync(filePath, "utf-8");
    return AssemblyProgram.fromSource(source, { ...options, file: filePath });
  }

  get instructions(): readonly AST.Instruction[] {
    return this.program.instructions;
  }

  /** Current values; `null` means no value has been assigned. */
  get variables(): Variables {
    return snapshot(this.table);
  }

  /**
   * Execute against the live table. A second run continues from the values
   * left by the first; call reset() to start over.
   */
  run(options: RunOptions = {}): ExecResult {
    return execute(this.program, { ...options, variables: this.table });
  }

  reset(): void {
    this.table = createVariableTable(this.program, this.initial);
  }
}
