/**
 * minasm Program Validator
 * Checks line numbering and caller-supplied initial bindings before any
 * execution begins.
 */
import { z } from "zod";
import type * as AST from "./ast.js";
import type { Identifier } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";

export type Bindings = Record<Identifier, number>;

const bindingsSchema = z.record(
  z.string().regex(/^[A-Za-z]$/, { message: "variable names are single letters (a-z, A-Z)" }),
  z.number().int({ message: "initial values must be integers" }).safe()
);

/**
 * Line numbers must be exactly 1..N once sorted.
 */
export function validate(program: AST.Program): Diagnostic[] {
  const diags: Diagnostic[] = [];

  for (let i = 0; i < program.instructions.length; i++) {
    const instr = program.instructions[i];
    if (instr.line !== i + 1) {
      diags.push(
        makeDiag(
          "E_NUMBERING",
          `Non-contiguous numbering: expected line ${i + 1}, found line ${instr.line}.`,
          instr.span,
          "Line numbers must range from one upwards and increment by one each time."
        )
      );
      break;
    }
  }

  return diags;
}

export interface BindingCheck {
  bindings?: Bindings;
  diagnostics: Diagnostic[];
}

/**
 * Validate initial bindings. Bindings for identifiers the program never uses
 * are accepted unless `strict` is set.
 */
export function checkBindings(
  program: AST.Program,
  bindings: unknown,
  opts: { strict?: boolean } = {}
): BindingCheck {
  const parsed = bindingsSchema.safeParse(bindings ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? `'${issue.path.join(".")}': ` : "";
    return {
      diagnostics: [
        makeDiag("E_BINDING", `Invalid initial binding ${where}${issue.message}.`, undefined, "Pass bindings such as { x: 3 }.")
      ],
    };
  }

  if (opts.strict) {
    const used = new Set(program.identifiers);
    const unused = Object.keys(parsed.data).filter((name) => !used.has(name)).sort();
    if (unused.length > 0) {
      return {
        diagnostics: [
          makeDiag(
            "E_UNUSED_BINDING",
            `Initial binding for variable(s) not used by the program: ${unused.join(", ")}.`,
            undefined,
            "Remove the binding or disable strict bindings."
          ),
        ],
      };
    }
  }

  return { bindings: parsed.data, diagnostics: [] };
}
