/**
 * minasm run - execute programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  AssemblyProgram,
  MinasmSyntaxError,
  MinasmRuntimeError,
  MinasmConfigError,
  formatDiagnostic,
  makeDiag,
  resolveConfig,
} from "@minasm/core";
import type { Config, Diagnostic, TraceEvent } from "@minasm/core";
import { readSource } from "./source.js";

class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export interface RunOpts {
  set?: string[];
  ext?: number;
  maxSteps?: number;
  permissive?: boolean;
  strictBindings?: boolean;
  verbose?: boolean;
  trace?: string;
  pretty?: boolean;
  cwd?: string;
  homeDir?: string;
}

const BINDING = /^([^=\s]+)\s*=\s*(-?\d+)$/;

/**
 * Turn repeated `--set x=3` values into a bindings record.
 */
export function parseBindings(sets: string[]): { bindings?: Record<string, number>; diagnostic?: Diagnostic } {
  const bindings: Record<string, number> = {};
  for (const raw of sets) {
    const m = BINDING.exec(raw.trim());
    if (!m) {
      return {
        diagnostic: makeDiag("E_BINDING", `Invalid binding '${raw}'.`, undefined, "Use --set <name>=<integer>, e.g. --set x=3."),
      };
    }
    bindings[m[1]] = parseInt(m[2], 10);
  }
  return { bindings };
}

export async function runRun(file: string, opts: RunOpts): Promise<number> {
  const pretty = !!opts.pretty;
  const emitDiag = (d: Diagnostic): void => {
    console.error(formatDiagnostic(d, pretty));
  };

  let config: Config;
  try {
    config = resolveConfig(opts.cwd, opts.homeDir).config;
  } catch (e) {
    if (e instanceof MinasmConfigError) {
      emitDiag(e.diagnostic);
      return 2;
    }
    throw e;
  }

  const read = readSource(file);
  if (!read.ok) {
    emitDiag(read.diagnostic);
    return 4;
  }

  const parsedBindings = parseBindings(opts.set ?? []);
  if (parsedBindings.diagnostic) {
    emitDiag(parsedBindings.diagnostic);
    return 2;
  }

  // Parse, validate, check bindings
  let program: AssemblyProgram;
  try {
    program = AssemblyProgram.fromSource(read.source, {
      file,
      bindings: parsedBindings.bindings,
      extensionLevel: opts.ext ?? config.extensionLevel,
      strictBindings: opts.strictBindings || config.strictBindings,
    });
  } catch (e) {
    if (e instanceof MinasmSyntaxError) {
      emitDiag(e.diagnostic);
      return 2;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitDiag({ code: "E_RUNTIME", message: msg });
    return 4;
  }

  // Trace setup
  let traceFd: number | null = null;

  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitDiag({ code: "E_IO", message: `Error opening trace file: ${msg}` });
      return 4;
    }
  }

  let traceHandler: ((event: TraceEvent) => void) | undefined;
  if (traceFd !== null) {
    const fd = traceFd;
    traceHandler = (event: TraceEvent) => {
      try {
        fs.writeSync(fd, JSON.stringify(event) + "\n");
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        throw new CliIoError(`Error writing trace file: ${msg}`);
      }
    };
  }

  // Execute
  try {
    const maxSteps = opts.maxSteps ?? config.maxSteps;
    const result = program.run({
      maxSteps,
      uninitialized: opts.permissive ? "permissive" : config.uninitialized,
      trace: traceHandler,
      runId: crypto.randomUUID(),
      verbose: !!opts.verbose,
      // stdout carries the final variables only
      log: (line) => console.error(line),
    });

    console.log(JSON.stringify(result.variables, null, 2));
    if (result.stepLimitReached) {
      console.error(`warning: step limit of ${maxSteps} reached before 'stop'.`);
    }
    return 0;
  } catch (e) {
    if (e instanceof CliIoError) {
      emitDiag({ code: "E_IO", message: e.message });
      return 4;
    }
    if (e instanceof MinasmRuntimeError) {
      if (pretty) {
        emitDiag({ code: e.code, message: e.message, span: e.span });
      } else {
        console.error(
          JSON.stringify({
            code: e.code,
            message: e.message,
            span: e.span,
            details: e.details,
          })
        );
      }
      return 4;
    }
    const msg = e instanceof Error ? e.message : String(e);
    emitDiag({ code: "E_RUNTIME", message: msg });
    return 4;
  } finally {
    if (traceFd !== null) {
      try {
        fs.closeSync(traceFd);
      } catch (e) {
        const msg = e instanceof Error ? e.message : String(e);
        emitDiag({ code: "E_IO", message: `Error closing trace file: ${msg}` });
      }
    }
  }
}
