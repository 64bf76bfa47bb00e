/**
 * minasm check - static validation command
 */
import {
  parse,
  validate,
  resolveConfig,
  formatDiagnostics,
  formatDiagnostic,
  MinasmConfigError,
} from "@minasm/core";
import { readSource } from "./source.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; ext?: number; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;

  let extensionLevel: number;
  try {
    extensionLevel = opts.ext ?? resolveConfig(opts.cwd, opts.homeDir).config.extensionLevel;
  } catch (e) {
    if (e instanceof MinasmConfigError) {
      console.error(formatDiagnostic(e.diagnostic, pretty));
      return 2;
    }
    throw e;
  }

  const read = readSource(file);
  if (!read.ok) {
    console.error(formatDiagnostic(read.diagnostic, pretty));
    return 4;
  }

  const parseResult = parse(read.source, file, { extensionLevel });
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return 2;
  }

  if (!parseResult.program) {
    console.error("Parse produced no program.");
    return 2;
  }

  const validationDiags = validate(parseResult.program);
  if (validationDiags.length > 0) {
    console.error(formatDiagnostics(validationDiags, pretty));
    return 2;
  }

  if (pretty) {
    console.log("No errors found.");
  } else {
    console.log("[]");
  }
  return 0;
}
