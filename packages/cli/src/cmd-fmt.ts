/**
 * minasm fmt - rewrite a program in canonical layout, keeping its comments
 */
import * as fs from "node:fs";
import { formatSource, formatDiagnostic, formatDiagnostics, makeDiag, MAX_EXTENSION_LEVEL } from "@minasm/core";
import { readSource } from "./source.js";

export interface FmtOpts {
  write?: boolean;
  check?: boolean;
}

export async function runFmt(file: string, opts: FmtOpts): Promise<number> {
  if (opts.write && file === "-") {
    console.error(formatDiagnostic(makeDiag("E_IO", "Cannot use --write with stdin."), true));
    return 4;
  }

  const read = readSource(file);
  if (!read.ok) {
    console.error(formatDiagnostic(read.diagnostic, true));
    return 4;
  }

  // Layout only: every instruction form is accepted regardless of configuration.
  const result = formatSource(read.source, file, { extensionLevel: MAX_EXTENSION_LEVEL });
  if (result.output === undefined) {
    console.error(formatDiagnostics(result.diagnostics, true));
    return 2;
  }

  const unchanged = result.output === read.source;

  if (opts.check) {
    if (!unchanged) {
      console.error(`${file}: not in canonical layout`);
      return 1;
    }
    return 0;
  }

  if (!opts.write) {
    process.stdout.write(result.output);
    return 0;
  }

  if (unchanged) return 0;
  try {
    fs.writeFileSync(file, result.output, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(formatDiagnostic(makeDiag("E_IO", `Error writing file: ${msg}`), true));
    return 4;
  }
  return 0;
}
