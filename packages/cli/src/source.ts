/**
 * Program source access shared by the commands. "-" names stdin.
 */
import * as fs from "node:fs";
import { makeDiag } from "@minasm/core";
import type { Diagnostic } from "@minasm/core";

export type SourceRead = { ok: true; source: string } | { ok: false; diagnostic: Diagnostic };

export function readSource(file: string): SourceRead {
  try {
    return { ok: true, source: fs.readFileSync(file === "-" ? 0 : file, "utf-8") };
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    return { ok: false, diagnostic: makeDiag("E_IO", `Error reading file: ${msg}`) };
  }
}
