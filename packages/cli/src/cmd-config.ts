/**
 * minasm config - effective configuration summary command
 */
import { resolveConfig, formatDiagnostic, MinasmConfigError } from "@minasm/core";
import type { ResolvedConfig } from "@minasm/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (e instanceof MinasmConfigError) {
      console.error(formatDiagnostic(e.diagnostic, !opts.json));
      return 2;
    }
    throw e;
  }

  if (opts.json) {
    console.log(JSON.stringify(resolved, null, 2));
    return 0;
  }

  const { config } = resolved;
  console.log("Effective minasm config");
  console.log(`  Source:          ${resolved.source}`);
  console.log(`  Path:            ${resolved.path ?? "(none)"}`);
  console.log(`  Extension level: ${config.extensionLevel}`);
  console.log(`  Max steps:       ${config.maxSteps}`);
  console.log(`  Uninitialized:   ${config.uninitialized}`);
  console.log(`  Strict bindings: ${config.strictBindings}`);
  return 0;
}
