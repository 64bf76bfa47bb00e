#!/usr/bin/env node
/**
 * minasm - line-numbered mini assembly CLI
 */
import { Command, InvalidArgumentError } from "commander";
import { VERSION, MAX_EXTENSION_LEVEL } from "@minasm/core";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

function parseExtLevel(value: string): number {
  const level = Number(value);
  if (!Number.isInteger(level) || level < -1 || level > MAX_EXTENSION_LEVEL) {
    throw new InvalidArgumentError(`Expected an integer from -1 to ${MAX_EXTENSION_LEVEL}.`);
  }
  return level;
}

function parseStepLimit(value: string): number {
  const steps = Number(value);
  if (!Number.isInteger(steps) || steps < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return steps;
}

function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}

const program = new Command();

program
  .name("minasm")
  .description("minasm: line-numbered mini assembly interpreter")
  .version(VERSION);

program
  .command("run")
  .description("Run a program and print the final variables as JSON")
  .argument("<file>", "Source file to run (or - for stdin)")
  .option("--set <name=value>", "Initial value for a variable (repeatable)", collect, [])
  .option("--ext <level>", "Extension level: -1 none, 0 transfer, 1 +add, 2 +abs", parseExtLevel)
  .option("--max-steps <n>", "Stop after this many executed instructions", parseStepLimit)
  .option("--permissive", "Let transfers copy variables that have no value", false)
  .option("--strict-bindings", "Reject --set for variables the program never uses", false)
  .option("--verbose", "Print each executed step to stderr", false)
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: {
    set: string[];
    ext?: number;
    maxSteps?: number;
    permissive?: boolean;
    strictBindings?: boolean;
    verbose?: boolean;
    trace?: string;
    pretty?: boolean;
  }) => {
    const code = await runRun(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Parse and validate without running")
  .argument("<file>", "Source file to check")
  .option("--ext <level>", "Extension level: -1 none, 0 transfer, 1 +add, 2 +abs", parseExtLevel)
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { ext?: number; pretty?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("fmt")
  .description("Rewrite a program in canonical layout, keeping comments")
  .argument("<file>", "Source file to format (or - for stdin)")
  .option("--write", "Overwrite file in place", false)
  .option("--check", "Exit 1 if the file is not in canonical layout", false)
  .action(async (file: string, opts: { write?: boolean; check?: boolean }) => {
    const code = await runFmt(file, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and where it came from")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (prevents --help from masking exit code)
const knownCommands = new Set(["run", "check", "fmt", "trace", "config"]);
const firstPositional = process.argv.slice(2).find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(1);
});
