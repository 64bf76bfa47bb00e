/**
 * @minasm/core - minasm language core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { VERSION } from "./version.js";
export { StatementLexer } from "./lexer.js";
export { Recognizer, grammarFor, MAX_EXTENSION_LEVEL } from "./recognizer.js";
export type { GrammarRule, RecognizeResult } from "./recognizer.js";
export { parse, splitSourceLines } from "./parser.js";
export type { ParseResult, ParseOptions } from "./parser.js";
export { validate, checkBindings } from "./validator.js";
export type { Bindings, BindingCheck } from "./validator.js";
export { format, formatInstruction, formatSource } from "./formatter.js";
export type { FormatResult } from "./formatter.js";
export {
  execute,
  createVariableTable,
  snapshot,
  MinasmRuntimeError,
  DEFAULT_MAX_STEPS,
} from "./evaluator.js";
export type {
  Value,
  Variables,
  VariableTable,
  TraceData,
  TraceEvent,
  TraceEventType,
  RuntimeErrorCode,
  UninitializedMode,
  ExecOptions,
  ExecResult,
} from "./evaluator.js";
export { AssemblyProgram } from "./program.js";
export type { ProgramOptions, RunOptions } from "./program.js";
export { resolveConfig, loadConfig, DEFAULT_CONFIG, MinasmConfigError } from "./config.js";
export type { Config, ConfigFile, ResolvedConfig } from "./config.js";
