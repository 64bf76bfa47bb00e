/**
 * minasm AST Node Definitions
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

/** Single ASCII letter, case-sensitive. */
export type Identifier = string;

/** Positive decimal line number. */
export type LineNumber = number;

// Base node with line number and span
export interface BaseNode {
  kind: string;
  line: LineNumber;
  span: Span;
}

// --- Base instructions ---
export interface JumpIfZero extends BaseNode {
  kind: "JumpIfZero";
  name: Identifier;
  target: LineNumber;
}

export interface Increment extends BaseNode {
  kind: "Increment";
  name: Identifier;
}

export interface Decrement extends BaseNode {
  kind: "Decrement";
  name: Identifier;
}

export interface Jump extends BaseNode {
  kind: "Jump";
  target: LineNumber;
}

export interface Halt extends BaseNode {
  kind: "Halt";
}

export interface SetZero extends BaseNode {
  kind: "SetZero";
  name: Identifier;
}

// --- Extension instructions ---
export interface Transfer extends BaseNode {
  kind: "Transfer";
  dest: Identifier;
  src: Identifier;
}

// dest = dest + src
export interface Add extends BaseNode {
  kind: "Add";
  dest: Identifier;
  src: Identifier;
}

// dest = abs(lhs - rhs)
export interface AbsDiff extends BaseNode {
  kind: "AbsDiff";
  dest: Identifier;
  lhs: Identifier;
  rhs: Identifier;
}

export type Instruction =
  | JumpIfZero
  | Increment
  | Decrement
  | Jump
  | Halt
  | SetZero
  | Transfer
  | Add
  | AbsDiff;

export type InstructionKind = Instruction["kind"];

// --- Program ---
export interface Program {
  kind: "Program";
  file: string;
  /** Ordered by line number. */
  instructions: Instruction[];
  /** Every identifier named in any payload, sorted. */
  identifiers: Identifier[];
}

/**
 * Identifiers read or written by an instruction, in payload order.
 */
export function identifiersOf(instr: Instruction): Identifier[] {
  switch (instr.kind) {
    case "JumpIfZero":
    case "Increment":
    case "Decrement":
    case "SetZero":
      return [instr.name];
    case "Transfer":
    case "Add":
      return [instr.dest, instr.src];
    case "AbsDiff":
      return [instr.dest, instr.lhs, instr.rhs];
    case "Jump":
    case "Halt":
      return [];
  }
}

export function isIdentifier(name: string): boolean {
  return /^[A-Za-z]$/.test(name);
}
