/**
 * minasm statement recognizer.
 *
 * A statement body is tokenized with the Chevrotain lexer and then tested
 * against an ordered table of token patterns. The first rule whose pattern
 * matches the whole token stream decides the instruction; base rules always
 * run before extension rules, and extension rules are enabled cumulatively by
 * extension level. Spacing between tokens must be exactly the spacing of the
 * rule's form: one space where the form has one, none where it has none.
 */
import { tokenMatcher, type IToken, type TokenType } from "chevrotain";
import type { Instruction, InstructionKind, LineNumber, Span } from "./ast.js";
import { isIdentifier } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { makeDiag } from "./diagnostics.js";
import {
  StatementLexer,
  If,
  Goto,
  Stop,
  Abs,
  Ident,
  IntLit,
  LParen,
  RParen,
  EqEq,
  Equals,
  Plus,
  Minus,
} from "./lexer.js";

// --- Pattern parts ---

type PatternPart =
  | { type: "token"; token: TokenType }
  | { type: "int"; image: string }
  | { type: "ident"; capture: string; distinctFrom?: string }
  | { type: "line"; capture: string };

const tok = (token: TokenType): PatternPart => ({ type: "token", token });
const lit = (image: string): PatternPart => ({ type: "int", image });
const id = (capture: string, distinctFrom?: string): PatternPart => ({ type: "ident", capture, distinctFrom });
const target = (capture: string): PatternPart => ({ type: "line", capture });

export interface Captures {
  ids: Record<string, string>;
  lines: Record<string, number>;
}

export interface RuleSite {
  line: LineNumber;
  span: Span;
}

export interface GrammarRule {
  kind: InstructionKind;
  /** Canonical example of the accepted shape; also fixes the spacing between tokens. */
  form: string;
  pattern: readonly PatternPart[];
  build(c: Captures, site: RuleSite): Instruction;
}

// --- Grammar tables (priority order) ---

const BASE_RULES: readonly GrammarRule[] = [
  {
    kind: "JumpIfZero",
    form: "if (x == 0) goto N",
    pattern: [tok(If), tok(LParen), id("x"), tok(EqEq), lit("0"), tok(RParen), tok(Goto), target("n")],
    build: (c, site) => ({ kind: "JumpIfZero", ...site, name: c.ids["x"], target: c.lines["n"] }),
  },
  {
    kind: "Increment",
    form: "x = x + 1",
    pattern: [id("x"), tok(Equals), id("x"), tok(Plus), lit("1")],
    build: (c, site) => ({ kind: "Increment", ...site, name: c.ids["x"] }),
  },
  {
    kind: "Decrement",
    form: "x = x - 1",
    pattern: [id("x"), tok(Equals), id("x"), tok(Minus), lit("1")],
    build: (c, site) => ({ kind: "Decrement", ...site, name: c.ids["x"] }),
  },
  {
    kind: "Jump",
    form: "goto N",
    pattern: [tok(Goto), target("n")],
    build: (c, site) => ({ kind: "Jump", ...site, target: c.lines["n"] }),
  },
  {
    kind: "Halt",
    form: "stop",
    pattern: [tok(Stop)],
    build: (_c, site) => ({ kind: "Halt", ...site }),
  },
  {
    kind: "SetZero",
    form: "x = 0",
    pattern: [id("x"), tok(Equals), lit("0")],
    build: (c, site) => ({ kind: "SetZero", ...site, name: c.ids["x"] }),
  },
];

// Enabled cumulatively: level 0 -> Transfer, 1 -> + Add, 2 -> + AbsDiff.
const EXTENSION_RULES: readonly GrammarRule[] = [
  {
    kind: "Transfer",
    form: "x = y",
    pattern: [id("x"), tok(Equals), id("y", "x")],
    build: (c, site) => ({ kind: "Transfer", ...site, dest: c.ids["x"], src: c.ids["y"] }),
  },
  {
    kind: "Add",
    form: "x = x + y",
    pattern: [id("x"), tok(Equals), id("x"), tok(Plus), id("y")],
    build: (c, site) => ({ kind: "Add", ...site, dest: c.ids["x"], src: c.ids["y"] }),
  },
  {
    kind: "AbsDiff",
    form: "z = abs(x - y)",
    pattern: [id("z"), tok(Equals), tok(Abs), tok(LParen), id("x"), tok(Minus), id("y"), tok(RParen)],
    build: (c, site) => ({ kind: "AbsDiff", ...site, dest: c.ids["z"], lhs: c.ids["x"], rhs: c.ids["y"] }),
  },
];

export const MAX_EXTENSION_LEVEL = EXTENSION_RULES.length - 1;

/**
 * Rules enabled at an extension level, in the order they are tried.
 * Level -1 enables none of the extensions.
 */
export function grammarFor(extensionLevel: number): GrammarRule[] {
  if (!Number.isInteger(extensionLevel) || extensionLevel < -1) {
    throw new RangeError(`Extension level must be an integer >= -1 (got ${extensionLevel}).`);
  }
  return [...BASE_RULES, ...EXTENSION_RULES.slice(0, extensionLevel + 1)];
}

// --- Matching ---

function gapsBetween(text: string, tokens: readonly IToken[]): string[] {
  const gaps: string[] = [];
  for (let i = 1; i < tokens.length; i++) {
    const prev = tokens[i - 1];
    gaps.push(text.slice(prev.startOffset + prev.image.length, tokens[i].startOffset));
  }
  return gaps;
}

const layouts = new WeakMap<GrammarRule, string[]>();

function layoutOf(rule: GrammarRule): string[] {
  let layout = layouts.get(rule);
  if (!layout) {
    layout = gapsBetween(rule.form, StatementLexer.tokenize(rule.form).tokens);
    layouts.set(rule, layout);
  }
  return layout;
}

function matchRule(rule: GrammarRule, tokens: IToken[], gaps: readonly string[]): Captures | null {
  if (tokens.length !== rule.pattern.length) return null;
  const layout = layoutOf(rule);
  if (gaps.some((gap, i) => gap !== layout[i])) return null;
  const captures: Captures = { ids: {}, lines: {} };

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const part = rule.pattern[i];
    switch (part.type) {
      case "token":
        if (!tokenMatcher(token, part.token)) return null;
        break;
      case "int":
        if (!tokenMatcher(token, IntLit) || token.image !== part.image) return null;
        break;
      case "line":
        if (!tokenMatcher(token, IntLit)) return null;
        captures.lines[part.capture] = parseInt(token.image, 10);
        break;
      case "ident": {
        if (!tokenMatcher(token, Ident) || !isIdentifier(token.image)) return null;
        const bound = captures.ids[part.capture];
        if (bound !== undefined && bound !== token.image) return null;
        if (part.distinctFrom !== undefined && captures.ids[part.distinctFrom] === token.image) return null;
        captures.ids[part.capture] = token.image;
        break;
      }
    }
  }
  return captures;
}

export type RecognizeResult =
  | { ok: true; instruction: Instruction }
  | { ok: false; diagnostic: Diagnostic };

export class Recognizer {
  readonly rules: readonly GrammarRule[];

  constructor(extensionLevel: number = -1) {
    this.rules = grammarFor(extensionLevel);
  }

  /**
   * Classify one statement body. `span` locates the body in the source file.
   */
  recognize(line: LineNumber, text: string, span: Span): RecognizeResult {
    const statement = text.trim();
    const lexResult = StatementLexer.tokenize(statement);

    if (lexResult.errors.length === 0) {
      const gaps = gapsBetween(statement, lexResult.tokens);
      for (const rule of this.rules) {
        const captures = matchRule(rule, lexResult.tokens, gaps);
        if (captures) {
          return { ok: true, instruction: rule.build(captures, { line, span }) };
        }
      }
    }

    return {
      ok: false,
      diagnostic: makeDiag(
        "E_SYNTAX",
        `No matching instruction could be found for the line: ${statement}`,
        span,
        `Expected one of: ${this.rules.map((r) => r.form).join(", ")}.`
      ),
    };
  }
}
