/**
 * minasm statement lexer using Chevrotain.
 * Tokenizes the statement body of one source line (the text after "(N) ").
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers are lexed greedily; the recognizer only accepts single letters.
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z][A-Za-z0-9_]*/ });

// Keywords
export const If = createToken({ name: "If", pattern: /if/, longer_alt: Ident });
export const Goto = createToken({ name: "Goto", pattern: /goto/, longer_alt: Ident });
export const Stop = createToken({ name: "Stop", pattern: /stop/, longer_alt: Ident });
export const Abs = createToken({ name: "Abs", pattern: /abs/, longer_alt: Ident });

// Literals
export const IntLit = createToken({ name: "IntLit", pattern: /\d+/ });

// Punctuation
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const EqEq = createToken({ name: "EqEq", pattern: /==/ });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const Plus = createToken({ name: "Plus", pattern: /\+/ });
export const Minus = createToken({ name: "Minus", pattern: /-/ });

export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  EqEq, // == before Equals
  // Keywords (before Ident)
  Goto,
  Stop,
  Abs,
  If,
  IntLit,
  Ident,
  LParen,
  RParen,
  Equals,
  Plus,
  Minus,
];

export const StatementLexer = new Lexer(allTokens, { positionTracking: "onlyOffset" });
