/**
 * @module expression/tokens
 *
 * Token vocabulary for the node expression language.
 */

import { createToken, Lexer } from 'chevrotain';

// =============================================================================
// Trivia
// =============================================================================

export const WhiteSpace = createToken({
  name: 'WhiteSpace',
  pattern: /[ \t\r]+/,
  group: Lexer.SKIPPED,
});

export const Comment = createToken({
  name: 'Comment',
  pattern: /#[^\n]*/,
  group: Lexer.SKIPPED,
});

export const Newline = createToken({ name: 'Newline', pattern: /\n/, line_breaks: true });
export const Semicolon = createToken({ name: 'Semicolon', pattern: /;/ });

// =============================================================================
// Literals and names
// =============================================================================

export const Identifier = createToken({ name: 'Identifier', pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

export const NumberLiteral = createToken({
  name: 'NumberLiteral',
  pattern: /(?:\d+\.\d*|\.\d+|\d+)(?:[eE][+-]?\d+)?/,
});

export const StringLiteral = createToken({
  name: 'StringLiteral',
  pattern: /"(?:[^"\\\n]|\\.)*"|'(?:[^'\\\n]|\\.)*'/,
});

// Keywords must be declared before Identifier and fall back to it on longer matches
export const And = createToken({ name: 'And', pattern: /and/, longer_alt: Identifier });
export const Or = createToken({ name: 'Or', pattern: /or/, longer_alt: Identifier });
export const Not = createToken({ name: 'Not', pattern: /not/, longer_alt: Identifier });
export const If = createToken({ name: 'If', pattern: /if/, longer_alt: Identifier });
export const Else = createToken({ name: 'Else', pattern: /else/, longer_alt: Identifier });
export const True = createToken({ name: 'True', pattern: /true|True/, longer_alt: Identifier });
export const False = createToken({ name: 'False', pattern: /false|False/, longer_alt: Identifier });
export const Null = createToken({ name: 'Null', pattern: /null|None/, longer_alt: Identifier });

// =============================================================================
// Operators and punctuation (longest first)
// =============================================================================

export const Power = createToken({ name: 'Power', pattern: /\*\*/ });
export const FloorDiv = createToken({ name: 'FloorDiv', pattern: /\/\// });
export const EqEq = createToken({ name: 'EqEq', pattern: /==/ });
export const NotEq = createToken({ name: 'NotEq', pattern: /!=/ });
export const LtEq = createToken({ name: 'LtEq', pattern: /<=/ });
export const GtEq = createToken({ name: 'GtEq', pattern: />=/ });
export const AmpAmp = createToken({ name: 'AmpAmp', pattern: /&&/ });
export const PipePipe = createToken({ name: 'PipePipe', pattern: /\|\|/ });
export const Lt = createToken({ name: 'Lt', pattern: /</ });
export const Gt = createToken({ name: 'Gt', pattern: />/ });
export const Bang = createToken({ name: 'Bang', pattern: /!/ });
export const Assign = createToken({ name: 'Assign', pattern: /=/ });
export const Plus = createToken({ name: 'Plus', pattern: /\+/ });
export const Minus = createToken({ name: 'Minus', pattern: /-/ });
export const Star = createToken({ name: 'Star', pattern: /\*/ });
export const Slash = createToken({ name: 'Slash', pattern: /\// });
export const Percent = createToken({ name: 'Percent', pattern: /%/ });
export const LParen = createToken({ name: 'LParen', pattern: /\(/ });
export const RParen = createToken({ name: 'RParen', pattern: /\)/ });
export const LBracket = createToken({ name: 'LBracket', pattern: /\[/ });
export const RBracket = createToken({ name: 'RBracket', pattern: /\]/ });
export const Comma = createToken({ name: 'Comma', pattern: /,/ });

export const allTokens = [
  WhiteSpace,
  Comment,
  Newline,
  Semicolon,
  NumberLiteral,
  StringLiteral,
  And,
  Or,
  Not,
  If,
  Else,
  True,
  False,
  Null,
  Identifier,
  Power,
  FloorDiv,
  EqEq,
  NotEq,
  LtEq,
  GtEq,
  AmpAmp,
  PipePipe,
  Lt,
  Gt,
  Bang,
  Assign,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  LParen,
  RParen,
  LBracket,
  RBracket,
  Comma,
];

export const ExpressionLexer = new Lexer(allTokens);
