/**
 * @module expression/parser
 *
 * Parser for the node expression language using Chevrotain.
 *
 * Syntax:
 *   result = value * factor
 *   label = "big" if total > 100 else "small"; count = len(items)
 *
 * Statements are separated by newlines or semicolons, `#` starts a comment.
 */

import { EmbeddedActionsParser, tokenMatcher, type IToken } from 'chevrotain';

import type { BinaryOperator, CompareOperator, Expr, Program, Statement } from './ast.js';
import {
  allTokens,
  ExpressionLexer,
  AmpAmp,
  And,
  Assign,
  Bang,
  Comma,
  Else,
  EqEq,
  False,
  FloorDiv,
  Gt,
  GtEq,
  Identifier,
  If,
  LBracket,
  LParen,
  Lt,
  LtEq,
  Minus,
  Newline,
  Not,
  NotEq,
  Null,
  NumberLiteral,
  Or,
  Percent,
  PipePipe,
  Plus,
  Power,
  RBracket,
  RParen,
  Semicolon,
  Slash,
  Star,
  StringLiteral,
  True,
} from './tokens.js';

// =============================================================================
// Errors
// =============================================================================

export class ExpressionSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExpressionSyntaxError';
  }
}

// =============================================================================
// Token helpers
// =============================================================================

const ESCAPES: Record<string, string> = { n: '\n', t: '\t', r: '\r', '0': '\0' };

function unquote(image: string): string {
  return image.slice(1, -1).replace(/\\(.)/g, (_match, ch: string) => ESCAPES[ch] ?? ch);
}

function compareOperator(token: IToken): CompareOperator {
  if (tokenMatcher(token, EqEq)) return '==';
  if (tokenMatcher(token, NotEq)) return '!=';
  if (tokenMatcher(token, LtEq)) return '<=';
  if (tokenMatcher(token, GtEq)) return '>=';
  if (tokenMatcher(token, Lt)) return '<';
  return '>';
}

function multiplicativeOperator(token: IToken): BinaryOperator {
  if (tokenMatcher(token, Star)) return '*';
  if (tokenMatcher(token, FloorDiv)) return '//';
  if (tokenMatcher(token, Percent)) return '%';
  return '/';
}

// =============================================================================
// Parser Definition
// =============================================================================

class ExpressionParser extends EmbeddedActionsParser {
  constructor() {
    super(allTokens, { maxLookahead: 3 });
    this.performSelfAnalysis();
  }

  // Entry rule: (separator | statement)*
  public program = this.RULE('program', (): Program => {
    const statements: Statement[] = [];
    this.MANY(() => {
      this.OR([
        {
          ALT: () => {
            this.CONSUME(Newline);
          },
        },
        {
          ALT: () => {
            this.CONSUME(Semicolon);
          },
        },
        {
          ALT: () => {
            const statement = this.SUBRULE(this.statement);
            this.ACTION(() => statements.push(statement));
          },
        },
      ]);
    });
    return { statements };
  });

  // statement: Identifier '=' expression | expression
  public statement = this.RULE('statement', (): Statement => {
    return this.OR<Statement>([
      {
        ALT: () => {
          const target = this.CONSUME(Identifier);
          this.CONSUME(Assign);
          const value = this.SUBRULE(this.expression);
          return { kind: 'assign', target: target.image, value };
        },
      },
      { ALT: () => ({ kind: 'expr', value: this.SUBRULE2(this.expression) }) },
    ]);
  });

  // expression: orExpr ('if' orExpr 'else' expression)?
  public expression = this.RULE('expression', (): Expr => {
    const value = this.SUBRULE(this.orExpr);
    const branch = this.OPTION(() => {
      this.CONSUME(If);
      const test = this.SUBRULE2(this.orExpr);
      this.CONSUME(Else);
      const otherwise = this.SUBRULE(this.expression);
      return { test, otherwise };
    });
    if (branch) {
      return { kind: 'conditional', test: branch.test, then: value, otherwise: branch.otherwise };
    }
    return value;
  });

  public orExpr = this.RULE('orExpr', (): Expr => {
    let left = this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.OR([{ ALT: () => this.CONSUME(Or) }, { ALT: () => this.CONSUME(PipePipe) }]);
      const right = this.SUBRULE2(this.andExpr);
      left = { kind: 'logical', op: 'or', left, right };
    });
    return left;
  });

  public andExpr = this.RULE('andExpr', (): Expr => {
    let left = this.SUBRULE(this.notExpr);
    this.MANY(() => {
      this.OR([{ ALT: () => this.CONSUME(And) }, { ALT: () => this.CONSUME(AmpAmp) }]);
      const right = this.SUBRULE2(this.notExpr);
      left = { kind: 'logical', op: 'and', left, right };
    });
    return left;
  });

  public notExpr = this.RULE('notExpr', (): Expr => {
    return this.OR<Expr>([
      {
        ALT: () => {
          this.OR2([{ ALT: () => this.CONSUME(Not) }, { ALT: () => this.CONSUME(Bang) }]);
          const operand = this.SUBRULE(this.notExpr);
          return { kind: 'unary', op: 'not', operand };
        },
      },
      { ALT: () => this.SUBRULE(this.comparison) },
    ]);
  });

  // Chained comparisons: a < b <= c
  public comparison = this.RULE('comparison', (): Expr => {
    const first = this.SUBRULE(this.additive);
    const operands: Expr[] = [first];
    const ops: CompareOperator[] = [];
    this.MANY(() => {
      const token = this.OR([
        { ALT: () => this.CONSUME(EqEq) },
        { ALT: () => this.CONSUME(NotEq) },
        { ALT: () => this.CONSUME(LtEq) },
        { ALT: () => this.CONSUME(GtEq) },
        { ALT: () => this.CONSUME(Lt) },
        { ALT: () => this.CONSUME(Gt) },
      ]);
      const operand = this.SUBRULE2(this.additive);
      this.ACTION(() => {
        ops.push(compareOperator(token));
        operands.push(operand);
      });
    });
    return ops.length === 0 ? first : { kind: 'compare', operands, ops };
  });

  public additive = this.RULE('additive', (): Expr => {
    let left = this.SUBRULE(this.multiplicative);
    this.MANY(() => {
      const token = this.OR([{ ALT: () => this.CONSUME(Plus) }, { ALT: () => this.CONSUME(Minus) }]);
      const right = this.SUBRULE2(this.multiplicative);
      left = { kind: 'binary', op: tokenMatcher(token, Plus) ? '+' : '-', left, right };
    });
    return left;
  });

  public multiplicative = this.RULE('multiplicative', (): Expr => {
    let left = this.SUBRULE(this.unary);
    this.MANY(() => {
      const token = this.OR([
        { ALT: () => this.CONSUME(Star) },
        { ALT: () => this.CONSUME(FloorDiv) },
        { ALT: () => this.CONSUME(Slash) },
        { ALT: () => this.CONSUME(Percent) },
      ]);
      const right = this.SUBRULE2(this.unary);
      left = { kind: 'binary', op: multiplicativeOperator(token), left, right };
    });
    return left;
  });

  // Unary minus binds looser than '**': -2 ** 2 == -4
  public unary = this.RULE('unary', (): Expr => {
    return this.OR<Expr>([
      {
        ALT: () => {
          const token = this.OR2([{ ALT: () => this.CONSUME(Minus) }, { ALT: () => this.CONSUME(Plus) }]);
          const operand = this.SUBRULE(this.unary);
          return { kind: 'unary', op: tokenMatcher(token, Minus) ? '-' : '+', operand };
        },
      },
      { ALT: () => this.SUBRULE(this.power) },
    ]);
  });

  public power = this.RULE('power', (): Expr => {
    const base = this.SUBRULE(this.postfix);
    const exponent = this.OPTION(() => {
      this.CONSUME(Power);
      return this.SUBRULE(this.unary);
    });
    return exponent ? { kind: 'binary', op: '**', left: base, right: exponent } : base;
  });

  public postfix = this.RULE('postfix', (): Expr => {
    let target = this.SUBRULE(this.primary);
    this.MANY(() => {
      this.CONSUME(LBracket);
      const index = this.SUBRULE(this.expression);
      this.CONSUME(RBracket);
      target = { kind: 'index', target, index };
    });
    return target;
  });

  public primary = this.RULE('primary', (): Expr => {
    return this.OR<Expr>([
      { ALT: () => ({ kind: 'literal', value: Number(this.CONSUME(NumberLiteral).image) }) },
      { ALT: () => ({ kind: 'literal', value: unquote(this.CONSUME(StringLiteral).image) }) },
      {
        ALT: () => {
          this.CONSUME(True);
          return { kind: 'literal', value: true };
        },
      },
      {
        ALT: () => {
          this.CONSUME(False);
          return { kind: 'literal', value: false };
        },
      },
      {
        ALT: () => {
          this.CONSUME(Null);
          return { kind: 'literal', value: null };
        },
      },
      { ALT: () => this.SUBRULE(this.listLiteral) },
      { ALT: () => this.SUBRULE(this.nameOrCall) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          const inner = this.SUBRULE(this.expression);
          this.CONSUME(RParen);
          return inner;
        },
      },
    ]);
  });

  public listLiteral = this.RULE('listLiteral', (): Expr => {
    const items: Expr[] = [];
    this.CONSUME(LBracket);
    this.MANY_SEP({
      SEP: Comma,
      DEF: () => {
        const item = this.SUBRULE(this.expression);
        this.ACTION(() => items.push(item));
      },
    });
    this.CONSUME(RBracket);
    return { kind: 'list', items };
  });

  public nameOrCall = this.RULE('nameOrCall', (): Expr => {
    const name = this.CONSUME(Identifier).image;
    const args = this.OPTION(() => {
      const collected: Expr[] = [];
      this.CONSUME(LParen);
      this.MANY_SEP({
        SEP: Comma,
        DEF: () => {
          const arg = this.SUBRULE(this.expression);
          this.ACTION(() => collected.push(arg));
        },
      });
      this.CONSUME(RParen);
      return collected;
    });
    return args ? { kind: 'call', callee: name, args } : { kind: 'name', name };
  });
}

// =============================================================================
// Parser Instance (singleton)
// =============================================================================

const parserInstance = new ExpressionParser();

function tokenize(source: string): IToken[] {
  const lexResult = ExpressionLexer.tokenize(source);
  if (lexResult.errors.length > 0) {
    const first = lexResult.errors[0];
    throw new ExpressionSyntaxError(
      `Unexpected character at line ${first?.line ?? '?'}, column ${first?.column ?? '?'}: ${first?.message ?? ''}`,
    );
  }
  return lexResult.tokens;
}

function assertParsed(source: string): void {
  const first = parserInstance.errors[0];
  if (first) {
    const truncated = source.length > 60 ? `${source.substring(0, 60)}...` : source;
    throw new ExpressionSyntaxError(`Failed to parse "${truncated}": ${first.message}`);
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Parse a program: one or more statements.
 */
export function parseProgram(source: string): Program {
  parserInstance.input = tokenize(source);
  const program = parserInstance.program();
  assertParsed(source);
  return program;
}

/**
 * Parse a single expression; trailing input is an error.
 */
export function parseExpression(source: string): Expr {
  parserInstance.input = tokenize(source);
  const expr = parserInstance.expression();
  assertParsed(source);
  return expr;
}
