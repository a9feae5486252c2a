// AST produced by the expression parser

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';

export type Expr =
  | { kind: 'literal'; value: number | string | boolean | null }
  | { kind: 'list'; items: Expr[] }
  | { kind: 'name'; name: string }
  | { kind: 'call'; callee: string; args: Expr[] }
  | { kind: 'index'; target: Expr; index: Expr }
  | { kind: 'unary'; op: '-' | '+' | 'not'; operand: Expr }
  | { kind: 'binary'; op: BinaryOperator; left: Expr; right: Expr }
  | { kind: 'compare'; operands: Expr[]; ops: CompareOperator[] }
  | { kind: 'logical'; op: 'and' | 'or'; left: Expr; right: Expr }
  | { kind: 'conditional'; test: Expr; then: Expr; otherwise: Expr };

export type Statement =
  | { kind: 'assign'; target: string; value: Expr }
  | { kind: 'expr'; value: Expr };

export interface Program {
  statements: Statement[];
}
