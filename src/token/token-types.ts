// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Special
  ILLEGAL: 'ILLEGAL',
  EOF: 'EOF',
  COMMENT: 'COMMENT',

  // Literals
  IDENT: 'IDENT', // main
  BOOL: 'BOOL', // true
  INT: 'INT', // 12345
  FLOAT: 'FLOAT', // 123.45
  STRING: 'STRING', // "abc"
  RAW_STRING: 'RAW_STRING', // 'abc'

  // Arithmetic operators
  ADD: 'ADD', // +
  SUB: 'SUB', // -
  MUL: 'MUL', // *
  QUO: 'QUO', // /
  REM: 'REM', // %

  // Boolean operators
  AND: 'AND', // &&
  OR: 'OR', // ||

  // Comparison and assignment
  EQL: 'EQL', // ==
  LSS: 'LSS', // <
  GTR: 'GTR', // >
  ASSIGN: 'ASSIGN', // =
  NOT: 'NOT', // !
  NEQ: 'NEQ', // !=
  LEQ: 'LEQ', // <=
  GEQ: 'GEQ', // >=

  // Delimiters
  LPAREN: 'LPAREN', // (
  LBRACK: 'LBRACK', // [
  LBRACE: 'LBRACE', // {
  COMMA: 'COMMA', // ,
  PERIOD: 'PERIOD', // .
  RPAREN: 'RPAREN', // )
  RBRACK: 'RBRACK', // ]
  RBRACE: 'RBRACE', // }
  COLON: 'COLON', // :
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Source text of every operator and delimiter */
export const OPERATOR_TEXT = {
  ADD: '+',
  SUB: '-',
  MUL: '*',
  QUO: '/',
  REM: '%',
  AND: '&&',
  OR: '||',
  EQL: '==',
  LSS: '<',
  GTR: '>',
  ASSIGN: '=',
  NOT: '!',
  NEQ: '!=',
  LEQ: '<=',
  GEQ: '>=',
  LPAREN: '(',
  LBRACK: '[',
  LBRACE: '{',
  COMMA: ',',
  PERIOD: '.',
  RPAREN: ')',
  RBRACK: ']',
  RBRACE: '}',
  COLON: ':',
} as const satisfies Partial<Record<TokenType, string>>;

export type OperatorType = keyof typeof OPERATOR_TEXT;

const LITERAL_TYPES: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.IDENT,
  TOKEN_TYPES.BOOL,
  TOKEN_TYPES.INT,
  TOKEN_TYPES.FLOAT,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.RAW_STRING,
]);

/** Identifiers and basic type literals */
export function isLiteral(type: TokenType): boolean {
  return LITERAL_TYPES.has(type);
}

/** Operators and delimiters */
export function isOperator(type: TokenType): type is OperatorType {
  return Object.prototype.hasOwnProperty.call(OPERATOR_TEXT, type);
}

/**
 * Display string of a token type: the source text for operators and
 * delimiters, the type name for everything else.
 */
export function tokenString(type: TokenType): string {
  return isOperator(type) ? OPERATOR_TEXT[type] : type;
}
