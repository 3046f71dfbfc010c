/**
 * Operator Lookup Tables
 */

import { TOKEN_TYPES, type TokenType } from '../token/token-types.js';

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
  '==': TOKEN_TYPES.EQL,
  '!=': TOKEN_TYPES.NEQ,
  '<=': TOKEN_TYPES.LEQ,
  '>=': TOKEN_TYPES.GEQ,
};

/**
 * Single-character operator lookup table.
 * `&` and `|` only exist doubled; alone they are illegal.
 */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  ':': TOKEN_TYPES.COLON,
  ',': TOKEN_TYPES.COMMA,
  '.': TOKEN_TYPES.PERIOD,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '[': TOKEN_TYPES.LBRACK,
  ']': TOKEN_TYPES.RBRACK,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '+': TOKEN_TYPES.ADD,
  '-': TOKEN_TYPES.SUB,
  '*': TOKEN_TYPES.MUL,
  '/': TOKEN_TYPES.QUO,
  '%': TOKEN_TYPES.REM,
  '<': TOKEN_TYPES.LSS,
  '>': TOKEN_TYPES.GTR,
  '=': TOKEN_TYPES.ASSIGN,
  '!': TOKEN_TYPES.NOT,
};

/** Keywords with a token type of their own */
export const KEYWORDS: Record<string, TokenType> = {
  true: TOKEN_TYPES.BOOL,
  false: TOKEN_TYPES.BOOL,
};

/** Own-property lookup, so names like `constructor` never match */
export function lookup(
  table: Record<string, TokenType>,
  key: string
): TokenType | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}
