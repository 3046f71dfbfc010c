/**
 * Token Type Tests
 */

import { describe, expect, it } from 'vitest';
import {
  isLiteral,
  isOperator,
  OPERATOR_TEXT,
  TOKEN_TYPES,
  tokenString,
} from '../../src/index.js';

describe('token types', () => {
  it('classifies literal kinds', () => {
    expect(isLiteral(TOKEN_TYPES.IDENT)).toBe(true);
    expect(isLiteral(TOKEN_TYPES.RAW_STRING)).toBe(true);
    expect(isLiteral(TOKEN_TYPES.COMMENT)).toBe(false);
    expect(isLiteral(TOKEN_TYPES.ADD)).toBe(false);
  });

  it('classifies operators and delimiters', () => {
    expect(isOperator(TOKEN_TYPES.AND)).toBe(true);
    expect(isOperator(TOKEN_TYPES.COLON)).toBe(true);
    expect(isOperator(TOKEN_TYPES.EOF)).toBe(false);
    expect(isOperator(TOKEN_TYPES.BOOL)).toBe(false);
  });

  it('puts every type in exactly one class or none', () => {
    for (const type of Object.values(TOKEN_TYPES)) {
      expect(isLiteral(type) && isOperator(type)).toBe(false);
    }
    const special = Object.values(TOKEN_TYPES).filter(
      (type) => !isLiteral(type) && !isOperator(type)
    );
    expect(special).toEqual(['ILLEGAL', 'EOF', 'COMMENT']);
  });

  it('has source text for every operator', () => {
    expect(Object.keys(OPERATOR_TEXT)).toHaveLength(24);
    expect(tokenString(TOKEN_TYPES.NEQ)).toBe('!=');
    expect(tokenString(TOKEN_TYPES.LBRACE)).toBe('{');
  });

  it('uses the type name for everything else', () => {
    expect(tokenString(TOKEN_TYPES.IDENT)).toBe('IDENT');
    expect(tokenString(TOKEN_TYPES.EOF)).toBe('EOF');
  });
});
