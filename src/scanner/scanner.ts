/**
 * Scanner
 * Turns one file's bytes into (position, token type, literal) triples
 */

import { ContractError } from '../error-classes.js';
import type { Pos } from '../position.js';
import type { SourceFile } from '../source/file.js';
import { TOKEN_TYPES, type TokenType } from '../token/token-types.js';
import {
  BOM,
  CHAR,
  EOF_RUNE,
  formatRune,
  isDecimal,
  isLetter,
  runeString,
} from './helpers.js';
import {
  lookup,
  SINGLE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  scanComment,
  scanIdentifier,
  scanNumber,
  scanString,
  skipWhitespace,
  type ScannedLiteral,
} from './readers.js';
import {
  createScannerState,
  type ErrorHandler,
  next,
  reportError,
  type ScannerState,
} from './state.js';

export interface ScanResult {
  readonly pos: Pos;
  readonly type: TokenType;
  /**
   * Source text for literal tokens (IDENT, BOOL, INT, FLOAT, STRING,
   * RAW_STRING) and the offending character for ILLEGAL; empty otherwise.
   */
  readonly literal: string;
}

/**
 * Operators, delimiters and illegal characters. `ch` is already consumed
 * and state.ch is the lookahead.
 */
function scanOperator(
  state: ScannerState,
  ch: number,
  start: number
): ScannedLiteral {
  const text = runeString(ch);

  if (state.ch !== EOF_RUNE) {
    const twoChar = lookup(TWO_CHAR_OPERATORS, text + runeString(state.ch));
    if (twoChar) {
      next(state);
      return { type: twoChar, literal: '' };
    }
  }

  const singleChar = lookup(SINGLE_CHAR_OPERATORS, text);
  if (singleChar) {
    return { type: singleChar, literal: '' };
  }

  // next() already reported stray byte order marks
  if (ch !== BOM) {
    reportError(state, start, 'TF-L004', { char: formatRune(ch) });
  }
  return { type: TOKEN_TYPES.ILLEGAL, literal: text };
}

/**
 * A Scanner holds the state for tokenizing one source text. Call init()
 * before scan(); init() may be called again to reuse the instance for
 * another file.
 *
 * Scanning is tolerant: after a syntax error, scan() still returns the best
 * token it can. Check errorCount (or count handler calls) rather than looking
 * for ILLEGAL tokens to find out whether errors occurred.
 */
export class Scanner {
  private state: ScannerState | undefined;

  /** Number of errors reported since the last init() */
  get errorCount(): number {
    return this.state?.errorCount ?? 0;
  }

  /**
   * Bind the scanner to `file` and its content `src`, positioned at the
   * first character. A byte order mark at the very start is skipped. Line
   * starts already recorded in `file` are kept.
   *
   * The handler may already be called here, for an error in the first
   * character.
   *
   * @throws ContractError if src.length differs from file.size
   */
  init(file: SourceFile, src: Uint8Array, err?: ErrorHandler): void {
    if (file.size !== src.length) {
      throw new ContractError('TF-C001', {
        size: file.size,
        length: src.length,
      });
    }

    const state = createScannerState(file, src, err);
    this.state = state;
    next(state);
    if (state.ch === BOM) {
      next(state);
    }
  }

  /**
   * Scan the next token. At the end of the input the type is EOF, and every
   * further call returns EOF again.
   *
   * @throws ContractError if init() has not been called
   */
  scan(): ScanResult {
    const state = this.state;
    if (!state) {
      throw new ContractError('TF-C009');
    }

    skipWhitespace(state);

    const start = state.offset;
    const pos = state.file.pos(start);
    const ch = state.ch;

    if (isLetter(ch)) {
      return { pos, ...scanIdentifier(state) };
    }
    if (isDecimal(ch)) {
      return { pos, ...scanNumber(state, false) };
    }

    // always make progress
    next(state);

    switch (ch) {
      case EOF_RUNE:
        return { pos, type: TOKEN_TYPES.EOF, literal: '' };
      case CHAR.DQUOTE:
        return {
          pos,
          type: TOKEN_TYPES.STRING,
          literal: scanString(state, CHAR.DQUOTE),
        };
      case CHAR.SQUOTE:
        return {
          pos,
          type: TOKEN_TYPES.RAW_STRING,
          literal: scanString(state, CHAR.SQUOTE),
        };
      case CHAR.DOT:
        if (isDecimal(state.ch)) {
          return { pos, ...scanNumber(state, true) };
        }
        return { pos, type: TOKEN_TYPES.PERIOD, literal: '' };
      case CHAR.SLASH:
        if (state.ch === CHAR.SLASH || state.ch === CHAR.STAR) {
          scanComment(state);
          return { pos, type: TOKEN_TYPES.COMMENT, literal: '' };
        }
        return { pos, type: TOKEN_TYPES.QUO, literal: '' };
      default:
        return { pos, ...scanOperator(state, ch, start) };
    }
  }
}
