/**
 * Token Readers
 * Functions that consume one token class from the scanner state
 */

import { TOKEN_TYPES, type TokenType } from '../token/token-types.js';
import {
  CHAR,
  digitVal,
  EOF_RUNE,
  formatRune,
  isDigit,
  isLetter,
  isWhitespace,
  MAX_RUNE,
} from './helpers.js';
import { KEYWORDS, lookup } from './operators.js';
import { next, reportError, type ScannerState, textBetween } from './state.js';

export interface ScannedLiteral {
  readonly type: TokenType;
  readonly literal: string;
}

export function skipWhitespace(state: ScannerState): void {
  while (isWhitespace(state.ch)) {
    next(state);
  }
}

// ============================================================
// COMMENTS
// ============================================================

/**
 * Consume a comment. The initial '/' is already consumed and state.ch is
 * '/' or '*'. A block comment left open runs to the end of the input.
 */
export function scanComment(state: ScannerState): void {
  if (state.ch === CHAR.SLASH) {
    next(state);
    while (state.ch !== CHAR.NEWLINE && state.ch !== EOF_RUNE) {
      next(state);
    }
    return;
  }

  next(state);
  while (state.ch !== EOF_RUNE) {
    const ch = state.ch;
    next(state);
    if (ch === CHAR.STAR && state.ch === CHAR.SLASH) {
      next(state);
      break;
    }
  }
}

// ============================================================
// IDENTIFIERS
// ============================================================

export function scanIdentifier(state: ScannerState): ScannedLiteral {
  const offs = state.offset;
  while (isLetter(state.ch) || isDigit(state.ch)) {
    next(state);
  }
  const literal = textBetween(state, offs, state.offset);
  return { type: lookup(KEYWORDS, literal) ?? TOKEN_TYPES.IDENT, literal };
}

// ============================================================
// NUMBERS
// ============================================================

/** Where scanning continues after the integer part of a number */
type NumberPhase = 'fraction' | 'exponent' | 'done';

function scanMantissa(state: ScannerState, base: number): void {
  while (digitVal(state.ch) < base) {
    next(state);
  }
}

/**
 * Integer part of a literal starting with '0': hexadecimal, octal, or the
 * leading digits of a float.
 */
function scanZeroPrefixed(state: ScannerState): NumberPhase {
  const offs = state.offset;
  next(state);

  if (state.ch === CHAR.LOWER_X || state.ch === CHAR.UPPER_X) {
    next(state);
    scanMantissa(state, 16);
    if (state.offset - offs <= 2) {
      // only "0x" or "0X"
      reportError(state, offs, 'TF-L005');
    }
    return 'done';
  }

  let invalidOctal = false;
  scanMantissa(state, 8);
  if (state.ch === CHAR.EIGHT || state.ch === CHAR.NINE) {
    invalidOctal = true;
    scanMantissa(state, 10);
  }
  if (
    state.ch === CHAR.DOT ||
    state.ch === CHAR.LOWER_E ||
    state.ch === CHAR.UPPER_E
  ) {
    return 'fraction';
  }
  if (invalidOctal) {
    reportError(state, offs, 'TF-L006');
  }
  return 'done';
}

/**
 * Scan a number literal. With `seenDecimalPoint`, the '.' has already been
 * consumed and state.ch is the first fraction digit.
 *
 * The literal is the exact source text consumed, including illegal digits.
 */
export function scanNumber(
  state: ScannerState,
  seenDecimalPoint: boolean
): ScannedLiteral {
  let offs = state.offset;
  let type: TokenType = TOKEN_TYPES.INT;
  let phase: NumberPhase;

  if (seenDecimalPoint) {
    offs--;
    type = TOKEN_TYPES.FLOAT;
    scanMantissa(state, 10);
    phase = 'exponent';
  } else if (state.ch === CHAR.ZERO) {
    phase = scanZeroPrefixed(state);
  } else {
    scanMantissa(state, 10);
    phase = 'fraction';
  }

  if (phase === 'fraction' && state.ch === CHAR.DOT) {
    type = TOKEN_TYPES.FLOAT;
    next(state);
    scanMantissa(state, 10);
  }

  if (
    phase !== 'done' &&
    (state.ch === CHAR.LOWER_E || state.ch === CHAR.UPPER_E)
  ) {
    type = TOKEN_TYPES.FLOAT;
    next(state);
    if (state.ch === CHAR.MINUS || state.ch === CHAR.PLUS) {
      next(state);
    }
    scanMantissa(state, 10);
  }

  return { type, literal: textBetween(state, offs, state.offset) };
}

// ============================================================
// STRINGS
// ============================================================

const SIMPLE_ESCAPES: ReadonlySet<number> = new Set([
  0x61, // a
  0x62, // b
  0x66, // f
  0x6e, // n
  0x72, // r
  0x74, // t
  0x76, // v
  CHAR.BACKSLASH,
]);

interface EscapeShape {
  readonly digits: number;
  readonly base: number;
  readonly max: number;
}

/** Shape of a numeric escape introduced by state.ch, consuming the letter */
function numericEscape(state: ScannerState): EscapeShape | undefined {
  const ch = state.ch;
  if (ch >= CHAR.ZERO && ch <= CHAR.SEVEN) {
    return { digits: 3, base: 8, max: 255 };
  }
  let shape: EscapeShape | undefined;
  if (ch === CHAR.LOWER_X) {
    shape = { digits: 2, base: 16, max: 255 };
  } else if (ch === CHAR.LOWER_U) {
    shape = { digits: 4, base: 16, max: MAX_RUNE };
  } else if (ch === CHAR.UPPER_U) {
    shape = { digits: 8, base: 16, max: MAX_RUNE };
  }
  if (shape) {
    next(state);
  }
  return shape;
}

/**
 * Validate an escape sequence; the backslash is already consumed and
 * `quote` is the delimiter of the enclosing literal. On an error, stops at
 * the offending character without consuming it.
 *
 * @returns false if the escape was invalid
 */
export function scanEscape(state: ScannerState, quote: number): boolean {
  const offs = state.offset;

  if (SIMPLE_ESCAPES.has(state.ch) || state.ch === quote) {
    next(state);
    return true;
  }

  const shape = numericEscape(state);
  if (!shape) {
    reportError(state, offs, state.ch === EOF_RUNE ? 'TF-L008' : 'TF-L007');
    return false;
  }

  let x = 0;
  for (let n = shape.digits; n > 0; n--) {
    const d = digitVal(state.ch);
    if (d >= shape.base) {
      if (state.ch === EOF_RUNE) {
        reportError(state, state.offset, 'TF-L008');
      } else {
        reportError(state, state.offset, 'TF-L009', {
          char: formatRune(state.ch),
        });
      }
      return false;
    }
    x = x * shape.base + d;
    next(state);
  }

  if (x > shape.max || (x >= 0xd800 && x < 0xe000)) {
    reportError(state, offs, 'TF-L010');
    return false;
  }
  return true;
}

/**
 * Scan a quoted literal; the opening quote is already consumed. A newline
 * or the end of input before the closing quote ends the literal with an
 * error, and the text scanned so far is returned.
 */
export function scanString(state: ScannerState, quote: number): string {
  const offs = state.offset - 1;

  for (;;) {
    const ch = state.ch;
    if (ch === CHAR.NEWLINE || ch === EOF_RUNE) {
      reportError(state, offs, 'TF-L011');
      break;
    }
    next(state);
    if (ch === quote) {
      break;
    }
    if (ch === CHAR.BACKSLASH) {
      scanEscape(state, quote);
    }
  }

  return textBetween(state, offs, state.offset);
}
