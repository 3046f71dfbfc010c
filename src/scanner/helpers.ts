/**
 * Scanner Helper Functions
 * UTF-8 decoding and character classification over code points
 */

// ============================================================
// CONSTANTS
// ============================================================

/** Current-character value once the source is exhausted */
export const EOF_RUNE = -1;

/** Byte order mark, only permitted as the very first character */
export const BOM = 0xfeff;

/** Code points below RUNE_SELF are single-byte ASCII */
export const RUNE_SELF = 0x80;

/** Replacement character produced for invalid encodings */
export const RUNE_ERROR = 0xfffd;

export const MAX_RUNE = 0x10ffff;

/** ASCII code points the scanner dispatches on */
export const CHAR = {
  NUL: 0x00,
  TAB: 0x09,
  NEWLINE: 0x0a,
  CR: 0x0d,
  SPACE: 0x20,
  DQUOTE: 0x22,
  SQUOTE: 0x27,
  STAR: 0x2a,
  PLUS: 0x2b,
  MINUS: 0x2d,
  DOT: 0x2e,
  SLASH: 0x2f,
  ZERO: 0x30,
  SEVEN: 0x37,
  EIGHT: 0x38,
  NINE: 0x39,
  UPPER_E: 0x45,
  UPPER_U: 0x55,
  UPPER_X: 0x58,
  BACKSLASH: 0x5c,
  UNDERSCORE: 0x5f,
  LOWER_E: 0x65,
  LOWER_U: 0x75,
  LOWER_X: 0x78,
};

// ============================================================
// UTF-8 DECODING
// ============================================================

export interface DecodedRune {
  readonly rune: number;
  readonly width: number;
}

const INVALID: DecodedRune = { rune: RUNE_ERROR, width: 1 };

function isContinuation(
  b: number | undefined,
  lo = 0x80,
  hi = 0xbf
): b is number {
  return b !== undefined && lo <= b && b <= hi;
}

/**
 * Decode the UTF-8 sequence starting at src[offset].
 *
 * Invalid or truncated sequences, overlong forms and surrogate halves all
 * decode to RUNE_ERROR with width 1. A correctly encoded U+FFFD decodes to
 * RUNE_ERROR with width 3.
 */
export function decodeRune(src: Uint8Array, offset: number): DecodedRune {
  const b0 = src[offset];
  if (b0 === undefined) {
    return INVALID;
  }
  if (b0 < RUNE_SELF) {
    return { rune: b0, width: 1 };
  }

  const b1 = src[offset + 1];
  if (b0 >= 0xc2 && b0 <= 0xdf) {
    if (!isContinuation(b1)) return INVALID;
    return { rune: ((b0 & 0x1f) << 6) | (b1 & 0x3f), width: 2 };
  }

  const b2 = src[offset + 2];
  if (b0 >= 0xe0 && b0 <= 0xef) {
    // E0 excludes overlongs, ED excludes surrogates
    const lo = b0 === 0xe0 ? 0xa0 : 0x80;
    const hi = b0 === 0xed ? 0x9f : 0xbf;
    if (!isContinuation(b1, lo, hi) || !isContinuation(b2)) return INVALID;
    return {
      rune: ((b0 & 0x0f) << 12) | ((b1 & 0x3f) << 6) | (b2 & 0x3f),
      width: 3,
    };
  }

  const b3 = src[offset + 3];
  if (b0 >= 0xf0 && b0 <= 0xf4) {
    // F0 excludes overlongs, F4 caps at U+10FFFF
    const lo = b0 === 0xf0 ? 0x90 : 0x80;
    const hi = b0 === 0xf4 ? 0x8f : 0xbf;
    if (
      !isContinuation(b1, lo, hi) ||
      !isContinuation(b2) ||
      !isContinuation(b3)
    ) {
      return INVALID;
    }
    return {
      rune:
        ((b0 & 0x07) << 18) |
        ((b1 & 0x3f) << 12) |
        ((b2 & 0x3f) << 6) |
        (b3 & 0x3f),
      width: 4,
    };
  }

  return INVALID;
}

// ============================================================
// CHARACTER CLASSES
// ============================================================

const UNICODE_LETTER = /^\p{L}$/u;
const UNICODE_DIGIT = /^\p{Nd}$/u;
const UNICODE_PRINT = /^[\p{L}\p{M}\p{N}\p{P}\p{S}]$/u;

export function runeString(ch: number): string {
  return ch < 0 ? '' : String.fromCodePoint(ch);
}

export function isLetter(ch: number): boolean {
  return (
    (ch >= 0x61 && ch <= 0x7a) ||
    (ch >= 0x41 && ch <= 0x5a) ||
    ch === CHAR.UNDERSCORE ||
    (ch >= RUNE_SELF && UNICODE_LETTER.test(runeString(ch)))
  );
}

/** ASCII or Unicode decimal digit */
export function isDigit(ch: number): boolean {
  return (
    isDecimal(ch) || (ch >= RUNE_SELF && UNICODE_DIGIT.test(runeString(ch)))
  );
}

export function isDecimal(ch: number): boolean {
  return ch >= CHAR.ZERO && ch <= CHAR.NINE;
}

export function isWhitespace(ch: number): boolean {
  return (
    ch === CHAR.SPACE ||
    ch === CHAR.TAB ||
    ch === CHAR.NEWLINE ||
    ch === CHAR.CR
  );
}

/** Value of a hex digit, or 16 for anything that is not one */
export function digitVal(ch: number): number {
  if (ch >= CHAR.ZERO && ch <= CHAR.NINE) return ch - CHAR.ZERO;
  if (ch >= 0x61 && ch <= 0x66) return ch - 0x61 + 10;
  if (ch >= 0x41 && ch <= 0x46) return ch - 0x41 + 10;
  return 16;
}

/**
 * Format a code point as `U+0040 '@'`. The quoted character is left out
 * when it is not printable.
 */
export function formatRune(ch: number): string {
  const hex = ch.toString(16).toUpperCase().padStart(4, '0');
  const s = runeString(ch);
  const printable = ch === CHAR.SPACE || UNICODE_PRINT.test(s);
  return printable ? `U+${hex} '${s}'` : `U+${hex}`;
}
