/**
 * Source Positions
 * Global offsets and the resolved (filename, line, column) form
 */

// ============================================================
// POS
// ============================================================

/**
 * Compact encoding of a source location: an offset into the global offset
 * space of a FileSet. Convert to a Position with FileSet.position().
 */
export type Pos = number;

/** The zero Pos; no file or line information is associated with it */
export const NO_POS: Pos = 0;

export function isValidPos(p: Pos): boolean {
  return p !== NO_POS;
}

// ============================================================
// POSITION
// ============================================================

/** A resolved source location */
export interface Position {
  /** Filename, if any */
  readonly filename: string;
  /** Global offset, starting at 1 (0 means unknown) */
  readonly offset: number;
  /** Line number, starting at 1 */
  readonly line: number;
  /** Column number, starting at 1 (byte count within the line) */
  readonly column: number;
}

export const INVALID_POSITION: Position = {
  filename: '',
  offset: 0,
  line: 0,
  column: 0,
};

export function isValidPosition(pos: Position): boolean {
  return pos.offset !== 0 || pos.filename !== '';
}

/**
 * Render a position as `file:line:column`.
 *
 * Forms:
 * - `file:line:column` valid position with filename
 * - `line:column` valid position without filename
 * - `file` invalid position with filename
 * - `-` invalid position without filename
 *
 * The column is omitted when it is 0.
 */
export function formatPosition(pos: Position): string {
  let s = pos.filename;
  if (isValidPosition(pos) && pos.line > 0) {
    if (s !== '') {
      s += ':';
    }
    s += String(pos.line);
    if (pos.column !== 0) {
      s += `:${pos.column}`;
    }
  }
  return s === '' ? '-' : s;
}

/**
 * Compare strings by Unicode code point, which matches the byte order of
 * their UTF-8 encodings. Plain `<` compares UTF-16 units and puts
 * characters above U+FFFF before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  if (a === b) {
    return 0;
  }
  const right = b[Symbol.iterator]();
  for (const ch of a) {
    const next = right.next();
    if (next.done === true) {
      return 1;
    }
    const x = ch.codePointAt(0) ?? 0;
    const y = next.value.codePointAt(0) ?? 0;
    if (x !== y) {
      return x < y ? -1 : 1;
    }
  }
  return right.next().done === true ? 0 : -1;
}

/**
 * Order positions by filename, then line, then column.
 * Positions without a filename sort first.
 */
export function comparePositions(a: Position, b: Position): number {
  if (a.filename !== b.filename) {
    return compareCodePoints(a.filename, b.filename);
  }
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  return a.column - b.column;
}
