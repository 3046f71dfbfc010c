/**
 * Error List
 * Collects positioned diagnostics, orders them and renders them
 */

import {
  compareCodePoints,
  comparePositions,
  formatPosition,
  isValidPosition,
  type Position,
} from '../position.js';

// ============================================================
// DIAGNOSTIC
// ============================================================

/** One reported problem and where it happened */
export interface ScanDiagnostic {
  readonly pos: Position;
  readonly msg: string;
}

/**
 * Render as `file:line:column: msg`, or `msg` alone when the position
 * carries neither a filename nor a location.
 */
export function formatDiagnostic(diagnostic: ScanDiagnostic): string {
  const { pos, msg } = diagnostic;
  if (pos.filename !== '' || isValidPosition(pos)) {
    return `${formatPosition(pos)}: ${msg}`;
  }
  return msg;
}

/** Order by position, then by message */
export function compareDiagnostics(
  a: ScanDiagnostic,
  b: ScanDiagnostic
): number {
  const byPosition = comparePositions(a.pos, b.pos);
  if (byPosition !== 0) {
    return byPosition;
  }
  return compareCodePoints(a.msg, b.msg);
}

// ============================================================
// ERROR LIST
// ============================================================

/** Default number of entries shown by summarize() */
export const DEFAULT_MAX_DISPLAYED_ERRORS = 10;

/**
 * A list of diagnostics in insertion order. Pass
 * `(pos, msg) => list.add(pos, msg)` as the scanner's ErrorHandler to collect
 * everything it reports.
 */
export class ErrorList implements Iterable<ScanDiagnostic> {
  private items: ScanDiagnostic[] = [];

  get length(): number {
    return this.items.length;
  }

  get entries(): readonly ScanDiagnostic[] {
    return this.items;
  }

  [Symbol.iterator](): Iterator<ScanDiagnostic> {
    return this.items[Symbol.iterator]();
  }

  at(index: number): ScanDiagnostic | undefined {
    return this.items[index];
  }

  add(pos: Position, msg: string): void {
    this.items.push({ pos, msg });
  }

  /** Remove all entries */
  reset(): void {
    this.items = [];
  }

  /**
   * Sort by filename, line, column and message. Entries without a filename
   * come first. The sort is stable.
   */
  sort(): void {
    this.items.sort(compareDiagnostics);
  }

  /**
   * Keep only the first entry of each (filename, line) pair. Assumes the
   * list is sorted.
   */
  removeMultiples(): void {
    let last: Position | undefined;
    this.items = this.items.filter(({ pos }) => {
      if (
        last !== undefined &&
        last.filename === pos.filename &&
        last.line === pos.line
      ) {
        return false;
      }
      last = pos;
      return true;
    });
  }

  /** One rendered line per entry */
  lines(): string[] {
    return this.items.map(formatDiagnostic);
  }

  /**
   * Rendered entries, at most `limit` of them, followed by an
   * `and N more errors` line when some were left out.
   */
  summarize(limit: number = DEFAULT_MAX_DISPLAYED_ERRORS): string {
    const shown = this.items
      .slice(0, Math.max(0, limit))
      .map(formatDiagnostic);
    const hidden = this.items.length - shown.length;
    if (hidden > 0) {
      shown.push(`and ${hidden} more ${hidden === 1 ? 'error' : 'errors'}`);
    }
    return shown.join('\n');
  }

  toString(): string {
    const [first] = this.items;
    if (first === undefined) {
      return 'no errors';
    }
    const text = formatDiagnostic(first);
    if (this.items.length === 1) {
      return text;
    }
    return `${text} (and ${this.items.length - 1} more errors)`;
  }

  /** The list as an Error, or null if it is empty */
  err(): ErrorListError | null {
    return this.items.length === 0 ? null : new ErrorListError(this);
  }
}

/** Thrown or returned form of a non-empty ErrorList */
export class ErrorListError extends Error {
  readonly errors: readonly ScanDiagnostic[];

  constructor(list: ErrorList) {
    super(list.toString());
    this.name = 'ErrorListError';
    this.errors = [...list.entries];
  }
}

// ============================================================
// PRINTING
// ============================================================

/** Anything with a write(string) method, e.g. process.stderr */
export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * Write an error to `out`: one line per entry for an ErrorList or
 * ErrorListError, the error message for anything else. Nothing is written
 * for null or undefined.
 */
export function printErrors(out: TextSink, err: unknown): void {
  if (err instanceof ErrorList) {
    for (const line of err.lines()) {
      out.write(`${line}\n`);
    }
  } else if (err instanceof ErrorListError) {
    for (const diagnostic of err.errors) {
      out.write(`${formatDiagnostic(diagnostic)}\n`);
    }
  } else if (err instanceof Error) {
    out.write(`${err.message}\n`);
  } else if (err !== null && err !== undefined) {
    out.write(`${String(err)}\n`);
  }
}
