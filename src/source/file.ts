/**
 * Source File
 * One file's slice of the global offset space and its line table
 */

import { ContractError } from '../error-classes.js';
import {
  INVALID_POSITION,
  NO_POS,
  type Pos,
  type Position,
} from '../position.js';
import type { ExclusiveLock } from './lock.js';
import type { SerializedFile } from './serialize.js';

// ============================================================
// TYPES
// ============================================================

/**
 * Alternate position entry: from `offset` on, positions are reported in
 * `filename` with the line at `offset` numbered `line`.
 */
export interface LineInfo {
  readonly offset: number;
  readonly filename: string;
  readonly line: number;
}

export interface SourceFileData {
  readonly name: string;
  readonly base: number;
  readonly size: number;
  readonly lines?: readonly number[] | undefined;
  readonly infos?: readonly LineInfo[] | undefined;
}

// ============================================================
// SEARCH
// ============================================================

/**
 * Index of the last element whose key is <= x, or -1 if there is none.
 * Elements must be sorted ascending by key.
 */
export function searchAtOrBelow<T>(
  items: readonly T[],
  x: number,
  key: (item: T) => number
): number {
  let lo = 0;
  let hi = items.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const item = items[mid];
    if (item !== undefined && key(item) <= x) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}

const identity = (n: number): number => n;

// ============================================================
// SOURCE FILE
// ============================================================

/**
 * A file registered with a FileSet. Created by FileSet.addFile().
 *
 * Local offsets run from 0 to size inclusive; offset `size` is the position
 * just past the last byte, where EOF tokens sit.
 */
export class SourceFile {
  readonly name: string;
  readonly base: number;
  readonly size: number;

  private readonly lock: ExclusiveLock;
  private lines: number[];
  private infos: LineInfo[];

  constructor(lock: ExclusiveLock, data: SourceFileData) {
    this.lock = lock;
    this.name = data.name;
    this.base = data.base;
    this.size = data.size;
    this.lines = data.lines ? [...data.lines] : [0];
    this.infos = data.infos ? data.infos.map((info) => ({ ...info })) : [];
  }

  // ------------------------------------------------------------
  // Line table
  // ------------------------------------------------------------

  get lineCount(): number {
    return this.lock.run('lineCount', () => this.lines.length);
  }

  /**
   * Record that a line starts at `offset`. Ignored unless `offset` lies past
   * the last recorded line start and before the end of the file, so
   * re-scanning a file is harmless.
   */
  addLine(offset: number): void {
    this.lock.run('addLine', () => {
      const last = this.lines[this.lines.length - 1];
      if ((last === undefined || last < offset) && offset < this.size) {
        this.lines.push(offset);
      }
    });
  }

  /**
   * Replace the line table. Each entry is the offset of the first byte of a
   * line; entries must be strictly ascending and below the file size.
   *
   * @returns false (and leaves the table unchanged) if the table is invalid
   */
  setLines(lines: readonly number[]): boolean {
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];
      const prev = i > 0 ? lines[i - 1] : undefined;
      if (
        line === undefined ||
        !Number.isInteger(line) ||
        line < 0 ||
        line >= this.size ||
        (prev !== undefined && line <= prev)
      ) {
        return false;
      }
    }
    this.lock.run('setLines', () => {
      this.lines = [...lines];
    });
    return true;
  }

  /**
   * Derive the line table from the file content.
   *
   * @throws ContractError if content.length differs from the file size
   */
  setLinesForContent(content: Uint8Array): void {
    if (content.length !== this.size) {
      throw new ContractError('TF-C010', {
        length: content.length,
        size: this.size,
      });
    }
    const lines: number[] = [];
    let line = 0;
    for (let offset = 0; offset < content.length; offset++) {
      if (line >= 0) {
        lines.push(line);
      }
      line = -1;
      if (content[offset] === 0x0a) {
        line = offset + 1;
      }
    }
    this.lock.run('setLinesForContent', () => {
      this.lines = lines.length > 0 ? lines : [0];
    });
  }

  /** Pos of the first byte of a 1-based line */
  lineStart(line: number): Pos {
    return this.lock.run('lineStart', () => {
      const start = this.lines[line - 1];
      if (line < 1 || start === undefined) {
        throw new ContractError('TF-C006', {
          line,
          count: this.lines.length,
        });
      }
      return this.base + start;
    });
  }

  /**
   * Add an alternate position entry, the effect of a line directive.
   * Ignored unless `offset` lies past the previous entry and before the end
   * of the file.
   */
  addLineInfo(offset: number, filename: string, line: number): void {
    this.lock.run('addLineInfo', () => {
      const last = this.infos[this.infos.length - 1];
      if ((last === undefined || last.offset < offset) && offset < this.size) {
        this.infos.push({ offset, filename, line });
      }
    });
  }

  // ------------------------------------------------------------
  // Offsets
  // ------------------------------------------------------------

  /** Global Pos of a local offset */
  pos(offset: number): Pos {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.size) {
      throw new ContractError('TF-C004', { offset, size: this.size });
    }
    return this.base + offset;
  }

  /** Local offset of a global Pos; inverse of pos() */
  offset(p: Pos): number {
    if (!this.contains(p)) {
      throw new ContractError('TF-C005', {
        pos: p,
        base: this.base,
        end: this.base + this.size,
      });
    }
    return p - this.base;
  }

  contains(p: Pos): boolean {
    return this.base <= p && p <= this.base + this.size;
  }

  // ------------------------------------------------------------
  // Resolution
  // ------------------------------------------------------------

  /** Line number of p, honoring alternate position entries */
  line(p: Pos): number {
    return this.position(p).line;
  }

  position(p: Pos): Position {
    return this.positionFor(p, true);
  }

  /**
   * Resolve p within this file. With `adjusted` false, alternate position
   * entries are ignored.
   */
  positionFor(p: Pos, adjusted: boolean): Position {
    if (p === NO_POS) {
      return INVALID_POSITION;
    }
    const offset = this.offset(p);
    return this.lock.run('position', () => this.unpack(p, offset, adjusted));
  }

  /**
   * Resolution without taking the lock; the caller must hold it.
   * @internal
   */
  unpack(p: Pos, offset: number, adjusted: boolean): Position {
    let filename = this.name;
    let line = 0;
    let column = 0;

    const i = searchAtOrBelow(this.lines, offset, identity);
    const start = this.lines[i];
    if (start !== undefined) {
      line = i + 1;
      column = offset - start + 1;
    }

    if (adjusted && this.infos.length > 0) {
      const j = searchAtOrBelow(this.infos, offset, (info) => info.offset);
      const alt = this.infos[j];
      if (alt !== undefined) {
        filename = alt.filename;
        const k = searchAtOrBelow(this.lines, alt.offset, identity);
        if (k >= 0) {
          line += alt.line - k - 1;
        }
      }
    }

    return { filename, offset: p, line, column };
  }

  /**
   * Copy of the persisted state; the caller must hold the lock.
   * @internal
   */
  snapshot(): SerializedFile {
    return {
      name: this.name,
      base: this.base,
      size: this.size,
      lines: [...this.lines],
      infos: this.infos.map((info) => ({ ...info })),
    };
  }
}
