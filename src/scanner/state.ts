/**
 * Scanner State
 * Cursor over one file's bytes, decoded one code point at a time
 */

import { TextDecoder } from 'node:util';

import { messageFor } from '../error-registry.js';
import type { Position } from '../position.js';
import type { SourceFile } from '../source/file.js';
import {
  BOM,
  CHAR,
  decodeRune,
  EOF_RUNE,
  RUNE_ERROR,
  RUNE_SELF,
} from './helpers.js';

/**
 * Receives every scanner diagnostic: the position of the offending
 * character and the message.
 */
export type ErrorHandler = (pos: Position, msg: string) => void;

export interface ScannerState {
  readonly file: SourceFile;
  readonly src: Uint8Array;
  readonly err: ErrorHandler | undefined;

  /** Current code point, EOF_RUNE at end of input */
  ch: number;
  /** Byte offset of ch */
  offset: number;
  /** Byte offset just past ch */
  rdOffset: number;
  errorCount: number;
}

const decoder = new TextDecoder('utf-8', { ignoreBOM: true });

export function createScannerState(
  file: SourceFile,
  src: Uint8Array,
  err: ErrorHandler | undefined
): ScannerState {
  return {
    file,
    src,
    err,
    ch: CHAR.SPACE,
    offset: 0,
    rdOffset: 0,
    errorCount: 0,
  };
}

/**
 * Report a diagnostic at a local offset. The count goes up whether or not a
 * handler is installed.
 */
export function reportError(
  state: ScannerState,
  offset: number,
  errorId: string,
  context: Record<string, unknown> = {}
): void {
  if (state.err) {
    const pos = state.file.position(state.file.pos(offset));
    state.err(pos, messageFor(errorId, context));
  }
  state.errorCount++;
}

/**
 * Read the next code point into state.ch. Records a line start in the file
 * whenever the character being left behind is a newline.
 */
export function next(state: ScannerState): void {
  if (state.rdOffset >= state.src.length) {
    state.offset = state.src.length;
    if (state.ch === CHAR.NEWLINE) {
      state.file.addLine(state.offset);
    }
    state.ch = EOF_RUNE;
    return;
  }

  state.offset = state.rdOffset;
  if (state.ch === CHAR.NEWLINE) {
    state.file.addLine(state.offset);
  }

  let r = state.src[state.rdOffset] ?? CHAR.NUL;
  let w = 1;
  if (r === CHAR.NUL) {
    reportError(state, state.offset, 'TF-L001');
  } else if (r >= RUNE_SELF) {
    const decoded = decodeRune(state.src, state.rdOffset);
    r = decoded.rune;
    w = decoded.width;
    if (r === RUNE_ERROR && w === 1) {
      reportError(state, state.offset, 'TF-L002');
    } else if (r === BOM && state.offset > 0) {
      reportError(state, state.offset, 'TF-L003');
    }
  }
  state.rdOffset += w;
  state.ch = r;
}

/** Source text between two local offsets */
export function textBetween(
  state: ScannerState,
  from: number,
  to: number
): string {
  return decoder.decode(state.src.subarray(from, to));
}
