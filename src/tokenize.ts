/**
 * Tokenize
 * Scan a whole source text in one call
 */

import { TextEncoder } from 'node:util';

import { createDefaultConfig, type TokenfrontConfig } from './config.js';
import { ErrorList } from './errors/error-list.js';
import type { Position } from './position.js';
import { Scanner, type ScanResult } from './scanner/scanner.js';
import type { ErrorHandler } from './scanner/state.js';
import type { SourceFile } from './source/file.js';
import { FileSet } from './source/file-set.js';
import { TOKEN_TYPES } from './token/token-types.js';

export interface TokenizeOptions extends Partial<TokenfrontConfig> {
  /** Set to register the file in; a new set is created when omitted */
  readonly fileSet?: FileSet | undefined;
  readonly filename?: string | undefined;
  /** Called for every diagnostic as it is reported */
  readonly onError?: ErrorHandler | undefined;
}

export interface TokenizeResult {
  /** Scanned tokens, ending with EOF */
  readonly tokens: ScanResult[];
  readonly errors: ErrorList;
  /** Diagnostics reported, before any de-duplication */
  readonly errorCount: number;
  /** errors.summarize() limited to maxDisplayedErrors, '' without errors */
  readonly summary: string;
  readonly file: SourceFile;
  readonly fileSet: FileSet;
}

const encoder = new TextEncoder();

/**
 * Register `source` as a new file and scan it to EOF.
 *
 * @example
 * const { tokens } = tokenize('x + 1');
 * tokens.map((t) => t.type); // ['IDENT', 'ADD', 'INT', 'EOF']
 */
export function tokenize(
  source: string | Uint8Array,
  options: TokenizeOptions = {}
): TokenizeResult {
  const defaults = createDefaultConfig();
  const includeComments = options.includeComments ?? defaults.includeComments;
  const sortErrors = options.sortErrors ?? defaults.sortErrors;
  const removeMultiples = options.removeMultiples ?? defaults.removeMultiples;
  const maxDisplayedErrors =
    options.maxDisplayedErrors ?? defaults.maxDisplayedErrors;

  const src = typeof source === 'string' ? encoder.encode(source) : source;
  const fileSet = options.fileSet ?? new FileSet();
  const file = fileSet.addFile(options.filename ?? '', -1, src.length);

  const errors = new ErrorList();
  const onError = options.onError;
  const handler: ErrorHandler = (pos: Position, msg: string) => {
    errors.add(pos, msg);
    onError?.(pos, msg);
  };

  const scanner = new Scanner();
  scanner.init(file, src, handler);

  const tokens: ScanResult[] = [];
  let token: ScanResult;
  do {
    token = scanner.scan();
    if (includeComments || token.type !== TOKEN_TYPES.COMMENT) {
      tokens.push(token);
    }
  } while (token.type !== TOKEN_TYPES.EOF);

  if (sortErrors) {
    errors.sort();
  }
  if (removeMultiples) {
    errors.removeMultiples();
  }

  return {
    tokens,
    errors,
    errorCount: scanner.errorCount,
    summary: errors.length === 0 ? '' : errors.summarize(maxDisplayedErrors),
    file,
    fileSet,
  };
}
