/**
 * Tokenfront
 * Source positions, a file set and a fault-tolerant scanner
 */

export {
  compareCodePoints,
  comparePositions,
  formatPosition,
  INVALID_POSITION,
  isValidPos,
  isValidPosition,
  NO_POS,
  type Pos,
  type Position,
} from './position.js';
export { type LineInfo, SourceFile } from './source/file.js';
export { FileSet } from './source/file-set.js';
export type { SerializedFile, SerializedFileSet } from './source/serialize.js';
export {
  isLiteral,
  isOperator,
  OPERATOR_TEXT,
  type OperatorType,
  TOKEN_TYPES,
  tokenString,
  type TokenType,
} from './token/token-types.js';
export { Scanner, type ScanResult } from './scanner/scanner.js';
export type { ErrorHandler } from './scanner/state.js';
export {
  compareDiagnostics,
  DEFAULT_MAX_DISPLAYED_ERRORS,
  ErrorList,
  ErrorListError,
  formatDiagnostic,
  printErrors,
  type ScanDiagnostic,
  type TextSink,
} from './errors/error-list.js';
export {
  tokenize,
  type TokenizeOptions,
  type TokenizeResult,
} from './tokenize.js';
export {
  CONFIG_FILE_NAMES,
  createDefaultConfig,
  loadConfig,
  parseConfig,
  type TokenfrontConfig,
} from './config.js';
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  messageFor,
  renderMessage,
} from './error-registry.js';
export {
  ConfigError,
  ContractError,
  createError,
  TokenfrontError,
  type TokenfrontErrorData,
} from './error-classes.js';
