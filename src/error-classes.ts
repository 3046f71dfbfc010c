/**
 * Error Classes and Factory
 * Structured error types backed by the error registry
 */

import { ERROR_REGISTRY, renderMessage } from './error-registry.js';
import type { ErrorCategory } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface TokenfrontErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all errors thrown by this package.
 * Scanner diagnostics are not thrown; they go to the ErrorHandler.
 */
export class TokenfrontError extends Error {
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: TokenfrontErrorData) {
    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(data.message);
    this.name = 'TokenfrontError';
    this.errorId = data.errorId;
    this.category = definition.category;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): TokenfrontErrorData {
    return {
      errorId: this.errorId,
      message: this.message,
      context: this.context,
    };
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

function definitionIn(
  errorId: string,
  category: ErrorCategory
): { messageTemplate: string } {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
  return definition;
}

/**
 * Misuse of the API: the caller broke a precondition.
 * These abort the operation; state is left as it was before the call.
 */
export class ContractError extends TokenfrontError {
  constructor(errorId: string, context: Record<string, unknown> = {}) {
    const definition = definitionIn(errorId, 'contract');
    super({
      errorId,
      message: renderMessage(definition.messageTemplate, context),
      context,
    });
    this.name = 'ContractError';
  }
}

/** Invalid configuration file content */
export class ConfigError extends TokenfrontError {
  readonly path: string;

  constructor(path: string, reason: string) {
    const definition = definitionIn('TF-G001', 'config');
    super({
      errorId: 'TF-G001',
      message: renderMessage(definition.messageTemplate, { reason }),
      context: { path, reason },
    });
    this.name = 'ConfigError';
    this.path = path;
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create the error class matching the category of errorId.
 *
 * @example
 * createError('TF-C003', { size: -1 })
 * // ContractError: "invalid size -1 (should be >= 0)"
 *
 * @throws TypeError if errorId is not registered or names a lexer
 * diagnostic (those are reported through the scanner's ErrorHandler)
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>
): TokenfrontError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  switch (definition.category) {
    case 'contract':
      return new ContractError(errorId, context);
    case 'config':
      return new ConfigError(
        typeof context['path'] === 'string' ? context['path'] : '',
        typeof context['reason'] === 'string' ? context['reason'] : ''
      );
    case 'lexer':
      throw new TypeError(`Lexer diagnostics are not thrown: ${errorId}`);
  }
}
