/**
 * Error Registry
 * Central definition table for scanner diagnostics and API misuse errors.
 */

// ============================================================
// ERROR CATEGORIES
// ============================================================

/**
 * Error category determining the ID prefix.
 * - lexer: recoverable diagnostics about source text (TF-L)
 * - contract: misuse of the API by the caller (TF-C)
 * - config: invalid configuration files (TF-G)
 */
export type ErrorCategory = 'lexer' | 'contract' | 'config';

/** Registry entry for a single error condition */
export interface ErrorDefinition {
  /** Format: TF-{category letter}{3-digit} (e.g., TF-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Short human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/** Read-only lookup of error definitions by ID */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
  byCategory(category: ErrorCategory): ErrorDefinition[];
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();
    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }
    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }

  byCategory(category: ErrorCategory): ErrorDefinition[] {
    return [...this.byId.values()].filter((def) => def.category === category);
  }
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer diagnostics (TF-L0xx). Templates are the exact reported messages.
  {
    errorId: 'TF-L001',
    category: 'lexer',
    description: 'NUL byte in source',
    messageTemplate: 'illegal character NUL',
  },
  {
    errorId: 'TF-L002',
    category: 'lexer',
    description: 'Invalid UTF-8 byte sequence',
    messageTemplate: 'illegal UTF-8 encoding',
  },
  {
    errorId: 'TF-L003',
    category: 'lexer',
    description: 'Byte order mark after file start',
    messageTemplate: 'illegal byte order mark',
  },
  {
    errorId: 'TF-L004',
    category: 'lexer',
    description: 'Character outside the token grammar',
    messageTemplate: 'illegal character {char}',
  },
  {
    errorId: 'TF-L005',
    category: 'lexer',
    description: 'Hex prefix without digits',
    messageTemplate: 'illegal hexadecimal number',
  },
  {
    errorId: 'TF-L006',
    category: 'lexer',
    description: 'Digit 8 or 9 in octal literal',
    messageTemplate: 'illegal octal number',
  },
  {
    errorId: 'TF-L007',
    category: 'lexer',
    description: 'Unrecognized escape introducer',
    messageTemplate: 'unknown escape sequence',
  },
  {
    errorId: 'TF-L008',
    category: 'lexer',
    description: 'Source ends inside an escape',
    messageTemplate: 'escape sequence not terminated',
  },
  {
    errorId: 'TF-L009',
    category: 'lexer',
    description: 'Wrong digit in escape sequence',
    messageTemplate: 'illegal character {char} in escape sequence',
  },
  {
    errorId: 'TF-L010',
    category: 'lexer',
    description: 'Escape outside the valid code points',
    messageTemplate: 'escape sequence is invalid Unicode code point',
  },
  {
    errorId: 'TF-L011',
    category: 'lexer',
    description: 'String without closing quote',
    messageTemplate: 'string literal not terminated',
  },

  // API contract violations (TF-C0xx)
  {
    errorId: 'TF-C001',
    category: 'contract',
    description: 'Scanner source length mismatch',
    messageTemplate: 'file size ({size}) does not match src len ({length})',
  },
  {
    errorId: 'TF-C002',
    category: 'contract',
    description: 'File registered below the next base',
    messageTemplate: 'invalid base {base} (should be >= {minimum})',
  },
  {
    errorId: 'TF-C003',
    category: 'contract',
    description: 'Negative file size',
    messageTemplate: 'invalid size {size} (should be >= 0)',
  },
  {
    errorId: 'TF-C004',
    category: 'contract',
    description: 'Local offset outside the file',
    messageTemplate: 'invalid file offset {offset} (should be <= {size})',
  },
  {
    errorId: 'TF-C005',
    category: 'contract',
    description: 'Global Pos outside the file',
    messageTemplate: 'invalid Pos value {pos} (should be in [{base}, {end}])',
  },
  {
    errorId: 'TF-C006',
    category: 'contract',
    description: 'Line number outside the file',
    messageTemplate:
      'invalid line number {line} (should be >= 1 and <= {count})',
  },
  {
    errorId: 'TF-C007',
    category: 'contract',
    description: 'Re-entrant file set access',
    messageTemplate: 'file set accessed while {operation} is in progress',
  },
  {
    errorId: 'TF-C008',
    category: 'contract',
    description: 'Malformed file set snapshot',
    messageTemplate: 'invalid file set snapshot: {reason}',
  },
  {
    errorId: 'TF-C009',
    category: 'contract',
    description: 'Scanner used before init',
    messageTemplate: 'scanner must be initialized with init() before scan()',
  },
  {
    errorId: 'TF-C010',
    category: 'contract',
    description: 'Line table content of the wrong length',
    messageTemplate: 'content length ({length}) does not match file size ({size})',
  },

  // Configuration errors (TF-G0xx)
  {
    errorId: 'TF-G001',
    category: 'config',
    description: 'Invalid configuration file',
    messageTemplate: 'Invalid configuration: {reason}',
  },
];

/**
 * Global error registry instance.
 * Read-only singleton initialized at module load.
 */
export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Renders a message template by replacing `{name}` placeholders with
 * context values.
 *
 * Missing context values render as empty string; other values are coerced
 * with String(). A template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage('illegal character {char}', { char: "U+0040 '@'" })
 * // Returns: "illegal character U+0040 '@'"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  const open = template.lastIndexOf('{');
  if (open !== -1 && template.indexOf('}', open) === -1) {
    return template;
  }
  return template.replace(/\{([^{}]*)\}/g, (_match, name: string) => {
    const value = context[name];
    return value === undefined ? '' : String(value);
  });
}

/**
 * Render the message of a registered error.
 *
 * @throws TypeError if errorId is not registered
 */
export function messageFor(
  errorId: string,
  context: Record<string, unknown> = {}
): string {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  return renderMessage(definition.messageTemplate, context);
}
