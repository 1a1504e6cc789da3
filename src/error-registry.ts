/**
 * Error Registry
 * Central error definitions with message template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND KINDS
// ============================================================

/** Error category determining the error ID prefix */
export type ErrorCategory = 'lexer' | 'parse' | 'internal';

/** Diagnostic kind reported to callers */
export type ErrorKind =
  | 'IllegalToken'
  | 'UnterminatedComment'
  | 'UnterminatedString'
  | 'UnterminatedRegexLiteral'
  | 'UnterminatedCharacterClass'
  | 'MissingExponentDigits'
  | 'MissingExpectedToken'
  | 'LookaheadOverflow'
  | 'EmptyPushback';

/**
 * Example demonstrating an error condition.
 */
export interface ErrorExample {
  readonly description: string;
  readonly code: string;
}

/** Registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: JSCAN-{category letter}{3-digit} (e.g., JSCAN-L001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  readonly kind: ErrorKind;
  /** Human-readable description */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
  readonly examples?: ErrorExample[] | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Read-only lookup of error definitions by ID.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: readonly ErrorDefinition[]) {
    this.byId = new Map(definitions.map((def) => [def.errorId, def]));
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
}

const ERROR_DEFINITIONS: readonly ErrorDefinition[] = [
  // Lexer Errors (JSCAN-L0xx)
  {
    errorId: 'JSCAN-L001',
    category: 'lexer',
    kind: 'IllegalToken',
    description: 'Illegal token',
    messageTemplate: 'Illegal token {char}',
    cause: 'No literal, identifier or operator starts with this character.',
    examples: [
      { description: 'Hash outside of a string', code: 'a # b' },
      { description: 'Template literal backtick', code: '`x`' },
    ],
  },
  {
    errorId: 'JSCAN-L002',
    category: 'lexer',
    kind: 'UnterminatedComment',
    description: 'Unterminated comment',
    messageTemplate: 'Unterminated comment',
    cause: 'A block comment was opened with /* but the input ends before */.',
    examples: [{ description: 'Missing comment close', code: '/* note' }],
  },
  {
    errorId: 'JSCAN-L003',
    category: 'lexer',
    kind: 'UnterminatedString',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'A quote was opened but the line or the input ends before the matching quote.',
    examples: [
      { description: 'Missing closing quote', code: '"abc' },
      { description: 'Raw newline inside a string', code: "'a\nb'" },
    ],
  },
  {
    errorId: 'JSCAN-L004',
    category: 'lexer',
    kind: 'UnterminatedRegexLiteral',
    description: 'Unterminated regular expression',
    messageTemplate: 'Unterminated regular expression literal',
    cause: 'A regular expression was opened with / but never closed on its line.',
    examples: [{ description: 'Missing closing slash', code: 'x = /ab' }],
  },
  {
    errorId: 'JSCAN-L005',
    category: 'lexer',
    kind: 'UnterminatedCharacterClass',
    description: 'Unterminated character class',
    messageTemplate: 'Unterminated character class',
    cause: 'A [ inside a regular expression has no matching ].',
    examples: [{ description: 'Open class', code: 'x = /[a-z/' }],
  },
  {
    errorId: 'JSCAN-L006',
    category: 'lexer',
    kind: 'MissingExponentDigits',
    description: 'Missing exponent',
    messageTemplate: 'Missing exponent in {text}',
    cause: 'An exponent marker (e or E, optional sign) has no digits after it.',
    examples: [
      { description: 'Bare exponent marker', code: '1e' },
      { description: 'Signed exponent without digits', code: '2.5E+' },
    ],
  },
  {
    errorId: 'JSCAN-L007',
    category: 'lexer',
    kind: 'IllegalToken',
    description: 'Missing hexadecimal digits',
    messageTemplate: 'Missing hexadecimal digits after {prefix}',
    cause: 'A 0x or 0X prefix is not followed by any hexadecimal digit.',
    examples: [{ description: 'Empty hex literal', code: '0x' }],
  },

  // Parse Errors (JSCAN-P0xx)
  {
    errorId: 'JSCAN-P001',
    category: 'parse',
    kind: 'MissingExpectedToken',
    description: 'Missing expected token',
    messageTemplate: 'Missing {expected}',
    cause: 'The parser required a specific token but the next token differs.',
    examples: [{ description: 'Unclosed call', code: 'f(a' }],
  },

  // Internal Errors (JSCAN-I0xx)
  {
    errorId: 'JSCAN-I001',
    category: 'internal',
    kind: 'LookaheadOverflow',
    description: 'Too much lookahead',
    messageTemplate: 'PANIC: too much lookahead ({limit} tokens max)',
    cause: 'The caller pushed back more tokens than the lookahead buffer holds.',
  },
  {
    errorId: 'JSCAN-I002',
    category: 'internal',
    kind: 'EmptyPushback',
    description: 'Nothing to push back',
    messageTemplate: 'PANIC: no current token to push back',
    cause: 'unget() was called before any token was consumed.',
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
 * Replaces `{name}` placeholders with values from `context`.
 *
 * Missing values render as empty string, other values go through String().
 * A template with an unclosed brace is returned unchanged.
 *
 * @example
 * renderMessage('Missing {expected}', { expected: 'right_paren' })
 * // Returns: "Missing right_paren"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const open = template.indexOf('{', i);
    if (open === -1) {
      result += template.slice(i);
      break;
    }

    const close = template.indexOf('}', open + 1);
    if (close === -1) return template;

    result += template.slice(i, open);
    const value = context[template.slice(open + 1, close)];
    if (value !== undefined) {
      try {
        result += String(value);
      } catch {
        // Objects without a usable toString (null prototype)
        result += Object.prototype.toString.call(value);
      }
    }
    i = close + 1;
  }

  return result;
}
