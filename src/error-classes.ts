/**
 * Scanner Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation } from './source-location.js';
import {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorKind,
} from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface ScanErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly filename: string;
  readonly location: SourceLocation;
  readonly context?: Record<string, unknown> | undefined;
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for everything the scanner raises.
 * `message` ends with the filename and line; `toData()` gives the bare message.
 */
export class ScanError extends Error {
  readonly errorId: string;
  readonly kind: ErrorKind;
  readonly filename: string;
  readonly location: SourceLocation;
  readonly context?: Record<string, unknown> | undefined;
  private readonly detail: string;

  constructor(data: ScanErrorData) {
    const definition = ERROR_REGISTRY.get(data.errorId);
    if (!definition) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    super(`${data.message} at ${data.filename}:${data.location.line}`);
    this.name = 'ScanError';
    this.errorId = data.errorId;
    this.kind = definition.kind;
    this.filename = data.filename;
    this.location = data.location;
    this.context = data.context;
    this.detail = data.message;
  }

  get line(): number {
    return this.location.line;
  }

  /** Get structured error data for custom formatting */
  toData(): ScanErrorData {
    return {
      errorId: this.errorId,
      message: this.detail,
      filename: this.filename,
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: ScanErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

function checkCategory(errorId: string, expected: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== expected) {
    throw new TypeError(`Expected ${expected} error ID, got: ${errorId}`);
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Source text that no lexical rule accepts */
export class LexerError extends ScanError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    filename: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'lexer');
    super({ errorId, message, filename, location, context });
    this.name = 'LexerError';
  }
}

/** Token sequence rejected by a caller's expectation (mustMatch) */
export class ParseError extends ScanError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    filename: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'parse');
    super({ errorId, message, filename, location, context });
    this.name = 'ParseError';
  }
}

/**
 * Broken tokenizer contract on the caller's side (e.g. too many ungets).
 * Never caused by source text; a tokenizer that raised one is unusable.
 */
export class InternalError extends ScanError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    filename: string,
    context?: Record<string, unknown>
  ) {
    checkCategory(errorId, 'internal');
    super({ errorId, message, filename, location, context });
    this.name = 'InternalError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Creates the error for `errorId`, rendering its registry template with `context`.
 *
 * @throws TypeError if errorId is not in the registry
 *
 * @example
 * createError('JSCAN-P001', { expected: 'semicolon' }, location, 'app.js')
 * // ParseError: "Missing semicolon at app.js:3"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation,
  filename: string
): ScanError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);
  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location, filename, context);
    case 'parse':
      return new ParseError(errorId, message, location, filename, context);
    case 'internal':
      return new InternalError(errorId, message, location, filename, context);
  }
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format an error for a diagnostic stream.
 *
 * Source problems render as `Syntax error: <message>` followed by
 * `<filename>:<line>` on the next line.
 */
export function formatError(err: Error): string {
  if (err instanceof InternalError) {
    return `Internal error: ${err.toData().message}`;
  }
  if (err instanceof ScanError) {
    const data = err.toData();
    return `Syntax error: ${data.message}\n${data.filename}:${data.location.line}`;
  }
  return err.message;
}
