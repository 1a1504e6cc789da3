/**
 * Scanner Types
 * Re-exports token, location and error types from their modules
 */

export type { SourceLocation } from './source-location.js';

export {
  TOKEN_TYPES,
  type NumberVariant,
  type StringVariant,
  type Token,
  type TokenType,
  type TokenVariant,
} from './token-types.js';

export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorKind,
  type ErrorRegistry,
} from './error-registry.js';

export {
  createError,
  formatError,
  InternalError,
  LexerError,
  ParseError,
  ScanError,
  type ScanErrorData,
} from './error-classes.js';
