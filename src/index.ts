/**
 * jscan
 * JavaScript scanner with parser-driven lookahead
 */

export {
  createLexerState,
  DEFAULT_FILENAME,
  expectsOperand,
  isKeyword,
  KEYWORDS,
  nextToken,
  tokenize,
  Tokenizer,
  type LexerErrorEvent,
  type LexerObservability,
  type LexerState,
  type ScanFlags,
  type TokenEvent,
  type TokenizeOptions,
  type TokenizerOptions,
} from './lexer/index.js';

export {
  createError,
  ERROR_REGISTRY,
  formatError,
  InternalError,
  LexerError,
  ParseError,
  renderMessage,
  ScanError,
  TOKEN_TYPES,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorExample,
  type ErrorKind,
  type ErrorRegistry,
  type NumberVariant,
  type ScanErrorData,
  type SourceLocation,
  type StringVariant,
  type Token,
  type TokenType,
  type TokenVariant,
} from './types.js';
