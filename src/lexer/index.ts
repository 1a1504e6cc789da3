/**
 * Lexer Module
 * Converts source text into tokens for a recursive-descent parser
 */

export { isKeyword, KEYWORDS } from './operators.js';
export type {
  LexerErrorEvent,
  LexerObservability,
  TokenEvent,
} from './observability.js';
export { expectsOperand } from './operand.js';
export {
  createLexerState,
  DEFAULT_FILENAME,
  type LexerState,
} from './state.js';
export { Tokenizer, type TokenizerOptions } from './stream.js';
export {
  nextToken,
  tokenize,
  type ScanFlags,
  type TokenizeOptions,
} from './tokenizer.js';
