/**
 * Token Classification
 * Produces the next token at the cursor under the current mode flags,
 * and tokenizes whole sources
 */

import type { Token } from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isIdentifierStart,
  makeToken,
  withComments,
} from './helpers.js';
import {
  readIdentifier,
  readNumber,
  readOperator,
  readRegExp,
  readString,
} from './readers.js';
import { type LexerObservability, observeScan } from './observability.js';
import { expectsOperand } from './operand.js';
import { skipInsignificant } from './skipper.js';
import {
  advance,
  createLexerState,
  currentLocation,
  DEFAULT_FILENAME,
  isAtEnd,
  type LexerState,
  peek,
} from './state.js';

/** Mode flags owned by the caller (the parser) */
export interface ScanFlags {
  /** Emit `\n` as a newline token instead of skipping it */
  readonly scanNewlines: boolean;
  /** An operand is expected next, so a leading `/` opens a regexp */
  readonly scanOperand: boolean;
}

function classify(state: LexerState, flags: ScanFlags): Token {
  const start = currentLocation(state);

  if (isAtEnd(state)) {
    return makeToken(TOKEN_TYPES.END, '', start, start.offset);
  }

  const ch = peek(state);

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Number (including .5)
  if (isDigit(ch) || (ch === '.' && isDigit(peek(state, 1)))) {
    return readNumber(state);
  }

  // String
  if (ch === '"' || ch === "'") {
    return readString(state);
  }

  // Regexp, only where an operand may start
  if (ch === '/' && flags.scanOperand) {
    return readRegExp(state);
  }

  const operator = readOperator(state);
  if (operator !== null) {
    return operator;
  }

  // Newline survives skipping only in newline-sensitive mode
  if (ch === '\n') {
    advance(state);
    return makeToken(TOKEN_TYPES.NEWLINE, '\n', start, state.pos);
  }

  // A surrogate pair names one character
  const char = String.fromCodePoint(state.source.codePointAt(state.pos) ?? 0);
  throw createError(
    'JSCAN-L001',
    { char: JSON.stringify(char) },
    start,
    state.filename
  );
}

/**
 * Skip insignificant input, then scan one token.
 * Comments skipped on the way are attached to the returned token.
 */
export function nextToken(state: LexerState, flags: ScanFlags): Token {
  const comments = skipInsignificant(state, flags.scanNewlines);
  return withComments(classify(state, flags), comments);
}

export interface TokenizeOptions {
  filename?: string;
  /** Emit newline tokens (default false) */
  scanNewlines?: boolean;
  /**
   * Stands in for the parser's scanOperand decision, given the previous
   * significant token (undefined at the start). Defaults to expectsOperand.
   */
  expectsOperand?: (previous: Token | undefined) => boolean;
  observability?: LexerObservability;
}

/**
 * Scan a whole source text, end token included.
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
  const state = createLexerState(source, options.filename ?? DEFAULT_FILENAME);
  const scanNewlines = options.scanNewlines ?? false;
  const decide = options.expectsOperand ?? expectsOperand;
  const observability = options.observability ?? {};
  const tokens: Token[] = [];
  let previous: Token | undefined;
  let token: Token;

  do {
    const flags: ScanFlags = { scanNewlines, scanOperand: decide(previous) };
    token = observeScan(observability, () => nextToken(state, flags));
    tokens.push(token);
    if (token.type !== TOKEN_TYPES.NEWLINE) previous = token;
  } while (token.type !== TOKEN_TYPES.END);

  return tokens;
}
