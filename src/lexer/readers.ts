/**
 * Token Readers
 * Functions to read specific token kinds from source
 */

import type { SourceLocation, Token } from '../types.js';
import { createError, TOKEN_TYPES } from '../types.js';
import {
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isOctalDigit,
  makeToken,
} from './helpers.js';
import {
  ASSIGN_OPERATORS,
  keywordType,
  MAX_OPERATOR_LENGTH,
  OPERATORS,
} from './operators.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  type LexerState,
  peek,
  peekString,
  textFrom,
} from './state.js';

const REGEXP_FLAGS = 'gimy';

function fail(
  state: LexerState,
  errorId: string,
  location: SourceLocation,
  context: Record<string, unknown> = {}
): never {
  throw createError(errorId, context, location, state.filename);
}

// ============================================================
// IDENTIFIERS
// ============================================================

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  while (isIdentifierChar(peek(state))) {
    advance(state);
  }

  const value = textFrom(state, start.offset);
  const type = keywordType(value) ?? TOKEN_TYPES.IDENTIFIER;
  return makeToken(type, value, start, state.pos);
}

// ============================================================
// NUMBERS
// ============================================================

function readDigits(state: LexerState): void {
  while (isDigit(peek(state))) advance(state);
}

/** Consumes `e[+-]digits` if present; returns whether an exponent was read */
function readExponent(state: LexerState, start: SourceLocation): boolean {
  const marker = peek(state);
  if (marker !== 'e' && marker !== 'E') return false;

  advance(state);
  if (peek(state) === '+' || peek(state) === '-') advance(state);
  if (!isDigit(peek(state))) {
    fail(state, 'JSCAN-L006', currentLocation(state), {
      text: textFrom(state, start.offset),
    });
  }
  readDigits(state);
  return true;
}

function readHexNumber(state: LexerState, start: SourceLocation): Token {
  const prefix = advanceBy(state, 2);
  if (!isHexDigit(peek(state))) {
    fail(state, 'JSCAN-L007', start, { prefix });
  }
  while (isHexDigit(peek(state))) advance(state);

  const text = textFrom(state, start.offset);
  return makeToken(
    TOKEN_TYPES.NUMBER,
    parseInt(text.slice(2), 16),
    start,
    state.pos,
    { variant: 'int' }
  );
}

/**
 * Integer value of a decimal-looking literal. A leading zero followed only
 * by octal digits is a legacy octal literal (`010` is 8); `09` stays decimal.
 */
function integerValue(text: string): number {
  if (text.length > 1 && text.startsWith('0') && [...text].every(isOctalDigit)) {
    return parseInt(text, 8);
  }
  return Number(text);
}

/**
 * Reads a number starting at a digit, or at a `.` followed by a digit.
 * A fraction or an exponent makes it a float; otherwise it is an int.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);

  const second = peek(state, 1);
  if (peek(state) === '0' && (second === 'x' || second === 'X')) {
    return readHexNumber(state, start);
  }

  readDigits(state);
  let floating = false;
  if (peek(state) === '.') {
    floating = true;
    advance(state);
    readDigits(state);
  }
  if (readExponent(state, start)) floating = true;

  const text = textFrom(state, start.offset);
  return floating
    ? makeToken(TOKEN_TYPES.NUMBER, Number(text), start, state.pos, {
        variant: 'float',
      })
    : makeToken(TOKEN_TYPES.NUMBER, integerValue(text), start, state.pos, {
        variant: 'int',
      });
}

// ============================================================
// STRINGS
// ============================================================

const SIMPLE_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  b: '\b',
  f: '\f',
  v: '\v',
};

/** Decodes `\xHH` / `\uHHHH`; a malformed sequence yields the letter itself */
function readHexEscape(state: LexerState, letter: string, digits: number): string {
  const hex = peekString(state, digits);
  if (hex.length !== digits || ![...hex].every(isHexDigit)) {
    return letter;
  }
  advanceBy(state, digits);
  return String.fromCharCode(parseInt(hex, 16));
}

/** Up to three octal digits, the first of three at most `3` */
function readOctalEscape(state: LexerState, first: string): string {
  let digits = first;
  if (isOctalDigit(peek(state))) {
    digits += advance(state);
    if (first <= '3' && isOctalDigit(peek(state))) {
      digits += advance(state);
    }
  }
  return String.fromCharCode(parseInt(digits, 8));
}

/**
 * Decode the escape sequence after a consumed backslash.
 * Unknown escapes decode to the escaped character (`\q` is `q`).
 */
export function processEscape(state: LexerState): string {
  const escaped = advance(state);
  const simple = SIMPLE_ESCAPES[escaped];
  if (simple !== undefined) return simple;

  switch (escaped) {
    case 'x':
      return readHexEscape(state, escaped, 2);
    case 'u':
      return readHexEscape(state, escaped, 4);
    case '\n':
      // Line continuation
      return '';
    case '\r':
      if (peek(state) === '\n') advance(state);
      return '';
  }

  if (isOctalDigit(escaped)) {
    return readOctalEscape(state, escaped);
  }
  return escaped;
}

export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const quote = advance(state); // consume opening quote

  let value = '';
  for (;;) {
    const ch = peek(state);
    if (isAtEnd(state) || ch === '\n') {
      fail(state, 'JSCAN-L003', start);
    }
    if (ch === quote) {
      advance(state); // consume closing quote
      break;
    }
    if (ch === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state)) fail(state, 'JSCAN-L003', start);
      value += processEscape(state);
    } else {
      value += advance(state);
    }
  }

  return makeToken(TOKEN_TYPES.STRING, value, start, state.pos, {
    variant: quote === "'" ? 'single' : 'double',
  });
}

// ============================================================
// REGULAR EXPRESSIONS
// ============================================================

function atLineEnd(state: LexerState): boolean {
  return isAtEnd(state) || peek(state) === '\n';
}

/** Reads a bracketed class after its consumed `[`, returning the text after `[` */
function readCharacterClass(state: LexerState, start: SourceLocation): string {
  let body = '';
  for (;;) {
    if (atLineEnd(state)) fail(state, 'JSCAN-L005', start);
    const ch = advance(state);
    body += ch;
    if (ch === ']') return body;
    if (ch === '\\') {
      if (atLineEnd(state)) fail(state, 'JSCAN-L005', start);
      body += advance(state);
    }
  }
}

/**
 * Reads `/body/flags`. The body keeps its escapes verbatim; an unescaped
 * `/` inside a character class does not close the literal.
 */
export function readRegExp(state: LexerState): Token {
  const start = currentLocation(state);
  advance(state); // consume opening /

  let body = '';
  for (;;) {
    if (atLineEnd(state)) fail(state, 'JSCAN-L004', start);
    const ch = advance(state);
    if (ch === '/') break;
    body += ch;
    if (ch === '\\') {
      if (atLineEnd(state)) fail(state, 'JSCAN-L004', start);
      body += advance(state);
    } else if (ch === '[') {
      body += readCharacterClass(state, start);
    }
  }

  let flags = '';
  while (peek(state) !== '' && REGEXP_FLAGS.includes(peek(state))) {
    flags += advance(state);
  }

  return makeToken(TOKEN_TYPES.REGEXP, body, start, state.pos, {
    variant: flags,
  });
}

// ============================================================
// OPERATORS
// ============================================================

/**
 * Longest operator at the cursor, or null if none starts here.
 * A compoundable operator directly followed by `=` becomes an `assign`
 * token whose assignOp names the operator.
 */
export function readOperator(state: LexerState): Token | null {
  let op = '';
  while (op.length < MAX_OPERATOR_LENGTH) {
    const ch = peek(state, op.length);
    if (ch === '' || OPERATORS[op + ch] === undefined) break;
    op += ch;
  }

  const type = OPERATORS[op];
  if (op === '' || type === undefined) return null;

  const start = currentLocation(state);
  if (ASSIGN_OPERATORS.has(op) && peek(state, op.length) === '=') {
    const value = advanceBy(state, op.length + 1);
    return makeToken(TOKEN_TYPES.ASSIGN, value, start, state.pos, {
      assignOp: type,
    });
  }

  advanceBy(state, op.length);
  return makeToken(type, op, start, state.pos);
}
