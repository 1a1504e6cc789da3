/**
 * Lexer Helper Functions
 * Character classification and token construction
 */

import type { SourceLocation, Token, TokenType, TokenVariant } from '../types.js';

export function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

export function isOctalDigit(ch: string): boolean {
  return ch >= '0' && ch <= '7';
}

export function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= 'a' && ch <= 'f') || (ch >= 'A' && ch <= 'F');
}

function isLetter(ch: string): boolean {
  return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z');
}

export function isIdentifierStart(ch: string): boolean {
  return isLetter(ch) || ch === '_' || ch === '$';
}

export function isIdentifierChar(ch: string): boolean {
  return isIdentifierStart(ch) || isDigit(ch);
}

/**
 * Whitespace that never ends a line. `\r` counts here, so CRLF input
 * yields a single newline.
 */
export function isInlineWhitespace(ch: string): boolean {
  return (
    ch === ' ' ||
    ch === '\t' ||
    ch === '\r' ||
    ch === '\v' ||
    ch === '\f' ||
    ch === '\u00a0' ||
    ch === '\ufeff'
  );
}

export interface TokenFields {
  variant?: TokenVariant;
  assignOp?: TokenType | null;
}

export function makeToken(
  type: TokenType,
  value: string | number,
  start: SourceLocation,
  end: number,
  fields: TokenFields = {}
): Token {
  return {
    type,
    value,
    variant: fields.variant ?? '',
    assignOp: fields.assignOp ?? null,
    start: start.offset,
    end,
    line: start.line,
    column: start.column,
    comments: [],
  };
}

/** Same token with the given leading comments */
export function withComments(token: Token, comments: readonly string[]): Token {
  return comments.length === 0 ? token : { ...token, comments };
}
