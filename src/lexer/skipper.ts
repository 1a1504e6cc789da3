/**
 * Whitespace and Comment Skipper
 * Consumes insignificant input before a token and collects comment text
 */

import { createError } from '../types.js';
import { isInlineWhitespace } from './helpers.js';
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

function skipWhitespace(state: LexerState, scanNewlines: boolean): void {
  for (;;) {
    const ch = peek(state);
    if (isInlineWhitespace(ch) || (ch === '\n' && !scanNewlines)) {
      advance(state);
    } else {
      return;
    }
  }
}

/** Reads one comment at the cursor, returning its raw text or null */
function readComment(state: LexerState): string | null {
  if (peek(state) !== '/') return null;

  const start = currentLocation(state);
  const next = peek(state, 1);

  if (next === '*') {
    advanceBy(state, 2);
    while (peekString(state, 2) !== '*/') {
      if (isAtEnd(state)) {
        throw createError('JSCAN-L002', {}, start, state.filename);
      }
      advance(state);
    }
    advanceBy(state, 2);
    return textFrom(state, start.offset);
  }

  if (next === '/') {
    // The line break (CRLF included) is left for the next token or skip
    while (!isAtEnd(state) && peek(state) !== '\n' && peek(state) !== '\r') {
      advance(state);
    }
    return textFrom(state, start.offset);
  }

  return null;
}

/**
 * Skips whitespace and comments until a significant character.
 * With `scanNewlines` set, `\n` is significant and stays unconsumed.
 *
 * @returns comment texts in source order
 */
export function skipInsignificant(
  state: LexerState,
  scanNewlines: boolean
): string[] {
  const comments: string[] = [];
  for (;;) {
    skipWhitespace(state, scanNewlines);
    const comment = readComment(state);
    if (comment === null) return comments;
    comments.push(comment);
  }
}
