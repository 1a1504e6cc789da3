/**
 * Lexer State
 * Tracks the cursor and line position in source text during scanning
 */

import type { SourceLocation } from '../types.js';

/** Label used in diagnostics when the caller names no file */
export const DEFAULT_FILENAME = '<anonymous>';

export interface LexerState {
  readonly source: string;
  readonly filename: string;
  /** Next unread offset; only ever moves forward */
  pos: number;
  line: number;
  column: number;
}

export function createLexerState(
  source: string,
  filename: string
): LexerState {
  return {
    source,
    filename,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

export function peekString(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** Consume one character; a no-op returning '' at end of input */
export function advance(state: LexerState): string {
  const ch = state.source[state.pos];
  if (ch === undefined) return '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

export function advanceBy(state: LexerState, count: number): string {
  const start = state.pos;
  for (let i = 0; i < count; i++) advance(state);
  return state.source.slice(start, state.pos);
}

/** Source text from `start` up to the cursor */
export function textFrom(state: LexerState, start: number): string {
  return state.source.slice(start, state.pos);
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
