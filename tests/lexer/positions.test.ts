/**
 * Lexer Tests: Token Positions
 */

import { describe, expect, it } from 'vitest';
import { tokenize } from '../../src/index.js';

describe('Lexer: Positions', () => {
  it('records offsets, lines and columns', () => {
    const tokens = tokenize('var x = 10;');
    expect(tokens.map((t) => [t.start, t.end])).toEqual([
      [0, 3],
      [4, 5],
      [6, 7],
      [8, 10],
      [10, 11],
      [11, 11],
    ]);
    expect(tokens.map((t) => t.column)).toEqual([1, 5, 7, 9, 11, 12]);
  });

  it('slices back to the raw token text', () => {
    const source = "if (a >= 0x10) { s = 'q\\'s'; }";
    const raw = tokenize(source).map((t) => source.slice(t.start, t.end));
    expect(raw).toEqual([
      'if',
      '(',
      'a',
      '>=',
      '0x10',
      ')',
      '{',
      's',
      '=',
      "'q\\'s'",
      ';',
      '}',
      '',
    ]);
  });

  it('rebuilds the source from tokens and the gaps between them', () => {
    const source =
      '/* head */\r\nvar a = 1; // one\r\n\r\n/* two\r\n */ b\n// tail';
    const tokens = tokenize(source);

    let rebuilt = '';
    let previousEnd = 0;
    for (const token of tokens) {
      rebuilt += source.slice(previousEnd, token.start);
      rebuilt += source.slice(token.start, token.end);
      previousEnd = token.end;
    }
    expect(rebuilt).toBe(source);

    for (const token of tokens.slice(0, -1)) {
      expect(token.start).toBeLessThan(token.end);
    }
    const end = tokens[tokens.length - 1]!;
    expect(end.start).toBe(source.length);
    expect(end.end).toBe(source.length);
  });

  it('attaches comments across CRLF line ends', () => {
    const source =
      '/* head */\r\nvar a = 1; // one\r\n\r\n/* two\r\n */ b\n// tail';
    const tokens = tokenize(source);
    expect(tokens.map((t) => t.comments)).toEqual([
      ['/* head */'],
      [],
      [],
      [],
      [],
      ['// one', '/* two\r\n */'],
      ['// tail'],
    ]);
    expect(tokens[5]!.line).toBe(5);
    expect(tokens[5]!.column).toBe(5);
  });

  it('counts lines across the source', () => {
    const tokens = tokenize('a\n\nb\n  c');
    expect(tokens.map((t) => t.line)).toEqual([1, 3, 4, 4]);
    expect(tokens[2]!.column).toBe(3);
  });

  it('produces only the end token for empty input', () => {
    const tokens = tokenize('');
    expect(tokens).toHaveLength(1);
    expect(tokens[0]).toEqual({
      type: 'end',
      value: '',
      variant: '',
      assignOp: null,
      start: 0,
      end: 0,
      line: 1,
      column: 1,
      comments: [],
    });
  });
});
