/**
 * Lexer Tests: Operators, Punctuators and Keywords
 */

import { describe, expect, it } from 'vitest';
import { isKeyword, KEYWORDS, tokenize } from '../../src/index.js';
import { LexerError, TOKEN_TYPES } from '../../src/types.js';

function types(source: string): string[] {
  return tokenize(source).map((t) => t.type);
}

describe('Lexer: Operators', () => {
  describe('Longest Match', () => {
    it('reads three-character operators', () => {
      expect(types('a === b')).toEqual(['identifier', 'strict_eq', 'identifier', 'end']);
      expect(types('a !== b')).toEqual(['identifier', 'strict_ne', 'identifier', 'end']);
      expect(types('a >>> b')).toEqual(['identifier', 'ursh', 'identifier', 'end']);
    });

    it('reads two-character operators', () => {
      expect(types('a<=b')).toEqual(['identifier', 'le', 'identifier', 'end']);
      expect(types('a<<b')).toEqual(['identifier', 'lsh', 'identifier', 'end']);
      expect(types('a&&b||c')).toEqual([
        'identifier',
        'and',
        'identifier',
        'or',
        'identifier',
        'end',
      ]);
    });

    it('splits +++ into increment and plus', () => {
      expect(types('a+++b')).toEqual([
        'identifier',
        'increment',
        'plus',
        'identifier',
        'end',
      ]);
    });

    it('reads punctuators', () => {
      expect(types('f(a[0], {}) ? x : y;')).toEqual([
        'identifier',
        'left_paren',
        'identifier',
        'left_bracket',
        'number',
        'right_bracket',
        'comma',
        'left_curly',
        'right_curly',
        'right_paren',
        'hook',
        'identifier',
        'colon',
        'identifier',
        'semicolon',
        'end',
      ]);
    });

    it('keeps the operator text as the value', () => {
      const tokens = tokenize('!~x');
      expect(tokens[0]!.value).toBe('!');
      expect(tokens[1]!.value).toBe('~');
      expect(tokens[1]!.type).toBe(TOKEN_TYPES.BITWISE_NOT);
    });
  });

  describe('Assignment', () => {
    it('reads >>>= as an assignment with the ursh operator', () => {
      const tokens = tokenize('x >>>= 1');
      expect(tokens[1]!.type).toBe(TOKEN_TYPES.ASSIGN);
      expect(tokens[1]!.assignOp).toBe(TOKEN_TYPES.URSH);
      expect(tokens[1]!.value).toBe('>>>=');
    });

    it('reads compound assignments', () => {
      const tokens = tokenize('a += 1; b %= 2; c |= 3');
      expect(tokens[1]!.assignOp).toBe(TOKEN_TYPES.PLUS);
      expect(tokens[5]!.assignOp).toBe(TOKEN_TYPES.MOD);
      expect(tokens[9]!.assignOp).toBe(TOKEN_TYPES.BITWISE_OR);
    });

    it('reads a plain = without an assignOp', () => {
      const tokens = tokenize('a = b');
      expect(tokens[1]!.type).toBe(TOKEN_TYPES.ASSIGN);
      expect(tokens[1]!.value).toBe('=');
      expect(tokens[1]!.assignOp).toBeNull();
    });

    it('does not compound logical operators', () => {
      expect(types('a ||= b')).toEqual([
        'identifier',
        'or',
        'assign',
        'identifier',
        'end',
      ]);
    });

    it('reads /= as an assignment after an operand', () => {
      const tokens = tokenize('a /= 2');
      expect(tokens[1]!.type).toBe(TOKEN_TYPES.ASSIGN);
      expect(tokens[1]!.assignOp).toBe(TOKEN_TYPES.DIV);
    });
  });

  describe('Keywords', () => {
    it('types keywords by their own text', () => {
      expect(types('if (x) return')).toEqual([
        'if',
        'left_paren',
        'identifier',
        'right_paren',
        'return',
        'end',
      ]);
    });

    it('reads identifiers that start with a keyword', () => {
      expect(types('iff $x _y')).toEqual([
        'identifier',
        'identifier',
        'identifier',
        'end',
      ]);
    });

    it('lists every reserved word', () => {
      expect(KEYWORDS).toHaveLength(33);
      expect(isKeyword('while')).toBe(true);
      expect(isKeyword('yield')).toBe(true);
      expect(isKeyword('While')).toBe(false);
      expect(isKeyword('undefined')).toBe(false);
    });
  });

  describe('Errors', () => {
    it('rejects a character that starts no token', () => {
      expect(() => tokenize('a # b')).toThrow(LexerError);
      expect(() => tokenize('a # b')).toThrow(
        'Illegal token "#" at <anonymous>:1'
      );
    });

    it('names a character outside the basic plane whole', () => {
      expect(() => tokenize('a \u{1F600}')).toThrow(
        'Illegal token "\u{1F600}" at <anonymous>:1'
      );
    });

    it('reports the illegal character position', () => {
      try {
        tokenize('x;\n  @', { filename: 'bad.js' });
        expect.fail('Should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(LexerError);
        const lexerErr = err as LexerError;
        expect(lexerErr.kind).toBe('IllegalToken');
        expect(lexerErr.location).toEqual({ line: 2, column: 3, offset: 5 });
        expect(lexerErr.message).toBe('Illegal token "@" at bad.js:2');
      }
    });
  });
});
