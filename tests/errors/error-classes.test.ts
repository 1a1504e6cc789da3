/**
 * Error Tests: Error Classes, Factory and Formatting
 */

import { describe, expect, it } from 'vitest';
import {
  createError,
  formatError,
  InternalError,
  LexerError,
  ParseError,
  ScanError,
  type SourceLocation,
} from '../../src/index.js';

const location: SourceLocation = { line: 3, column: 7, offset: 20 };

describe('ScanError', () => {
  it('suffixes the message with filename and line', () => {
    const error = new ScanError({
      errorId: 'JSCAN-L002',
      message: 'Unterminated comment',
      filename: 'app.js',
      location,
    });
    expect(error.message).toBe('Unterminated comment at app.js:3');
    expect(error.line).toBe(3);
    expect(error.kind).toBe('UnterminatedComment');
  });

  it('rejects an unknown error ID', () => {
    expect(
      () =>
        new ScanError({
          errorId: 'JSCAN-X999',
          message: 'nope',
          filename: 'app.js',
          location,
        })
    ).toThrow(new TypeError('Unknown error ID: JSCAN-X999'));
  });

  it('returns the bare message from toData', () => {
    const error = createError('JSCAN-L003', {}, location, 'app.js');
    expect(error.toData()).toEqual({
      errorId: 'JSCAN-L003',
      message: 'Unterminated string literal',
      filename: 'app.js',
      location,
      context: {},
    });
  });

  it('formats with a host formatter', () => {
    const error = createError('JSCAN-L002', {}, location, 'app.js');
    expect(error.format()).toBe('Unterminated comment at app.js:3');
    expect(error.format((data) => `${data.errorId}: ${data.message}`)).toBe(
      'JSCAN-L002: Unterminated comment'
    );
  });
});

describe('Specialized errors', () => {
  it('rejects an error ID from another category', () => {
    expect(
      () => new LexerError('JSCAN-P001', 'Missing x', location, 'app.js')
    ).toThrow(new TypeError('Expected lexer error ID, got: JSCAN-P001'));
    expect(
      () => new ParseError('JSCAN-L001', 'Illegal token', location, 'app.js')
    ).toThrow(new TypeError('Expected parse error ID, got: JSCAN-L001'));
    expect(
      () => new InternalError('JSCAN-L001', 'Illegal token', location, 'app.js')
    ).toThrow(new TypeError('Expected internal error ID, got: JSCAN-L001'));
  });

  it('names each subclass', () => {
    const error = new InternalError(
      'JSCAN-I002',
      'PANIC: no current token to push back',
      location,
      'app.js'
    );
    expect(error.name).toBe('InternalError');
    expect(error).toBeInstanceOf(ScanError);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('createError', () => {
  it('renders the template and picks the class by category', () => {
    const error = createError(
      'JSCAN-P001',
      { expected: 'semicolon' },
      location,
      'app.js'
    );
    expect(error).toBeInstanceOf(ParseError);
    expect(error.message).toBe('Missing semicolon at app.js:3');
    expect(error.context).toEqual({ expected: 'semicolon' });
  });

  it('creates lexer and internal errors', () => {
    expect(createError('JSCAN-L001', { char: '"#"' }, location, 'a.js')).toBeInstanceOf(
      LexerError
    );
    expect(createError('JSCAN-I001', { limit: 3 }, location, 'a.js').message).toBe(
      'PANIC: too much lookahead (3 tokens max) at a.js:3'
    );
  });

  it('rejects an unknown error ID', () => {
    expect(() => createError('JSCAN-L999', {}, location, 'a.js')).toThrow(
      new TypeError('Unknown error ID: JSCAN-L999')
    );
  });
});

describe('formatError', () => {
  it('formats source errors as syntax errors', () => {
    const error = createError(
      'JSCAN-L003',
      {},
      { line: 1, column: 1, offset: 0 },
      'a.js'
    );
    expect(formatError(error)).toBe(
      'Syntax error: Unterminated string literal\na.js:1'
    );
  });

  it('formats contract violations as internal errors', () => {
    const error = createError('JSCAN-I002', {}, location, 'a.js');
    expect(formatError(error)).toBe(
      'Internal error: PANIC: no current token to push back'
    );
  });

  it('passes other errors through', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
  });
});
