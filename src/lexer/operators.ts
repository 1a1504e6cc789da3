/**
 * Operator and Keyword Lookup Tables
 *
 * Every prefix of an operator is itself an operator (`!==` has `!=` and `!`),
 * so a longest-prefix match never needs to backtrack.
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Operator and punctuator table; newline is handled by the scanner itself */
export const OPERATORS: Readonly<Record<string, TokenType>> = {
  ';': TOKEN_TYPES.SEMICOLON,
  ',': TOKEN_TYPES.COMMA,
  '?': TOKEN_TYPES.HOOK,
  ':': TOKEN_TYPES.COLON,
  '||': TOKEN_TYPES.OR,
  '&&': TOKEN_TYPES.AND,
  '|': TOKEN_TYPES.BITWISE_OR,
  '^': TOKEN_TYPES.BITWISE_XOR,
  '&': TOKEN_TYPES.BITWISE_AND,
  '===': TOKEN_TYPES.STRICT_EQ,
  '==': TOKEN_TYPES.EQ,
  '=': TOKEN_TYPES.ASSIGN,
  '!==': TOKEN_TYPES.STRICT_NE,
  '!=': TOKEN_TYPES.NE,
  '<<': TOKEN_TYPES.LSH,
  '<=': TOKEN_TYPES.LE,
  '<': TOKEN_TYPES.LT,
  '>>>': TOKEN_TYPES.URSH,
  '>>': TOKEN_TYPES.RSH,
  '>=': TOKEN_TYPES.GE,
  '>': TOKEN_TYPES.GT,
  '++': TOKEN_TYPES.INCREMENT,
  '--': TOKEN_TYPES.DECREMENT,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.MUL,
  '/': TOKEN_TYPES.DIV,
  '%': TOKEN_TYPES.MOD,
  '!': TOKEN_TYPES.NOT,
  '~': TOKEN_TYPES.BITWISE_NOT,
  '.': TOKEN_TYPES.DOT,
  '[': TOKEN_TYPES.LEFT_BRACKET,
  ']': TOKEN_TYPES.RIGHT_BRACKET,
  '{': TOKEN_TYPES.LEFT_CURLY,
  '}': TOKEN_TYPES.RIGHT_CURLY,
  '(': TOKEN_TYPES.LEFT_PAREN,
  ')': TOKEN_TYPES.RIGHT_PAREN,
};

/** Longest entry in OPERATORS */
export const MAX_OPERATOR_LENGTH = 3;

/** Operators that combine with a trailing `=` into a compound assignment */
export const ASSIGN_OPERATORS: ReadonlySet<string> = new Set([
  '|',
  '^',
  '&',
  '<<',
  '>>',
  '>>>',
  '+',
  '-',
  '*',
  '/',
  '%',
]);

/** Reserved words, in the order they are documented */
export const KEYWORDS: readonly string[] = [
  'break',
  'case',
  'catch',
  'const',
  'continue',
  'debugger',
  'default',
  'delete',
  'do',
  'else',
  'enum',
  'false',
  'finally',
  'for',
  'function',
  'if',
  'in',
  'instanceof',
  'let',
  'new',
  'null',
  'return',
  'switch',
  'this',
  'throw',
  'true',
  'try',
  'typeof',
  'var',
  'void',
  'yield',
  'while',
  'with',
];

/** Keyword lookup table */
const KEYWORD_TYPES: ReadonlyMap<string, TokenType> = new Map(
  Object.values(TOKEN_TYPES)
    .filter((type) => KEYWORDS.includes(type))
    .map((type): [string, TokenType] => [type, type])
);

export function keywordType(text: string): TokenType | undefined {
  return KEYWORD_TYPES.get(text);
}

export function isKeyword(text: string): boolean {
  return KEYWORD_TYPES.has(text);
}
