// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  IDENTIFIER: 'identifier',
  NUMBER: 'number',
  STRING: 'string',
  REGEXP: 'regexp',

  // Punctuators
  NEWLINE: 'newline', // \n (only when scanning newlines)
  SEMICOLON: 'semicolon', // ;
  COMMA: 'comma', // ,
  HOOK: 'hook', // ?
  COLON: 'colon', // :
  DOT: 'dot', // .
  LEFT_BRACKET: 'left_bracket', // [
  RIGHT_BRACKET: 'right_bracket', // ]
  LEFT_CURLY: 'left_curly', // {
  RIGHT_CURLY: 'right_curly', // }
  LEFT_PAREN: 'left_paren', // (
  RIGHT_PAREN: 'right_paren', // )

  // Logical operators
  OR: 'or', // ||
  AND: 'and', // &&
  NOT: 'not', // !

  // Bitwise operators
  BITWISE_OR: 'bitwise_or', // |
  BITWISE_XOR: 'bitwise_xor', // ^
  BITWISE_AND: 'bitwise_and', // &
  BITWISE_NOT: 'bitwise_not', // ~
  LSH: 'lsh', // <<
  RSH: 'rsh', // >>
  URSH: 'ursh', // >>>

  // Comparison operators
  STRICT_EQ: 'strict_eq', // ===
  EQ: 'eq', // ==
  STRICT_NE: 'strict_ne', // !==
  NE: 'ne', // !=
  LE: 'le', // <=
  LT: 'lt', // <
  GE: 'ge', // >=
  GT: 'gt', // >

  // Assignment (= and every compound form)
  ASSIGN: 'assign',

  // Arithmetic operators
  INCREMENT: 'increment', // ++
  DECREMENT: 'decrement', // --
  PLUS: 'plus', // +
  MINUS: 'minus', // -
  MUL: 'mul', // *
  DIV: 'div', // /
  MOD: 'mod', // %

  // Keywords
  BREAK: 'break',
  CASE: 'case',
  CATCH: 'catch',
  CONST: 'const',
  CONTINUE: 'continue',
  DEBUGGER: 'debugger',
  DEFAULT: 'default',
  DELETE: 'delete',
  DO: 'do',
  ELSE: 'else',
  ENUM: 'enum',
  FALSE: 'false',
  FINALLY: 'finally',
  FOR: 'for',
  FUNCTION: 'function',
  IF: 'if',
  IN: 'in',
  INSTANCEOF: 'instanceof',
  LET: 'let',
  NEW: 'new',
  NULL: 'null',
  RETURN: 'return',
  SWITCH: 'switch',
  THIS: 'this',
  THROW: 'throw',
  TRUE: 'true',
  TRY: 'try',
  TYPEOF: 'typeof',
  VAR: 'var',
  VOID: 'void',
  YIELD: 'yield',
  WHILE: 'while',
  WITH: 'with',

  // Special
  END: 'end',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

/** Sub-kind of a number literal */
export type NumberVariant = 'int' | 'float';

/** Quote style of a string literal */
export type StringVariant = 'single' | 'double';

/**
 * Literal sub-kind: number or string variant, regexp flags,
 * or '' for tokens without one.
 */
export type TokenVariant = NumberVariant | StringVariant | string;

export interface Token {
  readonly type: TokenType;
  /** Decoded string, numeric value, regexp body, or the raw operator text */
  readonly value: string | number;
  readonly variant: TokenVariant;
  /** Underlying binary operator of a compound assignment (`+=` carries `plus`) */
  readonly assignOp: TokenType | null;
  /** Offset of the first character */
  readonly start: number;
  /** Offset one past the last character */
  readonly end: number;
  readonly line: number;
  readonly column: number;
  /** Raw text of the comments skipped right before this token */
  readonly comments: readonly string[];
}
