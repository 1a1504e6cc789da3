/**
 * Operand Context
 * Decides whether a `/` after a given token starts a regexp
 */

import type { Token, TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Tokens that complete an operand, so a following `/` divides */
const OPERAND_ENDERS: ReadonlySet<TokenType> = new Set<TokenType>([
  TOKEN_TYPES.IDENTIFIER,
  TOKEN_TYPES.NUMBER,
  TOKEN_TYPES.STRING,
  TOKEN_TYPES.REGEXP,
  TOKEN_TYPES.RIGHT_PAREN,
  TOKEN_TYPES.RIGHT_BRACKET,
  TOKEN_TYPES.RIGHT_CURLY,
  TOKEN_TYPES.INCREMENT,
  TOKEN_TYPES.DECREMENT,
  TOKEN_TYPES.THIS,
  TOKEN_TYPES.NULL,
  TOKEN_TYPES.TRUE,
  TOKEN_TYPES.FALSE,
]);

/**
 * Approximates the parser's scanOperand flag from the previous significant
 * token. `}` is treated as ending an object literal, so `} /x/` divides.
 */
export function expectsOperand(previous: Token | undefined): boolean {
  return previous === undefined || !OPERAND_ENDERS.has(previous.type);
}
