/**
 * Lexer Observability
 * Callbacks for monitoring scanning without a logging dependency
 */

import type { Token } from '../types.js';
import { ScanError } from '../types.js';

/** Emitted once per freshly scanned token (replays from the buffer are silent) */
export interface TokenEvent {
  readonly token: Token;
}

/** Emitted right before a scan error propagates to the caller */
export interface LexerErrorEvent {
  readonly error: ScanError;
}

export interface LexerObservability {
  onToken?: (event: TokenEvent) => void;
  onError?: (event: LexerErrorEvent) => void;
}

/** Run one scan step, reporting its token or its error */
export function observeScan(
  observability: LexerObservability,
  scan: () => Token
): Token {
  let token: Token;
  try {
    token = scan();
  } catch (err) {
    if (err instanceof ScanError) {
      observability.onError?.({ error: err });
    }
    throw err;
  }
  observability.onToken?.({ token });
  return token;
}

/** Report an error raised outside of scanning, returning it for `throw` */
export function reportError<E extends ScanError>(
  observability: LexerObservability,
  error: E
): E {
  observability.onError?.({ error });
  return error;
}
