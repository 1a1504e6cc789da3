/**
 * Token Stream
 * The parser-facing tokenizer: a 4-slot ring of tokens that supports
 * peek and pushback without rescanning, plus the two mode flags.
 */

import type { SourceLocation, Token, TokenType } from '../types.js';
import { createError, type ScanError, TOKEN_TYPES } from '../types.js';
import {
  type LexerObservability,
  observeScan,
  reportError,
} from './observability.js';
import {
  createLexerState,
  DEFAULT_FILENAME,
  type LexerState,
} from './state.js';
import { nextToken } from './tokenizer.js';

/** Current token plus up to three tokens of lookahead */
const RING_SIZE = 4;
const MAX_LOOKAHEAD = RING_SIZE - 1;

export interface TokenizerOptions {
  /** Initial newline mode (default false) */
  scanNewlines?: boolean;
  /** Initial operand mode (default true) */
  scanOperand?: boolean;
  observability?: LexerObservability;
}

interface Slot {
  readonly token: Token;
  /** Cursor line right after the token was scanned */
  readonly lineAfter: number;
}

export class Tokenizer {
  readonly source: string;
  readonly filename: string;

  /** Set by the parser where a line break ends a statement */
  scanNewlines: boolean;
  /** Set by the parser where an expression may start */
  scanOperand: boolean;

  private readonly state: LexerState;
  private readonly observability: LexerObservability;
  private readonly slots: (Slot | undefined)[] = new Array<Slot | undefined>(
    RING_SIZE
  ).fill(undefined);
  /** Slot of the most recently consumed token */
  private tokenIndex = 0;
  /** Buffered tokens not yet consumed */
  private lookahead = 0;

  constructor(
    source: string,
    filename: string = DEFAULT_FILENAME,
    options: TokenizerOptions = {}
  ) {
    this.source = source;
    this.filename = filename;
    this.scanNewlines = options.scanNewlines ?? false;
    this.scanOperand = options.scanOperand ?? true;
    this.observability = options.observability ?? {};
    this.state = createLexerState(source, filename);
  }

  /**
   * Scan offset: the next source offset the scanner reads. It runs ahead of
   * consumption while peeked tokens are buffered; `token` and `line` give
   * the consumption position.
   */
  get cursor(): number {
    return this.state.pos;
  }

  /**
   * Line where consumption stands: the line right after the current token,
   * or 1 before the first get(). Tokens buffered by peek do not move it.
   */
  get line(): number {
    return this.slots[this.tokenIndex]?.lineAfter ?? 1;
  }

  /** The most recently consumed token, undefined before the first get() */
  get token(): Token | undefined {
    return this.slots[this.tokenIndex]?.token;
  }

  get done(): boolean {
    return this.token?.type === TOKEN_TYPES.END;
  }

  /**
   * Consume the next token and return its type. Buffered tokens are
   * replayed first; buffered newlines are passed over unless newlines
   * are being scanned.
   */
  get(): TokenType {
    while (this.lookahead > 0) {
      this.lookahead--;
      this.tokenIndex = (this.tokenIndex + 1) % RING_SIZE;
      const token = this.slotAt(this.tokenIndex).token;
      if (token.type !== TOKEN_TYPES.NEWLINE || this.scanNewlines) {
        return token.type;
      }
    }

    const token = observeScan(this.observability, () =>
      nextToken(this.state, {
        scanNewlines: this.scanNewlines,
        scanOperand: this.scanOperand,
      })
    );
    this.tokenIndex = (this.tokenIndex + 1) % RING_SIZE;
    this.slots[this.tokenIndex] = { token, lineAfter: this.state.line };
    return token.type;
  }

  /**
   * Push the current token back so the next get() returns it again.
   *
   * @throws InternalError when three tokens are already pushed back, or
   * when nothing has been consumed yet
   */
  unget(): void {
    if (this.lookahead === MAX_LOOKAHEAD) {
      throw this.fail('JSCAN-I001', { limit: MAX_LOOKAHEAD });
    }
    if (this.slots[this.tokenIndex] === undefined) {
      throw this.fail('JSCAN-I002', {});
    }
    this.lookahead++;
    this.tokenIndex = (this.tokenIndex + RING_SIZE - 1) % RING_SIZE;
  }

  /** Consume the next token only if it has the given type */
  match(type: TokenType): boolean {
    if (this.get() === type) return true;
    this.unget();
    return false;
  }

  /**
   * Consume a token of the given type and return it.
   *
   * @throws ParseError (MissingExpectedToken) otherwise
   */
  mustMatch(type: TokenType): Token {
    if (!this.match(type)) {
      throw this.fail('JSCAN-P001', { expected: type });
    }
    return this.slotAt(this.tokenIndex).token;
  }

  /**
   * Type of the next token without consuming it. In newline mode, a
   * buffered token on a later line than the current one reads as newline.
   */
  peek(): TokenType {
    if (!this.scanNewlines) this.dropBufferedNewlines();

    if (this.lookahead === 0) {
      this.get();
      this.unget();
    }

    const next = this.slotAt((this.tokenIndex + 1) % RING_SIZE).token;
    return this.scanNewlines && next.line !== this.line
      ? TOKEN_TYPES.NEWLINE
      : next.type;
  }

  /** peek() with newlines significant, for "no line break here" rules */
  peekOnSameLine(): TokenType {
    const saved = this.scanNewlines;
    this.scanNewlines = true;
    try {
      return this.peek();
    } finally {
      this.scanNewlines = saved;
    }
  }

  private slotAt(index: number): Slot {
    const slot = this.slots[index];
    if (slot === undefined) {
      throw this.fail('JSCAN-I002', {});
    }
    return slot;
  }

  /**
   * Remove buffered newline tokens, shifting later buffered tokens up.
   * They only exist to answer an earlier newline-mode peek. The current
   * token and the consumed tokens behind it stay in place.
   */
  private dropBufferedNewlines(): void {
    let kept = 0;
    for (let i = 1; i <= this.lookahead; i++) {
      const slot = this.slots[(this.tokenIndex + i) % RING_SIZE];
      if (slot !== undefined && slot.token.type !== TOKEN_TYPES.NEWLINE) {
        kept++;
        this.slots[(this.tokenIndex + kept) % RING_SIZE] = slot;
      }
    }
    for (let i = kept + 1; i <= this.lookahead; i++) {
      this.slots[(this.tokenIndex + i) % RING_SIZE] = undefined;
    }
    this.lookahead = kept;
  }

  /** Start of the first buffered token, or the cursor if none */
  private nextLocation(): SourceLocation {
    const next =
      this.lookahead > 0
        ? this.slots[(this.tokenIndex + 1) % RING_SIZE]?.token
        : undefined;
    if (next !== undefined) {
      return { line: next.line, column: next.column, offset: next.start };
    }
    return {
      line: this.state.line,
      column: this.state.column,
      offset: this.state.pos,
    };
  }

  private fail(
    errorId: string,
    context: Record<string, unknown>,
    location: SourceLocation = this.nextLocation()
  ): ScanError {
    return reportError(
      this.observability,
      createError(errorId, context, location, this.filename)
    );
  }
}
