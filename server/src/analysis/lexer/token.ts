/**
 * Token Module - D Language Server
 * ================================
 *
 * Defines the token types produced by the lexer. Tokens are the atomic units
 * handed to the (host supplied) parser and to the cursor queries.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → parser → Module
 *
 * @module dlens/server/src/analysis/lexer/token
 */

/**
 * Token kinds for the D lexer.
 *
 * Every operator and punctuation spelling has its own kind so that callers
 * can switch on the kind instead of comparing text. Keywords share a single
 * kind; the keyword itself is the token text.
 */
export enum TokenKind {
  // operators and punctuation
  Assign,
  At,
  BitAnd,
  BitAndEquals,
  BitOr,
  BitOrEquals,
  CatEquals,
  Colon,
  Comma,
  Decrement,
  Div,
  DivEquals,
  Dollar,
  Dot,
  Equals,
  GoesTo,
  Greater,
  GreaterEqual,
  Hash,
  Increment,
  LBrace,
  LBracket,
  Less,
  LessEqual,
  LessEqualGreater,
  LessOrGreater,
  LogicAnd,
  LogicOr,
  LParen,
  Minus,
  MinusEquals,
  Mod,
  ModEquals,
  MulEquals,
  Not,
  NotEquals,
  NotGreater,
  NotGreaterEqual,
  NotLess,
  NotLessEqual,
  NotLessEqualGreater,
  Plus,
  PlusEquals,
  Pow,
  PowEquals,
  RBrace,
  RBracket,
  RParen,
  Semicolon,
  ShiftLeft,
  ShiftLeftEqual,
  ShiftRight,
  ShiftRightEqual,
  Slice,
  Star,
  Ternary,
  Tilde,
  Unordered,
  UnsignedShiftRight,
  UnsignedShiftRightEqual,
  Vararg,
  Xor,
  XorEquals,

  // words
  Identifier,
  Keyword,
  Attribute,

  // literals and trivia
  NumberLiteral,
  StringLiteral,
  Comment,
  Whitespace,

  /** A separating character that starts no known form, e.g. a stray `\`. */
  Invalid
}

/**
 * Token interface - represents a single lexical token
 *
 * @property text  - Exactly `source.slice(start, end)`
 * @property line  - 1-based line on which the token starts
 * @property start - Offset of the first character
 * @property end   - Offset one past the last character
 */
export interface Token {
  kind: TokenKind;
  text: string;
  line: number;
  start: number;
  end: number;
}

/** Whether whitespace and comments are emitted as tokens. */
export enum IterationStyle {
  /** Only include code, not whitespace or comments */
  CodeOnly,
  /** Include everything */
  Everything
}

/**
 * Shared scan position. Sub-lexers advance `index` and `line` in place.
 */
export interface LexCursor {
  readonly text: string;
  index: number;
  line: number;
}

export function createCursor(text: string): LexCursor {
  return { text, index: 0, line: 1 };
}

/** Thrown when a sub-lexer is entered on a character it does not handle. */
export class LexerError extends Error {
  constructor(
    public readonly offset: number,
    public readonly line: number,
    message: string
  ) {
    super(`${message} (offset ${offset}, line ${line})`);
    this.name = 'LexerError';
  }
}
