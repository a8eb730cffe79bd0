/**
 * Rules Module - D Lexer Rules
 * ============================
 *
 * Defines keywords, operators, and the separating-character class used by
 * the tokenizer.
 *
 * D vs C DIFFERENCES THAT MATTER HERE:
 *   - Floating point comparison operators: '!<>=', '<>', '!>' and friends
 *   - '^^' power operator, '~' concatenation, '..' slice, '=>' lambda arrow
 *   - '@' introduces attributes such as '@safe' or '@property'
 *
 * @module dlens/server/src/analysis/lexer/rules
 */

import { TokenKind } from './token';
import keywordList from './keywords.json';

// Reserved words, including the special __FILE__ style tokens
export const keywords: ReadonlySet<string> = new Set<string>(keywordList);

/**
 * Operator and punctuation spellings.
 *
 * Matched longest first, so '>>>=' wins over '>>>' which wins over '>>'.
 * '/' and '/=' are absent on purpose: the tokenizer has to peek past '/' to
 * tell division from the three comment forms.
 */
export const operators: ReadonlyMap<string, TokenKind> = new Map<string, TokenKind>([
  ['=', TokenKind.Assign],
  ['&', TokenKind.BitAnd],
  ['&=', TokenKind.BitAndEquals],
  ['|', TokenKind.BitOr],
  ['|=', TokenKind.BitOrEquals],
  ['~=', TokenKind.CatEquals],
  [':', TokenKind.Colon],
  [',', TokenKind.Comma],
  ['$', TokenKind.Dollar],
  ['.', TokenKind.Dot],
  ['==', TokenKind.Equals],
  ['=>', TokenKind.GoesTo],
  ['>', TokenKind.Greater],
  ['>=', TokenKind.GreaterEqual],
  ['#', TokenKind.Hash],
  ['&&', TokenKind.LogicAnd],
  ['{', TokenKind.LBrace],
  ['[', TokenKind.LBracket],
  ['<', TokenKind.Less],
  ['<=', TokenKind.LessEqual],
  ['<>=', TokenKind.LessEqualGreater],
  ['<>', TokenKind.LessOrGreater],
  ['||', TokenKind.LogicOr],
  ['(', TokenKind.LParen],
  ['-', TokenKind.Minus],
  ['-=', TokenKind.MinusEquals],
  ['%', TokenKind.Mod],
  ['%=', TokenKind.ModEquals],
  ['*=', TokenKind.MulEquals],
  ['!', TokenKind.Not],
  ['!=', TokenKind.NotEquals],
  ['!>', TokenKind.NotGreater],
  ['!>=', TokenKind.NotGreaterEqual],
  ['!<', TokenKind.NotLess],
  ['!<=', TokenKind.NotLessEqual],
  ['!<>', TokenKind.NotLessEqualGreater],
  ['+', TokenKind.Plus],
  ['+=', TokenKind.PlusEquals],
  ['^^', TokenKind.Pow],
  ['^^=', TokenKind.PowEquals],
  ['}', TokenKind.RBrace],
  [']', TokenKind.RBracket],
  [')', TokenKind.RParen],
  [';', TokenKind.Semicolon],
  ['<<', TokenKind.ShiftLeft],
  ['<<=', TokenKind.ShiftLeftEqual],
  ['>>', TokenKind.ShiftRight],
  ['>>=', TokenKind.ShiftRightEqual],
  ['..', TokenKind.Slice],
  ['*', TokenKind.Star],
  ['?', TokenKind.Ternary],
  ['~', TokenKind.Tilde],
  ['--', TokenKind.Decrement],
  ['!<>=', TokenKind.Unordered],
  ['>>>', TokenKind.UnsignedShiftRight],
  ['>>>=', TokenKind.UnsignedShiftRightEqual],
  ['++', TokenKind.Increment],
  ['...', TokenKind.Vararg],
  ['^', TokenKind.Xor],
  ['^=', TokenKind.XorEquals]
]);

const longestOperator = Math.max(...[...operators.keys()].map(op => op.length));

/**
 * Longest operator spelling starting at `index`, or undefined.
 */
export function matchOperator(text: string, index: number): { spelling: string; kind: TokenKind } | undefined {
  for (let len = Math.min(longestOperator, text.length - index); len > 0; len--) {
    const spelling = text.slice(index, index + len);
    const kind = operators.get(spelling);
    if (kind !== undefined) return { spelling, kind };
  }
  return undefined;
}

export function isWhite(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * True if `ch` ends one token and starts another: whitespace or any ASCII
 * punctuation except '_' and '`'.
 */
export function isSeparating(ch: string): boolean {
  const code = ch.charCodeAt(0);
  return (code >= 0x21 && code <= 0x2f)   // ! .. /
    || (code >= 0x3a && code <= 0x40)     // : .. @
    || (code >= 0x5b && code <= 0x5e)     // [ .. ^
    || (code >= 0x7b && code <= 0x7e)     // { .. ~
    || code === 0x20 || code === 0x09
    || (code >= 0x0a && code <= 0x0d);
}

export function isIdentifierChar(ch: string): boolean {
  return /[_0-9A-Za-z]/.test(ch);
}

// Tokens counted by countLinesOfCode besides ';'
export const lineOfCodeKeywords: ReadonlySet<string> = new Set([
  'while', 'if', 'for', 'foreach', 'foreach_reverse', 'case'
]);
