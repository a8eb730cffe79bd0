/**
 * Sub-lexers - D Language Server
 * ==============================
 *
 * One routine per lexical form that needs more than a table lookup. Each is
 * entered with the cursor on a known character, consumes its form, and
 * leaves `cursor.index` on the first character after it and `cursor.line`
 * matching that position.
 *
 * TRUNCATED INPUT:
 *   Unterminated strings and comments run to end of input. The cursor is
 *   clamped to `text.length`, the partial text is returned, and nothing is
 *   thrown; `diagnostics.ts` reports them afterwards.
 *
 * @module dlens/server/src/analysis/lexer/sublexers
 */

import { IterationStyle, LexCursor, LexerError } from './token';
import { isIdentifierChar, isWhite } from './rules';

export type Quote = '\'' | '"' | '`';

/** Opening delimiter → closing delimiter for the nesting q"..." forms */
const delimiterPairs: Readonly<Record<string, string>> = {
    '[': ']',
    '<': '>',
    '{': '}',
    '(': ')'
};

/** A single one of these ends a numeric literal */
const numberSuffixes = new Set(['F', 'f', 'L', 'i', 'u', 'U']);

const contractError = (cursor: LexCursor, message: string): LexerError =>
    new LexerError(cursor.index, cursor.line, message);

/**
 * Advances over whitespace, counting newlines.
 * @returns the whitespace run, or undefined in CodeOnly mode
 */
export function lexWhitespace(cursor: LexCursor, style: IterationStyle = IterationStyle.CodeOnly): string | undefined {
    const { text } = cursor;
    const start = cursor.index;
    while (cursor.index < text.length && isWhite(text[cursor.index])) {
        if (text[cursor.index] === '\n') cursor.line++;
        cursor.index++;
    }
    return style === IterationStyle.Everything ? text.slice(start, cursor.index) : undefined;
}

/**
 * Lexes `//`, `/* *\/` and `/+ +/` comments.
 *
 * The cursor must be on the character after the opening slash, i.e. on the
 * second '/' of a line comment. The returned text includes that slash.
 */
export function lexComment(cursor: LexCursor): string {
    const { text } = cursor;
    const start = cursor.index - 1;

    switch (text[cursor.index]) {
        case '/':
            while (cursor.index < text.length && text[cursor.index] !== '\n') cursor.index++;
            break;

        case '*':
            cursor.index++;
            while (cursor.index < text.length && !text.startsWith('*/', cursor.index)) {
                if (text[cursor.index] === '\n') cursor.line++;
                cursor.index++;
            }
            cursor.index = Math.min(cursor.index + 2, text.length);
            break;

        case '+': {
            cursor.index++;
            let depth = 1;
            while (cursor.index < text.length && depth > 0) {
                if (text.startsWith('+/', cursor.index)) {
                    depth--;
                    cursor.index += 2;
                } else if (text.startsWith('/+', cursor.index)) {
                    depth++;
                    cursor.index += 2;
                } else {
                    if (text[cursor.index] === '\n') cursor.line++;
                    cursor.index++;
                }
            }
            break;
        }

        default:
            throw contractError(cursor, `lexComment called on '${text[cursor.index] ?? 'end of input'}'`);
    }

    return text.slice(start, cursor.index);
}

/**
 * Lexes a quoted literal, delimiters included.
 *
 * The cursor must be on the opening quote. Backslash escapes are honoured
 * only when `canEscape` is set; raw (r"...") and backtick strings pass false.
 */
export function lexString(cursor: LexCursor, quote: Quote, canEscape = true): string {
    const { text } = cursor;
    if (text[cursor.index] !== quote) {
        throw contractError(cursor, `lexString expected ${quote}`);
    }

    const start = cursor.index;
    cursor.index++;
    let escape = false;
    while (cursor.index < text.length && (text[cursor.index] !== quote || escape)) {
        if (escape) escape = false;
        else escape = canEscape && text[cursor.index] === '\\';
        if (text[cursor.index] === '\n') cursor.line++;
        cursor.index++;
    }
    cursor.index = Math.min(cursor.index + 1, text.length);
    return text.slice(start, cursor.index);
}

/**
 * Lexes the delimited string forms: q"[...]", q"<...>", q"{...}", q"(...)",
 * q"/.../" and the heredoc style q"EOS ... EOS".
 *
 * The cursor must be on the 'q'. Bracketed forms nest; the identifier form
 * ends at the next occurrence of the identifier. Returns the literal from
 * the 'q' through the closing quote.
 */
export function lexDelimitedString(cursor: LexCursor): string {
    const { text } = cursor;
    if (!text.startsWith('q"', cursor.index)) {
        throw contractError(cursor, 'lexDelimitedString expected q"');
    }

    const start = cursor.index;
    cursor.index += 2;
    if (cursor.index >= text.length) return text.slice(start);

    const open = text[cursor.index];
    const close = delimiterPairs[open];

    if (open === '"') {
        // q"" has no body
        cursor.index++;
        return text.slice(start, cursor.index);
    }

    if (close !== undefined) {
        cursor.index++;
        let depth = 1;
        while (cursor.index < text.length && depth > 0) {
            const ch = text[cursor.index];
            if (ch === '\n') cursor.line++;
            else if (ch === open) depth++;
            else if (ch === close) depth--;
            cursor.index++;
        }
    } else if (isIdentifierChar(open)) {
        const identStart = cursor.index;
        while (cursor.index < text.length && isIdentifierChar(text[cursor.index])) cursor.index++;
        const ident = text.slice(identStart, cursor.index);
        const found = text.indexOf(ident, cursor.index);
        const stop = found === -1 ? text.length : found + ident.length;
        advanceTo(cursor, stop);
    } else {
        advanceTo(cursor, cursor.index + 1);
        const found = text.indexOf(open, cursor.index);
        advanceTo(cursor, found === -1 ? text.length : found + 1);
    }

    if (cursor.index < text.length && text[cursor.index] === '"') cursor.index++;
    return text.slice(start, cursor.index);
}

/**
 * Lexes a numeric literal in one left-to-right pass.
 *
 * The cursor must be on a decimal digit. Handles 0x/0b prefixes, '_'
 * separators, one decimal point, e/E (decimal) or p/P (hex) exponents with an
 * optional sign, and a single trailing type suffix.
 */
export function lexNumber(cursor: LexCursor): string {
    const { text } = cursor;
    if (!/[0-9]/.test(text[cursor.index] ?? '')) {
        throw contractError(cursor, 'lexNumber expected a digit');
    }

    const start = cursor.index;
    let hex = false;
    let binary = false;
    let foundDot = false;
    let foundE = false;

    if (text[cursor.index] === '0' && cursor.index + 1 < text.length) {
        const prefix = text[cursor.index + 1];
        if (prefix === 'x' || prefix === 'X') {
            hex = true;
            cursor.index += 2;
        } else if (prefix === 'b' || prefix === 'B') {
            binary = true;
            cursor.index += 2;
        }
    }

    while (cursor.index < text.length) {
        const ch = text[cursor.index];

        if ((ch >= '0' && ch <= '9') || ch === '_') {
            cursor.index++;
            continue;
        }

        if (hex && !foundE && /[a-fA-F]/.test(ch)) {
            cursor.index++;
            continue;
        }

        if (ch === '.') {
            const after = text[cursor.index + 1] ?? '';
            // '1..2' is a slice and '1.max' a property access
            if (foundDot || foundE || binary || after === '.' || /[_A-Za-z]/.test(after)) break;
            foundDot = true;
            cursor.index++;
            continue;
        }

        const exponent = hex ? ch === 'p' || ch === 'P' : !binary && (ch === 'e' || ch === 'E');
        if (exponent) {
            if (foundE) break;
            foundE = true;
            cursor.index++;
            if (cursor.index < text.length && (text[cursor.index] === '+' || text[cursor.index] === '-')) {
                cursor.index++;
            }
            continue;
        }

        if (numberSuffixes.has(ch)) cursor.index++;
        break;
    }

    return text.slice(start, cursor.index);
}

/* move to `stop`, counting the newlines passed on the way */
function advanceTo(cursor: LexCursor, stop: number): void {
    while (cursor.index < stop) {
        if (cursor.text[cursor.index] === '\n') cursor.line++;
        cursor.index++;
    }
}
