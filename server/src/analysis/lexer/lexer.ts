/**
 * Lexer Module - D Language Server
 * ================================
 *
 * Tokenizes D source code into a stream of tokens for the parser and the
 * cursor queries.
 *
 * TOKEN FLOW:
 *   Source Code → [lexer.ts] → Token[] → parser → Module
 *
 * DISPATCH (one cursor, no backtracking):
 *   whitespace        → lexWhitespace
 *   0-9               → lexNumber
 *   '/'               → peek one: '//' '/*' '/+' comments, '/=' or '/'
 *   r" x" ` ' "       → lexString (r" and ` never escape)
 *   q" q{             → lexDelimitedString / lexTokenString
 *   '@'               → attribute such as @safe
 *   operator table    → longest match
 *   anything else     → run up to the next separating char, keyword or identifier
 *
 * Every branch advances the cursor by at least one character, so the loop
 * always terminates, and sub-lexers clamp to the end of the input.
 *
 * @module dlens/server/src/analysis/lexer/lexer
 */

import { createCursor, IterationStyle, LexCursor, LexerError, Token, TokenKind } from './token';
import { isSeparating, isWhite, keywords, lineOfCodeKeywords, matchOperator } from './rules';
import { lexComment, lexDelimitedString, lexNumber, lexString, lexWhitespace } from './sublexers';

export function tokenize(source: string, style: IterationStyle = IterationStyle.CodeOnly): Token[] {
    const toks: Token[] = [];
    const cursor = createCursor(source);

    while (cursor.index < source.length) {
        const tok = nextToken(cursor, style);
        if (tok) toks.push(tok);
    }

    return toks;
}

/**
 * Lexes a token string q{ ... }: whole tokens are consumed, tracking brace
 * depth, until the brace matching the opening one. The cursor must be on
 * the 'q'. A nested q{ is read as `q` and `{`, which balances the same and
 * keeps the scan flat however deep the nesting goes.
 */
export function lexTokenString(cursor: LexCursor): string {
    const { text } = cursor;
    if (!text.startsWith('q{', cursor.index)) {
        throw new LexerError(cursor.index, cursor.line, 'lexTokenString expected q{');
    }

    const start = cursor.index;
    cursor.index++;
    let depth = 0;
    while (cursor.index < text.length) {
        const tok = nextToken(cursor, IterationStyle.Everything, true);
        if (!tok) continue;
        if (tok.kind === TokenKind.LBrace) depth++;
        else if (tok.kind === TokenKind.RBrace && --depth === 0) break;
    }
    return text.slice(start, cursor.index);
}

/**
 * Counts logical lines of code: statements ending in ';' plus the
 * control-flow keywords that carry a statement without one.
 */
export function countLinesOfCode(tokens: readonly Token[]): number {
    return tokens.filter(t =>
        t.kind === TokenKind.Semicolon ||
        (t.kind === TokenKind.Keyword && lineOfCodeKeywords.has(t.text))
    ).length;
}

/* one token from the cursor position; undefined for skipped trivia */
function nextToken(cursor: LexCursor, style: IterationStyle, inTokenString = false): Token | undefined {
    const { text } = cursor;
    const start = cursor.index;
    const line = cursor.line;
    const ch = text[start];
    const next = text[start + 1];

    const make = (kind: TokenKind): Token => ({
        kind,
        text: text.slice(start, cursor.index),
        line,
        start,
        end: cursor.index
    });

    // whitespace
    if (isWhite(ch)) {
        lexWhitespace(cursor, style);
        return style === IterationStyle.Everything ? make(TokenKind.Whitespace) : undefined;
    }

    // numbers
    if (ch >= '0' && ch <= '9') {
        lexNumber(cursor);
        return make(TokenKind.NumberLiteral);
    }

    // comments, '/=' and '/'
    if (ch === '/') {
        if (next === '/' || next === '*' || next === '+') {
            cursor.index++;
            lexComment(cursor);
            return style === IterationStyle.Everything ? make(TokenKind.Comment) : undefined;
        }
        cursor.index += next === '=' ? 2 : 1;
        return make(next === '=' ? TokenKind.DivEquals : TokenKind.Div);
    }

    // r"raw" and x"hex" strings; otherwise 'r' and 'x' start identifiers
    if ((ch === 'r' || ch === 'x') && next === '"') {
        cursor.index++;
        lexString(cursor, '"', ch === 'x');
        return make(TokenKind.StringLiteral);
    }

    if (ch === '`') {
        lexString(cursor, '`', false);
        return make(TokenKind.StringLiteral);
    }

    if (ch === '"' || ch === '\'') {
        lexString(cursor, ch);
        return make(TokenKind.StringLiteral);
    }

    if (ch === 'q' && next === '"') {
        lexDelimitedString(cursor);
        return make(TokenKind.StringLiteral);
    }

    if (ch === 'q' && next === '{' && !inTokenString) {
        lexTokenString(cursor);
        return make(TokenKind.StringLiteral);
    }

    // @safe, @property, or a bare '@' before '(' in @(...)
    if (ch === '@') {
        cursor.index++;
        scanWord(cursor);
        return make(cursor.index - start > 1 ? TokenKind.Attribute : TokenKind.At);
    }

    const op = matchOperator(text, start);
    if (op) {
        cursor.index += op.spelling.length;
        return make(op.kind);
    }

    // identifier / keyword
    scanWord(cursor);
    if (cursor.index === start) {
        // separating character with no meaning of its own
        cursor.index++;
        return make(TokenKind.Invalid);
    }
    const word = text.slice(start, cursor.index);
    return make(keywords.has(word) ? TokenKind.Keyword : TokenKind.Identifier);
}

function scanWord(cursor: LexCursor): void {
    const { text } = cursor;
    while (cursor.index < text.length && !isSeparating(text[cursor.index]) && !isWhite(text[cursor.index])) {
        cursor.index++;
    }
}
