/**
 * Lexical diagnostics: unterminated strings and comments.
 *
 * The lexer never fails on these; it hands back the partial token. This pass
 * looks at the finished tokens and reports the ones that ran off the end of
 * the input so the LSP layer can publish them as warnings.
 *
 * @module dlens/server/src/analysis/lexer/diagnostics
 */

import { IterationStyle, Token, TokenKind } from './token';
import { tokenize } from './lexer';

export interface LexicalProblem {
    start: number;
    end: number;
    message: string;
}

const closingPairs: Readonly<Record<string, string>> = { '[': ']', '<': '>', '{': '}', '(': ')' };

export function lexicalDiagnostics(tokens: readonly Token[]): LexicalProblem[] {
    const problems: LexicalProblem[] = [];

    for (const tok of tokens) {
        let message: string | undefined;
        if (tok.kind === TokenKind.StringLiteral && !isTerminatedString(tok.text)) {
            message = 'Unterminated string literal';
        } else if (tok.kind === TokenKind.Comment && !isTerminatedComment(tok.text)) {
            message = 'Unterminated comment';
        }
        if (message) problems.push({ start: tok.start, end: tok.end, message });
    }

    return problems;
}

export function isTerminatedComment(text: string): boolean {
    if (text.startsWith('//')) return true;
    if (text.startsWith('/*')) return text.length >= 4 && text.endsWith('*/');
    if (text.startsWith('/+')) return nestingDepth(text) === 0;
    return true;
}

export function isTerminatedString(text: string): boolean {
    if (text.startsWith('q{')) return braceBalanced(text.slice(1));
    if (text.startsWith('q"')) return isTerminatedDelimited(text);

    // r"..." and x"..." carry a one-character prefix
    const prefixed = text.startsWith('r"') || text.startsWith('x"');
    const body = prefixed ? text.slice(1) : text;
    const quote = body[0];
    if (body.length < 2 || body[body.length - 1] !== quote) return false;
    if (quote === '`' || text.startsWith('r"')) return true;

    // the closing quote must not itself be escaped
    let backslashes = 0;
    for (let i = body.length - 2; i > 0 && body[i] === '\\'; i--) backslashes++;
    return backslashes % 2 === 0;
}

function isTerminatedDelimited(text: string): boolean {
    const open = text[2];
    if (open === undefined) return false;
    if (open === '"') return true;

    const close = closingPairs[open];
    if (close !== undefined) {
        return text.length >= 5 && text.endsWith(close + '"') && nestingOf(text.slice(3, -1), open, close) === 0;
    }

    const ident = /^[_0-9A-Za-z]+/.exec(text.slice(2));
    if (ident) {
        return text.length >= 2 + ident[0].length * 2 + 1 && text.endsWith(ident[0] + '"');
    }

    return text.length >= 5 && text.endsWith(open + '"');
}

/* depth left open after the body of a bracketed q"..." literal; the body includes the closing bracket */
function nestingOf(body: string, open: string, close: string): number {
    let depth = 1;
    for (const ch of body) {
        if (ch === open) depth++;
        else if (ch === close) depth--;
    }
    return depth;
}

function nestingDepth(comment: string): number {
    let depth = 0;
    let i = 0;
    while (i < comment.length) {
        if (comment.startsWith('/+', i)) {
            depth++;
            i += 2;
        } else if (comment.startsWith('+/', i) && depth > 0) {
            depth--;
            i += 2;
            if (depth === 0) break;
        } else {
            i++;
        }
    }
    return depth;
}

function braceBalanced(text: string): boolean {
    // token strings hold whole tokens, so braces inside nested strings do not count
    let depth = 0;
    const inner = tokenize(text, IterationStyle.Everything);
    for (const tok of inner) {
        if (tok.kind === TokenKind.LBrace) depth++;
        else if (tok.kind === TokenKind.RBrace) depth--;
    }
    return depth === 0 && inner.length > 0 && inner[inner.length - 1].kind === TokenKind.RBrace;
}
