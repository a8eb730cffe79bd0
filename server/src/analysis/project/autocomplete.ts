/**
 * AutoComplete - cursor queries over one document
 * ================================================
 *
 * Works on the code-only tokens of a document plus the CompletionContext
 * built from its parsed module and imports. Positions are character
 * offsets into the document text.
 *
 * EXPRESSION TYPING (typeOfExpression):
 *   Walks the dotted chain backwards from a token index, collecting
 *   `name`, `name(...)` and `name[...]` segments, then resolves the root:
 *     1. nearest local declaration `Type name` before the expression
 *     2. `this` / `super`
 *     3. members of enclosing aggregates, innermost first
 *     4. module-level variables and functions (current, then imported)
 *     5. a type name (static access such as `int.max`, `Color.red`)
 *   and types every later segment with membersOfType.
 *
 * Nothing here does real inference: `auto` declarations and template
 * results stay unresolved, and an unresolved chain gives empty results.
 *
 * @module dlens/server/src/analysis/project/autocomplete
 */

import { Token, TokenKind } from '../lexer/token';
import { isInherits } from '../ast/entities';
import { elementType, normalizeTypeName } from '../ast/typenames';
import { CompletionContext, MemberKind } from './context';
import { builtinPropertyRegistry } from './builtins';
import parenKeywords from './paren-keywords.json';

export interface CompletionEntry {
    name: string;
    type: string;
    kind: MemberKind;
}

interface ChainSegment {
    name: string;
    /** suffixes in source order: '(' for a call, '[' for an index */
    suffixes: Array<'(' | '['>;
}

const parenKeywordTable = new Map<string, readonly string[]>(Object.entries<string[]>(parenKeywords));

const DECLARATION_FOLLOWERS = new Set<TokenKind>([
    TokenKind.Assign,
    TokenKind.Semicolon,
    TokenKind.Comma,
    TokenKind.RParen,
    TokenKind.Colon
]);

const TYPE_QUALIFIERS = new Set(['const', 'immutable', 'shared', 'inout']);

/* tokens after which a declaration may begin */
const DECLARATION_BOUNDARIES = new Set<TokenKind>([
    TokenKind.Semicolon,
    TokenKind.LBrace,
    TokenKind.RBrace,
    TokenKind.LParen,
    TokenKind.Comma,
    TokenKind.Colon,
    TokenKind.Attribute
]);

const STORAGE_CLASSES = new Set([
    ...TYPE_QUALIFIERS,
    'static', 'ref', 'in', 'out', 'lazy', 'scope', 'final', 'extern', '__gshared', 'auto'
]);

/** a type written in source: its text, its first token, and whether a `*` follows it */
interface TypeSpan {
    type: string;
    start: number;
    pointer: boolean;
}

export class AutoComplete {
    constructor(private readonly tokens: readonly Token[], private readonly context: CompletionContext) {}

    /**
     * Members of the expression left of the `.` the cursor follows, sorted
     * by name and filtered by the part of the member name already typed.
     */
    dotComplete(position: number): CompletionEntry[] {
        const last = this.lastTokenBefore(position);
        if (last === -1) return [];

        let dotIndex: number;
        let prefix = '';
        const token = this.tokens[last];
        if (token.kind === TokenKind.Dot) {
            dotIndex = last;
        } else if (isWord(token) && last > 0 && this.tokens[last - 1].kind === TokenKind.Dot && position <= token.end) {
            dotIndex = last - 1;
            prefix = token.text.slice(0, position - token.start);
        } else {
            return [];
        }

        const type = this.typeOfExpression(dotIndex, position);
        if (type === undefined) return [];

        const entries: CompletionEntry[] = [];
        for (const [name, info] of this.context.membersOfType(type)) {
            if (name.startsWith(prefix)) entries.push({ name, type: info.type, kind: info.kind });
        }
        return entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    }

    /**
     * Call tips for the innermost call left open before `position`.
     * `version(`, `scope(`, `extern(` and `__traits(` list their accepted
     * identifiers instead; `new T(` lists the constructors of T.
     */
    parenComplete(position: number): string[] {
        const open = this.openParenBefore(position);
        if (open === undefined || open === 0) return [];

        const callee = this.tokens[open - 1];
        if (callee.kind === TokenKind.Keyword) {
            return [...(parenKeywordTable.get(callee.text) ?? [])];
        }
        if (callee.kind !== TokenKind.Identifier) return [];

        const before = open >= 2 ? this.tokens[open - 2] : undefined;
        if (before?.kind === TokenKind.Dot) {
            const container = this.typeOfExpression(open - 2, position);
            if (container === undefined) return [];
            return this.context.callTipsFor(container, callee.text, position);
        }
        if (before?.kind === TokenKind.Keyword && before.text === 'new') {
            return this.context.callTipsFor(callee.text, 'this', position);
        }
        return this.context.callTipsFor('', callee.text, position);
    }

    /**
     * Zero-based index of the argument the cursor is in, counting commas at
     * the top level of the innermost open call; undefined outside a call.
     */
    activeParameter(position: number): number | undefined {
        const open = this.openParenBefore(position);
        if (open === undefined) return undefined;

        let depth = 0;
        let commas = 0;
        for (let i = open + 1; i < this.tokens.length && this.tokens[i].start < position; i++) {
            switch (this.tokens[i].kind) {
                case TokenKind.LParen:
                case TokenKind.LBracket:
                case TokenKind.LBrace:
                    depth++;
                    break;
                case TokenKind.RParen:
                case TokenKind.RBracket:
                case TokenKind.RBrace:
                    depth--;
                    break;
                case TokenKind.Comma:
                    if (depth === 0) commas++;
                    break;
            }
        }
        return commas;
    }

    /**
     * Type of the dotted expression that ends right before token
     * `endIndex`, or undefined when any part of it does not resolve.
     */
    typeOfExpression(endIndex: number, position: number): string | undefined {
        const chain = this.chainBefore(endIndex);
        if (!chain) return undefined;

        const [root, ...rest] = chain.segments;
        let type = this.rootType(root.name, chain.start, position);
        if (type === undefined) return undefined;
        type = applySuffixes(type, root.suffixes);

        for (const segment of rest) {
            if (type === undefined) return undefined;
            const member = this.context.membersOfType(type).get(segment.name);
            if (!member) return undefined;
            type = applySuffixes(normalizeTypeName(member.type), segment.suffixes);
        }
        return type;
    }

    /* index of the last token starting before `position`, -1 if none */
    private lastTokenBefore(position: number): number {
        let i = this.tokens.length - 1;
        while (i >= 0 && this.tokens[i].start >= position) i--;
        return i;
    }

    private openParenBefore(position: number): number | undefined {
        let depth = 0;
        for (let i = this.lastTokenBefore(position); i >= 0; i--) {
            const kind = this.tokens[i].kind;
            if (kind === TokenKind.RParen) {
                depth++;
            } else if (kind === TokenKind.LParen) {
                if (depth === 0) return i;
                depth--;
            } else if (kind === TokenKind.Semicolon || kind === TokenKind.LBrace || kind === TokenKind.RBrace) {
                return undefined;
            }
        }
        return undefined;
    }

    /* index of the opener matching the closer at `close`, walking backwards */
    private matchingOpen(close: number, openKind: TokenKind, closeKind: TokenKind): number | undefined {
        let depth = 0;
        for (let i = close; i >= 0; i--) {
            const kind = this.tokens[i].kind;
            if (kind === closeKind) depth++;
            else if (kind === openKind && --depth === 0) return i;
        }
        return undefined;
    }

    private chainBefore(endIndex: number): { segments: ChainSegment[]; start: number } | undefined {
        const segments: ChainSegment[] = [];
        let i = endIndex - 1;

        for (;;) {
            const suffixes: Array<'(' | '['> = [];
            while (i >= 0) {
                const kind = this.tokens[i].kind;
                let open: number | undefined;
                if (kind === TokenKind.RParen) {
                    open = this.matchingOpen(i, TokenKind.LParen, TokenKind.RParen);
                    if (open !== undefined) suffixes.unshift('(');
                } else if (kind === TokenKind.RBracket) {
                    open = this.matchingOpen(i, TokenKind.LBracket, TokenKind.RBracket);
                    if (open !== undefined) suffixes.unshift('[');
                } else {
                    break;
                }
                if (open === undefined) return undefined;
                i = open - 1;
            }

            if (i < 0 || !isWord(this.tokens[i])) return undefined;
            segments.unshift({ name: this.tokens[i].text, suffixes });

            if (i > 0 && this.tokens[i - 1].kind === TokenKind.Dot) {
                i -= 2;
                continue;
            }
            return { segments, start: i };
        }
    }

    private rootType(name: string, rootIndex: number, position: number): string | undefined {
        const local = this.localDeclarationType(name, rootIndex);
        if (local !== undefined) return local;

        const enclosing = this.context.structsContaining(position).reverse();
        if (name === 'this') {
            return enclosing[0]?.name;
        }
        if (name === 'super') {
            const cls = enclosing.find(isInherits);
            const base = cls?.baseClasses[0];
            return base === undefined ? undefined : normalizeTypeName(base);
        }

        for (const agg of enclosing) {
            if (!agg.name) continue;
            const member = this.context.membersOfType(agg.name).get(name);
            if (member) return normalizeTypeName(member.type);
        }

        const modules = this.context.allModules();
        for (const m of modules) {
            const variable = m.variables.find(v => v.name === name);
            if (variable) return normalizeTypeName(variable.type);
        }
        for (const m of modules) {
            const fn = m.functions.find(f => f.name === name);
            if (fn) return normalizeTypeName(fn.returnType);
        }

        return this.context.membersOfType(name).size > 0 ? name : undefined;
    }

    /*
     * Scans backwards from `before` for `Type name` followed by `=`, `;`,
     * `,`, `)` or `:` (a foreach variable), the shapes of locals,
     * parameters and loop variables. The type has to start a declaration,
     * so `q = scale * p;` declares nothing, and `width * p;` is a product
     * when `width` is itself a local.
     */
    private localDeclarationType(name: string, before: number): string | undefined {
        for (let i = before - 1; i > 0; i--) {
            const token = this.tokens[i];
            if (token.kind !== TokenKind.Identifier || token.text !== name) continue;
            const next = this.tokens[i + 1];
            if (!next || !DECLARATION_FOLLOWERS.has(next.kind)) continue;

            const found = this.typeEndingAt(i - 1);
            if (found === undefined || !this.startsDeclaration(found.start)) continue;
            if (found.pointer && this.localDeclarationType(found.type, found.start) !== undefined) continue;
            return normalizeTypeName(found.type);
        }
        return undefined;
    }

    /* whether a type beginning at token `start` can open a declaration */
    private startsDeclaration(start: number): boolean {
        const previous = this.tokens[start - 1];
        if (previous === undefined) return true;
        if (DECLARATION_BOUNDARIES.has(previous.kind)) return true;
        return previous.kind === TokenKind.Keyword && STORAGE_CLASSES.has(previous.text);
    }

    private typeEndingAt(index: number): TypeSpan | undefined {
        const token = this.tokens[index];
        if (!token) return undefined;

        if (token.kind === TokenKind.RBracket && index > 0 && this.tokens[index - 1].kind === TokenKind.LBracket) {
            const element = this.typeEndingAt(index - 2);
            return element === undefined ? undefined : { ...element, type: `${element.type}[]` };
        }
        if (token.kind === TokenKind.Star) {
            const pointee = this.typeEndingAt(index - 1);
            return pointee === undefined ? undefined : { ...pointee, pointer: true };
        }
        // const(T), immutable(T), shared(T), inout(T)
        if (token.kind === TokenKind.RParen) {
            const open = this.matchingOpen(index, TokenKind.LParen, TokenKind.RParen);
            const qualifier = open === undefined ? undefined : this.tokens[open - 1];
            if (open !== undefined && qualifier?.kind === TokenKind.Keyword && TYPE_QUALIFIERS.has(qualifier.text)) {
                const inner = this.typeEndingAt(index - 1);
                return inner === undefined ? undefined : { ...inner, start: open - 1 };
            }
            return undefined;
        }
        if (token.kind === TokenKind.Identifier) {
            return { type: token.text, start: index, pointer: false };
        }
        if (token.kind === TokenKind.Keyword && builtinPropertyRegistry().categoryOf(token.text) !== undefined) {
            return { type: token.text, start: index, pointer: false };
        }
        return undefined;
    }
}

/* identifiers, `this`, `super` and primitive type keywords such as `int` */
function isWord(token: Token): boolean {
    if (token.kind === TokenKind.Identifier) return true;
    if (token.kind !== TokenKind.Keyword) return false;
    return token.text === 'this'
        || token.text === 'super'
        || builtinPropertyRegistry().categoryOf(token.text) !== undefined;
}

function applySuffixes(type: string, suffixes: ReadonlyArray<'(' | '['>): string | undefined {
    let current: string | undefined = type;
    for (const suffix of suffixes) {
        if (current === undefined) return undefined;
        // calls keep the type: membersOfType already reports return types
        if (suffix === '[') current = elementType(current);
    }
    return current;
}
