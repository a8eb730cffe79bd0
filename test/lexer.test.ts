import { tokenize, lexTokenString, countLinesOfCode } from '../server/src/analysis/lexer/lexer';
import { createCursor, IterationStyle, LexerError, Token, TokenKind } from '../server/src/analysis/lexer/token';

/** [kind, text] pairs, the shape most assertions need */
function kindsAndTexts(tokens: Token[]): Array<[TokenKind, string]> {
    return tokens.map(t => [t.kind, t.text]);
}

function texts(source: string, style = IterationStyle.CodeOnly): string[] {
    return tokenize(source, style).map(t => t.text);
}

// ══════════════════════════════════════════════════════════════════════════════
// 1. Basic dispatch
// ══════════════════════════════════════════════════════════════════════════════

describe('tokenize', () => {
    test('declaration with offsets and lines', () => {
        const tokens = tokenize('int x = 5;');
        expect(tokens).toEqual([
            { kind: TokenKind.Keyword, text: 'int', line: 1, start: 0, end: 3 },
            { kind: TokenKind.Identifier, text: 'x', line: 1, start: 4, end: 5 },
            { kind: TokenKind.Assign, text: '=', line: 1, start: 6, end: 7 },
            { kind: TokenKind.NumberLiteral, text: '5', line: 1, start: 8, end: 9 },
            { kind: TokenKind.Semicolon, text: ';', line: 1, start: 9, end: 10 }
        ]);
    });

    test('keywords and identifiers', () => {
        expect(kindsAndTexts(tokenize('class Foo __traits foo_bar2'))).toEqual([
            [TokenKind.Keyword, 'class'],
            [TokenKind.Identifier, 'Foo'],
            [TokenKind.Keyword, '__traits'],
            [TokenKind.Identifier, 'foo_bar2']
        ]);
    });

    test('longest operator wins', () => {
        expect(kindsAndTexts(tokenize('a >>>= b >>> c >> d'))).toEqual([
            [TokenKind.Identifier, 'a'],
            [TokenKind.UnsignedShiftRightEqual, '>>>='],
            [TokenKind.Identifier, 'b'],
            [TokenKind.UnsignedShiftRight, '>>>'],
            [TokenKind.Identifier, 'c'],
            [TokenKind.ShiftRight, '>>'],
            [TokenKind.Identifier, 'd']
        ]);
    });

    test('floating point comparison operators', () => {
        expect(tokenize('a !<>= b').map(t => t.kind)).toEqual([
            TokenKind.Identifier, TokenKind.Unordered, TokenKind.Identifier
        ]);
        expect(tokenize('a ^^= 2 ... x => y').map(t => t.kind)).toEqual([
            TokenKind.Identifier, TokenKind.PowEquals, TokenKind.NumberLiteral,
            TokenKind.Vararg, TokenKind.Identifier, TokenKind.GoesTo, TokenKind.Identifier
        ]);
    });

    test('slash is division, division-assign or a comment', () => {
        expect(kindsAndTexts(tokenize('a / b /= c'))).toEqual([
            [TokenKind.Identifier, 'a'],
            [TokenKind.Div, '/'],
            [TokenKind.Identifier, 'b'],
            [TokenKind.DivEquals, '/='],
            [TokenKind.Identifier, 'c']
        ]);
        expect(texts('a // note\nb /* c */ d /+ e +/ f')).toEqual(['a', 'b', 'd', 'f']);
    });

    test('everything mode keeps comments and whitespace', () => {
        expect(kindsAndTexts(tokenize('// hi\nx', IterationStyle.Everything))).toEqual([
            [TokenKind.Comment, '// hi'],
            [TokenKind.Whitespace, '\n'],
            [TokenKind.Identifier, 'x']
        ]);
    });

    test('line numbers advance through comments and whitespace', () => {
        const source = 'a\n/* one\ntwo */\nb';
        const code = tokenize(source);
        expect(code.map(t => t.line)).toEqual([1, 4]);

        const all = tokenize(source, IterationStyle.Everything);
        expect(all.find(t => t.kind === TokenKind.Comment)?.line).toBe(2);
    });

    test('prefixed and backtick strings', () => {
        expect(kindsAndTexts(tokenize('r"C:\\dir" x"0A" `a\\` xy r + 1'))).toEqual([
            [TokenKind.StringLiteral, 'r"C:\\dir"'],
            [TokenKind.StringLiteral, 'x"0A"'],
            [TokenKind.StringLiteral, '`a\\`'],
            [TokenKind.Identifier, 'xy'],
            [TokenKind.Identifier, 'r'],
            [TokenKind.Plus, '+'],
            [TokenKind.NumberLiteral, '1']
        ]);
    });

    test('escaped quotes stay inside a string', () => {
        expect(texts('"a\\"b" c')).toEqual(['"a\\"b"', 'c']);
        expect(texts('\'\\\'\'')).toEqual(['\'\\\'\'']);
    });

    test('delimited strings', () => {
        expect(texts('q"(a(b)c)" d')).toEqual(['q"(a(b)c)"', 'd']);

        const heredoc = tokenize('q"EOS\nline\nEOS" z');
        expect(heredoc.map(t => t.text)).toEqual(['q"EOS\nline\nEOS"', 'z']);
        expect(heredoc[1].line).toBe(3);
    });

    test('token strings hold whole tokens', () => {
        expect(kindsAndTexts(tokenize('q{ int x = "}"; } y'))).toEqual([
            [TokenKind.StringLiteral, 'q{ int x = "}"; }'],
            [TokenKind.Identifier, 'y']
        ]);
    });

    test('attributes and a bare @', () => {
        expect(kindsAndTexts(tokenize('@safe @(x)'))).toEqual([
            [TokenKind.Attribute, '@safe'],
            [TokenKind.At, '@'],
            [TokenKind.LParen, '('],
            [TokenKind.Identifier, 'x'],
            [TokenKind.RParen, ')']
        ]);
    });

    test('a separating character without meaning is one invalid token', () => {
        expect(kindsAndTexts(tokenize('a \\ b'))).toEqual([
            [TokenKind.Identifier, 'a'],
            [TokenKind.Invalid, '\\'],
            [TokenKind.Identifier, 'b']
        ]);
    });
});

// ══════════════════════════════════════════════════════════════════════════════
// 2. Numbers in context
// ══════════════════════════════════════════════════════════════════════════════

describe('numeric literals in context', () => {
    test('single literals', () => {
        expect(texts('0x1A 0b101 1_000 1.5e-10 0x1p4 10L 2.5f')).toEqual([
            '0x1A', '0b101', '1_000', '1.5e-10', '0x1p4', '10L', '2.5f'
        ]);
    });

    test('at most one dot', () => {
        expect(kindsAndTexts(tokenize('1.2.3'))).toEqual([
            [TokenKind.NumberLiteral, '1.2'],
            [TokenKind.Dot, '.'],
            [TokenKind.NumberLiteral, '3']
        ]);
    });

    test('slices and property access after a number', () => {
        expect(kindsAndTexts(tokenize('1..2'))).toEqual([
            [TokenKind.NumberLiteral, '1'],
            [TokenKind.Slice, '..'],
            [TokenKind.NumberLiteral, '2']
        ]);
        expect(texts('1.max')).toEqual(['1', '.', 'max']);
    });
});

// ══════════════════════════════════════════════════════════════════════════════
// 3. Totality and round-trip
// ══════════════════════════════════════════════════════════════════════════════

describe('malformed input', () => {
    const truncated = [
        '"abc', '/* abc', '/+ /+ +/', 'q"(abc', 'q{ {', '`abc', '\'', '0x', '@', 'q"', 'r"', 'q"EOS\nabc',
        'x = 1 /', 'a.b.', '\\\\\\'
    ];

    test.each(truncated)('%j lexes without throwing and stays in bounds', (source) => {
        const tokens = tokenize(source, IterationStyle.Everything);
        for (const t of tokens) {
            expect(t.start).toBeLessThanOrEqual(source.length);
            expect(t.end).toBeLessThanOrEqual(source.length);
        }
        expect(tokens.map(t => t.text).join('')).toBe(source);
    });

    test('unterminated string runs to the end of input', () => {
        expect(texts('x = "abc')).toEqual(['x', '=', '"abc']);
    });
});

describe('round-trip in everything mode', () => {
    test('joining token texts reproduces the source', () => {
        const source = [
            'module app.main;',
            'import std.stdio : writeln;',
            '/++ docs /+ nested +/ ++/',
            'class Foo : Bar!int {',
            '    @property int size() const { return cast(int) data.length; }',
            '    string s = q"[a[b]c]" ~ r"raw\\" ~ `tick` ~ x"0A";',
            '    auto t = q{ a + "}" };',
            '    real r = 0x1.8p3 + 1_000.5e-3L;',
            '}',
            ''
        ].join('\r\n');
        const tokens = tokenize(source, IterationStyle.Everything);
        expect(tokens.map(t => t.text).join('')).toBe(source);
        for (const t of tokens) expect(source.slice(t.start, t.end)).toBe(t.text);
    });
});

// ══════════════════════════════════════════════════════════════════════════════
// 4. Token strings and line counts
// ══════════════════════════════════════════════════════════════════════════════

describe('lexTokenString', () => {
    test('stops at the matching brace', () => {
        const cursor = createCursor('q{ { a } } rest');
        expect(lexTokenString(cursor)).toBe('q{ { a } }');
        expect(cursor.index).toBe(10);
    });

    test('nested token strings are part of the outer one', () => {
        expect(kindsAndTexts(tokenize('q{ q{ a } } b'))).toEqual([
            [TokenKind.StringLiteral, 'q{ q{ a } }'],
            [TokenKind.Identifier, 'b']
        ]);
    });

    test('deep nesting is scanned without exhausting the stack', () => {
        const source = 'q{'.repeat(20000);
        expect(kindsAndTexts(tokenize(source))).toEqual([[TokenKind.StringLiteral, source]]);
    });

    test('must start on q{', () => {
        expect(() => lexTokenString(createCursor('{ a }'))).toThrow(LexerError);
    });
});

describe('countLinesOfCode', () => {
    test('counts semicolons and control-flow keywords', () => {
        const tokens = tokenize('if (a) b(); for (;;) {} int x = 1; // not; counted');
        expect(countLinesOfCode(tokens)).toBe(6);
    });

    test('an empty file has no lines of code', () => {
        expect(countLinesOfCode(tokenize(''))).toBe(0);
    });
});
