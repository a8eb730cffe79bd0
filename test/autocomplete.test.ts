import { AutoComplete } from '../server/src/analysis/project/autocomplete';
import { CompletionContext } from '../server/src/analysis/project/context';
import { tokenize } from '../server/src/analysis/lexer/lexer';
import { Module } from '../server/src/analysis/ast/entities';
import { bodySpan, cls, enumDecl, fn, moduleWith, struct, variable } from './helpers/factories';

/** Source with a '|' marking the cursor → source without it + offset */
function at(marked: string): { source: string; position: number } {
    const position = marked.indexOf('|');
    return { source: marked.slice(0, position) + marked.slice(position + 1), position };
}

function complete(source: string, mod: Module, imports: Module[] = []): AutoComplete {
    return new AutoComplete(tokenize(source), new CompletionContext(mod, imports));
}

const point = struct('Point', {
    variables: [variable('x', 'int'), variable('y', 'int')],
    functions: [fn('length', 'double')]
});

// ══════════════════════════════════════════════════════════════════════════════
// 1. dotComplete
// ══════════════════════════════════════════════════════════════════════════════

describe('dotComplete', () => {
    test('members of a local, sorted by name', () => {
        const { source, position } = at('void f() { Point p; p.| }');
        expect(complete(source, moduleWith({ structs: [point] })).dotComplete(position)).toEqual([
            { name: 'length', type: 'double', kind: 'method' },
            { name: 'x', type: 'int', kind: 'member' },
            { name: 'y', type: 'int', kind: 'member' }
        ]);
    });

    test('filters by the typed prefix', () => {
        const { source, position } = at('void f() { Point p; p.le| }');
        expect(complete(source, moduleWith({ structs: [point] })).dotComplete(position).map(e => e.name)).toEqual(['length']);
    });

    test('parameters count as locals', () => {
        const { source, position } = at('void f(const(Point)* p) { p.| }');
        const names = complete(source, moduleWith({ structs: [point] })).dotComplete(position).map(e => e.name);
        expect(names).toEqual(['length', 'x', 'y']);
    });

    test('products are not declarations', () => {
        const mod = moduleWith({ structs: [point] });
        for (const statement of ['int width; width * p;', 'int scale; Point q; q = scale * p;']) {
            const { source, position } = at(`void f() { Point p; ${statement} p.| }`);
            expect(complete(source, mod).dotComplete(position).map(e => e.name)).toEqual(['length', 'x', 'y']);
        }
    });

    test('pointer declarations after a storage class', () => {
        const { source, position } = at('void f() { static Point* p; p.| }');
        expect(complete(source, moduleWith({ structs: [point] })).dotComplete(position).map(e => e.name)).toEqual(['length', 'x', 'y']);
    });

    describe('inside a class', () => {
        const marked = 'class Shape { Point origin; Point[] points; Point center() { return origin; } void draw() { $ } }';

        function shapeCompletion(expression: string) {
            const { source, position } = at(marked.replace('$', expression));
            const shape = cls('Shape', [], {
                ...bodySpan(source, 'class Shape'),
                variables: [variable('origin', 'Point'), variable('points', 'Point[]')],
                functions: [fn('center', 'Point'), fn('draw', 'void')]
            });
            return complete(source, moduleWith({ structs: [point], classes: [shape] })).dotComplete(position);
        }

        test('call result', () => {
            expect(shapeCompletion('center().|').map(e => e.name)).toEqual(['length', 'x', 'y']);
        });

        test('indexed array field', () => {
            expect(shapeCompletion('points[0].|').map(e => e.name)).toEqual(['length', 'x', 'y']);
        });

        test('this and a field chain', () => {
            expect(shapeCompletion('this.origin.|').map(e => e.name)).toEqual(['length', 'x', 'y']);
        });

        test('this lists the class itself', () => {
            expect(shapeCompletion('this.|').map(e => e.name)).toEqual(['center', 'classInfo', 'draw', 'origin', 'points']);
        });

        test('array field gets the array properties', () => {
            expect(shapeCompletion('points.len|')).toEqual([{ name: 'length', type: 'size_t', kind: 'method' }]);
        });
    });

    test('super resolves the first base class', () => {
        const marked = 'class Derived : Base { void f() { super.| } }';
        const { source, position } = at(marked);
        const mod = moduleWith({
            classes: [
                cls('Base', [], { functions: [fn('run', 'void')] }),
                cls('Derived', ['Base'], bodySpan(source, 'class Derived'))
            ]
        });
        expect(complete(source, mod).dotComplete(position).map(e => e.name)).toEqual(['classInfo', 'run']);
    });

    test('primitive type names give built-in properties', () => {
        const { source, position } = at('auto m = int.m|');
        expect(complete(source, moduleWith({})).dotComplete(position)).toEqual([
            { name: 'mangleof', type: 'string', kind: 'method' },
            { name: 'max', type: 'int', kind: 'method' },
            { name: 'min', type: 'int', kind: 'method' }
        ]);
    });

    test('enum type names list their constants', () => {
        const { source, position } = at('auto c = Color.|');
        const mod = moduleWith({ enums: [enumDecl('Color', 'int', ['red', 'green'])] });
        expect(complete(source, mod).dotComplete(position)).toEqual([
            { name: 'green', type: 'int', kind: 'enum-constant' },
            { name: 'red', type: 'int', kind: 'enum-constant' }
        ]);
    });

    test('module-level variables of imports', () => {
        const { source, position } = at('void f() { config.| }');
        const imported = moduleWith({
            variables: [variable('config', 'Settings')],
            structs: [struct('Settings', { variables: [variable('verbose', 'bool')] })]
        });
        expect(complete(source, moduleWith({}), [imported]).dotComplete(position)).toEqual([
            { name: 'verbose', type: 'bool', kind: 'member' }
        ]);
    });

    test('unresolved expressions give nothing', () => {
        const { source, position } = at('void f() { unknown.| }');
        expect(complete(source, moduleWith({})).dotComplete(position)).toEqual([]);
    });

    test('not after a dot', () => {
        const { source, position } = at('void f() { p| }');
        expect(complete(source, moduleWith({ structs: [point] })).dotComplete(position)).toEqual([]);
    });
});

// ══════════════════════════════════════════════════════════════════════════════
// 2. parenComplete / activeParameter
// ══════════════════════════════════════════════════════════════════════════════

describe('parenComplete', () => {
    const add = fn('add', 'int', [variable('a', 'int'), variable('b', 'int')]);

    test('free function', () => {
        const { source, position } = at('void f() { add(1, |');
        const ac = complete(source, moduleWith({ functions: [add] }));
        expect(ac.parenComplete(position)).toEqual(['int add(int a, int b)']);
        expect(ac.activeParameter(position)).toBe(1);
    });

    test('member function through an expression', () => {
        const { source, position } = at('void f() { Point p; p.length(| }');
        const ac = complete(source, moduleWith({ structs: [point] }));
        expect(ac.parenComplete(position)).toEqual(['double length()']);
        expect(ac.activeParameter(position)).toBe(0);
    });

    test('innermost open call, nested commas ignored', () => {
        const { source, position } = at('x = add(g(1, 2), |');
        const ac = complete(source, moduleWith({ functions: [add, fn('g', 'int')] }));
        expect(ac.parenComplete(position)).toEqual(['int add(int a, int b)']);
        expect(ac.activeParameter(position)).toBe(1);
    });

    test('constructors after new', () => {
        const { source, position } = at('auto w = new Widget(|');
        const widget = cls('Widget', [], { functions: [fn('this', 'void', [variable('size', 'int')])] });
        expect(complete(source, moduleWith({ classes: [widget] })).parenComplete(position)).toEqual(['void this(int size)']);
    });

    test('keywords list their identifiers', () => {
        const scope = at('scope(|');
        expect(complete(scope.source, moduleWith({})).parenComplete(scope.position)).toEqual(['exit', 'failure', 'success']);

        const version = at('version(|');
        expect(complete(version.source, moduleWith({})).parenComplete(version.position)).toContain('linux');
    });

    test('outside a call', () => {
        const { source, position } = at('foo(); |');
        const ac = complete(source, moduleWith({ functions: [fn('foo', 'void')] }));
        expect(ac.parenComplete(position)).toEqual([]);
        expect(ac.activeParameter(position)).toBeUndefined();
    });
});
