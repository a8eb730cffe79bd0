import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { candidatePaths, findModuleFile, moduleNameOf } from '../server/src/analysis/project/imports';

describe('moduleNameOf', () => {
    test.each([
        ['std.stdio', 'std.stdio'],
        ['io = std.stdio', 'std.stdio'],
        ['std.stdio : writeln, writefln', 'std.stdio'],
        ['io = std.stdio : writeln', 'std.stdio'],
        [' core . thread ', 'core.thread']
    ])('%j → %j', (entry, expected) => {
        expect(moduleNameOf(entry)).toBe(expected);
    });
});

describe('findModuleFile', () => {
    let root: string;
    let second: string;

    beforeAll(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'dlens-imports-'));
        second = path.join(root, 'second');
        fs.mkdirSync(path.join(root, 'std'), { recursive: true });
        fs.mkdirSync(path.join(root, 'pkg'), { recursive: true });
        fs.mkdirSync(path.join(second, 'std'), { recursive: true });
        fs.writeFileSync(path.join(root, 'std', 'stdio.d'), 'module std.stdio;');
        fs.writeFileSync(path.join(root, 'std', 'conv.di'), 'module std.conv;');
        fs.writeFileSync(path.join(root, 'pkg', 'package.d'), 'module pkg;');
        fs.writeFileSync(path.join(second, 'std', 'stdio.d'), 'module std.stdio;');
        fs.writeFileSync(path.join(second, 'std', 'array.d'), 'module std.array;');
        fs.writeFileSync(path.join(root, 'local.d'), 'module local;');
    });

    afterAll(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    test('candidates in lookup order', () => {
        expect(candidatePaths('/inc', 'a.b')).toEqual([
            path.join('/inc', 'a', 'b.d'),
            path.join('/inc', 'a', 'b.di'),
            path.join('/inc', 'a', 'b', 'package.d')
        ]);
    });

    test('.d, then .di, then package.d', async () => {
        expect(await findModuleFile([root], 'std.stdio')).toBe(path.join(root, 'std', 'stdio.d'));
        expect(await findModuleFile([root], 'std.conv')).toBe(path.join(root, 'std', 'conv.di'));
        expect(await findModuleFile([root], 'pkg')).toBe(path.join(root, 'pkg', 'package.d'));
    });

    test('earlier directories win, later ones are searched', async () => {
        expect(await findModuleFile([root, second], 'std.stdio')).toBe(path.join(root, 'std', 'stdio.d'));
        expect(await findModuleFile([root, second], 'std.array')).toBe(path.join(second, 'std', 'array.d'));
    });

    test('file names resolve against the first directory', async () => {
        expect(await findModuleFile([root, second], 'local.d')).toBe(path.join(root, 'local.d'));
        expect(await findModuleFile([second], path.join(root, 'local.d'))).toBe(path.join(root, 'local.d'));
    });

    test('unknown modules', async () => {
        expect(await findModuleFile([root], 'std.missing')).toBeUndefined();
        expect(await findModuleFile([], 'std.stdio')).toBeUndefined();
        expect(await findModuleFile([root], 'missing.d')).toBeUndefined();
    });
});
