/**
 * Maps import entries of a parsed module to files on disk.
 *
 * @module dlens/server/src/analysis/project/imports
 */

import * as path from 'path';
import { isFile } from '../../util/fs';

/**
 * Module name of one import entry as the parser records it:
 * `std.stdio`, `io = std.stdio`, `std.stdio : writeln, writefln`.
 */
export function moduleNameOf(importText: string): string {
    let name = importText;
    const colon = name.indexOf(':');
    if (colon !== -1) name = name.slice(0, colon);
    const equals = name.indexOf('=');
    if (equals !== -1) name = name.slice(equals + 1);
    return name.replace(/\s+/g, '');
}

/** Paths tried for `name` under `dir`, in order */
export function candidatePaths(dir: string, name: string): string[] {
    const relative = path.join(...name.split('.'));
    return [
        path.join(dir, `${relative}.d`),
        path.join(dir, `${relative}.di`),
        path.join(dir, relative, 'package.d')
    ];
}

/**
 * First existing file for module `name` under the import directories.
 * A name ending in `.d` or `.di` is taken as a file path: absolute, or
 * relative to the first directory.
 */
export async function findModuleFile(directories: readonly string[], name: string): Promise<string | undefined> {
    if (name.endsWith('.d') || name.endsWith('.di')) {
        const resolved = path.isAbsolute(name) || directories.length === 0
            ? path.resolve(name)
            : path.resolve(directories[0], name);
        return (await isFile(resolved)) ? resolved : undefined;
    }

    for (const dir of directories) {
        for (const candidate of candidatePaths(dir, name)) {
            if (await isFile(candidate)) return path.resolve(candidate);
        }
    }
    return undefined;
}
