import * as fs from 'node:fs/promises';
import * as path from 'path';

/** directories never holding sources of the project itself */
const SKIPPED_DIRECTORIES = new Set(['node_modules', '.git', '.dub']);

export async function readFileUtf8(p: string): Promise<string> {
    return fs.readFile(p, 'utf8');
}

export async function isFile(p: string): Promise<boolean> {
    try {
        return (await fs.stat(p)).isFile();
    } catch {
        return false;
    }
}

/**
 * Source files below `dir` whose extension is one of `extensions`
 * (`.d` matches `app.d`, never `app.dd`), depth first.
 */
export async function findAllFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
    const found: string[] = [];
    const pending = [dir];

    while (pending.length > 0) {
        const current = pending.pop();
        if (current === undefined) break;

        const entries = await fs.readdir(current, { withFileTypes: true });
        entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
        const subdirs: string[] = [];
        for (const entry of entries) {
            const full = path.join(current, entry.name);
            if (entry.isDirectory()) {
                if (!SKIPPED_DIRECTORIES.has(entry.name)) subdirs.push(full);
            } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
                found.push(full);
            }
        }
        // reversed so the first subdirectory is popped next
        pending.push(...subdirs.reverse());
    }

    return found;
}
