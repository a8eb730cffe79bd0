/**
 * Helpers over type names as the parser spells them (`const(char)[]`,
 * `Foo!int*`, `immutable string`). Lookups key on the bare names these
 * return.
 *
 * @module dlens/server/src/analysis/ast/typenames
 */

const QUALIFIERS = ['const', 'immutable', 'shared', 'inout', 'ref', 'scope', 'static', 'out', 'lazy', 'in'];

const QUALIFIED_CALL = new RegExp(`^(?:${QUALIFIERS.join('|')})\\s*\\((.*)\\)(.*)$`);
const QUALIFIER_PREFIX = new RegExp(`^(?:${QUALIFIERS.join('|')})\\s+`);

/** `Foo!int` → `Foo`, `Foo!(int, long)` → `Foo` */
export function templateName(name: string): string {
    const bang = name.indexOf('!');
    return (bang === -1 ? name : name.slice(0, bang)).trim();
}

/**
 * Drops qualifiers, pointer stars and template arguments:
 * `const(Foo!int)*` → `Foo`, `immutable(char)[]` → `char[]`.
 */
export function normalizeTypeName(type: string): string {
    let result = type.trim();
    for (;;) {
        const call = QUALIFIED_CALL.exec(result);
        if (call) {
            result = (call[1] + call[2]).trim();
            continue;
        }
        const prefix = QUALIFIER_PREFIX.exec(result);
        if (prefix) {
            result = result.slice(prefix[0].length);
            continue;
        }
        break;
    }

    result = result.replace(/\*+$/, '').trim();

    const bang = result.indexOf('!');
    if (bang !== -1) {
        const suffix = /(\[[^\[\]]*\])*$/.exec(result);
        result = templateName(result) + (suffix ? suffix[0] : '');
    }
    return result;
}

/**
 * Type of one element of an indexed value: `int[]` → `int`,
 * `int[string]` → `int`, `string` → `immutable(char)` normalized to `char`.
 * @returns undefined when the type is not indexable by name alone
 */
export function elementType(type: string): string | undefined {
    const normalized = normalizeTypeName(type);
    switch (normalized) {
        case 'string': return 'char';
        case 'wstring': return 'wchar';
        case 'dstring': return 'dchar';
    }
    const indexed = /^(.*)\[[^\[\]]*\]$/.exec(normalized);
    return indexed ? indexed[1].trim() : undefined;
}
