/**
 * Built-in Property Registry
 * ==========================
 *
 * Compiler-synthesized pseudo-members of primitive and array types
 * (`int.max`, `float.nan`, `arr.length`, ...). The tables live in
 * builtin-properties.json; this module validates them once, on first use,
 * and serves the same frozen registry afterwards.
 *
 * A member type of `<#>` stands for the receiver type and is substituted at
 * query time, so `float.max` is a `float` and `ubyte.max` a `ubyte`.
 *
 * @module dlens/server/src/analysis/project/builtins
 */

import table from './builtin-properties.json';

export type PropertyCategory = 'float' | 'integral' | 'common' | 'array';

/** Placeholder for the receiver type inside a member type */
export const RECEIVER_TYPE = '<#>';

const categoryNames: readonly PropertyCategory[] = ['float', 'integral', 'common', 'array'];

const isCategory = (value: string): value is PropertyCategory =>
    categoryNames.some(name => name === value);

export interface BuiltinPropertyRegistry {
    /** Category of a primitive type name, e.g. 'integral' for 'uint' */
    categoryOf(typeName: string): PropertyCategory | undefined;
    /** Members of a primitive type with `<#>` replaced by the type name */
    propertiesFor(typeName: string): ReadonlyMap<string, string> | undefined;
    /** Members shared by every array type, verbatim */
    arrayProperties(): ReadonlyMap<string, string>;
    /** True when `name` is a built-in property of any category */
    isBuiltinPropertyName(name: string): boolean;
}

let registry: BuiltinPropertyRegistry | undefined;

export function builtinPropertyRegistry(): BuiltinPropertyRegistry {
    if (!registry) registry = buildRegistry();
    return registry;
}

function buildRegistry(): BuiltinPropertyRegistry {
    const categories = new Map<PropertyCategory, ReadonlyMap<string, string>>();
    for (const [name, members] of Object.entries(table.categories)) {
        if (!isCategory(name)) throw new Error(`builtin-properties.json: unknown category '${name}'`);
        categories.set(name, new Map<string, string>(Object.entries<string>(members)));
    }
    for (const name of categoryNames) {
        if (!categories.has(name)) throw new Error(`builtin-properties.json: missing category '${name}'`);
    }

    const typeCategories = new Map<string, PropertyCategory>();
    for (const [typeName, category] of Object.entries<string>(table.types)) {
        if (!isCategory(category)) {
            throw new Error(`builtin-properties.json: type '${typeName}' maps to unknown category '${category}'`);
        }
        typeCategories.set(typeName, category);
    }

    const allNames = new Set<string>();
    for (const members of categories.values()) {
        for (const name of members.keys()) allNames.add(name);
    }

    const tableFor = (category: PropertyCategory): ReadonlyMap<string, string> =>
        categories.get(category) ?? new Map<string, string>();

    const api: BuiltinPropertyRegistry = {
        categoryOf: typeName => typeCategories.get(typeName),

        propertiesFor(typeName) {
            const category = typeCategories.get(typeName);
            if (!category) return undefined;
            const resolved = new Map<string, string>();
            for (const [member, type] of tableFor(category)) {
                resolved.set(member, type.split(RECEIVER_TYPE).join(typeName));
            }
            return resolved;
        },

        arrayProperties: () => tableFor('array'),

        isBuiltinPropertyName: name => allNames.has(name)
    };
    return Object.freeze(api);
}
