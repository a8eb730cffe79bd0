/**
 * Completion Context - D Language Server
 * ======================================
 *
 * Answers member and call-tip queries over one current Module plus the
 * auxiliary (imported) Modules the host has parsed.
 *
 * LOOKUP ORDER FOR membersOfType(name), first match wins:
 *   1. 'T[]'               → array built-ins, verbatim
 *   2. primitive           → category built-ins, <#> = name
 *   3. class / interface   → own fields + methods, then every base class
 *                            (derived names shadow inherited ones), then
 *                            a synthesized 'classInfo'
 *   4. struct / union      → own fields + methods
 *   5. enum                → its members as constants
 *   6. alias               → members of the aliased type
 *
 * Base class names are looked up without their template arguments, so
 * `class A : B!int` inherits from `B`.
 *
 * Modules are scanned current first, then auxiliary ones in the order they
 * were added. Two classes with the same name in different modules are not
 * told apart: the first one in scan order is used, for base classes too.
 *
 * Nothing here throws for a miss. Unknown types, unresolved base classes
 * and missing containers all give empty results.
 *
 * @module dlens/server/src/analysis/project/context
 */

import {
    AggregateDecl,
    EnumDecl,
    FunctionDecl,
    InheritsDecl,
    isInherits,
    Module,
    StructDecl,
    aggregatesOf
} from '../ast/entities';
import { formatSignature } from '../ast/printer';
import { templateName } from '../ast/typenames';
import { builtinPropertyRegistry } from './builtins';

export type MemberKind = 'method' | 'member' | 'enum-constant';

export interface MemberInfo {
    type: string;
    kind: MemberKind;
}

export type MemberMap = Map<string, MemberInfo>;

/** Type of the member synthesized on every class and interface */
export const CLASS_INFO_TYPE = 'TypeInfo_Class';

export class CompletionContext {
    /** Auxiliary modules, append-only */
    readonly modules: Module[] = [];

    /** Where the host looks for imported files; not read by the queries */
    importDirectories: string[];

    constructor(readonly currentModule: Module, modules: readonly Module[] = [], importDirectories: readonly string[] = []) {
        this.modules.push(...modules);
        this.importDirectories = [...importDirectories];
    }

    addModule(mod: Module): void {
        this.modules.push(mod);
    }

    /**
     * Members exposed by the type `name`, keyed by member name.
     * @returns an empty map when the type is unknown
     */
    membersOfType(name: string): MemberMap {
        return this.resolveMembers(name, new Set());
    }

    /**
     * Aggregates of the current module whose body encloses `position`,
     * outermost first.
     */
    structsContaining(position: number): AggregateDecl[] {
        return aggregatesOf(this.currentModule)
            .filter(s => s.bodyStart <= position && s.bodyEnd >= position)
            .sort((a, b) => a.bodyStart - b.bodyStart);
    }

    /**
     * Rendered signatures of the functions a call to `functionName` can
     * reach. An empty or 'void' container means "an unqualified call at
     * `position`": enclosing aggregates are tried innermost first, then free
     * functions of every module.
     */
    callTipsFor(container: string, functionName: string, position: number): string[] {
        if (container === '' || container === 'void') {
            const enclosing = this.structsContaining(position).reverse();
            for (const agg of enclosing) {
                const methods = this.methodsNamed(agg, functionName);
                if (methods.length > 0) return methods.map(formatSignature);
            }
            return this.allModules()
                .flatMap(m => m.functions)
                .filter(f => f.name === functionName)
                .map(formatSignature);
        }

        const agg = this.findAggregate(container);
        if (!agg) return [];
        return this.methodsNamed(agg, functionName).map(formatSignature);
    }

    /** Current module first, then auxiliary modules */
    allModules(): Module[] {
        return [this.currentModule, ...this.modules];
    }

    /** First class or interface named `name` in scan order */
    findInherits(name: string): InheritsDecl | undefined {
        for (const m of this.allModules()) {
            const found = [...m.classes, ...m.interfaces].find(c => c.name === name);
            if (found) return found;
        }
        return undefined;
    }

    /**
     * First class, interface, struct or union named `name`, module by
     * module: a struct of the current module hides an imported class.
     */
    findAggregate(name: string): AggregateDecl | undefined {
        for (const m of this.allModules()) {
            const found = [...m.classes, ...m.interfaces, ...m.structs, ...m.unions].find(a => a.name === name);
            if (found) return found;
        }
        return undefined;
    }

    private findStruct(name: string): StructDecl | undefined {
        for (const m of this.allModules()) {
            const found = [...m.structs, ...m.unions].find(s => s.name === name);
            if (found) return found;
        }
        return undefined;
    }

    private findEnum(name: string): EnumDecl | undefined {
        for (const m of this.allModules()) {
            const found = m.enums.find(e => e.name === name);
            if (found) return found;
        }
        return undefined;
    }

    private findAliasTarget(name: string): string | undefined {
        for (const m of this.allModules()) {
            const found = m.aliases.find(a => a.name === name);
            if (found) return found.aliasedType;
        }
        return undefined;
    }

    private resolveMembers(name: string, visited: Set<string>): MemberMap {
        if (name.endsWith('[]')) {
            return toMemberMap(builtinPropertyRegistry().arrayProperties());
        }

        const builtins = builtinPropertyRegistry().propertiesFor(name);
        if (builtins) return toMemberMap(builtins);

        if (visited.has(name)) return new Map();
        visited.add(name);

        const inherits = this.findInherits(name);
        if (inherits) return this.flattenHierarchy(inherits, visited);

        const struct = this.findStruct(name);
        if (struct) return ownMembers(struct);

        const enumDecl = this.findEnum(name);
        if (enumDecl) {
            const members: MemberMap = new Map();
            for (const member of enumDecl.members) {
                setIfAbsent(members, member.name, { type: enumDecl.type, kind: 'enum-constant' });
            }
            return members;
        }

        const aliased = this.findAliasTarget(name);
        if (aliased !== undefined) return this.resolveMembers(aliased, visited);

        return new Map();
    }

    private flattenHierarchy(decl: InheritsDecl, visited: Set<string>): MemberMap {
        const members = ownMembers(decl);

        for (const baseName of decl.baseClasses.map(templateName)) {
            if (visited.has(baseName)) continue;
            visited.add(baseName);
            const base = this.findInherits(baseName);
            if (!base) continue;
            for (const [name, info] of this.flattenHierarchy(base, visited)) {
                setIfAbsent(members, name, info);
            }
        }

        setIfAbsent(members, 'classInfo', { type: CLASS_INFO_TYPE, kind: 'member' });
        return members;
    }

    /* member functions of `agg` named `name`; classes include inherited ones */
    private methodsNamed(agg: AggregateDecl, name: string): FunctionDecl[] {
        const own = agg.functions.filter(f => f.name === name);
        if (!isInherits(agg)) return own;

        const result = [...own];
        const visited = new Set<string>(agg.name ? [agg.name] : []);
        const queue = agg.baseClasses.map(templateName);
        while (queue.length > 0) {
            const baseName = queue.shift();
            if (baseName === undefined || visited.has(baseName)) continue;
            visited.add(baseName);
            const base = this.findInherits(baseName);
            if (!base) continue;
            result.push(...base.functions.filter(f => f.name === name));
            queue.push(...base.baseClasses.map(templateName));
        }
        return result;
    }
}

function ownMembers(agg: AggregateDecl): MemberMap {
    const members: MemberMap = new Map();
    for (const v of agg.variables) {
        if (v.name) setIfAbsent(members, v.name, { type: v.type, kind: 'member' });
    }
    for (const f of agg.functions) {
        if (f.name) setIfAbsent(members, f.name, { type: f.returnType, kind: 'method' });
    }
    return members;
}

function toMemberMap(table: ReadonlyMap<string, string>): MemberMap {
    const members: MemberMap = new Map();
    for (const [name, type] of table) members.set(name, { type, kind: 'method' });
    return members;
}

function setIfAbsent(members: MemberMap, name: string, info: MemberInfo): void {
    if (!members.has(name)) members.set(name, info);
}
