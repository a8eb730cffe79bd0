/**********************************************************************
 *  Symbol model for D modules
 *  ==========================
 *
 *  What the parser hands to the resolver: one Module per source unit,
 *  owning every declaration in it by value.
 *
 *  Declarations are tagged variants (`kind`) over a shared base, so
 *  consumers switch on the tag:
 *      • Variable / Alias
 *      • Function
 *      • Struct / Union                (aggregates without inheritance)
 *      • Class / Interface             (aggregates with base classes)
 *      • Enum                          + its members
 *
 *  Base class names are kept raw; the resolver looks them up lazily and
 *  a name that resolves to nothing simply contributes no members.
 *
 *  Anonymous aggregates have `name === undefined`. The display label for
 *  them lives in printer.ts and never takes part in lookups.
 *********************************************************************/

import { Token } from '../lexer/token';
import { ANONYMOUS, displayName } from './printer';

export type EntityKind =
    | 'Variable'
    | 'Alias'
    | 'Function'
    | 'Struct'
    | 'Union'
    | 'Class'
    | 'Interface'
    | 'Enum';

export type Protection = 'public' | 'private' | 'protected' | 'package' | 'export';

export interface EntityBase {
    kind: EntityKind;
    /** undefined for anonymous declarations */
    name?: string;
    /** 1-based line of the declaration */
    line: number;
    /** e.g. "const", "ref", "@safe" */
    attributes: string[];
    protection: Protection;
}

export interface VariableDecl extends EntityBase {
    kind: 'Variable';
    type: string;
}

export interface AliasDecl extends EntityBase {
    kind: 'Alias';
    aliasedType: string;
}

export interface TemplateableBase extends EntityBase {
    constraint?: string;
    templateParameters: string[];
}

export interface FunctionDecl extends TemplateableBase {
    kind: 'Function';
    returnType: string;
    parameters: VariableDecl[];
}

export interface AggregateBase extends TemplateableBase {
    functions: FunctionDecl[];
    variables: VariableDecl[];
    aliases: AliasDecl[];
    /** offset of the opening brace of the body */
    bodyStart: number;
    /** offset of the closing brace of the body */
    bodyEnd: number;
}

export interface StructDecl extends AggregateBase {
    kind: 'Struct' | 'Union';
}

export interface InheritsDecl extends AggregateBase {
    kind: 'Class' | 'Interface';
    /** raw names, possibly unresolved */
    baseClasses: string[];
}

export type AggregateDecl = StructDecl | InheritsDecl;

export interface EnumMember {
    line: number;
    name: string;
    type: string;
}

export interface EnumDecl extends EntityBase {
    kind: 'Enum';
    /** base type of the enum, e.g. "int" */
    type: string;
    /** false for manifest constants such as `enum x = 5;` */
    hasMembers: boolean;
    members: EnumMember[];
}

export interface Module {
    /** empty when the source has no module statement */
    name: string;
    imports: string[];
    interfaces: InheritsDecl[];
    classes: InheritsDecl[];
    structs: StructDecl[];
    unions: StructDecl[];
    functions: FunctionDecl[];
    variables: VariableDecl[];
    enums: EnumDecl[];
    aliases: AliasDecl[];
}

/** Produces a Module from code-only tokens; supplied by the host. */
export type ModuleParser = (tokens: Token[]) => Module;

export function createModule(name = ''): Module {
    return {
        name,
        imports: [],
        interfaces: [],
        classes: [],
        structs: [],
        unions: [],
        functions: [],
        variables: [],
        enums: [],
        aliases: []
    };
}

/**
 * Combines two partial parses of the same logical unit. Lists are
 * concatenated in order; neither input is modified.
 */
export function mergeModules(first: Module, second: Module): Module {
    return {
        name: first.name || second.name,
        imports: [...first.imports, ...second.imports],
        interfaces: [...first.interfaces, ...second.interfaces],
        classes: [...first.classes, ...second.classes],
        structs: [...first.structs, ...second.structs],
        unions: [...first.unions, ...second.unions],
        functions: [...first.functions, ...second.functions],
        variables: [...first.variables, ...second.variables],
        enums: [...first.enums, ...second.enums],
        aliases: [...first.aliases, ...second.aliases]
    };
}

/** structs, interfaces, classes, unions, in that order */
export function aggregatesOf(mod: Module): AggregateDecl[] {
    return [...mod.structs, ...mod.interfaces, ...mod.classes, ...mod.unions];
}

export function isInherits(decl: AggregateDecl): decl is InheritsDecl {
    return decl.kind === 'Class' || decl.kind === 'Interface';
}

/**
 * Lists the structural problems of a module: lines below 1, inverted body
 * spans, and declarations named like the anonymous label. An empty list
 * means the module is well formed.
 */
export function checkModule(mod: Module): string[] {
    const problems: string[] = [];

    const checkBase = (decl: EntityBase, where: string) => {
        const label = `${where}${decl.name ? ` '${decl.name}'` : ''}`;
        if (!Number.isInteger(decl.line) || decl.line < 1) {
            problems.push(`${label} has invalid line ${decl.line}`);
        }
        if (decl.name === ANONYMOUS) {
            problems.push(`${label} uses the reserved anonymous label as its name`);
        }
    };

    const checkFunction = (fn: FunctionDecl, where: string) => {
        checkBase(fn, where);
        fn.parameters.forEach(p => checkBase(p, `parameter of ${displayName(fn)}`));
    };

    for (const agg of aggregatesOf(mod)) {
        const where = agg.kind.toLowerCase();
        checkBase(agg, where);
        if (agg.bodyStart > agg.bodyEnd) {
            problems.push(`${where} '${displayName(agg)}' body starts at ${agg.bodyStart} after it ends at ${agg.bodyEnd}`);
        }
        agg.functions.forEach(f => checkFunction(f, 'method'));
        agg.variables.forEach(v => checkBase(v, 'field'));
        agg.aliases.forEach(a => checkBase(a, 'alias'));
    }

    mod.functions.forEach(f => checkFunction(f, 'function'));
    mod.variables.forEach(v => checkBase(v, 'variable'));
    mod.aliases.forEach(a => checkBase(a, 'alias'));
    for (const e of mod.enums) {
        checkBase(e, 'enum');
        for (const m of e.members) {
            if (m.line < 1) problems.push(`enum member '${m.name}' has invalid line ${m.line}`);
        }
    }

    return problems;
}
