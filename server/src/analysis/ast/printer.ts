/**
 * Presentation of declarations: the text shown in call tips and completion
 * details. Nothing here feeds back into lookups.
 *
 * @module dlens/server/src/analysis/ast/printer
 */

import { EntityBase, FunctionDecl, VariableDecl } from './entities';

/** Label shown for declarations without a name */
export const ANONYMOUS = '<<anonymous>>';

export function displayName(decl: Pick<EntityBase, 'name'>): string {
    return decl.name ?? ANONYMOUS;
}

export function formatParameter(param: VariableDecl): string {
    return param.name ? `${param.type} ${param.name}` : param.type;
}

/**
 * `returnType name(type1 name1, type2 name2)`
 */
export function formatSignature(fn: FunctionDecl): string {
    return `${fn.returnType} ${displayName(fn)}(${fn.parameters.map(formatParameter).join(', ')})`;
}
