/**
 * Completion Handler - D Language Server
 * ======================================
 *
 * Member completions after a dot. The expression left of the dot is typed
 * by the workspace (locals, `this`, enclosing members, module symbols or a
 * type name) and its members are listed, including:
 *   - inherited fields and methods of classes and interfaces
 *   - enum constants for `Color.`
 *   - built-in properties for primitives and arrays (`int.max`, `arr.length`)
 *
 * @module dlens/server/src/lsp/handlers/completion
 */

import {
  CompletionItemKind,
  CompletionItem,
  CompletionParams,
  Connection,
  TextDocuments,
  InsertTextFormat
} from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Workspace } from '../../analysis/project/workspace';
import { CompletionEntry } from '../../analysis/project/autocomplete';
import { MemberKind } from '../../analysis/project/context';

export function registerCompletion(
  conn: Connection,
  docs: TextDocuments<TextDocument>
): void {
  conn.onCompletion(async (params: CompletionParams): Promise<CompletionItem[]> => {
    const doc = docs.get(params.textDocument.uri);
    if (!doc) return [];

    const entries = await Workspace.instance().getCompletions(doc, params.position);
    return toCompletionItems(entries);
  });
}

export function toCompletionItems(entries: readonly CompletionEntry[]): CompletionItem[] {
  return entries.map(e => ({
    label: e.name,
    kind: convertKind(e.kind),
    detail: e.type,
    insertText: e.name,
    insertTextFormat: InsertTextFormat.PlainText
  }));
}

function convertKind(kind: MemberKind): CompletionItemKind {
  switch (kind) {
    case 'method':
      return CompletionItemKind.Method;
    case 'member':
      return CompletionItemKind.Field;
    case 'enum-constant':
      return CompletionItemKind.EnumMember;
  }
}
