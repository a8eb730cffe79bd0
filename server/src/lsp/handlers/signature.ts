import {
  Connection,
  ParameterInformation,
  SignatureHelp,
  SignatureHelpParams,
  SignatureInformation,
  TextDocuments
} from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Workspace, SignatureHelpResult } from '../../analysis/project/workspace';

export function registerSignatureHelp(conn: Connection, docs: TextDocuments<TextDocument>): void {
  conn.onSignatureHelp(async (params: SignatureHelpParams): Promise<SignatureHelp | null> => {
    const doc = docs.get(params.textDocument.uri);
    if (!doc) return null;

    const result = await Workspace.instance().getSignatureHelp(doc, params.position);
    return result ? toSignatureHelp(result) : null;
  });
}

export function toSignatureHelp(result: SignatureHelpResult): SignatureHelp {
  const signatures = result.signatures.map(toSignatureInformation);
  // prefer the first overload that still has a parameter at the cursor
  const active = signatures.findIndex(s => (s.parameters?.length ?? 0) > result.activeParameter);
  return {
    signatures,
    activeSignature: active === -1 ? 0 : active,
    activeParameter: result.activeParameter
  };
}

/**
 * `int add(int a, int b)` → parameters labelled by their offsets in the
 * label. Labels without a parameter list (version identifiers and the like)
 * have no parameters.
 */
export function toSignatureInformation(label: string): SignatureInformation {
  const close = label.lastIndexOf(')');
  const open = matchingOpenParen(label, close);
  if (open === undefined) return { label };

  const parameters: ParameterInformation[] = [];
  let depth = 0;
  let start = open + 1;
  for (let i = open + 1; i <= close; i++) {
    const ch = label[i];
    if (i === close || (ch === ',' && depth === 0)) {
      const text = label.slice(start, i);
      const lead = text.length - text.trimStart().length;
      const trimmed = text.trim();
      if (trimmed.length > 0) {
        parameters.push({ label: [start + lead, start + lead + trimmed.length] });
      }
      start = i + 1;
    } else if (ch === '(' || ch === '[') {
      depth++;
    } else if (ch === ')' || ch === ']') {
      depth--;
    }
  }
  return { label, parameters };
}

/* the return type may have parentheses of its own: `const(char)[] f(int a)` */
function matchingOpenParen(label: string, close: number): number | undefined {
  if (close === -1) return undefined;
  let depth = 0;
  for (let i = close; i >= 0; i--) {
    if (label[i] === ')') depth++;
    else if (label[i] === '(' && --depth === 0) return i;
  }
  return undefined;
}
