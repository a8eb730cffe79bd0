import {
  Connection,
  Diagnostic,
  DiagnosticSeverity,
  TextDocumentChangeEvent,
  TextDocuments
} from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Workspace } from '../../analysis/project/workspace';
import { LexicalProblem } from '../../analysis/lexer/diagnostics';
import { defaultSettings } from '../../util/config';

export const DIAGNOSTIC_SOURCE = 'dlens';

export function toDiagnostic(doc: TextDocument, problem: LexicalProblem): Diagnostic {
  return {
    message: problem.message,
    range: {
      start: doc.positionAt(problem.start),
      end: doc.positionAt(problem.end)
    },
    severity: DiagnosticSeverity.Warning,
    source: DIAGNOSTIC_SOURCE
  };
}

export function lexicalDiagnosticsFor(doc: TextDocument): Diagnostic[] {
  return Workspace.instance().getLexicalProblems(doc).map(p => toDiagnostic(doc, p));
}

export function registerDocuments(
  conn: Connection,
  docs: TextDocuments<TextDocument>,
  delay: () => number = () => defaultSettings.diagnosticsDelay
): void {
  const workspace = Workspace.instance();

  const validate = (change: TextDocumentChangeEvent<TextDocument>) => {
    void conn.sendDiagnostics({ uri: change.document.uri, diagnostics: lexicalDiagnosticsFor(change.document) });
  };

  // Debounce timers per-URI so each file gets its own delay
  const debounceTimers = new Map<string, ReturnType<typeof setTimeout>>();

  const cancelPending = (uri: string) => {
    const pending = debounceTimers.get(uri);
    if (pending) {
      clearTimeout(pending);
      debounceTimers.delete(uri);
    }
  };

  docs.onDidOpen(validate);
  docs.onDidSave((change) => {
    // saved files may be imported by other documents
    workspace.invalidate(change.document.uri);
    cancelPending(change.document.uri);
    validate(change);
  });
  docs.onDidChangeContent((change) => {
    // Tokenize + parse now so completion stays responsive; diagnostics wait
    workspace.ensure(change.document);

    const uri = change.document.uri;
    cancelPending(uri);
    debounceTimers.set(uri, setTimeout(() => {
      debounceTimers.delete(uri);
      // Re-fetch the latest document: the user may have typed more
      const latestDoc = docs.get(uri);
      if (latestDoc) {
        void conn.sendDiagnostics({ uri, diagnostics: lexicalDiagnosticsFor(latestDoc) });
      }
    }, delay()));
  });

  docs.onDidClose((change) => {
    const uri = change.document.uri;
    cancelPending(uri);
    workspace.invalidate(uri);
    void conn.sendDiagnostics({ uri, diagnostics: [] });
  });
}
