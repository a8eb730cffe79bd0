import { Connection, TextDocuments } from 'vscode-languageserver';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { registerCompletion } from './handlers/completion';
import { registerSignatureHelp } from './handlers/signature';
import { registerDocuments } from './handlers/documents';
import { ServerSettings } from '../util/config';

export function registerAllHandlers(
  conn: Connection,
  docs: TextDocuments<TextDocument>,
  settings: () => ServerSettings
): void {
  registerCompletion(conn, docs);
  registerSignatureHelp(conn, docs);
  registerDocuments(conn, docs, () => settings().diagnosticsDelay);
}
