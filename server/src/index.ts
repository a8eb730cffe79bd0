import {
    createConnection,
    TextDocuments,
    TextDocumentSyncKind,
    ProposedFeatures,
    InitializeParams,
    InitializeResult
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { registerAllHandlers } from './lsp/registerAll';
import { findAllFiles } from './util/fs';
import { uriToPath } from './util/uri';
import { ServerSettings, defaultSettings, getConfiguration } from './util/config';
import { SOURCE_EXTENSIONS, Workspace } from './analysis/project/workspace';
import { ModuleParser } from './analysis/ast/entities';

export type { ModuleParser } from './analysis/ast/entities';
export { tokenize } from './analysis/lexer/lexer';
export { CompletionContext } from './analysis/project/context';
export { Workspace } from './analysis/project/workspace';

/** Custom request: logical lines of code of an open document */
export const SLOC_REQUEST = 'dlens/sloc';

export interface SlocParams {
    uri: string;
}

/**
 * Starts a language server on stdio / Node IPC. The grammar parser is the
 * host's; without one every document parses to an empty module.
 */
export function startServer(parser?: ModuleParser): void {
    // Create LSP connection (stdio or Node IPC autodetect).
    const connection = createConnection(ProposedFeatures.all);

    // Track open documents: in-memory mirror of the client.
    const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

    const workspace = Workspace.instance();
    if (parser) workspace.setParser(parser);

    let workspaceRoots: string[] = [];
    let settings: ServerSettings = { ...defaultSettings };
    let hasConfigurationCapability = false;

    connection.onInitialize((params: InitializeParams): InitializeResult => {
        hasConfigurationCapability = params.capabilities.workspace?.configuration === true;

        const folders = params.workspaceFolders ?? [];
        const rootUris = folders.length > 0 ? folders.map(f => f.uri) : params.rootUri ? [params.rootUri] : [];
        workspaceRoots = rootUris
            .map(uriToPath)
            .filter((p): p is string => p !== undefined);

        return {
            capabilities: {
                textDocumentSync: TextDocumentSyncKind.Incremental,
                completionProvider: { resolveProvider: false, triggerCharacters: ['.'] },
                signatureHelpProvider: { triggerCharacters: ['(', ','] }
            }
        };
    });

    const applySettings = async () => {
        if (hasConfigurationCapability) {
            settings = await getConfiguration(connection);
        }
        workspace.setImportDirectories(settings.includePaths);
        workspace.setWorkspaceRoots(workspaceRoots);
    };

    connection.onInitialized(async () => {
        await applySettings();

        const allFiles: string[] = [];
        for (const basePath of [...workspaceRoots, ...settings.includePaths]) {
            console.log(`Adding folder ${basePath} to indexing`);
            try {
                allFiles.push(...await findAllFiles(basePath, SOURCE_EXTENSIONS));
            } catch (err) {
                console.warn(`Failed to scan path ${basePath}: ${String(err)}`);
            }
        }

        const startTime = Date.now();
        await workspace.indexFiles(allFiles);
        const stats = workspace.getIndexStats();
        console.log(
            `Indexing complete in ${Date.now() - startTime}ms: ${stats.importedFiles} files, ` +
            `${stats.classes} classes, ${stats.structs} structs, ${stats.functions} functions` +
            (stats.parseErrors > 0 ? ` (${stats.parseErrors} parse errors)` : '')
        );
    });

    connection.onDidChangeConfiguration(async () => {
        await applySettings();
        console.log(`Import directories: ${settings.includePaths.join(', ') || '<none>'}`);
    });

    connection.onRequest(SLOC_REQUEST, (params: SlocParams) => {
        const doc = documents.get(params.uri);
        if (!doc) return null;
        return { uri: params.uri, lines: workspace.getLinesOfCode(doc) };
    });

    // Wire all feature handlers.
    registerAllHandlers(connection, documents, () => settings);

    documents.listen(connection);

    // Start listening after the handlers were registered.
    connection.listen();
}
