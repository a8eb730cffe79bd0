/**
 * Workspace Module - D Language Server
 * ====================================
 *
 * Façade between the LSP handlers and the analysis core. Uses the singleton
 * pattern for shared state, like one server process per editor session.
 *
 * KEY RESPONSIBILITIES:
 *   - Tokenizing and parsing open documents (ensure())
 *   - Locating, parsing and caching imported modules
 *   - Building a CompletionContext per query
 *   - Completion, signature help and line counts for the handlers
 *
 * CACHING STRATEGY:
 *   - Open documents are cached by URI + version
 *   - Imported files are cached by path until invalidated
 *   - A parser failure yields an empty module stub so queries keep working
 *
 * The grammar parser is not part of this server: the host passes a
 * ModuleParser to setParser(). Until then every document parses to an
 * empty module and only built-in and lexical features answer.
 *
 * @module dlens/server/src/analysis/project/workspace
 */

import * as path from 'path';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Position } from 'vscode-languageserver';
import { countLinesOfCode, tokenize } from '../lexer/lexer';
import { IterationStyle, Token } from '../lexer/token';
import { LexicalProblem, lexicalDiagnostics } from '../lexer/diagnostics';
import { Module, ModuleParser, checkModule, createModule } from '../ast/entities';
import { CompletionContext } from './context';
import { AutoComplete, CompletionEntry } from './autocomplete';
import { findModuleFile, moduleNameOf } from './imports';
import { normalizeUri, uriToPath } from '../../util/uri';
import { readFileUtf8 } from '../../util/fs';

/** Source file extensions of the language */
export const SOURCE_EXTENSIONS = ['.d', '.di'];

interface DocumentEntry {
    version: number;
    /** code-only tokens */
    tokens: Token[];
    module: Module;
}

export interface SignatureHelpResult {
    signatures: string[];
    activeParameter: number;
}

export interface IndexStats {
    documents: number;
    importedFiles: number;
    classes: number;
    structs: number;
    functions: number;
    parseErrors: number;
}

const emptyParser: ModuleParser = () => createModule();

/** Singleton façade that lazily analyses documents and answers LSP queries. */
export class Workspace {
    private static _instance: Workspace;
    static instance(): Workspace {
        if (!Workspace._instance) Workspace._instance = new Workspace();
        return Workspace._instance;
    }

    private parser: ModuleParser = emptyParser;
    private docCache = new Map<string, DocumentEntry>();
    /** parsed imports keyed by file path */
    private importCache = new Map<string, Module>();
    private importDirectories: string[] = [];
    private workspaceRoots: string[] = [];
    private parseErrorCount = 0;

    /** Replaces the parser and drops everything parsed with the old one. */
    setParser(parser: ModuleParser): void {
        this.parser = parser;
        this.docCache.clear();
        this.importCache.clear();
    }

    setImportDirectories(directories: readonly string[]): void {
        this.importDirectories = [...directories];
    }

    setWorkspaceRoots(roots: readonly string[]): void {
        this.workspaceRoots = [...roots];
    }

    ensure(doc: TextDocument): DocumentEntry {
        // 1 · cache hit
        const key = normalizeUri(doc.uri);
        const cached = this.docCache.get(key);
        if (cached && cached.version === doc.version) {
            return cached;
        }

        // 2 · tokenize & parse
        const tokens = tokenize(doc.getText());
        const entry: DocumentEntry = {
            version: doc.version,
            tokens,
            module: this.parseTokens(tokens, uriToPath(doc.uri) ?? doc.uri)
        };
        this.docCache.set(key, entry);
        return entry;
    }

    /** Drops the cached parse of `uri`, as an open document and as an import. */
    invalidate(uri: string): void {
        this.docCache.delete(normalizeUri(uri));
        const fsPath = uriToPath(uri);
        if (fsPath) this.importCache.delete(path.resolve(fsPath));
    }

    /**
     * Directories searched for the imports of `doc`: its own directory, the
     * configured import directories, then the workspace roots.
     */
    searchPathFor(doc: TextDocument): string[] {
        const fsPath = uriToPath(doc.uri);
        const dirs = [
            ...(fsPath ? [path.dirname(fsPath)] : []),
            ...this.importDirectories,
            ...this.workspaceRoots
        ];
        return [...new Set(dirs)];
    }

    /**
     * Parses the modules `doc` imports. Imports are loaded concurrently and
     * each joins the cache only once its parse has finished. Imports that
     * cannot be found or read are skipped.
     */
    async loadImports(doc: TextDocument): Promise<Module[]> {
        const { module } = this.ensure(doc);
        const dirs = this.searchPathFor(doc);
        const names = [...new Set(module.imports.map(moduleNameOf))].filter(n => n.length > 0);

        const loaded = await Promise.all(names.map(name => this.loadImport(dirs, name)));
        return loaded.filter((m): m is Module => m !== undefined);
    }

    async contextFor(doc: TextDocument): Promise<CompletionContext> {
        const { module } = this.ensure(doc);
        const imports = await this.loadImports(doc);
        return new CompletionContext(module, imports, this.searchPathFor(doc));
    }

    async getCompletions(doc: TextDocument, pos: Position): Promise<CompletionEntry[]> {
        const { tokens } = this.ensure(doc);
        const context = await this.contextFor(doc);
        return new AutoComplete(tokens, context).dotComplete(doc.offsetAt(pos));
    }

    async getSignatureHelp(doc: TextDocument, pos: Position): Promise<SignatureHelpResult | undefined> {
        const { tokens } = this.ensure(doc);
        const context = await this.contextFor(doc);
        const offset = doc.offsetAt(pos);
        const complete = new AutoComplete(tokens, context);

        const signatures = complete.parenComplete(offset);
        if (signatures.length === 0) return undefined;
        return { signatures, activeParameter: complete.activeParameter(offset) ?? 0 };
    }

    getLinesOfCode(doc: TextDocument): number {
        return countLinesOfCode(this.ensure(doc).tokens);
    }

    /** Unterminated strings and comments; needs the comment tokens too. */
    getLexicalProblems(doc: TextDocument): LexicalProblem[] {
        return lexicalDiagnostics(tokenize(doc.getText(), IterationStyle.Everything));
    }

    /**
     * Parses workspace files ahead of time so that imports resolving to
     * them are answered from the cache.
     */
    async indexFiles(files: readonly string[]): Promise<void> {
        for (const file of files) {
            const resolved = path.resolve(file);
            if (this.importCache.has(resolved)) continue;
            try {
                const text = await readFileUtf8(resolved);
                this.importCache.set(resolved, this.parseTokens(tokenize(text), resolved));
            } catch (err) {
                console.warn(`Failed to index ${resolved}: ${String(err)}`);
            }
        }
    }

    getIndexStats(): IndexStats {
        const modules = [...[...this.docCache.values()].map(e => e.module), ...this.importCache.values()];
        let classes = 0, structs = 0, functions = 0;
        for (const m of modules) {
            classes += m.classes.length + m.interfaces.length;
            structs += m.structs.length + m.unions.length;
            functions += m.functions.length;
        }
        return {
            documents: this.docCache.size,
            importedFiles: this.importCache.size,
            classes,
            structs,
            functions,
            parseErrors: this.parseErrorCount
        };
    }

    private async loadImport(dirs: readonly string[], name: string): Promise<Module | undefined> {
        const file = await findModuleFile(dirs, name);
        if (!file) {
            console.warn(`Import '${name}' not found in ${dirs.join(', ') || '<no import directories>'}`);
            return undefined;
        }

        const cached = this.importCache.get(file);
        if (cached) return cached;

        try {
            const text = await readFileUtf8(file);
            const mod = this.parseTokens(tokenize(text), file);
            this.importCache.set(file, mod);
            return mod;
        } catch (err) {
            console.warn(`Failed to load import '${name}' from ${file}: ${String(err)}`);
            return undefined;
        }
    }

    private parseTokens(tokens: Token[], source: string): Module {
        try {
            const mod = this.parser(tokens);
            for (const problem of checkModule(mod)) {
                console.warn(`${source}: ${problem}`);
            }
            return mod;
        } catch (err) {
            this.parseErrorCount++;
            console.error(`${source}: ${err instanceof Error ? err.message : String(err)}`);
            // empty stub so callers can continue
            return createModule();
        }
    }
}
