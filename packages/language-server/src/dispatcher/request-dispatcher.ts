/**
 * Request Dispatcher
 *
 * Orchestrates every operation against the stores: resolves file state,
 * cancels superseded work, serves from cache or calls the analyzer, commits
 * results that are still wanted and publishes the side effects.
 *
 * Each request moves through Queued → Cancelling-Predecessors →
 * Resolving-Options → Awaiting-Analysis → Completed | Cancelled | Failed;
 * transitions are logged at TRACE.
 */

import * as os from 'os';
import { CancellationError, Logger, errorMessage, isCancellation } from '@quill-lsp/core';
import type {
    AnalysisCheck,
    AnalysisOptions,
    AnalyzerDiagnostic,
    BackgroundAnalysisKind,
    CompileResult,
    CompletionEntry,
    DeclarationTarget,
    MethodGroup,
    NavigationDeclaration,
    ScriptTarget,
    SourcePosition,
    SourceRange,
    SymbolUse,
    SymbolUseResult,
    ToolTip,
} from '@quill-lsp/analyzer-bridge';
import type { ServicesCore } from '../services/index.js';
import type { AnalysisResult, FileDeclarations } from '../services/analysis-cache.js';
import type { FileState } from '../services/document-store.js';
import { abortReason, type CancellationScope } from '../services/cancellation-registry.js';
import { summarize, type Project } from '../services/project-registry.js';
import type { ProjectSummary } from '../services/notification-bus.js';
import { RequestError, toErrorPayload } from '../core/errors.js';
import { NO_RECENT_CHECK_MESSAGE, PROJECT_NOT_FOUND_MESSAGE } from '../constants/index.js';
import { normalizePath } from '../utils/paths.js';
import { failure, info, ok, type Failure, type Info, type Outcome } from './responses.js';

type RequestState =
    | 'Queued'
    | 'Cancelling-Predecessors'
    | 'Resolving-Options'
    | 'Awaiting-Analysis'
    | 'Completed'
    | 'Cancelled'
    | 'Failed';

/** How failures other than options resolution reach the caller */
type Surfacing = 'info' | 'error';

type Freshness = 'recent' | 'latest';

export interface ParseOptions {
    /** Analyze a script against the SDK; defaults to the `useSdkScripts` setting */
    sdkScript?: boolean;
}

export interface RequestOptions {
    /** Aborts the request, including any wait for an up-to-date analysis */
    signal?: AbortSignal;
}

export interface ProjectOptions {
    /** Resolve the project again even when it is already loaded */
    reload?: boolean;
}

export interface LatestOptions extends RequestOptions {
    /** Overrides the `latestResultTimeout` setting; 0 waits indefinitely */
    timeoutMs?: number;
}

export interface CompletionOptions extends RequestOptions {
    /** Character that triggered the completion, if any */
    triggerCharacter?: string;
}

export interface CompletionResult {
    entries: CompletionEntry[];
    keywords: string[];
    residue: string;
    /** Side-cache generation the entries were stored under */
    generation: number;
}

export interface RenameEdit {
    file: string;
    ranges: SourceRange[];
}

export interface RenamePlan {
    oldName: string;
    newName: string;
    edits: RenameEdit[];
}

interface QueryPlan {
    operation: string;
    file: string;
    position: SourcePosition;
    freshness: Freshness;
    surfacing: Surfacing;
    /** Answer when the analyzer has nothing at the position */
    noResult: string;
    signal?: AbortSignal | undefined;
}

type QueryBody<T> = (check: AnalysisCheck, lineText: string, scope: CancellationScope) => Promise<T | null>;

const BACKGROUND_SETTINGS = {
    lint: 'linter',
    unusedOpens: 'unusedOpensAnalyzer',
    unusedDeclarations: 'unusedDeclarationsAnalyzer',
    simplifyNames: 'simplifyNameAnalyzer',
} as const satisfies Record<BackgroundAnalysisKind, string>;

const BACKGROUND_KINDS: readonly BackgroundAnalysisKind[] = ['lint', 'unusedOpens', 'unusedDeclarations', 'simplifyNames'];

export class RequestDispatcher {
    private readonly log = new Logger('Dispatcher');
    private requestId = 0;
    private workspaceReady: Promise<void> = Promise.resolve();
    private background = new Set<Promise<void>>();

    constructor(private readonly services: ServicesCore) {}

    // ========================================================================
    // Document state
    // ========================================================================

    /**
     * Replace a file's content without analyzing it. A newer version cancels
     * the work still running against the file's older text.
     */
    setFileContent(file: string, lines: readonly string[], version?: number): FileState {
        const { documents, cancellation } = this.services;
        const key = normalizePath(file);
        const previous = documents.getVersion(key);
        const state = documents.setContent(key, lines, version);
        if (version !== undefined && (previous === undefined || version > previous)) {
            cancellation.cancelAll(key, `superseded by version ${version}`);
        }
        return state;
    }

    /**
     * Forget a file removed from disk: cancel its work, drop its content and
     * results, and announce the removal.
     */
    fileDeleted(file: string): void {
        const { cancellation, documents, cache, projects, bus } = this.services;
        const key = normalizePath(file);
        cancellation.cancelAll(key, 'file deleted');
        documents.delete(key);
        cache.remove(key);
        projects.forgetScript(key);
        this.log.debug('File deleted', { file: key });
        bus.publish({ type: 'fileDeleted', file: key });
    }

    /**
     * Cancel in-flight work for the file.
     *
     * @returns Number of scopes cancelled
     */
    cancel(file: string, reason = 'cancelled'): number {
        return this.services.cancellation.cancelAll(normalizePath(file), reason);
    }

    /**
     * Store a new version and analyze it, superseding every earlier request
     * for the file.
     */
    async parse(
        file: string,
        lines: readonly string[],
        version: number,
        options: ParseOptions = {},
    ): Promise<Outcome<AnalysisResult>> {
        const { documents, cancellation, analyzer, bus } = this.services;
        const key = normalizePath(file);
        const id = this.begin('parse', key);

        documents.setContent(key, lines, version);
        const text = lines.join('\n');

        this.transition(id, 'parse', key, 'Cancelling-Predecessors');
        const scope = cancellation.register(key);
        try {
            this.transition(id, 'parse', key, 'Resolving-Options');
            const target = options.sdkScript === undefined ? undefined : options.sdkScript ? 'sdk' : 'framework';
            const analysisOptions = await this.resolveOptions(key, text, scope.signal, { refreshScript: true, target });
            scope.signal.throwIfAborted();

            this.transition(id, 'parse', key, 'Awaiting-Analysis');
            const result = await analyzer.parseAndCheck(key, version, text, analysisOptions, scope.signal);
            if (!result.ok) {
                throw new RequestError('analysisFailed', result.error);
            }

            this.assertNotSuperseded(key, version);
            const commit = cancellation.tryCommit(scope, () => this.commitCheck(key, version, result.check));
            if (!commit.committed) {
                throw new CancellationError(abortReason(scope.signal));
            }
            const entry = commit.value;

            bus.publish({ type: 'fileParsed', file: key, version });
            bus.publish({
                type: 'diagnostics',
                file: key,
                source: 'compiler',
                version,
                diagnostics: entry.diagnostics,
            });
            this.startBackgroundAnalyses(key);

            this.transition(id, 'parse', key, 'Completed');
            return ok(entry);
        } catch (err) {
            return this.settleFailure(id, 'parse', key, err, 'error');
        } finally {
            cancellation.release(scope);
        }
    }

    // ========================================================================
    // Freshness policies
    // ========================================================================

    /**
     * Most recent check of the file, whatever version it was computed for.
     */
    async recentAnalysis(file: string): Promise<Outcome<AnalysisCheck>> {
        const key = normalizePath(file);
        if (!this.services.documents.has(key)) {
            return failure({ kind: 'notFound', message: `File not loaded: ${key}` });
        }
        const check = this.recent(key);
        return check ? ok(check) : info(NO_RECENT_CHECK_MESSAGE);
    }

    /**
     * Wait for a check of the file's current version with resolved options.
     */
    async latestAnalysis(file: string, options: LatestOptions = {}): Promise<Outcome<AnalysisResult>> {
        const key = normalizePath(file);
        const id = this.begin('latestAnalysis', key);
        try {
            this.transition(id, 'latestAnalysis', key, 'Awaiting-Analysis');
            const entry = await this.awaitLatest(key, options.signal, options.timeoutMs);
            this.transition(id, 'latestAnalysis', key, 'Completed');
            return ok(entry);
        } catch (err) {
            return this.settleFailure(id, 'latestAnalysis', key, err, 'error');
        }
    }

    // ========================================================================
    // Position queries
    // ========================================================================

    async completion(file: string, position: SourcePosition, options: CompletionOptions = {}): Promise<Outcome<CompletionResult>> {
        const { cache, documents, completions } = this.services;
        const key = normalizePath(file);
        const checkedVersion = cache.getCheckedVersion(key);
        const currentVersion = documents.getVersion(key);
        const behind = checkedVersion !== undefined && currentVersion !== undefined && checkedVersion < currentVersion;
        const freshness: Freshness = options.triggerCharacter === '.' && behind ? 'latest' : 'recent';

        return this.query(
            {
                operation: 'completion',
                file: key,
                position,
                freshness,
                surfacing: 'info',
                noResult: 'No completions',
                signal: options.signal,
            },
            async (check, lineText, scope) => {
                const settings = this.services.settings;
                const list = await this.services.analyzer.getCompletions(check, position, lineText, scope.signal);
                if (!list) {
                    return null;
                }
                const entries = settings.externalAutocomplete
                    ? list.entries
                    : list.entries.filter(entry => entry.namespaceToOpen === undefined);

                const commit = this.services.cancellation.tryCommit(scope, () => completions.replace(entries, key, position));
                if (!commit.committed) {
                    throw new CancellationError(abortReason(scope.signal));
                }
                const generation = commit.value;

                const insertAt = this.namespaceInsertPosition(key);
                for (const entry of entries) {
                    if (entry.namespaceToOpen !== undefined) {
                        completions.setNamespaceInsert(entry.name, { namespace: entry.namespaceToOpen, position: insertAt }, generation);
                    }
                }

                return {
                    entries,
                    keywords: settings.keywordsAutocomplete && list.includeKeywords ? [...list.keywords] : [],
                    residue: list.residue,
                    generation,
                };
            },
        );
    }

    /**
     * Documentation for an entry of the last completion.
     */
    async helpText(name: string): Promise<Outcome<string>> {
        const { completions, analyzer } = this.services;
        const cached = completions.getHelpText(name);
        if (cached !== undefined) {
            return ok(cached);
        }
        const declaration = completions.getDeclaration(name);
        if (!declaration) {
            return failure({ kind: 'notFound', message: `No completion entry named '${name}'` });
        }

        const generation = completions.currentGeneration;
        try {
            const text = await analyzer.getHelpText(declaration.fullName);
            if (text === null) {
                return failure({ kind: 'notFound', message: `No help text for '${declaration.fullName}'` });
            }
            completions.setHelpText(name, text, generation);
            return ok(text);
        } catch (err) {
            this.log.debug('Help text lookup failed', { name, error: errorMessage(err) });
            return failure(toErrorPayload(err));
        }
    }

    toolTip(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<ToolTip>> {
        return this.query(
            {
                operation: 'toolTip',
                file,
                position,
                freshness: 'recent',
                surfacing: 'info',
                noResult: 'No tooltip information',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.getToolTip(check, position, lineText, scope.signal),
        );
    }

    signature(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<string>> {
        return this.query(
            {
                operation: 'signature',
                file,
                position,
                freshness: 'recent',
                surfacing: 'info',
                noResult: 'No signature information',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.getSignature(check, position, lineText, scope.signal),
        );
    }

    findDeclaration(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<DeclarationTarget>> {
        return this.query(
            {
                operation: 'findDeclaration',
                file,
                position,
                freshness: 'recent',
                surfacing: 'error',
                noResult: 'Could not find declaration',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.findDeclaration(check, position, lineText, scope.signal),
        );
    }

    findTypeDeclaration(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<DeclarationTarget>> {
        return this.query(
            {
                operation: 'findTypeDeclaration',
                file,
                position,
                freshness: 'recent',
                surfacing: 'error',
                noResult: 'Could not find type declaration',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.findTypeDeclaration(check, position, lineText, scope.signal),
        );
    }

    /**
     * Uses of the symbol at the position within the file (highlights).
     */
    symbolUse(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<SymbolUseResult>> {
        return this.query(
            {
                operation: 'symbolUse',
                file,
                position,
                freshness: 'recent',
                surfacing: 'info',
                noResult: 'No symbol at position',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.getSymbolUseAtPosition(check, position, lineText, scope.signal),
        );
    }

    /**
     * Uses of the symbol at the position across every project that can see it.
     */
    symbolUseProject(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<SymbolUseResult>> {
        const key = normalizePath(file);
        return this.query(
            {
                operation: 'symbolUseProject',
                file: key,
                position,
                freshness: 'latest',
                surfacing: 'error',
                noResult: 'No symbol at position',
                signal: options.signal,
            },
            async (check, lineText, scope) => {
                const at = await this.services.analyzer.getSymbolUseAtPosition(check, position, lineText, scope.signal);
                if (!at) {
                    return null;
                }
                return { symbol: at.symbol, uses: await this.usesInScope(key, at, scope.signal) };
            },
        );
    }

    symbolImplementation(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<SymbolUse[]>> {
        const key = normalizePath(file);
        return this.query(
            {
                operation: 'symbolImplementation',
                file: key,
                position,
                freshness: 'latest',
                surfacing: 'error',
                noResult: 'No symbol at position',
                signal: options.signal,
            },
            async (check, lineText, scope) => {
                const at = await this.services.analyzer.getSymbolUseAtPosition(check, position, lineText, scope.signal);
                if (!at) {
                    return null;
                }
                const uses = await this.usesInScope(key, at, scope.signal);
                return uses.filter(use => use.isFromDispatchSlotImplementation);
            },
        );
    }

    /**
     * Ranges to rewrite, grouped per file, for renaming the symbol at the position.
     */
    rename(file: string, position: SourcePosition, newName: string, options: RequestOptions = {}): Promise<Outcome<RenamePlan>> {
        const key = normalizePath(file);
        return this.query(
            {
                operation: 'rename',
                file: key,
                position,
                freshness: 'latest',
                surfacing: 'error',
                noResult: 'No symbol to rename at position',
                signal: options.signal,
            },
            async (check, lineText, scope) => {
                const at = await this.services.analyzer.getSymbolUseAtPosition(check, position, lineText, scope.signal);
                if (!at) {
                    return null;
                }
                const uses = await this.usesInScope(key, at, scope.signal);
                const byFile = new Map<string, SourceRange[]>();
                for (const use of uses) {
                    const useFile = normalizePath(use.file);
                    const ranges = byFile.get(useFile) ?? [];
                    ranges.push(use.range);
                    byFile.set(useFile, ranges);
                }
                return {
                    oldName: at.symbol.name,
                    newName,
                    edits: [...byFile].map(([editFile, ranges]) => ({ file: editFile, ranges })),
                };
            },
        );
    }

    /**
     * Overloads of the method being called at the position.
     */
    methods(file: string, position: SourcePosition, options: RequestOptions = {}): Promise<Outcome<MethodGroup>> {
        return this.query(
            {
                operation: 'methods',
                file,
                position,
                freshness: 'latest',
                surfacing: 'error',
                noResult: 'No method overloads at position',
                signal: options.signal,
            },
            (check, lineText, scope) => this.services.analyzer.getMethods(check, position, lineText, scope.signal),
        );
    }

    // ========================================================================
    // Declarations
    // ========================================================================

    /**
     * Outline of a file; `lines` analyzes that text instead of the stored one.
     */
    async declarations(file: string, lines?: readonly string[], version?: number): Promise<Outcome<NavigationDeclaration[]>> {
        const { documents, analyzer, cache } = this.services;
        const key = normalizePath(file);
        try {
            let text: string;
            let textVersion = version;
            if (lines) {
                text = lines.join('\n');
            } else {
                const state = documents.get(key) ?? await documents.loadFromDisk(key);
                if (!state) {
                    return failure({ kind: 'notFound', message: `File not found: ${key}` });
                }
                text = state.lines.join('\n');
                textVersion = state.version;
            }
            const options = await this.resolveOptions(key, text);
            const declarations = await analyzer.getDeclarations(key, text, options, textVersion);
            cache.setDeclarations(key, declarations);
            return ok(declarations);
        } catch (err) {
            this.log.debug('Declarations failed', { file: key, error: errorMessage(err) });
            return failure(toErrorPayload(err));
        }
    }

    /** Declaration index of every file seen so far. */
    declarationsInProjects(): FileDeclarations[] {
        return this.services.cache.allDeclarations();
    }

    // ========================================================================
    // Background analyses
    // ========================================================================

    lint(file: string): Promise<Outcome<AnalyzerDiagnostic[]>> {
        return this.runBackgroundAnalysis('lint', file);
    }

    unusedOpens(file: string): Promise<Outcome<AnalyzerDiagnostic[]>> {
        return this.runBackgroundAnalysis('unusedOpens', file);
    }

    unusedDeclarations(file: string): Promise<Outcome<AnalyzerDiagnostic[]>> {
        return this.runBackgroundAnalysis('unusedDeclarations', file);
    }

    simplifiedNames(file: string): Promise<Outcome<AnalyzerDiagnostic[]>> {
        return this.runBackgroundAnalysis('simplifyNames', file);
    }

    // ========================================================================
    // Projects
    // ========================================================================

    /**
     * Load a project, assign its options to its files and index them in the
     * background. A project that is already loaded is returned as is unless
     * `reload` is set.
     */
    async project(projectPath: string, options: ProjectOptions = {}): Promise<Outcome<ProjectSummary>> {
        const { projects, analyzer, bus } = this.services;
        const key = normalizePath(projectPath);
        const existing = projects.get(key);
        if (existing?.status === 'loaded' && options.reload !== true) {
            return ok(summarize(existing));
        }

        projects.markLoading(key);
        bus.publish({ type: 'workspace', event: { kind: 'projectLoading', projectPath: key } });
        try {
            const result = await analyzer.resolveOptionsForProject(key);
            if (!result.ok) {
                const error = { ...result.error, projectPath: key };
                projects.markFailed(key, error);
                bus.publish({ type: 'workspace', event: { kind: 'projectFailed', projectPath: key, error } });
                return failure({ kind: 'optionsResolutionFailed', message: error.message, reason: error.kind });
            }

            const project = projects.markLoaded({ ...result.project, projectPath: key });
            const summary = summarize(project);
            bus.publish({ type: 'workspace', event: { kind: 'projectLoaded', project: summary } });
            this.track(this.indexProjectFiles(project), 'Project indexing');
            return ok(summary);
        } catch (err) {
            const error = { kind: 'generic' as const, projectPath: key, message: errorMessage(err) };
            projects.markFailed(key, error);
            bus.publish({ type: 'workspace', event: { kind: 'projectFailed', projectPath: key, error } });
            this.log.warn('Project load failed', { project: key, error: error.message });
            return failure(toErrorPayload(err));
        }
    }

    /**
     * Load several projects, bracketed by workspace load events.
     *
     * Files opened meanwhile wait for {@link whenWorkspaceReady}.
     */
    async workspaceLoad(projectPaths: readonly string[]): Promise<Outcome<ProjectSummary>[]> {
        const { bus, settings } = this.services;
        let markReady: () => void = () => undefined;
        this.workspaceReady = new Promise<void>(resolve => {
            markReady = resolve;
        });

        bus.publish({ type: 'workspace', event: { kind: 'workspaceLoad', finished: false } });
        try {
            if (settings.workspaceLoadDelay > 0) {
                await new Promise(resolve => setTimeout(resolve, settings.workspaceLoadDelay));
            }
            const results: Outcome<ProjectSummary>[] = [];
            for (const projectPath of projectPaths) {
                results.push(await this.project(projectPath));
            }
            return results;
        } finally {
            bus.publish({ type: 'workspace', event: { kind: 'workspaceLoad', finished: true } });
            markReady();
        }
    }

    /** Resolves once no workspace load is in progress. */
    whenWorkspaceReady(): Promise<void> {
        return this.workspaceReady;
    }

    /**
     * Compile a loaded project.
     */
    async compile(projectPath: string): Promise<Outcome<CompileResult>> {
        const key = normalizePath(projectPath);
        const project = this.services.projects.get(key);
        if (!project || project.status !== 'loaded' || !project.options) {
            return info(PROJECT_NOT_FOUND_MESSAGE);
        }
        try {
            return ok(await this.services.analyzer.compile(project.options));
        } catch (err) {
            this.log.warn('Compile failed', { project: key, error: errorMessage(err) });
            return failure(toErrorPayload(err));
        }
    }

    /**
     * Resolves once all background work started so far has finished.
     */
    async whenIdle(): Promise<void> {
        while (this.background.size > 0) {
            await Promise.all([...this.background]);
        }
    }

    // ========================================================================
    // Internals
    // ========================================================================

    private begin(operation: string, file: string): number {
        const id = ++this.requestId;
        this.transition(id, operation, file, 'Queued');
        return id;
    }

    private transition(id: number, operation: string, file: string, state: RequestState): void {
        this.log.trace(`#${id} ${operation} -> ${state}`, { file });
    }

    /**
     * Map a thrown value onto an outcome. Cancellation always becomes an
     * informational answer plus a bus event.
     */
    private settleFailure(id: number, operation: string, file: string, err: unknown, surfacing: Surfacing): Info | Failure {
        if (isCancellation(err)) {
            this.transition(id, operation, file, 'Cancelled');
            return this.cancelled(operation, file, err);
        }
        this.transition(id, operation, file, 'Failed');
        const payload = toErrorPayload(err);
        this.log.debug(`${operation} failed`, { file, kind: payload.kind, error: payload.message });
        if (surfacing === 'info' && payload.kind !== 'optionsResolutionFailed') {
            return info(payload.message);
        }
        return failure(payload);
    }

    private cancelled(operation: string, file: string, err: unknown): Info {
        const reason = errorMessage(err);
        this.services.bus.publish({ type: 'cancelled', file, operation, reason });
        return info(`Request cancelled (${reason})`, true);
    }

    /**
     * Options for the file: the owning project's, else a script
     * configuration. Script options are re-synthesized on `refreshScript`
     * since the script's own directives feed them.
     */
    private async resolveOptions(
        file: string,
        text: string,
        signal?: AbortSignal,
        opts: { refreshScript?: boolean; target?: ScriptTarget | undefined } = {},
    ): Promise<AnalysisOptions> {
        const { projects, analyzer, settings } = this.services;
        const known = projects.getOptions(file);
        if (known && !(opts.refreshScript === true && known.isScript)) {
            return known;
        }

        const target = opts.target ?? (settings.useSdkScripts ? 'sdk' : 'framework');
        try {
            const options = await analyzer.resolveOptionsForScript(file, text, target, signal);
            return projects.setOptions(file, options);
        } catch (err) {
            if (isCancellation(err)) {
                throw err;
            }
            throw new RequestError(
                'optionsResolutionFailed',
                `Could not resolve options for ${file}: ${errorMessage(err)}`,
                'generic',
                err instanceof Error ? err : undefined,
            );
        }
    }

    /**
     * Cache a check and wake the waiters of its file. A check older than the
     * cached one is not written.
     */
    private commitCheck(file: string, version: number, check: AnalysisCheck): AnalysisResult {
        const { cache, waiters } = this.services;
        const existing = cache.getMostRecent(file);
        if (existing && existing.version > version) {
            this.log.debug('Dropping check older than cached result', { file, version, cached: existing.version });
            return existing;
        }
        const entry = cache.put(file, version, check);
        waiters.notify(file, version);
        return entry;
    }

    /** A check of a version older than the stored text is never committed. */
    private assertNotSuperseded(file: string, version: number): void {
        const current = this.services.documents.getVersion(file);
        if (current !== undefined && version < current) {
            throw new CancellationError(`superseded by version ${current}`);
        }
    }

    /** Recent policy: cached check regardless of version, else the analyzer's own. */
    private recent(file: string): AnalysisCheck | undefined {
        const { cache, projects, analyzer } = this.services;
        const cached = cache.getMostRecent(file);
        if (cached) {
            return cached.check;
        }
        const options = projects.getOptions(file);
        return options ? analyzer.tryGetRecent(file, options) : undefined;
    }

    /**
     * Latest policy: suspend until the cached check matches the document's
     * current version and options are resolved.
     */
    private async awaitLatest(file: string, signal?: AbortSignal, timeoutMs?: number): Promise<AnalysisResult> {
        const { documents, projects, cache, waiters, settings } = this.services;
        const limit = timeoutMs ?? settings.latestResultTimeout;
        const deadline = limit > 0 ? Date.now() + limit : undefined;

        for (;;) {
            if (!documents.has(file)) {
                throw new RequestError('notFound', `File not loaded: ${file}`);
            }
            const lookup = cache.getIfFresh(file);
            if (lookup.status === 'fresh' && projects.getOptions(file)) {
                return lookup.entry;
            }

            const remaining = deadline === undefined ? undefined : deadline - Date.now();
            if (remaining !== undefined && remaining <= 0) {
                throw new RequestError('timeout', `Timed out after ${limit}ms waiting for an up-to-date analysis of ${file}`);
            }
            await waiters.waitFor(
                file,
                (checked) => {
                    const version = documents.getVersion(file);
                    return version === undefined || checked === version;
                },
                { signal, timeoutMs: remaining },
            );
        }
    }

    /**
     * Check to answer a Recent query with; falls back to checking the
     * current text when the file was never analyzed.
     */
    private async checkForQuery(file: string, scope: CancellationScope): Promise<AnalysisCheck> {
        const recent = this.recent(file);
        if (recent) {
            return recent;
        }

        const { documents, analyzer, cancellation } = this.services;
        const state = documents.get(file) ?? await documents.loadFromDisk(file);
        if (!state) {
            throw new RequestError('notFound', `File not found: ${file}`);
        }
        const text = state.lines.join('\n');
        const options = await this.resolveOptions(file, text, scope.signal);
        const version = state.version ?? 0;
        const result = await analyzer.parseAndCheck(file, version, text, options, scope.signal);
        if (!result.ok) {
            throw new RequestError('analysisFailed', result.error);
        }
        this.assertNotSuperseded(file, version);
        if (!cancellation.tryCommit(scope, () => this.commitCheck(file, version, result.check)).committed) {
            throw new CancellationError(abortReason(scope.signal));
        }
        return result.check;
    }

    /**
     * Shared path of every position query.
     *
     * Latest queries wait before attaching their scope, so the parse they
     * wait for does not cancel them. The caller's signal ends the wait and
     * cancels the scope.
     */
    private async query<T>(plan: QueryPlan, body: QueryBody<T>): Promise<Outcome<T>> {
        const { cancellation, documents } = this.services;
        const key = normalizePath(plan.file);
        const id = this.begin(plan.operation, key);

        let latest: AnalysisResult | undefined;
        if (plan.freshness === 'latest') {
            try {
                this.transition(id, plan.operation, key, 'Resolving-Options');
                latest = await this.awaitLatest(key, plan.signal);
            } catch (err) {
                return this.settleFailure(id, plan.operation, key, err, plan.surfacing);
            }
        }

        const scope = cancellation.attach(key);
        const { signal } = plan;
        const onAbort = (): void => {
            if (signal) {
                cancellation.cancel(scope, abortReason(signal));
            }
        };
        signal?.addEventListener('abort', onAbort, { once: true });
        if (signal?.aborted) {
            onAbort();
        }
        try {
            this.transition(id, plan.operation, key, 'Awaiting-Analysis');
            const check = latest ? latest.check : await this.checkForQuery(key, scope);
            const lineText = documents.getLine(key, plan.position.line) ?? '';
            const value = await body(check, lineText, scope);
            scope.signal.throwIfAborted();

            if (value === null) {
                this.transition(id, plan.operation, key, 'Completed');
                return plan.surfacing === 'info'
                    ? info(plan.noResult)
                    : failure({ kind: 'notFound', message: plan.noResult });
            }
            this.transition(id, plan.operation, key, 'Completed');
            return ok(value);
        } catch (err) {
            return this.settleFailure(id, plan.operation, key, err, plan.surfacing);
        } finally {
            signal?.removeEventListener('abort', onAbort);
            cancellation.release(scope);
        }
    }

    /**
     * Uses of a symbol in every project that can reference it.
     */
    private async usesInScope(file: string, at: SymbolUseResult, signal: AbortSignal): Promise<SymbolUse[]> {
        if (at.symbol.isPrivateToFile) {
            return at.uses;
        }
        const { projects, analyzer } = this.services;
        const candidates: Project[] = at.symbol.isInternalToProject ? projects.projectsContaining(file) : projects.loaded();
        const scope = candidates.flatMap(project => (project.options ? [project.options] : []));
        if (scope.length === 0) {
            const own = projects.getOptions(file);
            if (own) {
                scope.push(own);
            }
        }
        return analyzer.getUsesOfSymbol(file, scope, at.symbol, signal);
    }

    /** Line after the last top-level `open`, else the start of the file. */
    private namespaceInsertPosition(file: string): SourcePosition {
        const lines = this.services.documents.getContent(file) ?? [];
        let last = -1;
        lines.forEach((line, index) => {
            if (line.startsWith('open ')) {
                last = index;
            }
        });
        return { line: last + 1, character: 0 };
    }

    private startBackgroundAnalyses(file: string): void {
        const settings = this.services.settings;
        for (const kind of BACKGROUND_KINDS) {
            if (settings[BACKGROUND_SETTINGS[kind]]) {
                this.track(this.runBackgroundAnalysis(kind, file), `Background ${kind}`);
            }
        }
    }

    private async runBackgroundAnalysis(kind: BackgroundAnalysisKind, file: string): Promise<Outcome<AnalyzerDiagnostic[]>> {
        const { cancellation, documents, analyzer, bus } = this.services;
        const key = normalizePath(file);
        const scope = cancellation.attach(key);
        try {
            const check = this.recent(key);
            if (!check) {
                return info(NO_RECENT_CHECK_MESSAGE);
            }
            const text = documents.getText(key) ?? '';
            const diagnostics = await analyzer.runBackgroundAnalysis(kind, check, text, scope.signal);
            const published = cancellation.tryCommit(scope, () => {
                bus.publish({ type: 'diagnostics', file: key, source: kind, version: check.version, diagnostics });
            });
            if (!published.committed) {
                throw new CancellationError(abortReason(scope.signal));
            }
            return ok(diagnostics);
        } catch (err) {
            if (isCancellation(err)) {
                return this.cancelled(kind, key, err);
            }
            const message = errorMessage(err);
            bus.publish({ type: 'backgroundFailed', file: key, analysis: kind, message });
            this.log.warn('Background analysis failed', { file: key, analysis: kind, error: message });
            return info(`${kind} failed: ${message}`);
        } finally {
            cancellation.release(scope);
        }
    }

    /**
     * Load member files from disk and index their declarations, a few at a time.
     */
    private async indexProjectFiles(project: Project): Promise<void> {
        const options = project.options;
        if (!options) {
            return;
        }
        const chunkSize = Math.max(1, os.availableParallelism());
        for (let i = 0; i < project.files.length; i += chunkSize) {
            const chunk = project.files.slice(i, i + chunkSize);
            await Promise.all(chunk.map(file => this.indexFile(file, options)));
        }
        this.log.debug('Project files indexed', { project: project.path, files: project.files.length });
    }

    private async indexFile(file: string, options: AnalysisOptions): Promise<void> {
        const { documents, analyzer, cache } = this.services;
        const state = await documents.loadFromDisk(file);
        if (!state) {
            return;
        }
        try {
            const declarations = await analyzer.getDeclarations(file, state.lines.join('\n'), options, state.version);
            cache.setDeclarations(file, declarations);
        } catch (err) {
            this.log.warn('Indexing failed', { file, error: errorMessage(err) });
        }
    }

    /**
     * Keep track of fire-and-forget work so {@link whenIdle} can wait for it.
     */
    private track(work: Promise<unknown>, label: string): void {
        const tracked: Promise<void> = work
            .then(
                () => undefined,
                (err: unknown) => {
                    this.log.error(`${label} failed`, { error: errorMessage(err) });
                },
            )
            .then(() => {
                this.background.delete(tracked);
            });
        this.background.add(tracked);
    }
}
