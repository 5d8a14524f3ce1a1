/**
 * Analyzer Bridge
 *
 * Manages the analyzer subprocess lifecycle and exposes one typed method per
 * analyzer RPC. Requests are correlated by id, bounded by a timeout and may be
 * cancelled through an AbortSignal.
 */

import { EventEmitter } from 'events';
import { AnalyzerError, BridgeError, CancellationError, Logger } from '@quill-lsp/core';
import { AnalyzerProcess } from './process.js';
import type {
    AnalysisOptions,
    AnalyzerCancelNotification,
    AnalyzerDiagnostic,
    AnalyzerMethod,
    AnalyzerRequest,
    AnalyzerResponse,
    AnalyzerVersionInfo,
    BackgroundAnalysisKind,
    CheckResult,
    CompileResult,
    CompletionList,
    DeclarationTarget,
    MethodGroup,
    NavigationDeclaration,
    ProjectLoadResult,
    ScriptTarget,
    SourcePosition,
    SymbolInfo,
    SymbolUse,
    SymbolUseResult,
    ToolTip,
} from './types.js';
import {
    ANALYZER_COMMAND_DEFAULT,
    BRIDGE_TIMEOUT_DEFAULT,
    GRACEFUL_SHUTDOWN_DELAY,
    PROCESS_STARTUP_DELAY,
} from './constants.js';
import { RateLimiter } from './rate-limiter.js';
import {
    nullable,
    validateCheckResult,
    validateCompileResult,
    validateCompletionList,
    validateDeclarationTarget,
    validateDiagnosticList,
    validateMethodGroup,
    validateNavigation,
    validateProjectLoadResult,
    validateScriptOptions,
    validateSymbolUseResult,
    validateSymbolUses,
    validateText,
    validateToolTip,
    validateVersionInfo,
    type ResponseValidator,
} from './response-validator.js';

/**
 * Configuration options for the AnalyzerBridge.
 */
export interface AnalyzerBridgeOptions {
    /** Analyzer executable. Defaults to 'quill-analyzer'. */
    analyzerPath?: string;
    /** Extra arguments passed to the analyzer. */
    args?: readonly string[];
    /**
     * Request timeout in milliseconds. Defaults to 30000 (30 seconds).
     * Analyses and requests that carry an AbortSignal are not timed.
     */
    timeout?: number;
    /** Enable debug logging to stderr. */
    debug?: boolean;
    env?: NodeJS.ProcessEnv;
    /** Rate limiting options (disabled by default). */
    rateLimit?: {
        /** Maximum number of requests allowed. Defaults to 100. */
        maxRequests?: number;
        /** Time window in seconds. Defaults to 10. */
        windowSeconds?: number;
    };
    /** Factory for the process wrapper; tests pass an in-process fake. */
    createProcess?: () => AnalyzerProcess;
    /** Milliseconds to wait after spawning before the bridge reports ready. */
    startupDelay?: number;
}

interface PendingRequest {
    resolve: (value: unknown) => void;
    reject: (error: Error) => void;
    timeout: ReturnType<typeof setTimeout> | undefined;
    /** Key in the in-flight map, for requests that can be shared */
    dedupeKey?: string;
    detachSignal?: () => void;
}

/** Analyses run as long as they need; only their caller may cancel them. */
const UNTIMED_METHODS: ReadonlySet<AnalyzerMethod> = new Set<AnalyzerMethod>([
    'parse_and_check',
    'resolve_project',
    'symbol_uses',
    'compile',
    'background_analysis',
]);

function parseResponse(line: string): AnalyzerResponse | null {
    let parsed: unknown;
    try {
        parsed = JSON.parse(line);
    } catch {
        return null;
    }
    if (typeof parsed !== 'object' || parsed === null || !('id' in parsed) || typeof parsed.id !== 'number') {
        return null;
    }
    const response: AnalyzerResponse = { id: parsed.id };
    if ('result' in parsed) {
        response.result = parsed.result;
    }
    if ('error' in parsed && typeof parsed.error === 'object' && parsed.error !== null) {
        const error = parsed.error;
        response.error = {
            code: 'code' in error && typeof error.code === 'number' ? error.code : -1,
            message: 'message' in error && typeof error.message === 'string' ? error.message : '',
        };
    }
    return response;
}

/**
 * AnalyzerBridge - Communication layer with the analyzer subprocess.
 *
 * Emits 'started', 'stopped', 'close' (exit code) and 'stderr'.
 *
 * @example
 * ```ts
 * const bridge = new AnalyzerBridge({ analyzerPath: 'quill-analyzer' });
 * await bridge.start();
 * const result = await bridge.parseAndCheck('/src/A.fsx', 1, 'let x = 1', options);
 * await bridge.stop();
 * ```
 */
export class AnalyzerBridge extends EventEmitter {
    private process: AnalyzerProcess | null = null;
    private requestId = 0;
    private pendingRequests = new Map<number, PendingRequest>();
    private inflight = new Map<string, Promise<unknown>>();

    private readonly analyzerPath: string;
    private readonly args: readonly string[];
    private readonly timeout: number;
    private readonly env: NodeJS.ProcessEnv;
    private readonly startupDelay: number;
    private readonly createProcess: () => AnalyzerProcess;

    private started = false;
    private readonly logger = new Logger('AnalyzerBridge');
    private debugLog: (message: string) => void;
    private rateLimiter: RateLimiter | null;

    constructor(options: AnalyzerBridgeOptions = {}) {
        super();

        const debug = options.debug ?? false;
        this.debugLog = debug
            ? (message: string) => this.logger.error(`[DEBUG] ${message}`)
            : () => {};

        this.analyzerPath = options.analyzerPath ?? ANALYZER_COMMAND_DEFAULT;
        this.args = options.args ?? [];
        this.timeout = options.timeout ?? BRIDGE_TIMEOUT_DEFAULT;
        this.env = options.env ?? {};
        this.startupDelay = options.startupDelay ?? PROCESS_STARTUP_DELAY;
        this.createProcess = options.createProcess ?? (() => new AnalyzerProcess());

        if (options.rateLimit) {
            const maxRequests = options.rateLimit.maxRequests ?? 100;
            const windowSeconds = options.rateLimit.windowSeconds ?? 10;
            this.rateLimiter = new RateLimiter(maxRequests, maxRequests / windowSeconds);
            this.debugLog(`Rate limiter enabled: ${maxRequests} requests per ${windowSeconds}s`);
        } else {
            this.rateLimiter = null;
        }

        this.debugLog(`Initialized with analyzerPath="${this.analyzerPath}"`);
    }

    /**
     * Start the analyzer subprocess. Returns immediately when already running.
     *
     * @throws Error if the subprocess fails to start.
     */
    async start(): Promise<void> {
        if (this.process) {
            this.debugLog('Process already running, skipping start');
            return;
        }

        this.debugLog(`Starting analyzer: ${this.analyzerPath} ${this.args.join(' ')}`);
        const proc = this.createProcess();

        return new Promise((resolve, reject) => {
            proc.on('error', (err: Error) => {
                this.logger.error('Analyzer process error', { error: err.message });
                if (this.process !== proc && this.process !== null) {
                    return;
                }
                const wasStarted = this.started;
                this.started = false;
                this.process = null;
                this.rejectAllPending(new BridgeError(`Analyzer process error: ${err.message}`, err));
                if (!wasStarted) {
                    reject(new BridgeError(`Failed to start analyzer: ${err.message}`, err));
                }
            });

            proc.on('stderr', (data: string) => {
                const message = data.trim();
                if (message) {
                    this.logger.debug('Analyzer stderr', { raw: message });
                    this.emit('stderr', message);
                }
            });

            proc.on('message', (line: string) => {
                this.handleResponse(line);
            });

            proc.on('exit', (code: number | null) => {
                this.debugLog(`Process closed with code: ${code}`);
                if (this.process !== proc) {
                    return;
                }
                this.started = false;
                this.process = null;
                this.emit('close', code);
                this.rejectAllPending(new BridgeError(`Analyzer process exited with code ${code}`));
            });

            try {
                proc.spawn(this.analyzerPath, this.args, this.env);
                this.process = proc;
                this.debugLog(`Analyzer spawned with PID: ${proc.pid}`);

                // Give the process a moment to start
                setTimeout(() => {
                    if (this.process !== proc) {
                        return;
                    }
                    this.started = true;
                    this.emit('started');
                    resolve();
                }, this.startupDelay);
            } catch (err) {
                const message = err instanceof Error ? err.message : String(err);
                reject(new BridgeError(`Failed to start analyzer: ${message}`, err instanceof Error ? err : undefined));
            }
        });
    }

    /**
     * Stop the analyzer subprocess and fail whatever is still pending.
     */
    async stop(): Promise<void> {
        if (this.process) {
            const proc = this.process;
            this.process = null;
            this.started = false;
            proc.kill();
            this.rejectAllPending(new BridgeError('Analyzer bridge stopped'));
            await new Promise(resolve => setTimeout(resolve, GRACEFUL_SHUTDOWN_DELAY));
            this.debugLog('Analyzer stopped');
        }
        this.emit('stopped');
    }

    isRunning(): boolean {
        return this.started && this.process !== null && this.process.isAlive();
    }

    get pid(): number | null {
        return this.process?.pid ?? null;
    }

    /** Number of requests awaiting a response. */
    get pendingCount(): number {
        return this.pendingRequests.size;
    }

    /**
     * Send a request to the analyzer.
     *
     * Identical requests without a signal share one in-flight promise. With a
     * signal, aborting sends a `cancel` notification for the request id and
     * rejects with CancellationError. The bridge timeout applies only to
     * unsignalled requests outside {@link UNTIMED_METHODS}.
     */
    private async sendRequest<T>(
        method: AnalyzerMethod,
        params: Record<string, unknown>,
        validate: ResponseValidator<T>,
        signal?: AbortSignal,
    ): Promise<T> {
        if (signal?.aborted) {
            throw new CancellationError(`Request '${method}' cancelled before it was sent`);
        }

        if (this.rateLimiter && !this.rateLimiter.tryAcquire()) {
            throw new BridgeError('Rate limit exceeded');
        }

        const dedupeKey = signal ? undefined : `${method}:${JSON.stringify(params)}`;
        const existing = dedupeKey === undefined ? undefined : this.inflight.get(dedupeKey);
        if (existing) {
            return existing.then(result => validate(result, method));
        }

        if (!this.isRunning()) {
            await this.start();
        }
        if (signal?.aborted) {
            throw new CancellationError(`Request '${method}' cancelled before it was sent`);
        }

        const id = ++this.requestId;
        const raw = new Promise<unknown>((resolve, reject) => {

            const timeout = signal === undefined && !UNTIMED_METHODS.has(method)
                ? setTimeout(() => {
                    this.settle(id);
                    reject(new BridgeError(`Request ${id} (${method}) timed out after ${this.timeout}ms`));
                }, this.timeout)
                : undefined;

            const pending: PendingRequest = { resolve, reject, timeout };
            if (dedupeKey !== undefined) {
                pending.dedupeKey = dedupeKey;
            }

            if (signal) {
                const onAbort = (): void => {
                    if (!this.pendingRequests.has(id)) {
                        return;
                    }
                    this.settle(id);
                    this.sendCancel(id);
                    reject(new CancellationError(`Request ${id} (${method}) cancelled`));
                };
                signal.addEventListener('abort', onAbort, { once: true });
                pending.detachSignal = () => signal.removeEventListener('abort', onAbort);
            }

            this.pendingRequests.set(id, pending);

            const request: AnalyzerRequest = { jsonrpc: '2.0', id, method, params };
            try {
                this.process?.send(JSON.stringify(request));
            } catch (err) {
                this.settle(id);
                const message = err instanceof Error ? err.message : String(err);
                reject(new BridgeError(`Failed to send ${method}: ${message}`));
            }
        });

        if (dedupeKey !== undefined && this.pendingRequests.has(id)) {
            this.inflight.set(dedupeKey, raw);
        }

        return raw.then(result => validate(result, method));
    }

    /** Remove a pending request and release everything it holds. */
    private settle(id: number): PendingRequest | undefined {
        const pending = this.pendingRequests.get(id);
        if (!pending) {
            return undefined;
        }
        this.pendingRequests.delete(id);
        clearTimeout(pending.timeout);
        pending.detachSignal?.();
        if (pending.dedupeKey !== undefined) {
            this.inflight.delete(pending.dedupeKey);
        }
        return pending;
    }

    private sendCancel(id: number): void {
        if (!this.process?.isAlive()) {
            return;
        }
        const notification: AnalyzerCancelNotification = { jsonrpc: '2.0', method: 'cancel', params: { id } };
        try {
            this.process.send(JSON.stringify(notification));
        } catch (err) {
            this.logger.warn('Failed to send cancel notification', {
                id,
                error: err instanceof Error ? err.message : String(err),
            });
        }
    }

    private rejectAllPending(error: Error): void {
        for (const id of [...this.pendingRequests.keys()]) {
            this.settle(id)?.reject(error);
        }
    }

    /**
     * Handle one line of analyzer output.
     */
    private handleResponse(line: string): void {
        const response = parseResponse(line);
        if (!response) {
            // Not a response; treat as diagnostic output
            this.emit('stderr', line);
            return;
        }

        const pending = this.settle(response.id);
        if (!pending) {
            this.debugLog(`Dropping response for unknown or cancelled request ${response.id}`);
            return;
        }

        if (response.error) {
            const message = response.error.message || 'Analyzer request failed';
            pending.reject(new AnalyzerError(message, new Error(`code ${response.error.code}`)));
            return;
        }

        pending.resolve(response.result);
    }

    /**
     * Synthesize analysis options for a standalone script.
     */
    async resolveScriptOptions(
        file: string,
        text: string,
        scriptTarget: ScriptTarget,
        signal?: AbortSignal,
    ): Promise<AnalysisOptions> {
        return this.sendRequest('resolve_script_options', { file, text, scriptTarget }, validateScriptOptions, signal);
    }

    /**
     * Load a project file and its options.
     */
    async resolveProject(projectPath: string, signal?: AbortSignal): Promise<ProjectLoadResult> {
        return this.sendRequest('resolve_project', { projectPath }, validateProjectLoadResult, signal);
    }

    /**
     * Parse and type-check one file version.
     */
    async parseAndCheck(
        file: string,
        version: number,
        text: string,
        options: AnalysisOptions,
        signal?: AbortSignal,
    ): Promise<CheckResult> {
        return this.sendRequest('parse_and_check', { file, version, text, options }, validateCheckResult, signal);
    }

    async declarations(
        file: string,
        text: string,
        options: AnalysisOptions,
        version?: number,
        signal?: AbortSignal,
    ): Promise<NavigationDeclaration[]> {
        return this.sendRequest('declarations', { file, text, options, version }, validateNavigation, signal);
    }

    /**
     * Uses of a symbol across the given project configurations.
     */
    async symbolUses(
        symbol: SymbolInfo,
        file: string,
        projects: readonly AnalysisOptions[],
        signal?: AbortSignal,
    ): Promise<SymbolUse[]> {
        return this.sendRequest('symbol_uses', { symbol, file, projects }, validateSymbolUses, signal);
    }

    async compile(options: AnalysisOptions, signal?: AbortSignal): Promise<CompileResult> {
        return this.sendRequest('compile', { options }, validateCompileResult, signal);
    }

    async completions(
        checkId: string,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<CompletionList | null> {
        return this.sendRequest('completions', { checkId, position, lineText }, nullable(validateCompletionList), signal);
    }

    async toolTip(checkId: string, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<ToolTip | null> {
        return this.sendRequest('tooltip', { checkId, position, lineText }, nullable(validateToolTip), signal);
    }

    async signature(checkId: string, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<string | null> {
        return this.sendRequest('signature', { checkId, position, lineText }, nullable(validateText), signal);
    }

    async findDeclaration(
        checkId: string,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<DeclarationTarget | null> {
        return this.sendRequest('find_declaration', { checkId, position, lineText }, nullable(validateDeclarationTarget), signal);
    }

    async findTypeDeclaration(
        checkId: string,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<DeclarationTarget | null> {
        return this.sendRequest(
            'find_type_declaration',
            { checkId, position, lineText },
            nullable(validateDeclarationTarget),
            signal,
        );
    }

    async symbolUseAt(
        checkId: string,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<SymbolUseResult | null> {
        return this.sendRequest('symbol_use_at', { checkId, position, lineText }, nullable(validateSymbolUseResult), signal);
    }

    async methods(checkId: string, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<MethodGroup | null> {
        return this.sendRequest('methods', { checkId, position, lineText }, nullable(validateMethodGroup), signal);
    }

    /**
     * Documentation for a completion entry, by full name.
     */
    async helpText(fullName: string, signal?: AbortSignal): Promise<string | null> {
        return this.sendRequest('help_text', { fullName }, nullable(validateText), signal);
    }

    async backgroundAnalysis(
        kind: BackgroundAnalysisKind,
        checkId: string,
        text: string,
        signal?: AbortSignal,
    ): Promise<AnalyzerDiagnostic[]> {
        return this.sendRequest('background_analysis', { kind, checkId, text }, validateDiagnosticList, signal);
    }

    /**
     * Query the analyzer's name and version.
     *
     * @returns `null` when the analyzer is unavailable.
     */
    async getVersionInfo(): Promise<AnalyzerVersionInfo | null> {
        try {
            return await this.sendRequest('get_version', {}, validateVersionInfo);
        } catch (err) {
            this.debugLog(`getVersionInfo failed: ${err instanceof Error ? err.message : String(err)}`);
            return null;
        }
    }
}
