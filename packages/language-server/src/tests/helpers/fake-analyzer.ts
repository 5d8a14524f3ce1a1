/**
 * Shared Test Infrastructure: Fake Analyzer
 *
 * In-process Analyzer with canned answers. Parses can be held open and
 * released one by one to drive overlapping-request scenarios; held calls
 * honor their AbortSignal like the real bridge does.
 */

import type {
    AnalysisCheck,
    AnalysisOptions,
    AnalyzerDiagnostic,
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
} from '@quill-lsp/analyzer-bridge';
import type { Analyzer, AnalyzerHealth } from '../../services/analyzer.js';

// =============================================================================
// Deferred
// =============================================================================

export interface Deferred<T> {
    promise: Promise<T>;
    resolve(value: T): void;
    reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
    let resolve: (value: T) => void = () => undefined;
    let reject: (reason: unknown) => void = () => undefined;
    const promise = new Promise<T>((res, rej) => {
        resolve = res;
        reject = rej;
    });
    return { promise, resolve, reject };
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) {
        return promise;
    }
    return new Promise<T>((resolve, reject) => {
        if (signal.aborted) {
            reject(signal.reason);
            return;
        }
        const onAbort = (): void => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (err: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(err);
            },
        );
    });
}

/** Let queued promise callbacks and immediates run. */
export function flush(): Promise<void> {
    return new Promise(resolve => setImmediate(resolve));
}

// =============================================================================
// Builders
// =============================================================================

export function pos(line: number, character: number): SourcePosition {
    return { line, character };
}

export function range(line: number, start: number, end: number): { start: SourcePosition; end: SourcePosition } {
    return { start: pos(line, start), end: pos(line, end) };
}

export function diag(message: string, line = 0, severity: AnalyzerDiagnostic['severity'] = 'error'): AnalyzerDiagnostic {
    return { range: range(line, 0, 1), severity, message };
}

export function scriptOptionsFor(file: string, target: ScriptTarget = 'sdk'): AnalysisOptions {
    return { projectPath: file, sourceFiles: [file], references: [], flags: [], isScript: true, scriptTarget: target };
}

export function symbol(name: string, extra: Partial<SymbolInfo> = {}): SymbolInfo {
    return { name, fullName: `Lib.${name}`, isPrivateToFile: false, isInternalToProject: false, ...extra };
}

export function use(file: string, line: number, extra: Partial<SymbolUse> = {}): SymbolUse {
    return {
        file,
        range: range(line, 4, 7),
        isDefinition: false,
        isFromDispatchSlotImplementation: false,
        isFromType: false,
        ...extra,
    };
}

// =============================================================================
// Fake Analyzer
// =============================================================================

export interface AnalyzerCall {
    method: string;
    file?: string;
    version?: number;
}

interface HeldParse {
    file: string;
    version: number;
    gate: Deferred<void>;
}

export class FakeAnalyzer implements Analyzer {
    readonly calls: AnalyzerCall[] = [];

    /** Hold parseAndCheck calls until released */
    holdParses = false;
    /** Answer held parses even after their signal aborts, like an analyzer that ignores cancel */
    ignoreAbort = false;
    readonly heldParses: HeldParse[] = [];

    /** Diagnostics reported by the next checks of a file */
    diagnostics = new Map<string, AnalyzerDiagnostic[]>();
    parseError: string | undefined;
    scriptOptionsError: Error | undefined;
    recentChecks = new Map<string, AnalysisCheck>();

    completions: CompletionList | null = null;
    toolTip: ToolTip | null = null;
    signature: string | null = null;
    declarationTarget: DeclarationTarget | null = null;
    typeDeclarationTarget: DeclarationTarget | null = null;
    symbolUseAt: SymbolUseResult | null = null;
    symbolUses: SymbolUse[] = [];
    usesScopes: (readonly AnalysisOptions[])[] = [];
    methodGroup: MethodGroup | null = null;
    helpTexts = new Map<string, string>();
    declarations = new Map<string, NavigationDeclaration[]>();
    declarationsError: Error | undefined;
    background: Partial<Record<BackgroundAnalysisKind, AnalyzerDiagnostic[] | Error>> = {};
    projects = new Map<string, ProjectLoadResult>();
    compileResult: CompileResult = { diagnostics: [], exitCode: 0 };
    queryError: Error | undefined;
    /** Line text handed to each position query */
    readonly lineTexts: string[] = [];

    health: AnalyzerHealth = {
        serverUptime: 0,
        analyzerConnected: true,
        analyzerPid: 4242,
        analyzerVersion: { name: 'fake-analyzer', version: '1.0.0' },
        recentErrors: [],
    };

    private checkSeq = 0;

    async start(): Promise<void> {
        this.calls.push({ method: 'start' });
    }

    async stop(): Promise<void> {
        this.calls.push({ method: 'stop' });
    }

    async getHealth(): Promise<AnalyzerHealth> {
        return this.health;
    }

    async resolveOptionsForScript(file: string, _text: string, target: ScriptTarget): Promise<AnalysisOptions> {
        this.calls.push({ method: 'resolveOptionsForScript', file });
        if (this.scriptOptionsError) {
            throw this.scriptOptionsError;
        }
        return scriptOptionsFor(file, target);
    }

    async resolveOptionsForProject(projectPath: string): Promise<ProjectLoadResult> {
        this.calls.push({ method: 'resolveOptionsForProject', file: projectPath });
        const result = this.projects.get(projectPath);
        if (!result) {
            return { ok: false, error: { kind: 'generic', projectPath, message: `Unknown project ${projectPath}` } };
        }
        return result;
    }

    async parseAndCheck(
        file: string,
        version: number,
        _text: string,
        _options: AnalysisOptions,
        signal?: AbortSignal,
    ): Promise<CheckResult> {
        this.calls.push({ method: 'parseAndCheck', file, version });
        if (this.holdParses) {
            const gate = deferred<void>();
            this.heldParses.push({ file, version, gate });
            await (this.ignoreAbort ? gate.promise : abortable(gate.promise, signal));
        }
        if (this.parseError !== undefined) {
            return { ok: false, error: this.parseError };
        }
        return { ok: true, check: this.makeCheck(file, version) };
    }

    /** Let the held parse of `version` (the oldest, when omitted) finish. */
    releaseParse(version?: number): void {
        const index = version === undefined ? 0 : this.heldParses.findIndex(p => p.version === version);
        const held = this.heldParses[index];
        if (index < 0 || !held) {
            throw new Error(`No held parse for version ${String(version)}`);
        }
        this.heldParses.splice(index, 1);
        held.gate.resolve();
    }

    makeCheck(file: string, version: number): AnalysisCheck {
        return {
            id: `check-${++this.checkSeq}`,
            file,
            version,
            diagnostics: this.diagnostics.get(file) ?? [],
            hasParseTree: true,
        };
    }

    tryGetRecent(file: string): AnalysisCheck | undefined {
        return this.recentChecks.get(file);
    }

    async getDeclarations(file: string): Promise<NavigationDeclaration[]> {
        this.calls.push({ method: 'getDeclarations', file });
        if (this.declarationsError) {
            throw this.declarationsError;
        }
        return this.declarations.get(file) ?? [];
    }

    async getUsesOfSymbol(file: string, scope: readonly AnalysisOptions[]): Promise<SymbolUse[]> {
        this.calls.push({ method: 'getUsesOfSymbol', file });
        this.usesScopes.push(scope);
        return this.symbolUses;
    }

    async compile(options: AnalysisOptions): Promise<CompileResult> {
        this.calls.push({ method: 'compile', file: options.projectPath });
        return this.compileResult;
    }

    getCompletions(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<CompletionList | null> {
        return this.answer('getCompletions', check, lineText, this.completions);
    }

    getToolTip(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<ToolTip | null> {
        return this.answer('getToolTip', check, lineText, this.toolTip);
    }

    getSignature(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<string | null> {
        return this.answer('getSignature', check, lineText, this.signature);
    }

    findDeclaration(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<DeclarationTarget | null> {
        return this.answer('findDeclaration', check, lineText, this.declarationTarget);
    }

    findTypeDeclaration(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<DeclarationTarget | null> {
        return this.answer('findTypeDeclaration', check, lineText, this.typeDeclarationTarget);
    }

    getSymbolUseAtPosition(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<SymbolUseResult | null> {
        return this.answer('getSymbolUseAtPosition', check, lineText, this.symbolUseAt);
    }

    getMethods(check: AnalysisCheck, _position: SourcePosition, lineText: string): Promise<MethodGroup | null> {
        return this.answer('getMethods', check, lineText, this.methodGroup);
    }

    async getHelpText(fullName: string): Promise<string | null> {
        this.calls.push({ method: 'getHelpText', file: fullName });
        return this.helpTexts.get(fullName) ?? null;
    }

    async runBackgroundAnalysis(kind: BackgroundAnalysisKind, check: AnalysisCheck): Promise<AnalyzerDiagnostic[]> {
        this.calls.push({ method: `background:${kind}`, file: check.file, version: check.version });
        const result = this.background[kind];
        if (result instanceof Error) {
            throw result;
        }
        return result ?? [];
    }

    callsOf(method: string): AnalyzerCall[] {
        return this.calls.filter(call => call.method === method);
    }

    private async answer<T>(method: string, check: AnalysisCheck, lineText: string, value: T | null): Promise<T | null> {
        this.calls.push({ method, file: check.file, version: check.version });
        this.lineTexts.push(lineText);
        if (this.queryError) {
            throw this.queryError;
        }
        return value;
    }
}
