/**
 * Bridge Analyzer - Analyzer implementation over AnalyzerBridge
 *
 * Wraps AnalyzerBridge with lifecycle management and health monitoring and
 * remembers the last check per file for non-blocking lookups.
 */

import type {
    AnalysisCheck,
    AnalysisOptions,
    AnalyzerBridge,
    AnalyzerBridgeOptions,
    AnalyzerDiagnostic,
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
} from '@quill-lsp/analyzer-bridge';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Analyzer, AnalyzerHealth } from './analyzer.js';
import { ANALYZER_RATE_WINDOW_DEFAULT, MAX_RECENT_ERRORS } from '../constants/index.js';
import type { ServerSettings } from '../core/types.js';
import { normalizePath } from '../utils/paths.js';

/**
 * Bridge options for the configured analyzer. A positive
 * `analyzerMaxRequests` turns on the bridge's rate limit.
 */
export function bridgeOptionsFor(settings: ServerSettings): AnalyzerBridgeOptions {
    const options: AnalyzerBridgeOptions = { analyzerPath: settings.analyzerPath, args: settings.analyzerArgs };
    if (settings.analyzerMaxRequests > 0) {
        options.rateLimit = {
            maxRequests: settings.analyzerMaxRequests,
            windowSeconds: settings.analyzerRateWindow > 0 ? settings.analyzerRateWindow : ANALYZER_RATE_WINDOW_DEFAULT,
        };
    }
    return options;
}

export class BridgeAnalyzer implements Analyzer {
    private readonly startTime = Date.now();
    private errorLog: string[] = [];
    private cachedVersion: AnalyzerVersionInfo | null = null;
    /** Last successful check per file, with the project it was checked under */
    private recentChecks = new Map<string, { projectPath: string; check: AnalysisCheck }>();
    private readonly log = new Logger('BridgeAnalyzer');

    constructor(public readonly bridge: AnalyzerBridge) {
        this.bridge.on('stderr', (msg: string) => {
            if (msg.toLowerCase().includes('error')) {
                this.errorLog.push(msg);
                this.log.debug('Analyzer error logged', { message: msg });
                if (this.errorLog.length > MAX_RECENT_ERRORS) {
                    this.errorLog.shift();
                }
            }
        });
    }

    /**
     * Start the analyzer and cache its version information.
     */
    async start(): Promise<void> {
        await this.bridge.start();
        this.cachedVersion = await this.bridge.getVersionInfo();
        if (this.cachedVersion) {
            this.log.info('Analyzer version detected', { ...this.cachedVersion });
        } else {
            this.log.warn('Failed to get analyzer version info');
        }
    }

    async stop(): Promise<void> {
        await this.bridge.stop();
        this.cachedVersion = null;
        this.recentChecks.clear();
    }

    async getHealth(): Promise<AnalyzerHealth> {
        return {
            serverUptime: Date.now() - this.startTime,
            analyzerConnected: this.bridge.isRunning(),
            analyzerPid: this.bridge.pid,
            analyzerVersion: this.cachedVersion,
            recentErrors: [...this.errorLog],
        };
    }

    resolveOptionsForScript(file: string, text: string, target: ScriptTarget, signal?: AbortSignal): Promise<AnalysisOptions> {
        return this.bridge.resolveScriptOptions(file, text, target, signal);
    }

    resolveOptionsForProject(projectPath: string, signal?: AbortSignal): Promise<ProjectLoadResult> {
        return this.bridge.resolveProject(projectPath, signal);
    }

    async parseAndCheck(
        file: string,
        version: number,
        text: string,
        options: AnalysisOptions,
        signal?: AbortSignal,
    ): Promise<CheckResult> {
        const startTime = performance.now();
        try {
            const result = await this.bridge.parseAndCheck(file, version, text, options, signal);
            if (result.ok) {
                this.recentChecks.set(normalizePath(file), { projectPath: options.projectPath, check: result.check });
            }
            this.log.debug('parseAndCheck done', {
                file,
                version,
                ok: result.ok,
                duration: `${(performance.now() - startTime).toFixed(2)}ms`,
            });
            return result;
        } catch (err) {
            this.log.debug('parseAndCheck failed', { file, version, error: errorMessage(err) });
            throw err;
        }
    }

    tryGetRecent(file: string, options: AnalysisOptions): AnalysisCheck | undefined {
        const recent = this.recentChecks.get(normalizePath(file));
        return recent && recent.projectPath === options.projectPath ? recent.check : undefined;
    }

    getDeclarations(
        file: string,
        text: string,
        options: AnalysisOptions,
        version?: number,
        signal?: AbortSignal,
    ): Promise<NavigationDeclaration[]> {
        return this.bridge.declarations(file, text, options, version, signal);
    }

    getUsesOfSymbol(
        file: string,
        scope: readonly AnalysisOptions[],
        symbol: SymbolInfo,
        signal?: AbortSignal,
    ): Promise<SymbolUse[]> {
        return this.bridge.symbolUses(symbol, file, scope, signal);
    }

    compile(options: AnalysisOptions, signal?: AbortSignal): Promise<CompileResult> {
        return this.bridge.compile(options, signal);
    }

    getCompletions(check: AnalysisCheck, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<CompletionList | null> {
        return this.bridge.completions(check.id, position, lineText, signal);
    }

    getToolTip(check: AnalysisCheck, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<ToolTip | null> {
        return this.bridge.toolTip(check.id, position, lineText, signal);
    }

    getSignature(check: AnalysisCheck, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<string | null> {
        return this.bridge.signature(check.id, position, lineText, signal);
    }

    findDeclaration(
        check: AnalysisCheck,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<DeclarationTarget | null> {
        return this.bridge.findDeclaration(check.id, position, lineText, signal);
    }

    findTypeDeclaration(
        check: AnalysisCheck,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<DeclarationTarget | null> {
        return this.bridge.findTypeDeclaration(check.id, position, lineText, signal);
    }

    getSymbolUseAtPosition(
        check: AnalysisCheck,
        position: SourcePosition,
        lineText: string,
        signal?: AbortSignal,
    ): Promise<SymbolUseResult | null> {
        return this.bridge.symbolUseAt(check.id, position, lineText, signal);
    }

    getMethods(check: AnalysisCheck, position: SourcePosition, lineText: string, signal?: AbortSignal): Promise<MethodGroup | null> {
        return this.bridge.methods(check.id, position, lineText, signal);
    }

    getHelpText(fullName: string, signal?: AbortSignal): Promise<string | null> {
        return this.bridge.helpText(fullName, signal);
    }

    runBackgroundAnalysis(
        kind: BackgroundAnalysisKind,
        check: AnalysisCheck,
        text: string,
        signal?: AbortSignal,
    ): Promise<AnalyzerDiagnostic[]> {
        return this.bridge.backgroundAnalysis(kind, check.id, text, signal);
    }
}
