/**
 * Analyzer Adapter contract.
 *
 * The semantic engine is external; the dispatcher only talks to it through
 * this interface. Every call takes an optional AbortSignal and is expected
 * to honor it at its own suspension points.
 */

import type {
    AnalysisCheck,
    AnalysisOptions,
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

/**
 * Health of the analyzer connection, shown by the health command.
 */
export interface AnalyzerHealth {
    /** Server uptime in milliseconds */
    serverUptime: number;
    analyzerConnected: boolean;
    analyzerPid: number | null;
    analyzerVersion: AnalyzerVersionInfo | null;
    /** Recent error messages from the analyzer's stderr */
    recentErrors: string[];
}

/**
 * A query at a position of a checked file.
 */
export type PositionQuery<T> = (
    check: AnalysisCheck,
    position: SourcePosition,
    lineText: string,
    signal?: AbortSignal,
) => Promise<T | null>;

export interface Analyzer {
    start(): Promise<void>;
    stop(): Promise<void>;
    getHealth(): Promise<AnalyzerHealth>;

    resolveOptionsForScript(file: string, text: string, target: ScriptTarget, signal?: AbortSignal): Promise<AnalysisOptions>;
    resolveOptionsForProject(projectPath: string, signal?: AbortSignal): Promise<ProjectLoadResult>;
    parseAndCheck(file: string, version: number, text: string, options: AnalysisOptions, signal?: AbortSignal): Promise<CheckResult>;
    /** Most recent check the analyzer holds for the file, without waiting */
    tryGetRecent(file: string, options: AnalysisOptions): AnalysisCheck | undefined;
    getDeclarations(
        file: string,
        text: string,
        options: AnalysisOptions,
        version?: number,
        signal?: AbortSignal,
    ): Promise<NavigationDeclaration[]>;
    getUsesOfSymbol(
        file: string,
        scope: readonly AnalysisOptions[],
        symbol: SymbolInfo,
        signal?: AbortSignal,
    ): Promise<SymbolUse[]>;
    compile(options: AnalysisOptions, signal?: AbortSignal): Promise<CompileResult>;

    getCompletions: PositionQuery<CompletionList>;
    getToolTip: PositionQuery<ToolTip>;
    getSignature: PositionQuery<string>;
    findDeclaration: PositionQuery<DeclarationTarget>;
    findTypeDeclaration: PositionQuery<DeclarationTarget>;
    getSymbolUseAtPosition: PositionQuery<SymbolUseResult>;
    getMethods: PositionQuery<MethodGroup>;
    getHelpText(fullName: string, signal?: AbortSignal): Promise<string | null>;

    runBackgroundAnalysis(
        kind: BackgroundAnalysisKind,
        check: AnalysisCheck,
        text: string,
        signal?: AbortSignal,
    ): Promise<AnalyzerDiagnostic[]>;
}
