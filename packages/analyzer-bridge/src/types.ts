/**
 * Analyzer Bridge Types
 *
 * Shapes exchanged with the external analyzer process. Positions are
 * zero-based (line and UTF-16 character), matching LSP conventions, so the
 * server can hand them to the editor without conversion.
 */

/**
 * Zero-based position in a source file
 */
export interface SourcePosition {
    line: number;
    character: number;
}

export interface SourceRange {
    start: SourcePosition;
    end: SourcePosition;
}

export type AnalyzerSeverity = 'error' | 'warning' | 'info' | 'hint';

/**
 * A diagnostic reported by the compiler or one of the secondary analyzers.
 */
export interface AnalyzerDiagnostic {
    range: SourceRange;
    severity: AnalyzerSeverity;
    message: string;
    /** Analyzer-specific code, e.g. "Q0039" */
    code?: string;
    /** Marks code the editor may fade out */
    unnecessary?: boolean;
    /** Replacement the analysis suggests, offered as a quick fix */
    fix?: DiagnosticFix;
}

export interface DiagnosticFix {
    range: SourceRange;
    newText: string;
}

/**
 * Runtime a standalone script is analyzed against.
 */
export type ScriptTarget = 'sdk' | 'framework';

/**
 * Resolved inputs required to analyze a file.
 *
 * Either inherited from an owning project or synthesized for a script.
 * Source file paths are always absolute.
 */
export interface AnalysisOptions {
    /** Project file path, or the script path for synthesized script options */
    projectPath: string;
    sourceFiles: readonly string[];
    references: readonly string[];
    /** Compiler flags other than source files and references */
    flags: readonly string[];
    isScript: boolean;
    scriptTarget?: ScriptTarget;
}

/**
 * Opaque handle to one parse-and-check of a file at a version.
 *
 * The analyzer keeps the parse tree and typed tree behind `id`; queries
 * reference them through the handle.
 */
export interface AnalysisCheck {
    id: string;
    file: string;
    version: number;
    diagnostics: AnalyzerDiagnostic[];
    /** Whether a parse tree is available for tree-based queries */
    hasParseTree: boolean;
}

export type CheckResult =
    | { ok: true; check: AnalysisCheck }
    | { ok: false; error: string };

/**
 * Why project options could not be produced.
 */
export type ProjectErrorKind =
    | 'languageNotSupported'
    | 'referencesNotLoaded'
    | 'projectNotRestored'
    | 'generic';

export interface ProjectError {
    kind: ProjectErrorKind;
    projectPath: string;
    message: string;
}

export interface ProjectInfo {
    projectPath: string;
    options: AnalysisOptions;
    /** Compile items, in compilation order */
    files: string[];
    outputFile?: string;
    references: string[];
}

export type ProjectLoadResult =
    | { ok: true; project: ProjectInfo }
    | { ok: false; error: ProjectError };

export type DeclarationKind =
    | 'namespace'
    | 'module'
    | 'type'
    | 'union'
    | 'enum'
    | 'interface'
    | 'exception'
    | 'function'
    | 'method'
    | 'property'
    | 'field'
    | 'value'
    | 'other';

/**
 * Navigation item (document outline entry).
 */
export interface NavigationDeclaration {
    name: string;
    kind: DeclarationKind;
    range: SourceRange;
    selectionRange: SourceRange;
    children: NavigationDeclaration[];
}

/**
 * One completion candidate.
 */
export interface CompletionEntry {
    name: string;
    fullName: string;
    kind: DeclarationKind;
    /** Namespace that must be opened for the entry to resolve, if any */
    namespaceToOpen?: string;
    /** Pre-rendered description, when the analyzer computed it eagerly */
    description?: string;
}

export interface CompletionList {
    entries: CompletionEntry[];
    /** Partially typed identifier at the cursor */
    residue: string;
    /** Whether keywords are meaningful at this position */
    includeKeywords: boolean;
    keywords: string[];
}

export interface ToolTip {
    signature: string;
    documentation: string;
    footer: string;
}

export interface SymbolInfo {
    name: string;
    fullName: string;
    isPrivateToFile: boolean;
    isInternalToProject: boolean;
}

export interface SymbolUse {
    file: string;
    range: SourceRange;
    isDefinition: boolean;
    isFromDispatchSlotImplementation: boolean;
    isFromType: boolean;
}

export interface SymbolUseResult {
    symbol: SymbolInfo;
    uses: SymbolUse[];
}

export type DeclarationTarget =
    | { kind: 'source'; file: string; range: SourceRange }
    | { kind: 'external'; assembly: string; fullName: string };

export interface MethodParameter {
    label: string;
    documentation?: string;
}

export interface MethodOverload {
    label: string;
    documentation?: string;
    parameters: MethodParameter[];
}

export interface MethodGroup {
    name: string;
    overloads: MethodOverload[];
    /** Number of commas before the cursor, i.e. the active parameter */
    activeParameter: number;
}

/**
 * Secondary analyses that run after a successful check.
 */
export type BackgroundAnalysisKind = 'lint' | 'unusedOpens' | 'unusedDeclarations' | 'simplifyNames';

export interface CompileResult {
    diagnostics: AnalyzerDiagnostic[];
    exitCode: number;
}

export interface AnalyzerVersionInfo {
    name: string;
    version: string;
}

/**
 * RPC method names understood by the analyzer process.
 */
export type AnalyzerMethod =
    | 'resolve_script_options'
    | 'resolve_project'
    | 'parse_and_check'
    | 'declarations'
    | 'symbol_uses'
    | 'compile'
    | 'completions'
    | 'tooltip'
    | 'signature'
    | 'find_declaration'
    | 'find_type_declaration'
    | 'symbol_use_at'
    | 'methods'
    | 'help_text'
    | 'background_analysis'
    | 'get_version';

export interface AnalyzerRequest {
    jsonrpc: '2.0';
    id: number;
    method: AnalyzerMethod;
    params: Record<string, unknown>;
}

export interface AnalyzerCancelNotification {
    jsonrpc: '2.0';
    method: 'cancel';
    params: { id: number };
}

export interface AnalyzerResponse {
    jsonrpc?: '2.0';
    id: number;
    result?: unknown;
    error?: {
        code: number;
        message: string;
    };
}
