/**
 * Runtime response validation for analyzer bridge responses.
 *
 * TypeScript types are erased at runtime and the analyzer is a separate
 * program. These assertion functions validate response shapes at the bridge
 * boundary so type mismatches surface as BridgeResponseError instead of
 * propagating into the caches.
 */

import { AnalyzerError } from '@quill-lsp/core';
import type {
    AnalysisCheck,
    AnalysisOptions,
    AnalyzerDiagnostic,
    AnalyzerSeverity,
    AnalyzerVersionInfo,
    CheckResult,
    CompileResult,
    CompletionEntry,
    CompletionList,
    DeclarationKind,
    DeclarationTarget,
    MethodGroup,
    MethodOverload,
    NavigationDeclaration,
    ProjectErrorKind,
    ProjectLoadResult,
    SourceRange,
    SymbolUse,
    SymbolUseResult,
    ToolTip,
} from './types.js';

/**
 * Error thrown when an analyzer response doesn't match the expected shape.
 * Includes method name, field name, expected type, and actual value.
 */
export class BridgeResponseError extends AnalyzerError {
    readonly method: string;
    readonly field: string;

    constructor(method: string, field: string, expected: string, got: unknown) {
        const gotDesc = got === null ? 'null'
            : got === undefined ? 'undefined'
            : Array.isArray(got) ? `array(${got.length})`
            : `${typeof got}(${String(got).substring(0, 50)})`;
        super(`Bridge '${method}': '${field}' expected ${expected}, got ${gotDesc}`);
        this.name = 'BridgeResponseError';
        this.method = method;
        this.field = field;
    }
}

/** Assert value is a non-null object (not array). */
export function assertObject(value: unknown, field: string, method: string): asserts value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new BridgeResponseError(method, field, 'object', value);
    }
}

/** Assert value is an array. */
export function assertArray(value: unknown, field: string, method: string): asserts value is unknown[] {
    if (!Array.isArray(value)) {
        throw new BridgeResponseError(method, field, 'array', value);
    }
}

/** Assert value is a string. */
export function assertString(value: unknown, field: string, method: string): asserts value is string {
    if (typeof value !== 'string') {
        throw new BridgeResponseError(method, field, 'string', value);
    }
}

/** Assert value is a number. */
export function assertNumber(value: unknown, field: string, method: string): asserts value is number {
    if (typeof value !== 'number') {
        throw new BridgeResponseError(method, field, 'number', value);
    }
}

/** Assert value is a boolean. */
export function assertBoolean(value: unknown, field: string, method: string): asserts value is boolean {
    if (typeof value !== 'boolean') {
        throw new BridgeResponseError(method, field, 'boolean', value);
    }
}

/** Assert every element in an array is a string. */
export function assertStringArray(value: unknown, field: string, method: string): asserts value is string[] {
    assertArray(value, field, method);
    for (let i = 0; i < value.length; i++) {
        if (typeof value[i] !== 'string') {
            throw new BridgeResponseError(method, `${field}[${i}]`, 'string', value[i]);
        }
    }
}

/** Validator function type for sendRequest. */
export type ResponseValidator<T> = (raw: unknown, method: string) => T;

const SEVERITIES: readonly AnalyzerSeverity[] = ['error', 'warning', 'info', 'hint'];
const DECLARATION_KINDS: readonly DeclarationKind[] = [
    'namespace', 'module', 'type', 'union', 'enum', 'interface', 'exception',
    'function', 'method', 'property', 'field', 'value', 'other',
];
const PROJECT_ERROR_KINDS: readonly ProjectErrorKind[] = [
    'languageNotSupported',
    'referencesNotLoaded',
    'projectNotRestored',
    'generic',
];

export function validateRange(raw: unknown, field: string, method: string): SourceRange {
    assertObject(raw, field, method);
    const { start, end } = raw;
    assertObject(start, `${field}.start`, method);
    assertObject(end, `${field}.end`, method);
    assertNumber(start['line'], `${field}.start.line`, method);
    assertNumber(start['character'], `${field}.start.character`, method);
    assertNumber(end['line'], `${field}.end.line`, method);
    assertNumber(end['character'], `${field}.end.character`, method);
    return {
        start: { line: start['line'], character: start['character'] },
        end: { line: end['line'], character: end['character'] },
    };
}

export function validateDiagnostics(raw: unknown, field: string, method: string): AnalyzerDiagnostic[] {
    assertArray(raw, field, method);
    return raw.map((item, i) => {
        const path = `${field}[${i}]`;
        assertObject(item, path, method);
        assertString(item['message'], `${path}.message`, method);
        const severity = SEVERITIES.find(s => s === item['severity']);
        if (severity === undefined) {
            throw new BridgeResponseError(method, `${path}.severity`, SEVERITIES.join('|'), item['severity']);
        }
        const diagnostic: AnalyzerDiagnostic = {
            range: validateRange(item['range'], `${path}.range`, method),
            severity,
            message: item['message'],
        };
        if (typeof item['code'] === 'string') {
            diagnostic.code = item['code'];
        }
        if (item['unnecessary'] === true) {
            diagnostic.unnecessary = true;
        }
        const fix = item['fix'];
        if (fix !== undefined && fix !== null) {
            assertObject(fix, `${path}.fix`, method);
            assertString(fix['newText'], `${path}.fix.newText`, method);
            diagnostic.fix = { range: validateRange(fix['range'], `${path}.fix.range`, method), newText: fix['newText'] };
        }
        return diagnostic;
    });
}

export function validateOptions(raw: unknown, field: string, method: string): AnalysisOptions {
    assertObject(raw, field, method);
    assertString(raw['projectPath'], `${field}.projectPath`, method);
    assertStringArray(raw['sourceFiles'], `${field}.sourceFiles`, method);
    assertStringArray(raw['references'], `${field}.references`, method);
    assertStringArray(raw['flags'], `${field}.flags`, method);
    assertBoolean(raw['isScript'], `${field}.isScript`, method);
    const options: AnalysisOptions = {
        projectPath: raw['projectPath'],
        sourceFiles: raw['sourceFiles'],
        references: raw['references'],
        flags: raw['flags'],
        isScript: raw['isScript'],
    };
    const target = raw['scriptTarget'];
    if (target === 'sdk' || target === 'framework') {
        options.scriptTarget = target;
    }
    return options;
}

export function validateCheck(raw: unknown, field: string, method: string): AnalysisCheck {
    assertObject(raw, field, method);
    assertString(raw['id'], `${field}.id`, method);
    assertString(raw['file'], `${field}.file`, method);
    assertNumber(raw['version'], `${field}.version`, method);
    return {
        id: raw['id'],
        file: raw['file'],
        version: raw['version'],
        diagnostics: validateDiagnostics(raw['diagnostics'], `${field}.diagnostics`, method),
        hasParseTree: raw['hasParseTree'] !== false,
    };
}

/** Validate a `{ ok, check | error }` parse_and_check payload. */
export function validateCheckResult(raw: unknown, method: string): CheckResult {
    assertObject(raw, 'result', method);
    if (raw['ok'] === true) {
        return { ok: true, check: validateCheck(raw['check'], 'check', method) };
    }
    assertString(raw['error'], 'error', method);
    return { ok: false, error: raw['error'] };
}

/** Validate a `{ ok, project | error }` resolve_project payload. */
export function validateProjectLoadResult(raw: unknown, method: string): ProjectLoadResult {
    assertObject(raw, 'result', method);
    if (raw['ok'] === true) {
        const project = raw['project'];
        assertObject(project, 'project', method);
        assertString(project['projectPath'], 'project.projectPath', method);
        assertStringArray(project['files'], 'project.files', method);
        assertStringArray(project['references'], 'project.references', method);
        const info = {
            projectPath: project['projectPath'],
            options: validateOptions(project['options'], 'project.options', method),
            files: project['files'],
            references: project['references'],
        };
        const outputFile = project['outputFile'];
        return {
            ok: true,
            project: typeof outputFile === 'string' ? { ...info, outputFile } : info,
        };
    }
    const error = raw['error'];
    assertObject(error, 'error', method);
    assertString(error['message'], 'error.message', method);
    assertString(error['projectPath'], 'error.projectPath', method);
    const kind = PROJECT_ERROR_KINDS.find(k => k === error['kind']) ?? 'generic';
    return { ok: false, error: { kind, projectPath: error['projectPath'], message: error['message'] } };
}

function declarationKind(raw: unknown): DeclarationKind {
    return DECLARATION_KINDS.find(k => k === raw) ?? 'other';
}

function optionalString(raw: unknown): string | undefined {
    return typeof raw === 'string' ? raw : undefined;
}

/** Accepts `null` as "nothing at this position". */
export function nullable<T>(validate: ResponseValidator<T>): ResponseValidator<T | null> {
    return (raw, method) => (raw === null || raw === undefined ? null : validate(raw, method));
}

export function validateNavigation(raw: unknown, method: string, field = 'result'): NavigationDeclaration[] {
    assertArray(raw, field, method);
    return raw.map((item, i) => {
        const path = `${field}[${i}]`;
        assertObject(item, path, method);
        assertString(item['name'], `${path}.name`, method);
        return {
            name: item['name'],
            kind: declarationKind(item['kind']),
            range: validateRange(item['range'], `${path}.range`, method),
            selectionRange: validateRange(item['selectionRange'] ?? item['range'], `${path}.selectionRange`, method),
            children: item['children'] === undefined ? [] : validateNavigation(item['children'], method, `${path}.children`),
        };
    });
}

export function validateCompletionList(raw: unknown, method: string): CompletionList {
    assertObject(raw, 'result', method);
    assertArray(raw['entries'], 'entries', method);
    const entries = raw['entries'].map((item, i): CompletionEntry => {
        assertObject(item, `entries[${i}]`, method);
        assertString(item['name'], `entries[${i}].name`, method);
        const entry: CompletionEntry = {
            name: item['name'],
            fullName: optionalString(item['fullName']) ?? item['name'],
            kind: declarationKind(item['kind']),
        };
        const namespaceToOpen = optionalString(item['namespaceToOpen']);
        if (namespaceToOpen !== undefined) {
            entry.namespaceToOpen = namespaceToOpen;
        }
        const description = optionalString(item['description']);
        if (description !== undefined) {
            entry.description = description;
        }
        return entry;
    });
    const keywords = raw['keywords'] ?? [];
    assertStringArray(keywords, 'keywords', method);
    return {
        entries,
        residue: optionalString(raw['residue']) ?? '',
        includeKeywords: raw['includeKeywords'] === true,
        keywords,
    };
}

export function validateToolTip(raw: unknown, method: string): ToolTip {
    assertObject(raw, 'result', method);
    assertString(raw['signature'], 'signature', method);
    return {
        signature: raw['signature'],
        documentation: optionalString(raw['documentation']) ?? '',
        footer: optionalString(raw['footer']) ?? '',
    };
}

export function validateText(raw: unknown, method: string): string {
    assertString(raw, 'result', method);
    return raw;
}

export function validateDeclarationTarget(raw: unknown, method: string): DeclarationTarget {
    assertObject(raw, 'result', method);
    if (raw['kind'] === 'external') {
        assertString(raw['assembly'], 'assembly', method);
        assertString(raw['fullName'], 'fullName', method);
        return { kind: 'external', assembly: raw['assembly'], fullName: raw['fullName'] };
    }
    assertString(raw['file'], 'file', method);
    return { kind: 'source', file: raw['file'], range: validateRange(raw['range'], 'range', method) };
}

export function validateSymbolUses(raw: unknown, method: string, field = 'result'): SymbolUse[] {
    assertArray(raw, field, method);
    return raw.map((item, i) => {
        const path = `${field}[${i}]`;
        assertObject(item, path, method);
        assertString(item['file'], `${path}.file`, method);
        return {
            file: item['file'],
            range: validateRange(item['range'], `${path}.range`, method),
            isDefinition: item['isDefinition'] === true,
            isFromDispatchSlotImplementation: item['isFromDispatchSlotImplementation'] === true,
            isFromType: item['isFromType'] === true,
        };
    });
}

export function validateSymbolUseResult(raw: unknown, method: string): SymbolUseResult {
    assertObject(raw, 'result', method);
    const symbol = raw['symbol'];
    assertObject(symbol, 'symbol', method);
    assertString(symbol['name'], 'symbol.name', method);
    return {
        symbol: {
            name: symbol['name'],
            fullName: optionalString(symbol['fullName']) ?? symbol['name'],
            isPrivateToFile: symbol['isPrivateToFile'] === true,
            isInternalToProject: symbol['isInternalToProject'] === true,
        },
        uses: validateSymbolUses(raw['uses'], method, 'uses'),
    };
}

export function validateMethodGroup(raw: unknown, method: string): MethodGroup {
    assertObject(raw, 'result', method);
    assertString(raw['name'], 'name', method);
    assertArray(raw['overloads'], 'overloads', method);
    const overloads = raw['overloads'].map((item, i): MethodOverload => {
        assertObject(item, `overloads[${i}]`, method);
        assertString(item['label'], `overloads[${i}].label`, method);
        const params = item['parameters'] ?? [];
        assertArray(params, `overloads[${i}].parameters`, method);
        const overload: MethodOverload = {
            label: item['label'],
            parameters: params.map((p, j) => {
                assertObject(p, `overloads[${i}].parameters[${j}]`, method);
                assertString(p['label'], `overloads[${i}].parameters[${j}].label`, method);
                const documentation = optionalString(p['documentation']);
                return documentation === undefined ? { label: p['label'] } : { label: p['label'], documentation };
            }),
        };
        const documentation = optionalString(item['documentation']);
        if (documentation !== undefined) {
            overload.documentation = documentation;
        }
        return overload;
    });
    const active = raw['activeParameter'];
    return { name: raw['name'], overloads, activeParameter: typeof active === 'number' ? active : 0 };
}

export function validateDiagnosticList(raw: unknown, method: string): AnalyzerDiagnostic[] {
    return validateDiagnostics(raw, 'result', method);
}

export function validateCompileResult(raw: unknown, method: string): CompileResult {
    assertObject(raw, 'result', method);
    assertNumber(raw['exitCode'], 'exitCode', method);
    return { exitCode: raw['exitCode'], diagnostics: validateDiagnostics(raw['diagnostics'], 'diagnostics', method) };
}

export function validateScriptOptions(raw: unknown, method: string): AnalysisOptions {
    return validateOptions(raw, 'result', method);
}

export function validateVersionInfo(raw: unknown, method: string): AnalyzerVersionInfo {
    assertObject(raw, 'result', method);
    assertString(raw['name'], 'name', method);
    assertString(raw['version'], 'version', method);
    return { name: raw['name'], version: raw['version'] };
}
