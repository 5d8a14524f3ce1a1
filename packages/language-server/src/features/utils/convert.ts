/**
 * Conversions from analyzer shapes to LSP shapes.
 */

import {
    CompletionItemKind,
    DiagnosticSeverity,
    DiagnosticTag,
    SymbolKind,
} from 'vscode-languageserver/node.js';
import type {
    Diagnostic,
    DocumentSymbol,
    Location,
    Range,
} from 'vscode-languageserver/node.js';
import type {
    AnalyzerDiagnostic,
    AnalyzerSeverity,
    DeclarationKind,
    NavigationDeclaration,
    SourceRange,
    SymbolUse,
} from '@quill-lsp/analyzer-bridge';
import type { DiagnosticSource } from '../../services/notification-bus.js';
import { toFileUri } from '../../utils/paths.js';

export function toRange(range: SourceRange): Range {
    return {
        start: { line: range.start.line, character: range.start.character },
        end: { line: range.end.line, character: range.end.character },
    };
}

export function toSeverity(severity: AnalyzerSeverity): DiagnosticSeverity {
    switch (severity) {
        case 'error':
            return DiagnosticSeverity.Error;
        case 'warning':
            return DiagnosticSeverity.Warning;
        case 'info':
            return DiagnosticSeverity.Information;
        case 'hint':
            return DiagnosticSeverity.Hint;
    }
}

const SOURCES: readonly DiagnosticSource[] = ['compiler', 'lint', 'unusedOpens', 'unusedDeclarations', 'simplifyNames'];

/** Label shown to the user for a diagnostic source. */
export function sourceLabel(source: DiagnosticSource): string {
    return source === 'compiler' ? 'quill' : `quill.${source}`;
}

/** Source of a diagnostic this server published, from its label. */
export function parseSourceLabel(label: string | undefined): DiagnosticSource | undefined {
    return SOURCES.find(source => sourceLabel(source) === label);
}

/** Replacement carried in `Diagnostic.data` for a suggested fix. */
export interface DiagnosticFixData {
    fix: { range: Range; newText: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isPosition(value: unknown): boolean {
    return isRecord(value) && typeof value['line'] === 'number' && typeof value['character'] === 'number';
}

export function isDiagnosticFixData(data: unknown): data is DiagnosticFixData {
    if (!isRecord(data) || !isRecord(data['fix'])) {
        return false;
    }
    const { range, newText } = data['fix'];
    return typeof newText === 'string' && isRecord(range) && isPosition(range['start']) && isPosition(range['end']);
}

/**
 * Convert an analyzer diagnostic, tagging it with the analysis it came from.
 */
export function toDiagnostic(diagnostic: AnalyzerDiagnostic, source: DiagnosticSource): Diagnostic {
    const result: Diagnostic = {
        range: toRange(diagnostic.range),
        severity: toSeverity(diagnostic.severity),
        message: diagnostic.message,
        source: sourceLabel(source),
    };
    if (diagnostic.code !== undefined) {
        result.code = diagnostic.code;
    }
    if (diagnostic.unnecessary) {
        result.tags = [DiagnosticTag.Unnecessary];
    }
    if (diagnostic.fix) {
        result.data = { fix: { range: toRange(diagnostic.fix.range), newText: diagnostic.fix.newText } } satisfies DiagnosticFixData;
    }
    return result;
}

export function toSymbolKind(kind: DeclarationKind): SymbolKind {
    switch (kind) {
        case 'namespace':
            return SymbolKind.Namespace;
        case 'module':
            return SymbolKind.Module;
        case 'type':
            return SymbolKind.Class;
        case 'union':
        case 'enum':
            return SymbolKind.Enum;
        case 'interface':
            return SymbolKind.Interface;
        case 'exception':
            return SymbolKind.Class;
        case 'function':
            return SymbolKind.Function;
        case 'method':
            return SymbolKind.Method;
        case 'property':
            return SymbolKind.Property;
        case 'field':
            return SymbolKind.Field;
        case 'value':
            return SymbolKind.Variable;
        case 'other':
            return SymbolKind.Variable;
    }
}

export function toCompletionKind(kind: DeclarationKind): CompletionItemKind {
    switch (kind) {
        case 'namespace':
        case 'module':
            return CompletionItemKind.Module;
        case 'type':
        case 'exception':
            return CompletionItemKind.Class;
        case 'union':
        case 'enum':
            return CompletionItemKind.Enum;
        case 'interface':
            return CompletionItemKind.Interface;
        case 'function':
            return CompletionItemKind.Function;
        case 'method':
            return CompletionItemKind.Method;
        case 'property':
            return CompletionItemKind.Property;
        case 'field':
            return CompletionItemKind.Field;
        case 'value':
            return CompletionItemKind.Variable;
        case 'other':
            return CompletionItemKind.Text;
    }
}

export function toDocumentSymbol(declaration: NavigationDeclaration): DocumentSymbol {
    return {
        name: declaration.name,
        kind: toSymbolKind(declaration.kind),
        range: toRange(declaration.range),
        selectionRange: toRange(declaration.selectionRange),
        children: declaration.children.map(toDocumentSymbol),
    };
}

export function toLocation(file: string, range: SourceRange): Location {
    return { uri: toFileUri(file), range: toRange(range) };
}

export function useToLocation(use: SymbolUse): Location {
    return toLocation(use.file, use.range);
}
