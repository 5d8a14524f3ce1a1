/**
 * Code Action Handlers
 *
 * Quick fixes for the diagnostics this server published: background
 * analysis findings and the compiler's name suggestions. Fixes are derived
 * from the diagnostics the client sends back with the request.
 */

import { CodeActionKind, TextEdit } from 'vscode-languageserver/node.js';
import type { CodeAction, CodeActionParams, Connection, Diagnostic } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../services/index.js';
import { isDiagnosticFixData, parseSourceLabel } from './utils/convert.js';

const log = new Logger('CodeActions');

/** First line of a compiler message that lists replacement names */
export const SUGGESTION_HEADER = 'Maybe you want one of the following:';

const IDENTIFIER = /^[a-zA-Z][a-zA-Z0-9']*$/;

function quickFix(uri: string, title: string, diagnostic: Diagnostic, edit: TextEdit): CodeAction {
    return {
        title,
        kind: CodeActionKind.QuickFix,
        diagnostics: [diagnostic],
        edit: { changes: { [uri]: [edit] } },
    };
}

function suggestionFixes(uri: string, diagnostic: Diagnostic): CodeAction[] {
    const [header, ...rest] = diagnostic.message.split('\n');
    if (header === undefined || !header.includes(SUGGESTION_HEADER)) {
        return [];
    }
    return rest
        .map(line => line.trim())
        .filter(name => name.length > 0)
        .map((name) => {
            const replacement = IDENTIFIER.test(name) ? name : `\`\`${name}\`\``;
            return quickFix(uri, `Replace with ${replacement}`, diagnostic, TextEdit.replace(diagnostic.range, replacement));
        });
}

function unusedDeclarationFixes(uri: string, diagnostic: Diagnostic): CodeAction[] {
    // A coded finding is an unused self identifier, which takes `__`
    if (diagnostic.code !== undefined) {
        return [quickFix(uri, 'Replace with __', diagnostic, TextEdit.replace(diagnostic.range, '__'))];
    }
    return [
        quickFix(uri, 'Replace with _', diagnostic, TextEdit.replace(diagnostic.range, '_')),
        quickFix(uri, 'Prefix with _', diagnostic, TextEdit.insert(diagnostic.range.start, '_')),
    ];
}

/**
 * Quick fixes for the diagnostics in the request's context. Fixes for a
 * background analysis are offered only while that analysis is enabled.
 */
export function provideCodeActions(services: Pick<Services, 'settings'>, params: CodeActionParams): CodeAction[] {
    const { settings } = services;
    const uri = params.textDocument.uri;
    const actions: CodeAction[] = [];

    for (const diagnostic of params.context.diagnostics) {
        switch (parseSourceLabel(diagnostic.source)) {
            case 'compiler':
                actions.push(...suggestionFixes(uri, diagnostic));
                break;
            case 'unusedOpens':
                if (settings.unusedOpensAnalyzer) {
                    const { start, end } = diagnostic.range;
                    const wholeLines = { start: { line: start.line, character: 0 }, end: { line: end.line + 1, character: 0 } };
                    actions.push(quickFix(uri, 'Remove unused open', diagnostic, TextEdit.del(wholeLines)));
                }
                break;
            case 'unusedDeclarations':
                if (settings.unusedDeclarationsAnalyzer) {
                    actions.push(...unusedDeclarationFixes(uri, diagnostic));
                }
                break;
            case 'simplifyNames':
                if (settings.simplifyNameAnalyzer) {
                    actions.push(quickFix(uri, 'Remove redundant qualifier', diagnostic, TextEdit.del(diagnostic.range)));
                }
                break;
            case 'lint':
                if (settings.linter && isDiagnosticFixData(diagnostic.data)) {
                    const { range, newText } = diagnostic.data.fix;
                    actions.push(quickFix(uri, `Replace with ${newText}`, diagnostic, TextEdit.replace(range, newText)));
                }
                break;
            case undefined:
                break;
        }
    }

    log.debug('Code actions', { uri, diagnostics: params.context.diagnostics.length, actions: actions.length });
    return actions;
}

/**
 * Register code action handler.
 */
export function registerCodeActionHandlers(connection: Connection, services: Services): void {
    connection.onCodeAction((params): CodeAction[] => {
        try {
            return provideCodeActions(services, params);
        } catch (err) {
            log.error('Code actions failed', { error: errorMessage(err) });
            return [];
        }
    });
}
