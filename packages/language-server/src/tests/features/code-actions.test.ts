/**
 * Code Action Tests
 *
 * Quick fixes derived from published diagnostics.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CodeActionKind } from 'vscode-languageserver/node.js';
import type { CodeAction, CodeActionParams, Diagnostic } from 'vscode-languageserver/node.js';
import { provideCodeActions } from '../../features/code-actions.js';
import { toDiagnostic } from '../../features/utils/convert.js';
import { defaultSettings, type ServerSettings } from '../../core/types.js';
import type { DiagnosticSource } from '../../services/notification-bus.js';
import { diag, range } from '../helpers/fake-analyzer.js';

const URI = 'file:///workspace/A.fsx';

function params(diagnostics: Diagnostic[]): CodeActionParams {
    return {
        textDocument: { uri: URI },
        range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
        context: { diagnostics },
    };
}

function published(source: DiagnosticSource, message: string, line: number, start: number, end: number): Diagnostic {
    return toDiagnostic({ ...diag(message, line, 'hint'), range: range(line, start, end) }, source);
}

function actionsFor(diagnostic: Diagnostic, settings: Partial<ServerSettings> = {}): CodeAction[] {
    return provideCodeActions({ settings: { ...defaultSettings, ...settings } }, params([diagnostic]));
}

describe('provideCodeActions', () => {
    it('removes the whole line of an unused open', () => {
        const unused = published('unusedOpens', 'Unused open statement', 2, 0, 11);

        assert.deepEqual(actionsFor(unused), [{
            title: 'Remove unused open',
            kind: CodeActionKind.QuickFix,
            diagnostics: [unused],
            edit: {
                changes: {
                    [URI]: [{ range: { start: { line: 2, character: 0 }, end: { line: 3, character: 0 } }, newText: '' }],
                },
            },
        }]);
    });

    it('offers to replace or prefix an unused value', () => {
        const unused = published('unusedDeclarations', 'This value is unused', 1, 4, 9);

        const actions = actionsFor(unused);

        assert.deepEqual(actions.map(a => a.title), ['Replace with _', 'Prefix with _']);
        assert.deepEqual(actions[0]?.edit?.changes?.[URI], [{ range: range(1, 4, 9), newText: '_' }]);
        assert.deepEqual(actions[1]?.edit?.changes?.[URI], [{ range: range(1, 4, 4), newText: '_' }]);
    });

    it('replaces an unused self identifier with a double underscore', () => {
        const unused = toDiagnostic({ ...diag('This value is unused', 3, 'hint'), range: range(3, 11, 15), code: '1' }, 'unusedDeclarations');

        const actions = actionsFor(unused);

        assert.deepEqual(actions.map(a => a.title), ['Replace with __']);
        assert.deepEqual(actions[0]?.edit?.changes?.[URI], [{ range: range(3, 11, 15), newText: '__' }]);
    });

    it('removes a redundant qualifier', () => {
        const redundant = published('simplifyNames', 'This qualifier is redundant', 5, 8, 15);

        const actions = actionsFor(redundant);

        assert.deepEqual(actions.map(a => a.title), ['Remove redundant qualifier']);
        assert.deepEqual(actions[0]?.edit?.changes?.[URI], [{ range: range(5, 8, 15), newText: '' }]);
    });

    it('applies the replacement a lint finding carries', () => {
        const lint = toDiagnostic(
            { ...diag('Lint: use List.isEmpty', 4, 'info'), fix: { range: range(4, 3, 17), newText: 'List.isEmpty xs' } },
            'lint',
        );

        const actions = actionsFor(lint);

        assert.deepEqual(actions.map(a => a.title), ['Replace with List.isEmpty xs']);
        assert.deepEqual(actions[0]?.edit?.changes?.[URI], [{ range: range(4, 3, 17), newText: 'List.isEmpty xs' }]);
    });

    it('has nothing for a lint finding without a replacement', () => {
        assert.deepEqual(actionsFor(published('lint', 'Lint: long line', 0, 0, 1)), []);
    });

    it('offers each name the compiler suggests, quoting non-identifiers', () => {
        const unknown = toDiagnostic(
            {
                ...diag("The value 'lenght' is not defined. Maybe you want one of the following:\n   length\n   list item", 0),
                range: range(0, 8, 14),
            },
            'compiler',
        );

        const actions = actionsFor(unknown);

        assert.deepEqual(actions.map(a => a.title), ['Replace with length', 'Replace with ``list item``']);
        assert.deepEqual(actions[1]?.edit?.changes?.[URI], [{ range: range(0, 8, 14), newText: '``list item``' }]);
    });

    it('skips fixes of disabled analyses', () => {
        const unused = published('unusedOpens', 'Unused open statement', 0, 0, 11);
        const redundant = published('simplifyNames', 'This qualifier is redundant', 1, 0, 5);

        assert.deepEqual(actionsFor(unused, { unusedOpensAnalyzer: false }), []);
        assert.deepEqual(actionsFor(redundant, { simplifyNameAnalyzer: false }), []);
    });

    it('ignores diagnostics from other sources', () => {
        const foreign: Diagnostic = { range: range(0, 0, 1), message: 'Unused open statement', source: 'other-tool' };

        assert.deepEqual(actionsFor(foreign), []);
    });
});
