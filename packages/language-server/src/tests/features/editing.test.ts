/**
 * Editing Feature Tests
 *
 * Completion and its resolve step, signature help and rename.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CompletionItemKind, LSPErrorCodes, MarkupKind, ResponseError } from 'vscode-languageserver/node.js';
import type { CompletionEntry } from '@quill-lsp/analyzer-bridge';
import {
    prepareRename,
    provideCompletion,
    provideRename,
    provideSignatureHelp,
    resolveCompletionItem,
} from '../../features/editing/index.js';
import { pos, range, symbol, use } from '../helpers/fake-analyzer.js';
import { createTestServices } from '../helpers/test-services.js';

const A = '/workspace/A.fsx';
const URI = 'file:///workspace/A.fsx';

const ENTRIES: CompletionEntry[] = [
    { name: 'map', fullName: 'List.map', kind: 'function', description: 'Builds a new list' },
    { name: 'HttpClient', fullName: 'Net.HttpClient', kind: 'type', namespaceToOpen: 'Net' },
];

describe('Completion', () => {
    it('lists entries, the open they need and keywords', async () => {
        const { services, analyzer } = createTestServices({ externalAutocomplete: true });
        analyzer.completions = { entries: ENTRIES, residue: '', includeKeywords: true, keywords: ['let'] };
        await services.dispatcher.parse(URI, ['open System', 'Http'], 1);

        const list = await provideCompletion(services, { textDocument: { uri: URI }, position: pos(1, 4) });

        assert.deepEqual(list, {
            isIncomplete: false,
            items: [
                { label: 'map', kind: CompletionItemKind.Function, data: { name: 'map' } },
                {
                    label: 'HttpClient',
                    kind: CompletionItemKind.Class,
                    data: { name: 'HttpClient' },
                    detail: 'open Net',
                    additionalTextEdits: [{ range: { start: pos(1, 0), end: pos(1, 0) }, newText: 'open Net\n' }],
                },
                { label: 'let', kind: CompletionItemKind.Keyword },
            ],
        });
    });

    it('returns an empty list when there is nothing to complete', async () => {
        const { services } = createTestServices();

        const list = await provideCompletion(services, { textDocument: { uri: URI }, position: pos(0, 0) });

        assert.deepEqual(list, { isIncomplete: false, items: [] });
    });

    it('resolves documentation from help text', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.completions = { entries: ENTRIES, residue: '', includeKeywords: false, keywords: [] };
        await services.dispatcher.parse(URI, ['ma'], 1);
        await provideCompletion(services, { textDocument: { uri: URI }, position: pos(0, 2) });

        const item = await resolveCompletionItem(services, { label: 'map', data: { name: 'map' } });

        assert.deepEqual(item.documentation, { kind: MarkupKind.Markdown, value: 'Builds a new list' });
    });

    it('leaves items without completion data alone', async () => {
        const { services } = createTestServices();

        assert.deepEqual(await resolveCompletionItem(services, { label: 'let' }), { label: 'let' });
    });
});

describe('Signature help', () => {
    it('selects the first overload that takes the active parameter', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.methodGroup = {
            name: 'add',
            overloads: [
                { label: 'add(a)', parameters: [{ label: 'a' }] },
                { label: 'add(a, b)', documentation: 'Adds', parameters: [{ label: 'a' }, { label: 'b', documentation: 'second' }] },
            ],
            activeParameter: 1,
        };
        await services.dispatcher.parse(URI, ['add(1, '], 1);

        const help = await provideSignatureHelp(services, { textDocument: { uri: URI }, position: pos(0, 7) });

        assert.deepEqual(help, {
            signatures: [
                { label: 'add(a)', parameters: [{ label: 'a' }] },
                { label: 'add(a, b)', documentation: 'Adds', parameters: [{ label: 'a' }, { label: 'b', documentation: 'second' }] },
            ],
            activeSignature: 1,
            activeParameter: 1,
        });
    });

    it('returns null without overloads', async () => {
        const { services } = createTestServices();
        await services.dispatcher.parse(URI, ['x'], 1);

        assert.equal(await provideSignatureHelp(services, { textDocument: { uri: URI }, position: pos(0, 0) }), null);
    });
});

describe('Rename', () => {
    it('prepares the identifier under the cursor', () => {
        const { services } = createTestServices();
        services.dispatcher.setFileContent(URI, ["let total' = x"], 1);

        assert.deepEqual(prepareRename(services, { textDocument: { uri: URI }, position: pos(0, 6) }), {
            start: pos(0, 4),
            end: pos(0, 10),
        });
        assert.equal(prepareRename(services, { textDocument: { uri: URI }, position: pos(0, 11) }), null);
        assert.equal(prepareRename(services, { textDocument: { uri: URI }, position: pos(4, 0) }), null);
    });

    it('builds a workspace edit from the rename plan', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.symbolUseAt = {
            symbol: symbol('total', { isPrivateToFile: true }),
            uses: [use(A, 0, { isDefinition: true }), use(A, 2)],
        };
        await services.dispatcher.parse(URI, ['let total = 1', '', 'total + 1'], 1);

        const edit = await provideRename(services, { textDocument: { uri: URI }, position: pos(0, 5), newName: 'sum' });

        assert.deepEqual(edit, {
            changes: {
                [URI]: [
                    { range: range(0, 4, 7), newText: 'sum' },
                    { range: range(2, 4, 7), newText: 'sum' },
                ],
            },
        });
    });

    it('fails the request when nothing can be renamed', async () => {
        const { services } = createTestServices();
        await services.dispatcher.parse(URI, ['1'], 1);

        await assert.rejects(
            provideRename(services, { textDocument: { uri: URI }, position: pos(0, 0), newName: 'x' }),
            (err: unknown) => err instanceof ResponseError
                && err.code === LSPErrorCodes.RequestFailed
                && err.message === 'No symbol to rename at position',
        );
    });
});
