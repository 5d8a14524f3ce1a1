/**
 * Diagnostics Feature Tests
 *
 * Per-source collections merged per uri, and the debounced document sync.
 */

import { describe, it, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { setTimeout as delay } from 'timers/promises';
import { DiagnosticSeverity, DiagnosticTag } from 'vscode-languageserver/node.js';
import type { Diagnostic, PublishDiagnosticsParams } from 'vscode-languageserver/node.js';
import { DiagnosticsPublisher, DocumentSync } from '../../features/diagnostics.js';
import { defaultSettings } from '../../core/types.js';
import { diag, flush } from '../helpers/fake-analyzer.js';
import { createTestServices } from '../helpers/test-services.js';

const URI = 'file:///workspace/A.fsx';

function lspDiagnostic(message: string, line: number, character = 0): Diagnostic {
    return {
        range: { start: { line, character }, end: { line, character: character + 1 } },
        severity: DiagnosticSeverity.Error,
        message,
    };
}

class RecordingSink {
    readonly sent: PublishDiagnosticsParams[] = [];

    async sendDiagnostics(params: PublishDiagnosticsParams): Promise<void> {
        this.sent.push(params);
    }

    get last(): PublishDiagnosticsParams | undefined {
        return this.sent.at(-1);
    }
}

// =============================================================================
// DiagnosticsPublisher
// =============================================================================

describe('DiagnosticsPublisher', () => {
    it('merges every source of a uri sorted by position', async () => {
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, { settings: { ...defaultSettings } });
        const compiler = lspDiagnostic('type mismatch', 3);
        const lintLate = lspDiagnostic('prefer pipe', 1, 8);
        const lintEarly = lspDiagnostic('redundant parens', 1, 2);

        await publisher.update(URI, 'compiler', [compiler]);
        await publisher.update(URI, 'lint', [lintLate, lintEarly]);

        assert.deepEqual(sink.last, { uri: URI, diagnostics: [lintEarly, lintLate, compiler] });
    });

    it('replaces only the collection of the updated source', async () => {
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, { settings: { ...defaultSettings } });
        const lint = lspDiagnostic('prefer pipe', 1);

        await publisher.update(URI, 'compiler', [lspDiagnostic('old error', 0)]);
        await publisher.update(URI, 'lint', [lint]);
        await publisher.update(URI, 'compiler', []);

        assert.deepEqual(sink.last, { uri: URI, diagnostics: [lint] });
        assert.equal(sink.sent.length, 3);
    });

    it('caps the merged list at maxNumberOfProblems', async () => {
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, { settings: { ...defaultSettings, maxNumberOfProblems: 2 } });

        await publisher.update(URI, 'compiler', [lspDiagnostic('c', 2), lspDiagnostic('a', 0), lspDiagnostic('b', 1)]);

        assert.deepEqual(sink.last?.diagnostics.map(d => d.message), ['a', 'b']);
    });

    it('clears a uri', async () => {
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, { settings: { ...defaultSettings } });
        await publisher.update(URI, 'compiler', [lspDiagnostic('e', 0)]);

        await publisher.clear(URI);

        assert.deepEqual(sink.last, { uri: URI, diagnostics: [] });
        assert.deepEqual(publisher.merged(URI), []);
    });

    it('publishes diagnostics events from the bus', async () => {
        const { services } = createTestServices();
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, services);
        publisher.attach(services);

        services.bus.publish({
            type: 'diagnostics',
            file: '/workspace/A.fsx',
            source: 'unusedOpens',
            version: 1,
            diagnostics: [{ ...diag('open is unused', 0, 'hint'), unnecessary: true }],
        });
        await flush();

        assert.deepEqual(sink.last, {
            uri: URI,
            diagnostics: [{
                range: { start: { line: 0, character: 0 }, end: { line: 0, character: 1 } },
                severity: DiagnosticSeverity.Hint,
                message: 'open is unused',
                source: 'quill.unusedOpens',
                tags: [DiagnosticTag.Unnecessary],
            }],
        });
    });
});

describe('DiagnosticsPublisher file deletion', () => {
    it('clears every source of a deleted file', async () => {
        const { services } = createTestServices();
        const sink = new RecordingSink();
        const publisher = new DiagnosticsPublisher(sink, services);
        publisher.attach(services);
        await publisher.update(URI, 'lint', [lspDiagnostic('prefer pipe', 1)]);

        services.bus.publish({ type: 'fileDeleted', file: '/workspace/A.fsx' });
        await flush();

        assert.deepEqual(sink.last, { uri: URI, diagnostics: [] });
        assert.deepEqual(publisher.merged(URI), []);
    });
});

// =============================================================================
// DocumentSync
// =============================================================================

describe('DocumentSync', () => {
    let sync: DocumentSync | undefined;

    afterEach(() => {
        sync?.dispose();
        sync = undefined;
    });

    it('stores and parses an opened document', async () => {
        const { services, analyzer } = createTestServices();
        sync = new DocumentSync(services);

        await sync.open(URI, 'let x = 1\nx', 1);

        assert.deepEqual(services.documents.getContent(URI), ['let x = 1', 'x']);
        assert.equal(services.cache.getCheckedVersion(URI), 1);
        assert.equal(analyzer.callsOf('parseAndCheck').length, 1);
    });

    it('stores changes at once and parses only the last one', async () => {
        const { services, analyzer } = createTestServices({ diagnosticDelay: 10 });
        sync = new DocumentSync(services);

        sync.change(URI, 'l', 2);
        sync.change(URI, 'le', 3);

        assert.equal(services.documents.getVersion(URI), 3);
        assert.equal(sync.pendingCount, 1);
        assert.deepEqual(analyzer.callsOf('parseAndCheck'), []);

        await delay(40);
        await services.dispatcher.whenIdle();

        assert.deepEqual(analyzer.callsOf('parseAndCheck').map(c => c.version), [3]);
        assert.equal(sync.pendingCount, 0);
    });

    it('drops the pending parse on close', async () => {
        const { services, analyzer } = createTestServices({ diagnosticDelay: 10 });
        sync = new DocumentSync(services);

        sync.change(URI, 'let', 2);
        sync.close(URI);
        await delay(30);

        assert.equal(sync.pendingCount, 0);
        assert.deepEqual(analyzer.callsOf('parseAndCheck'), []);
        assert.equal(services.documents.getVersion(URI), 2);
    });

    it('waits for a workspace load before parsing an opened document', async () => {
        const { services, analyzer } = createTestServices({ workspaceLoadDelay: 20 });
        sync = new DocumentSync(services);
        const loading = services.dispatcher.workspaceLoad([]);

        const opening = sync.open(URI, 'x', 1);
        await flush();
        assert.deepEqual(analyzer.callsOf('parseAndCheck'), []);
        assert.equal(services.documents.getVersion(URI), 1);

        await loading;
        await opening;
        assert.equal(analyzer.callsOf('parseAndCheck').length, 1);
    });

    it('parses only the newest text of a document edited during a workspace load', async () => {
        const { services, analyzer } = createTestServices({ workspaceLoadDelay: 60, diagnosticDelay: 10 });
        sync = new DocumentSync(services);
        const loading = services.dispatcher.workspaceLoad([]);

        const opening = sync.open(URI, 'let x = 1', 1);
        sync.change(URI, 'let x = 12', 2);
        await delay(30);
        assert.deepEqual(analyzer.callsOf('parseAndCheck'), []);

        await loading;
        await opening;
        await delay(20);
        await services.dispatcher.whenIdle();

        assert.equal(services.documents.getVersion(URI), 2);
        assert.deepEqual(services.documents.getContent(URI), ['let x = 12']);
        assert.equal(services.cache.getCheckedVersion(URI), 2);
        assert.deepEqual(analyzer.callsOf('parseAndCheck').map(c => c.version), [2]);
    });
});
