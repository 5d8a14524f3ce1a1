/**
 * Dispatcher Freshness Tests
 *
 * Latest waits for a check of the current version; Recent answers from
 * whatever check exists, checking on demand when there is none.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { CancellationError } from '@quill-lsp/core';
import { NO_RECENT_CHECK_MESSAGE } from '../../constants/index.js';
import { flush, pos, scriptOptionsFor, symbol, use } from '../helpers/fake-analyzer.js';
import { createTestServices, recordEvents } from '../helpers/test-services.js';

const A = '/workspace/A.fsx';

describe('RequestDispatcher latest policy', () => {
    it('fails with notFound for a file that is not loaded', async () => {
        const { services } = createTestServices();

        const outcome = await services.dispatcher.latestAnalysis('/workspace/none.fsx');

        assert.deepEqual(outcome, { kind: 'error', error: { kind: 'notFound', message: 'File not loaded: /workspace/none.fsx' } });
    });

    it('answers at once when the check matches the document', async () => {
        const { services } = createTestServices();
        await services.dispatcher.parse(A, ['1'], 1);

        const outcome = await services.dispatcher.latestAnalysis(A);

        assert.equal(outcome.kind === 'ok' ? outcome.value.version : undefined, 1);
    });

    it('waits for the parse in flight', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.holdParses = true;
        const parsing = services.dispatcher.parse(A, ['1'], 1);
        await flush();

        const waiting = services.dispatcher.latestAnalysis(A);
        await flush();
        analyzer.releaseParse(1);
        await parsing;

        const outcome = await waiting;
        assert.equal(outcome.kind === 'ok' ? outcome.value.version : undefined, 1);
    });

    it('keeps waiting while only an older version is checked', async () => {
        const { services } = createTestServices();
        await services.dispatcher.parse(A, ['1'], 1);
        services.dispatcher.setFileContent(A, ['12'], 2);

        let settled = false;
        const waiting = services.dispatcher.latestAnalysis(A).then((outcome) => {
            settled = true;
            return outcome;
        });
        await flush();
        assert.equal(settled, false);

        await services.dispatcher.parse(A, ['12'], 2);
        const outcome = await waiting;
        assert.equal(outcome.kind === 'ok' ? outcome.value.version : undefined, 2);
    });

    it('fails with timeout when no check arrives in time', async () => {
        const { services } = createTestServices();
        services.dispatcher.setFileContent(A, ['1'], 1);

        const outcome = await services.dispatcher.latestAnalysis(A, { timeoutMs: 20 });

        assert.equal(outcome.kind, 'error');
        if (outcome.kind === 'error') {
            assert.equal(outcome.error.kind, 'timeout');
            assert.match(outcome.error.message, /^Timed out after \d+ms waiting for an up-to-date analysis of \/workspace\/A\.fsx$/);
        }
    });

    it('applies the configured timeout to latest queries', async () => {
        const { services } = createTestServices({ latestResultTimeout: 20 });
        services.dispatcher.setFileContent(A, ['1'], 1);

        const outcome = await services.dispatcher.methods(A, pos(0, 0));

        assert.equal(outcome.kind === 'error' ? outcome.error.kind : outcome.kind, 'timeout');
    });

    it('turns an aborted wait into a cancelled answer', async () => {
        const { services } = createTestServices();
        services.dispatcher.setFileContent(A, ['1'], 1);
        const events = recordEvents(services);
        const controller = new AbortController();

        const waiting = services.dispatcher.latestAnalysis(A, { signal: controller.signal });
        await flush();
        controller.abort(new CancellationError('client cancelled'));

        assert.deepEqual(await waiting, { kind: 'info', message: 'Request cancelled (client cancelled)', cancelled: true });
        assert.deepEqual(events, [{ type: 'cancelled', file: A, operation: 'latestAnalysis', reason: 'client cancelled' }]);
    });

    it('lets the caller cancel a position query waiting for the current version', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.symbolUseAt = { symbol: symbol('total'), uses: [use(A, 0)] };
        await services.dispatcher.parse(A, ['let total = 1'], 1);
        services.dispatcher.setFileContent(A, ['let total = 12'], 2);
        const controller = new AbortController();

        const finding = services.dispatcher.symbolUseProject(A, pos(0, 5), { signal: controller.signal });
        await flush();
        controller.abort(new CancellationError('client cancelled'));

        assert.deepEqual(await finding, { kind: 'info', message: 'Request cancelled (client cancelled)', cancelled: true });
        assert.deepEqual(analyzer.callsOf('getSymbolUseAtPosition'), []);
    });

    it('answers cancelled at once for a signal aborted before the query starts', async () => {
        const { services } = createTestServices();
        services.dispatcher.setFileContent(A, ['let total = 12'], 2);
        const controller = new AbortController();
        controller.abort(new CancellationError('client cancelled'));

        const outcome = await services.dispatcher.methods(A, pos(0, 5), { signal: controller.signal });

        assert.deepEqual(outcome, { kind: 'info', message: 'Request cancelled (client cancelled)', cancelled: true });
    });

    it('is not cancelled by the parse it waits for', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.symbolUseAt = { symbol: symbol('total', { isPrivateToFile: true }), uses: [use(A, 0)] };
        await services.dispatcher.parse(A, ['let total = 1'], 1);
        services.dispatcher.setFileContent(A, ['let total = 12'], 2);

        const renaming = services.dispatcher.rename(A, pos(0, 5), 'sum');
        await flush();
        await services.dispatcher.parse(A, ['let total = 12'], 2);

        const outcome = await renaming;
        assert.equal(outcome.kind, 'ok');
        assert.deepEqual(analyzer.callsOf('getSymbolUseAtPosition'), [{ method: 'getSymbolUseAtPosition', file: A, version: 2 }]);
    });
});

describe('RequestDispatcher recent policy', () => {
    it('reports files that are not loaded', async () => {
        const { services } = createTestServices();

        assert.deepEqual(await services.dispatcher.recentAnalysis(A), {
            kind: 'error',
            error: { kind: 'notFound', message: `File not loaded: ${A}` },
        });
    });

    it('answers with info before any check exists', async () => {
        const { services } = createTestServices();
        services.dispatcher.setFileContent(A, ['1'], 1);

        assert.deepEqual(await services.dispatcher.recentAnalysis(A), { kind: 'info', message: NO_RECENT_CHECK_MESSAGE });
    });

    it("falls back to the analyzer's own recent check", async () => {
        const { services, analyzer } = createTestServices();
        services.dispatcher.setFileContent(A, ['1'], 1);
        services.projects.setOptions(A, scriptOptionsFor(A));
        const check = analyzer.makeCheck(A, 1);
        analyzer.recentChecks.set(A, check);

        assert.deepEqual(await services.dispatcher.recentAnalysis(A), { kind: 'ok', value: check });
    });

    it('serves a stale check without waiting', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.toolTip = { signature: 'val x: int', documentation: '', footer: '' };
        await services.dispatcher.parse(A, ['let x = 1'], 1);
        services.dispatcher.setFileContent(A, ['let x = 12'], 2);

        const outcome = await services.dispatcher.toolTip(A, pos(0, 4));

        assert.equal(outcome.kind, 'ok');
        assert.deepEqual(analyzer.callsOf('getToolTip'), [{ method: 'getToolTip', file: A, version: 1 }]);
        assert.equal(analyzer.callsOf('parseAndCheck').length, 1);
    });

    it('checks a file from disk on demand', async () => {
        const { services, analyzer, disk } = createTestServices();
        disk.set('/workspace/Lib.fs', 'module Lib\nlet y = 2');
        analyzer.toolTip = { signature: 'val y: int', documentation: '', footer: '' };

        const outcome = await services.dispatcher.toolTip('/workspace/Lib.fs', pos(1, 4));

        assert.equal(outcome.kind, 'ok');
        assert.deepEqual(analyzer.callsOf('parseAndCheck'), [{ method: 'parseAndCheck', file: '/workspace/Lib.fs', version: 0 }]);
        assert.equal(services.cache.getCheckedVersion('/workspace/Lib.fs'), 0);
    });

    it('cancels an on-demand check when the caller aborts', async () => {
        const { services, analyzer } = createTestServices();
        analyzer.holdParses = true;
        services.dispatcher.setFileContent(A, ['let x = 1'], 1);
        const controller = new AbortController();

        const hovering = services.dispatcher.toolTip(A, pos(0, 4), { signal: controller.signal });
        await flush();
        assert.equal(analyzer.heldParses.length, 1);
        controller.abort(new CancellationError('client cancelled'));

        assert.deepEqual(await hovering, { kind: 'info', message: 'Request cancelled (client cancelled)', cancelled: true });
        assert.equal(services.cancellation.activeCount(A), 0);
        assert.equal(services.cache.getCheckedVersion(A), undefined);
    });

    it('answers info for an unknown file on an info query', async () => {
        const { services } = createTestServices();

        assert.deepEqual(await services.dispatcher.symbolUse('/workspace/none.fs', pos(0, 0)), {
            kind: 'info',
            message: 'File not found: /workspace/none.fs',
        });
    });
});
