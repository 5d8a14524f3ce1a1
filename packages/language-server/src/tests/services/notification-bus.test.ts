/**
 * Notification Bus Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { Logger, LogLevel } from '@quill-lsp/core';
import { NotificationBus, type ServerEvent } from '../../services/notification-bus.js';
import { flush } from '../helpers/fake-analyzer.js';

Logger.setLevel(LogLevel.OFF);

const PARSED: ServerEvent = { type: 'fileParsed', file: '/workspace/A.fsx', version: 1 };

describe('NotificationBus', () => {
    it('delivers to subscribers in registration order', () => {
        const bus = new NotificationBus();
        const seen: string[] = [];
        bus.subscribe(() => {
            seen.push('first');
        });
        bus.subscribe(() => {
            seen.push('second');
        });

        bus.publish(PARSED);

        assert.deepEqual(seen, ['first', 'second']);
    });

    it('keeps delivering when a subscriber throws or rejects', async () => {
        const bus = new NotificationBus();
        const seen: ServerEvent[] = [];
        bus.subscribe(() => {
            throw new Error('sync failure');
        });
        bus.subscribe(async () => {
            throw new Error('async failure');
        });
        bus.subscribe((event) => {
            seen.push(event);
        });

        bus.publish(PARSED);
        await flush();

        assert.deepEqual(seen, [PARSED]);
    });

    it('stops delivering after dispose', () => {
        const bus = new NotificationBus();
        let count = 0;
        const subscription = bus.subscribe(() => {
            count++;
        });

        subscription.dispose();
        bus.publish(PARSED);

        assert.equal(count, 0);
        assert.equal(bus.subscriberCount, 0);
    });
});
