/**
 * Check Waiters
 *
 * Per-file condition mechanism: a waiter registers a predicate over the
 * checked version of one file and is re-evaluated only when that file is
 * checked.
 */

import { CancellationError } from '@quill-lsp/core';
import { RequestError } from '../core/errors.js';
import { normalizePath } from '../utils/paths.js';
import { abortReason } from './cancellation-registry.js';

export interface WaitOptions {
    signal?: AbortSignal;
    /** Reject with a `timeout` RequestError after this many ms; 0 or absent waits indefinitely */
    timeoutMs?: number;
}

interface Waiter {
    predicate: (checkedVersion: number) => boolean;
    resolve: (checkedVersion: number) => void;
}

export class CheckWaiters {
    private waiters = new Map<string, Set<Waiter>>();

    /**
     * Resolve with the checked version on the first notification for `file`
     * that satisfies `predicate`.
     *
     * @throws CancellationError when the signal aborts
     * @throws RequestError (`timeout`) when the timeout elapses
     */
    waitFor(file: string, predicate: (checkedVersion: number) => boolean, options: WaitOptions = {}): Promise<number> {
        const key = normalizePath(file);
        const { signal, timeoutMs } = options;

        return new Promise<number>((resolve, reject) => {
            if (signal?.aborted) {
                reject(new CancellationError(abortReason(signal)));
                return;
            }

            let timer: ReturnType<typeof setTimeout> | undefined;
            const cleanup = (): void => {
                this.remove(key, waiter);
                if (timer !== undefined) {
                    clearTimeout(timer);
                }
                signal?.removeEventListener('abort', onAbort);
            };
            const onAbort = (): void => {
                cleanup();
                reject(new CancellationError(signal ? abortReason(signal) : 'cancelled'));
            };
            const waiter: Waiter = {
                predicate,
                resolve: (checkedVersion) => {
                    cleanup();
                    resolve(checkedVersion);
                },
            };

            let set = this.waiters.get(key);
            if (!set) {
                set = new Set();
                this.waiters.set(key, set);
            }
            set.add(waiter);

            signal?.addEventListener('abort', onAbort, { once: true });
            if (timeoutMs !== undefined && timeoutMs > 0) {
                timer = setTimeout(() => {
                    cleanup();
                    reject(new RequestError('timeout', `Timed out after ${timeoutMs}ms waiting for an up-to-date analysis of ${key}`));
                }, timeoutMs);
            }
        });
    }

    /**
     * Report that `file` was checked at `checkedVersion`.
     */
    notify(file: string, checkedVersion: number): void {
        const set = this.waiters.get(normalizePath(file));
        if (!set) {
            return;
        }
        for (const waiter of [...set]) {
            if (waiter.predicate(checkedVersion)) {
                waiter.resolve(checkedVersion);
            }
        }
    }

    pendingCount(file: string): number {
        return this.waiters.get(normalizePath(file))?.size ?? 0;
    }

    private remove(key: string, waiter: Waiter): void {
        const set = this.waiters.get(key);
        if (!set) {
            return;
        }
        set.delete(waiter);
        if (set.size === 0) {
            this.waiters.delete(key);
        }
    }
}
