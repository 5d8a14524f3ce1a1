/**
 * Cancellation Registry
 *
 * Live cancellation scopes per file. A superseding operation (a parse of a
 * new version) cancels every earlier scope of its file; read-only work
 * attaches next to the live scopes instead.
 */

import { CancellationError } from '@quill-lsp/core';
import { normalizePath } from '../utils/paths.js';

export interface CancellationScope {
    readonly id: number;
    readonly file: string;
    readonly signal: AbortSignal;
}

export type CommitResult<T> = { committed: true; value: T } | { committed: false };

interface ScopeEntry {
    scope: CancellationScope;
    controller: AbortController;
}

export class CancellationRegistry {
    private scopes = new Map<string, Map<number, ScopeEntry>>();
    private nextId = 0;

    /**
     * Cancel and forget every scope of the file, then register a new one.
     */
    register(file: string): CancellationScope {
        const key = normalizePath(file);
        this.cancelAll(key, 'superseded by a newer request');
        return this.add(key);
    }

    /**
     * Register a scope without cancelling the file's other scopes.
     */
    attach(file: string): CancellationScope {
        return this.add(normalizePath(file));
    }

    /**
     * Cancel every scope of the file.
     *
     * @returns Number of scopes cancelled
     */
    cancelAll(file: string, reason = 'cancelled'): number {
        const key = normalizePath(file);
        const live = this.scopes.get(key);
        if (!live) {
            return 0;
        }
        this.scopes.delete(key);
        for (const { controller } of live.values()) {
            controller.abort(new CancellationError(reason));
        }
        return live.size;
    }

    /**
     * Cancel a single scope, leaving the file's other scopes running.
     *
     * @returns Whether the scope was still live
     */
    cancel(scope: CancellationScope, reason = 'cancelled'): boolean {
        const entry = this.scopes.get(scope.file)?.get(scope.id);
        if (!entry) {
            return false;
        }
        this.release(scope);
        entry.controller.abort(new CancellationError(reason));
        return true;
    }

    /** Forget a finished scope. */
    release(scope: CancellationScope): void {
        const live = this.scopes.get(scope.file);
        if (!live) {
            return;
        }
        live.delete(scope.id);
        if (live.size === 0) {
            this.scopes.delete(scope.file);
        }
    }

    isLive(scope: CancellationScope): boolean {
        return !scope.signal.aborted && (this.scopes.get(scope.file)?.has(scope.id) ?? false);
    }

    /**
     * Run `commit` only if the scope has not been cancelled or superseded.
     */
    tryCommit<T>(scope: CancellationScope, commit: () => T): CommitResult<T> {
        if (!this.isLive(scope)) {
            return { committed: false };
        }
        return { committed: true, value: commit() };
    }

    activeCount(file: string): number {
        return this.scopes.get(normalizePath(file))?.size ?? 0;
    }

    private add(key: string): CancellationScope {
        const controller = new AbortController();
        const scope: CancellationScope = { id: ++this.nextId, file: key, signal: controller.signal };
        let live = this.scopes.get(key);
        if (!live) {
            live = new Map();
            this.scopes.set(key, live);
        }
        live.set(scope.id, { scope, controller });
        return scope;
    }
}

/**
 * Human-readable reason a signal was aborted with.
 */
export function abortReason(signal: AbortSignal): string {
    const reason: unknown = signal.reason;
    if (reason instanceof Error) {
        return reason.message;
    }
    return reason === undefined ? 'cancelled' : String(reason);
}
