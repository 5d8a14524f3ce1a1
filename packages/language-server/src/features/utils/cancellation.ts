/**
 * LSP cancellation tokens as AbortSignals, so a `$/cancelRequest` from the
 * client reaches the dispatcher.
 */

import type { CancellationToken } from 'vscode-languageserver/node.js';
import { CancellationError } from '@quill-lsp/core';

export const CLIENT_CANCELLED = 'cancelled by client';

export function toAbortSignal(token?: CancellationToken): AbortSignal | undefined {
    if (!token) {
        return undefined;
    }
    const controller = new AbortController();
    if (token.isCancellationRequested) {
        controller.abort(new CancellationError(CLIENT_CANCELLED));
        return controller.signal;
    }
    const subscription = token.onCancellationRequested(() => {
        subscription.dispose();
        controller.abort(new CancellationError(CLIENT_CANCELLED));
    });
    return controller.signal;
}
