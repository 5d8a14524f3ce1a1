/**
 * Request-level error taxonomy.
 *
 * Failures that reach a caller are reduced to a payload with a
 * machine-checkable kind; cancellation is not part of this taxonomy.
 */

import { AnalyzerError, BridgeError, LSPError, errorMessage } from '@quill-lsp/core';
import type { ProjectErrorKind } from '@quill-lsp/analyzer-bridge';

export type RequestErrorKind = 'notFound' | 'optionsResolutionFailed' | 'analysisFailed' | 'timeout';

export interface RequestErrorPayload {
    kind: RequestErrorKind;
    message: string;
    /** Set for `optionsResolutionFailed` */
    reason?: ProjectErrorKind;
}

/**
 * Error raised inside the server with a known request error kind.
 */
export class RequestError extends LSPError {
    readonly kind: RequestErrorKind;
    readonly reason: ProjectErrorKind | undefined;

    constructor(kind: RequestErrorKind, message: string, reason?: ProjectErrorKind, cause?: Error) {
        super(message, 'server', cause);
        this.name = 'RequestError';
        this.kind = kind;
        this.reason = reason;
    }

    toPayload(): RequestErrorPayload {
        return this.reason === undefined
            ? { kind: this.kind, message: this.message }
            : { kind: this.kind, message: this.message, reason: this.reason };
    }
}

/**
 * Map any thrown value onto a request error payload.
 *
 * Analyzer, bridge and unknown failures are all reported as `analysisFailed`.
 */
export function toErrorPayload(err: unknown): RequestErrorPayload {
    if (err instanceof RequestError) {
        return err.toPayload();
    }
    if (err instanceof AnalyzerError || err instanceof BridgeError) {
        return { kind: 'analysisFailed', message: err.message };
    }
    return { kind: 'analysisFailed', message: errorMessage(err) };
}
