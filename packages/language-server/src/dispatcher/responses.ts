/**
 * Tagged results of dispatcher operations.
 */

import type { RequestErrorPayload } from '../core/errors.js';

export interface Ok<T> {
    kind: 'ok';
    value: T;
}

/**
 * Informational answer: no result, a degraded best-effort answer, or a
 * cancelled request.
 */
export interface Info {
    kind: 'info';
    message: string;
    cancelled?: boolean;
}

export interface Failure {
    kind: 'error';
    error: RequestErrorPayload;
}

export type Outcome<T> = Ok<T> | Info | Failure;

export function ok<T>(value: T): Ok<T> {
    return { kind: 'ok', value };
}

export function info(message: string, cancelled = false): Info {
    return cancelled ? { kind: 'info', message, cancelled: true } : { kind: 'info', message };
}

export function failure(error: RequestErrorPayload): Failure {
    return { kind: 'error', error };
}
