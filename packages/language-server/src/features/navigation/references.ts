/**
 * References Handlers
 *
 * Find references, document highlights and implementations.
 */

import { DocumentHighlightKind } from 'vscode-languageserver/node.js';
import type {
    Connection,
    DocumentHighlight,
    Location,
    ReferenceParams,
    TextDocumentPositionParams,
} from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import { normalizePath } from '../../utils/paths.js';
import { toRange, useToLocation } from '../utils/convert.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('Navigation');

/**
 * Uses of the symbol across every project that can see it.
 */
export async function provideReferences(
    services: Pick<Services, 'dispatcher'>,
    params: ReferenceParams,
    signal?: AbortSignal,
): Promise<Location[]> {
    const outcome = await services.dispatcher.symbolUseProject(params.textDocument.uri, params.position, { signal });
    if (outcome.kind !== 'ok') {
        log.debug('No references', { uri: params.textDocument.uri, outcome: outcome.kind });
        return [];
    }
    const uses = params.context.includeDeclaration
        ? outcome.value.uses
        : outcome.value.uses.filter(use => !use.isDefinition);
    return uses.map(useToLocation);
}

/**
 * Occurrences of the symbol in the current file.
 */
export async function provideDocumentHighlights(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<DocumentHighlight[] | null> {
    const outcome = await services.dispatcher.symbolUse(params.textDocument.uri, params.position, { signal });
    if (outcome.kind !== 'ok') {
        return null;
    }
    const file = normalizePath(params.textDocument.uri);
    return outcome.value.uses
        .filter(use => normalizePath(use.file) === file)
        .map(use => ({
            range: toRange(use.range),
            kind: use.isDefinition ? DocumentHighlightKind.Write : DocumentHighlightKind.Read,
        }));
}

export async function provideImplementations(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<Location[]> {
    const outcome = await services.dispatcher.symbolImplementation(params.textDocument.uri, params.position, { signal });
    if (outcome.kind !== 'ok') {
        log.debug('No implementations', { uri: params.textDocument.uri, outcome: outcome.kind });
        return [];
    }
    return outcome.value.map(useToLocation);
}

/**
 * Register references handlers.
 */
export function registerReferencesHandlers(connection: Connection, services: Services): void {
    connection.onReferences(async (params, token): Promise<Location[]> => {
        log.debug('References request', { uri: params.textDocument.uri });
        try {
            return await provideReferences(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('References failed', { error: errorMessage(err) });
            return [];
        }
    });

    connection.onDocumentHighlight(async (params, token): Promise<DocumentHighlight[] | null> => {
        try {
            return await provideDocumentHighlights(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Document highlight failed', { error: errorMessage(err) });
            return null;
        }
    });

    connection.onImplementation(async (params, token): Promise<Location[]> => {
        log.debug('Implementation request', { uri: params.textDocument.uri });
        try {
            return await provideImplementations(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Implementation failed', { error: errorMessage(err) });
            return [];
        }
    });
}
