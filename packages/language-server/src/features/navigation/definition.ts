/**
 * Definition Handlers
 *
 * Provides go-to-definition and type-definition navigation.
 * Declarations outside the workspace (compiled libraries) have no source
 * location and yield no result.
 */

import type {
    Connection,
    Location,
    TextDocumentPositionParams,
} from 'vscode-languageserver/node.js';
import type { DeclarationTarget } from '@quill-lsp/analyzer-bridge';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import type { Outcome } from '../../dispatcher/responses.js';
import { toLocation } from '../utils/convert.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('Navigation');

function targetToLocation(outcome: Outcome<DeclarationTarget>, uri: string): Location | null {
    if (outcome.kind === 'error') {
        log.debug('Declaration lookup failed', { uri, kind: outcome.error.kind, error: outcome.error.message });
        return null;
    }
    if (outcome.kind === 'info') {
        return null;
    }
    const target = outcome.value;
    if (target.kind === 'external') {
        log.debug('Declaration is external', { assembly: target.assembly, fullName: target.fullName });
        return null;
    }
    return toLocation(target.file, target.range);
}

export async function provideDefinition(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<Location | null> {
    const outcome = await services.dispatcher.findDeclaration(params.textDocument.uri, params.position, { signal });
    return targetToLocation(outcome, params.textDocument.uri);
}

export async function provideTypeDefinition(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<Location | null> {
    const outcome = await services.dispatcher.findTypeDeclaration(params.textDocument.uri, params.position, { signal });
    return targetToLocation(outcome, params.textDocument.uri);
}

/**
 * Register definition handlers.
 */
export function registerDefinitionHandlers(connection: Connection, services: Services): void {
    connection.onDefinition(async (params, token): Promise<Location | null> => {
        log.debug('Definition request', { uri: params.textDocument.uri });
        try {
            return await provideDefinition(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Definition failed', { error: errorMessage(err) });
            return null;
        }
    });

    connection.onTypeDefinition(async (params, token): Promise<Location | null> => {
        log.debug('Type definition request', { uri: params.textDocument.uri });
        try {
            return await provideTypeDefinition(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Type definition failed', { error: errorMessage(err) });
            return null;
        }
    });
}
