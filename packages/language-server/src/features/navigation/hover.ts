/**
 * Hover Handler
 *
 * Provides type information and documentation on hover.
 */

import { MarkupKind } from 'vscode-languageserver/node.js';
import type { Connection, Hover, TextDocumentPositionParams } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import { buildHoverContent } from '../utils/hover-builder.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('Navigation');

/**
 * Tooltip for the symbol at the position, from the most recent check.
 */
export async function provideHover(
    services: Pick<Services, 'dispatcher'>,
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
): Promise<Hover | null> {
    const outcome = await services.dispatcher.toolTip(params.textDocument.uri, params.position, { signal });
    if (outcome.kind !== 'ok') {
        log.debug('No hover', { uri: params.textDocument.uri, outcome: outcome.kind });
        return null;
    }
    const content = buildHoverContent(outcome.value);
    if (!content) {
        return null;
    }
    return {
        contents: {
            kind: MarkupKind.Markdown,
            value: content,
        },
    };
}

/**
 * Register hover handler.
 */
export function registerHoverHandler(connection: Connection, services: Services): void {
    connection.onHover(async (params, token): Promise<Hover | null> => {
        log.debug('Hover request', { uri: params.textDocument.uri });
        try {
            return await provideHover(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Hover failed', { error: errorMessage(err) });
            return null;
        }
    });
}
