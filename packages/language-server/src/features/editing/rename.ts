/**
 * Rename Handlers
 *
 * Provides prepare rename and rename across every project that sees the symbol.
 */

import { LSPErrorCodes, ResponseError, TextEdit } from 'vscode-languageserver/node.js';
import type {
    Connection,
    PrepareRenameParams,
    Range,
    RenameParams,
    WorkspaceEdit,
} from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import { toFileUri } from '../../utils/paths.js';
import { toRange } from '../utils/convert.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('Rename');

const IDENTIFIER_CHAR = /[\w']/;

/**
 * Range of the identifier under the cursor, or null when there is none.
 */
export function prepareRename(services: Pick<Services, 'documents'>, params: PrepareRenameParams): Range | null {
    const { line, character } = params.position;
    const text = services.documents.getLine(params.textDocument.uri, line);
    if (text === undefined) {
        return null;
    }

    let start = character;
    let end = character;
    while (start > 0 && IDENTIFIER_CHAR.test(text[start - 1] ?? '')) {
        start--;
    }
    while (end < text.length && IDENTIFIER_CHAR.test(text[end] ?? '')) {
        end++;
    }
    if (start === end) {
        return null;
    }
    return { start: { line, character: start }, end: { line, character: end } };
}

/**
 * @throws ResponseError when the rename cannot be computed
 */
export async function provideRename(
    services: Pick<Services, 'dispatcher'>,
    params: RenameParams,
    signal?: AbortSignal,
): Promise<WorkspaceEdit | null> {
    const outcome = await services.dispatcher.rename(params.textDocument.uri, params.position, params.newName, { signal });
    if (outcome.kind === 'error') {
        throw new ResponseError(LSPErrorCodes.RequestFailed, outcome.error.message, outcome.error);
    }
    if (outcome.kind === 'info') {
        return null;
    }

    const changes: Record<string, TextEdit[]> = {};
    for (const edit of outcome.value.edits) {
        changes[toFileUri(edit.file)] = edit.ranges.map(range => TextEdit.replace(toRange(range), params.newName));
    }
    return { changes };
}

/**
 * Register rename handlers.
 */
export function registerRenameHandlers(connection: Connection, services: Services): void {
    connection.onPrepareRename((params): Range | null => {
        try {
            return prepareRename(services, params);
        } catch (err) {
            log.error('Prepare rename failed', { error: errorMessage(err) });
            return null;
        }
    });

    connection.onRenameRequest(async (params, token): Promise<WorkspaceEdit | null> => {
        log.debug('Rename request', { uri: params.textDocument.uri, newName: params.newName });
        try {
            return await provideRename(services, params, toAbortSignal(token));
        } catch (err) {
            if (err instanceof ResponseError) {
                throw err;
            }
            log.error('Rename failed', { error: errorMessage(err) });
            return null;
        }
    });
}
