/**
 * Completion Handlers
 *
 * Completion lists from the most recent check, resolved lazily with help
 * text from the completion side cache.
 */

import {
    CompletionItemKind,
    MarkupKind,
    TextEdit,
} from 'vscode-languageserver/node.js';
import type {
    CompletionItem,
    CompletionList,
    CompletionParams,
    Connection,
} from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../../services/index.js';
import { LSP } from '../../constants/index.js';
import { toCompletionKind } from '../utils/convert.js';
import { toAbortSignal } from '../utils/cancellation.js';

const log = new Logger('Completion');

interface CompletionData {
    name: string;
}

function isCompletionData(data: unknown): data is CompletionData {
    return typeof data === 'object' && data !== null && 'name' in data && typeof data.name === 'string';
}

const EMPTY: CompletionList = { isIncomplete: false, items: [] };

export async function provideCompletion(
    services: Pick<Services, 'dispatcher' | 'completions'>,
    params: CompletionParams,
    signal?: AbortSignal,
): Promise<CompletionList> {
    const uri = params.textDocument.uri;
    const outcome = await services.dispatcher.completion(uri, params.position, {
        signal,
        triggerCharacter: params.context?.triggerCharacter,
    });
    if (outcome.kind !== 'ok') {
        log.debug('No completions', { uri, outcome: outcome.kind });
        return EMPTY;
    }

    const { entries, keywords } = outcome.value;
    const items: CompletionItem[] = entries.slice(0, LSP.MAX_COMPLETION_ITEMS).map((entry) => {
        const item: CompletionItem = {
            label: entry.name,
            kind: toCompletionKind(entry.kind),
            data: { name: entry.name } satisfies CompletionData,
        };
        const insert = services.completions.getNamespaceInsert(entry.name);
        if (insert) {
            item.detail = `open ${insert.namespace}`;
            item.additionalTextEdits = [TextEdit.insert(insert.position, `open ${insert.namespace}\n`)];
        }
        return item;
    });
    for (const keyword of keywords) {
        items.push({ label: keyword, kind: CompletionItemKind.Keyword });
    }

    log.debug('Completion', { uri, entries: entries.length, keywords: keywords.length });
    return { isIncomplete: entries.length > LSP.MAX_COMPLETION_ITEMS, items };
}

/**
 * Attach help text to a completion item from the last completion list.
 */
export async function resolveCompletionItem(services: Pick<Services, 'dispatcher'>, item: CompletionItem): Promise<CompletionItem> {
    const data: unknown = item.data;
    if (!isCompletionData(data)) {
        return item;
    }
    const outcome = await services.dispatcher.helpText(data.name);
    if (outcome.kind === 'ok' && outcome.value.length > 0) {
        item.documentation = { kind: MarkupKind.Markdown, value: outcome.value };
    }
    return item;
}

/**
 * Register completion handlers.
 */
export function registerCompletionHandlers(connection: Connection, services: Services): void {
    connection.onCompletion(async (params, token): Promise<CompletionList> => {
        try {
            return await provideCompletion(services, params, toAbortSignal(token));
        } catch (err) {
            log.error('Completion failed', { error: errorMessage(err) });
            return EMPTY;
        }
    });

    connection.onCompletionResolve(async (item): Promise<CompletionItem> => {
        try {
            return await resolveCompletionItem(services, item);
        } catch (err) {
            log.error('Completion resolve failed', { error: errorMessage(err) });
            return item;
        }
    });
}
