/**
 * Symbols Feature Handlers
 *
 * Provides document symbols (outline view) and workspace symbols (search)
 * from the navigation declaration index.
 */

import type {
    Connection,
    DocumentSymbol,
    DocumentSymbolParams,
    SymbolInformation,
    WorkspaceSymbolParams,
} from 'vscode-languageserver/node.js';
import type { NavigationDeclaration } from '@quill-lsp/analyzer-bridge';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { Services } from '../services/index.js';
import { LSP } from '../constants/index.js';
import { toDocumentSymbol, toLocation, toSymbolKind } from './utils/convert.js';

const log = new Logger('Symbols');

export async function provideDocumentSymbols(
    services: Pick<Services, 'dispatcher'>,
    params: DocumentSymbolParams,
): Promise<DocumentSymbol[] | null> {
    const outcome = await services.dispatcher.declarations(params.textDocument.uri);
    if (outcome.kind !== 'ok') {
        log.debug('No document symbols', { uri: params.textDocument.uri, outcome: outcome.kind });
        return null;
    }
    return outcome.value.map(toDocumentSymbol);
}

/**
 * Case-insensitive substring search over every indexed declaration,
 * nested ones included.
 */
export function provideWorkspaceSymbols(
    services: Pick<Services, 'dispatcher'>,
    params: WorkspaceSymbolParams,
): SymbolInformation[] {
    const query = params.query.toLowerCase();
    const results: SymbolInformation[] = [];

    const visit = (file: string, declaration: NavigationDeclaration, container: string | undefined): boolean => {
        if (results.length >= LSP.MAX_WORKSPACE_SYMBOLS) {
            return false;
        }
        if (!query || declaration.name.toLowerCase().includes(query)) {
            const symbol: SymbolInformation = {
                name: declaration.name,
                kind: toSymbolKind(declaration.kind),
                location: toLocation(file, declaration.selectionRange),
            };
            if (container !== undefined) {
                symbol.containerName = container;
            }
            results.push(symbol);
        }
        return declaration.children.every(child => visit(file, child, declaration.name));
    };

    for (const { file, declarations } of services.dispatcher.declarationsInProjects()) {
        if (!declarations.every(declaration => visit(file, declaration, undefined))) {
            break;
        }
    }
    return results;
}

/**
 * Register symbols handlers.
 */
export function registerSymbolsHandlers(connection: Connection, services: Services): void {
    connection.onDocumentSymbol(async (params): Promise<DocumentSymbol[] | null> => {
        log.debug('Document symbol request', { uri: params.textDocument.uri });
        try {
            return await provideDocumentSymbols(services, params);
        } catch (err) {
            log.error('Document symbols failed', { error: errorMessage(err) });
            return null;
        }
    });

    connection.onWorkspaceSymbol((params): SymbolInformation[] => {
        log.debug('Workspace symbol request', { query: params.query, limit: LSP.MAX_WORKSPACE_SYMBOLS });
        try {
            return provideWorkspaceSymbols(services, params);
        } catch (err) {
            log.error('Workspace symbols failed', { error: errorMessage(err) });
            return [];
        }
    });
}
