/**
 * Editing Feature Handlers
 *
 * Handlers for code editing operations:
 * - Completion: code completion suggestions
 * - Completion resolve: documentation for selected completion
 * - Signature help: function parameter hints
 * - Prepare rename: validation for rename operations
 * - Rename: symbol renaming across files
 */

import type { Connection } from 'vscode-languageserver/node.js';
import type { Services } from '../../services/index.js';
import { registerCompletionHandlers } from './completion.js';
import { registerSignatureHelpHandler } from './signature-help.js';
import { registerRenameHandlers } from './rename.js';

export { registerCompletionHandlers, provideCompletion, resolveCompletionItem } from './completion.js';
export { registerSignatureHelpHandler, provideSignatureHelp } from './signature-help.js';
export { registerRenameHandlers, prepareRename, provideRename } from './rename.js';

/**
 * Register all editing handlers with the LSP connection.
 *
 * @param connection - The LSP connection
 * @param services - The services bundle
 */
export function registerEditingHandlers(connection: Connection, services: Services): void {
    registerCompletionHandlers(connection, services);
    registerSignatureHelpHandler(connection, services);
    registerRenameHandlers(connection, services);
}
