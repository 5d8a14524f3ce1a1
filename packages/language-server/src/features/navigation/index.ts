/**
 * Navigation Feature Handlers
 *
 * Groups "what is this symbol?" handlers:
 * - Hover: type info and documentation
 * - Definition / TypeDefinition: go to declarations
 * - References, DocumentHighlight, Implementation: symbol uses
 *
 * Each handler includes try/catch with logging fallback.
 */

import type { Connection } from 'vscode-languageserver/node.js';
import type { Services } from '../../services/index.js';
import { registerHoverHandler } from './hover.js';
import { registerDefinitionHandlers } from './definition.js';
import { registerReferencesHandlers } from './references.js';

export { registerHoverHandler, provideHover } from './hover.js';
export { registerDefinitionHandlers, provideDefinition, provideTypeDefinition } from './definition.js';
export {
    registerReferencesHandlers,
    provideReferences,
    provideDocumentHighlights,
    provideImplementations,
} from './references.js';

/**
 * Register all navigation handlers with the LSP connection.
 *
 * @param connection - LSP connection
 * @param services - Bundle of server services
 */
export function registerNavigationHandlers(connection: Connection, services: Services): void {
    registerHoverHandler(connection, services);
    registerDefinitionHandlers(connection, services);
    registerReferencesHandlers(connection, services);
}
