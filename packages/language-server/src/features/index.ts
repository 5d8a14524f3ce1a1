/**
 * Feature Module Exports
 *
 * Re-exports all feature registration functions for convenient importing.
 * Feature handlers group related LSP capabilities into cohesive modules.
 */

// Symbols feature - document and workspace symbol providers
export { registerSymbolsHandlers } from './symbols.js';

// Diagnostics feature - document lifecycle and diagnostics publishing
export { registerDiagnosticsHandlers, DiagnosticsPublisher, DocumentSync } from './diagnostics.js';

// Navigation feature - hover, definitions, references
export { registerNavigationHandlers } from './navigation/index.js';

// Editing feature - completion, signature help, rename
export { registerEditingHandlers } from './editing/index.js';

// Code actions - quick fixes for published diagnostics
export { registerCodeActionHandlers } from './code-actions.js';

// Workspace feature - project requests, push notifications, health
export { registerWorkspaceHandlers } from './workspace.js';

// Export Services type for convenience
export type { Services } from '../services/index.js';
