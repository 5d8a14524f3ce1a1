/**
 * Quill LSP Server
 *
 * Entry point: creates the connection, builds the services once the client
 * has sent its initialization options, and registers the feature handlers.
 * All behavior lives in the dispatcher and the feature modules.
 */

import {
    createConnection,
    CodeActionKind,
    DidChangeConfigurationNotification,
    DidChangeWatchedFilesNotification,
    ProposedFeatures,
    TextDocuments,
    TextDocumentSyncKind,
} from 'vscode-languageserver/node.js';
import type { InitializeParams, InitializeResult } from 'vscode-languageserver/node.js';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { AnalyzerBridge } from '@quill-lsp/analyzer-bridge';
import { Logger, errorMessage, parseLogLevel } from '@quill-lsp/core';
import * as features from './features/index.js';
import { BridgeAnalyzer, bridgeOptionsFor, createServices, type Services } from './services/index.js';
import { defaultSettings, mergeSettings } from './core/types.js';
import { SHOW_DIAGNOSTICS_COMMAND, WATCHED_FILES_GLOB } from './constants/index.js';

// Create connection using stdio
const connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);
const log = new Logger('Server');

let services: Services | undefined;
let documentSync: features.DocumentSync | undefined;

// ============================================================================
// LSP Lifecycle Handlers
// ============================================================================

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
    connection.console.log('Quill LSP Server initializing...');

    const settings = mergeSettings({ ...defaultSettings }, params.initializationOptions);
    Logger.setLevel(parseLogLevel(settings.logLevel));

    const bridge = new AnalyzerBridge(bridgeOptionsFor(settings));
    bridge.on('stderr', (msg: string) => connection.console.log(`[Analyzer] ${msg}`));
    const analyzer = new BridgeAnalyzer(bridge);
    const created = createServices({ analyzer, settings });
    services = created;

    // Register feature handlers before the initialize response
    documentSync = features.registerDiagnosticsHandlers(connection, created, documents);
    features.registerNavigationHandlers(connection, created);
    features.registerEditingHandlers(connection, created);
    features.registerSymbolsHandlers(connection, created);
    features.registerCodeActionHandlers(connection, created);
    features.registerWorkspaceHandlers(connection, created);

    try {
        await analyzer.start();
        connection.console.log('Analyzer started');
    } catch (err) {
        connection.console.error(`Failed to start analyzer '${settings.analyzerPath}': ${errorMessage(err)}`);
    }

    return {
        capabilities: {
            textDocumentSync: TextDocumentSyncKind.Incremental,
            documentSymbolProvider: true,
            workspaceSymbolProvider: true,
            hoverProvider: true,
            definitionProvider: true,
            typeDefinitionProvider: true,
            referencesProvider: true,
            implementationProvider: true,
            documentHighlightProvider: true,
            completionProvider: {
                resolveProvider: true,
                triggerCharacters: ['.'],
            },
            signatureHelpProvider: {
                triggerCharacters: ['(', ',', ' '],
            },
            renameProvider: {
                prepareProvider: true,
            },
            codeActionProvider: {
                codeActionKinds: [CodeActionKind.QuickFix],
            },
            executeCommandProvider: {
                commands: [SHOW_DIAGNOSTICS_COMMAND],
            },
        },
    };
});

connection.onInitialized(() => {
    connection.console.log('Quill LSP Server initialized');
    connection.client.register(DidChangeConfigurationNotification.type, undefined).catch((err: unknown) => {
        log.warn('Could not register for configuration changes', { error: errorMessage(err) });
    });
    connection.client
        .register(DidChangeWatchedFilesNotification.type, { watchers: [{ globPattern: WATCHED_FILES_GLOB }] })
        .catch((err: unknown) => {
            log.warn('Could not register file watchers', { error: errorMessage(err) });
        });
});

// ============================================================================
// Shutdown Handlers
// ============================================================================

connection.onShutdown(async () => {
    connection.console.log('Quill LSP Server shutting down...');
    documentSync?.dispose();
    await services?.analyzer.stop();
});

connection.onExit(() => {
    services?.analyzer.stop().catch((err: unknown) => {
        log.debug('Analyzer stop during exit failed', { error: errorMessage(err) });
    });
});

// ============================================================================
// Start Listening
// ============================================================================

documents.listen(connection);
connection.listen();
