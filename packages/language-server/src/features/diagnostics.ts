/**
 * Diagnostics Feature Handlers
 *
 * Document synchronization (store, debounce, parse), configuration changes,
 * and publishing of diagnostics collected per (uri, source).
 */

import type {
    Connection,
    Diagnostic,
    PublishDiagnosticsParams,
    TextDocuments,
} from 'vscode-languageserver/node.js';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { Logger, errorMessage, parseLogLevel } from '@quill-lsp/core';
import type { Services } from '../services/index.js';
import type { DiagnosticSource, Disposable, ServerEvent } from '../services/notification-bus.js';
import { mergeSettings } from '../core/types.js';
import { normalizePath, splitLines, toFileUri } from '../utils/paths.js';
import { toDiagnostic } from './utils/convert.js';

export interface DiagnosticsSink {
    sendDiagnostics(params: PublishDiagnosticsParams): Promise<void>;
}

/**
 * One diagnostic collection per (uri, source). Each event replaces its
 * collection and republishes the merge of all sources for the uri.
 */
export class DiagnosticsPublisher {
    private collections = new Map<string, Map<DiagnosticSource, Diagnostic[]>>();
    private readonly log = new Logger('Diagnostics');

    constructor(
        private readonly sink: DiagnosticsSink,
        private readonly services: Pick<Services, 'settings'>,
    ) {}

    /**
     * Subscribe to diagnostics and file deletion events on the bus.
     */
    attach(services: Pick<Services, 'bus'>): Disposable {
        return services.bus.subscribe((event: ServerEvent) => {
            if (event.type === 'diagnostics') {
                return this.update(toFileUri(event.file), event.source, event.diagnostics.map(d => toDiagnostic(d, event.source)));
            }
            if (event.type === 'fileDeleted') {
                return this.clear(toFileUri(event.file));
            }
            return undefined;
        });
    }

    async update(uri: string, source: DiagnosticSource, diagnostics: Diagnostic[]): Promise<void> {
        let bySource = this.collections.get(uri);
        if (!bySource) {
            bySource = new Map();
            this.collections.set(uri, bySource);
        }
        bySource.set(source, diagnostics);
        await this.publish(uri);
    }

    /** Merged diagnostics currently held for the uri. */
    merged(uri: string): Diagnostic[] {
        const bySource = this.collections.get(uri);
        if (!bySource) {
            return [];
        }
        const all = [...bySource.values()].flat();
        all.sort((a, b) => a.range.start.line - b.range.start.line || a.range.start.character - b.range.start.character);
        return all.slice(0, this.services.settings.maxNumberOfProblems);
    }

    async clear(uri: string): Promise<void> {
        this.collections.delete(uri);
        await this.sink.sendDiagnostics({ uri, diagnostics: [] });
    }

    private async publish(uri: string): Promise<void> {
        const diagnostics = this.merged(uri);
        this.log.debug('Publishing diagnostics', { uri, count: diagnostics.length });
        await this.sink.sendDiagnostics({ uri, diagnostics });
    }
}

/**
 * Editor document lifecycle: content is stored at once, parses are debounced.
 */
export class DocumentSync {
    // Validation timers for debouncing
    private validationTimers = new Map<string, ReturnType<typeof setTimeout>>();
    private readonly log = new Logger('DocumentSync');

    constructor(private readonly services: Services) {}

    /**
     * Store and parse an opened document once the workspace is ready.
     */
    async open(uri: string, text: string, version: number): Promise<void> {
        this.services.dispatcher.setFileContent(uri, splitLines(text), version);
        await this.parse(uri, text, version);
    }

    /**
     * Store a changed document and schedule its parse after `diagnosticDelay`.
     */
    change(uri: string, text: string, version: number): void {
        const lines = splitLines(text);
        this.services.dispatcher.setFileContent(uri, lines, version);

        const existingTimer = this.validationTimers.get(uri);
        if (existingTimer) {
            clearTimeout(existingTimer);
        }
        const timer = setTimeout(() => {
            this.validationTimers.delete(uri);
            this.parse(uri, text, version).catch((err: unknown) => {
                this.log.error('Debounced parse failed', { uri, error: errorMessage(err) });
            });
        }, this.services.settings.diagnosticDelay);
        this.validationTimers.set(uri, timer);
    }

    /**
     * Drop a pending parse and cancel in-flight work. The stored content stays.
     */
    close(uri: string): void {
        const timer = this.validationTimers.get(uri);
        if (timer) {
            clearTimeout(timer);
            this.validationTimers.delete(uri);
        }
        this.services.dispatcher.cancel(uri, 'document closed');
    }

    get pendingCount(): number {
        return this.validationTimers.size;
    }

    dispose(): void {
        for (const timer of this.validationTimers.values()) {
            clearTimeout(timer);
        }
        this.validationTimers.clear();
    }

    /**
     * Parse once no workspace load is in progress, unless a newer version
     * was stored meanwhile.
     */
    private async parse(uri: string, text: string, version: number): Promise<void> {
        const { dispatcher, documents } = this.services;
        await dispatcher.whenWorkspaceReady();
        const current = documents.getVersion(uri);
        if (current !== undefined && current !== version) {
            this.log.debug('Skipping parse of replaced text', { file: normalizePath(uri), version, current });
            return;
        }
        const outcome = await dispatcher.parse(uri, splitLines(text), version);
        if (outcome.kind === 'error') {
            this.log.warn('Parse failed', { file: normalizePath(uri), version, kind: outcome.error.kind, error: outcome.error.message });
        } else if (outcome.kind === 'info') {
            this.log.debug('Parse did not complete', { file: normalizePath(uri), version, message: outcome.message });
        }
    }
}

/**
 * Register diagnostics handlers with the LSP connection.
 *
 * @param connection - LSP connection
 * @param services - Server services bundle
 * @param documents - Text document manager
 */
export function registerDiagnosticsHandlers(
    connection: Connection,
    services: Services,
    documents: TextDocuments<TextDocument>
): DocumentSync {
    const log = new Logger('Diagnostics');
    const sync = new DocumentSync(services);
    const publisher = new DiagnosticsPublisher(connection, services);
    publisher.attach(services);

    connection.onDidChangeConfiguration((change) => {
        const raw: unknown = change.settings;
        const section = typeof raw === 'object' && raw !== null && 'quill' in raw ? raw.quill : undefined;
        services.settings = mergeSettings(services.settings, section);
        Logger.setLevel(parseLogLevel(services.settings.logLevel));
        log.info('Settings updated', { diagnosticDelay: services.settings.diagnosticDelay });
    });

    documents.onDidOpen((event) => {
        const { uri, version } = event.document;
        sync.open(uri, event.document.getText(), version).catch((err: unknown) => {
            log.error('Open handling failed', { uri, error: errorMessage(err) });
        });
    });

    documents.onDidChangeContent((event) => {
        const { uri, version } = event.document;
        // Also fired on open, which already stored this version
        if (services.documents.getVersion(uri) === version) {
            return;
        }
        sync.change(uri, event.document.getText(), version);
    });

    documents.onDidClose((event) => {
        sync.close(event.document.uri);
        publisher.clear(event.document.uri).catch((err: unknown) => {
            log.error('Clearing diagnostics failed', { uri: event.document.uri, error: errorMessage(err) });
        });
    });

    return sync;
}
