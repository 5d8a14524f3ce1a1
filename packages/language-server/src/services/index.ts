/**
 * Services Bundle
 *
 * One explicitly constructed context holding every session-scoped store,
 * handed to the dispatcher and to each feature handler.
 */

import { Logger } from '@quill-lsp/core';
import type { Analyzer } from './analyzer.js';
import { AnalysisCache } from './analysis-cache.js';
import { CancellationRegistry } from './cancellation-registry.js';
import { CheckWaiters } from './check-waiters.js';
import { CompletionCache } from './completion-cache.js';
import { DocumentStore, type ReadFile } from './document-store.js';
import { NotificationBus } from './notification-bus.js';
import { ProjectRegistry } from './project-registry.js';
import { RequestDispatcher } from '../dispatcher/request-dispatcher.js';
import { defaultSettings, type ServerSettings } from '../core/types.js';

/**
 * Stores and adapters the dispatcher works on.
 */
export interface ServicesCore {
    /** Logger for diagnostic output */
    logger: Logger;
    /** Current settings (mutable, replaced on configuration changes) */
    settings: ServerSettings;
    documents: DocumentStore;
    cache: AnalysisCache;
    completions: CompletionCache;
    cancellation: CancellationRegistry;
    waiters: CheckWaiters;
    bus: NotificationBus;
    projects: ProjectRegistry;
    analyzer: Analyzer;
}

/**
 * Services interface bundles all service dependencies.
 *
 * Feature handlers receive this interface to access all
 * server services without needing to know their initialization.
 */
export interface Services extends ServicesCore {
    dispatcher: RequestDispatcher;
}

export interface CreateServicesOptions {
    analyzer: Analyzer;
    settings?: ServerSettings;
    /** Disk reader used for files no editor has opened */
    readFile?: ReadFile;
}

export function createServices(options: CreateServicesOptions): Services {
    const documents = new DocumentStore(options.readFile);
    const core: ServicesCore = {
        logger: new Logger('Server'),
        settings: options.settings ?? { ...defaultSettings },
        documents,
        cache: new AnalysisCache(documents),
        completions: new CompletionCache(),
        cancellation: new CancellationRegistry(),
        waiters: new CheckWaiters(),
        bus: new NotificationBus(),
        projects: new ProjectRegistry(),
        analyzer: options.analyzer,
    };
    return Object.assign(core, { dispatcher: new RequestDispatcher(core) });
}

export type { Analyzer, AnalyzerHealth } from './analyzer.js';
export { BridgeAnalyzer, bridgeOptionsFor } from './bridge-analyzer.js';
export type { AnalysisResult, CacheLookup, FileDeclarations } from './analysis-cache.js';
export type { FileState } from './document-store.js';
export type { CancellationScope } from './cancellation-registry.js';
export type { ServerEvent, WorkspaceEvent, DiagnosticSource, ProjectSummary, Disposable } from './notification-bus.js';
export type { Project, ProjectStatus } from './project-registry.js';
