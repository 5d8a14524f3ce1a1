/**
 * Notification Bus
 *
 * Typed publish/subscribe for side-effecting server events. Delivery is a
 * synchronous fan-out to the current subscribers in registration order;
 * nothing is persisted or replayed.
 */

import { Logger, errorMessage } from '@quill-lsp/core';
import type {
    AnalyzerDiagnostic,
    BackgroundAnalysisKind,
    ProjectError,
} from '@quill-lsp/analyzer-bridge';

export type DiagnosticSource = 'compiler' | BackgroundAnalysisKind;

export interface ProjectSummary {
    projectPath: string;
    files: string[];
    references: string[];
    outputFile?: string;
}

export type WorkspaceEvent =
    | { kind: 'workspaceLoad'; finished: boolean }
    | { kind: 'projectLoading'; projectPath: string }
    | { kind: 'projectLoaded'; project: ProjectSummary }
    | { kind: 'projectFailed'; projectPath: string; error: ProjectError };

export type ServerEvent =
    | { type: 'fileParsed'; file: string; version: number }
    | {
        type: 'diagnostics';
        file: string;
        source: DiagnosticSource;
        version: number;
        diagnostics: readonly AnalyzerDiagnostic[];
    }
    | { type: 'workspace'; event: WorkspaceEvent }
    | { type: 'cancelled'; file: string; operation: string; reason: string }
    | { type: 'backgroundFailed'; file: string; analysis: BackgroundAnalysisKind; message: string }
    | { type: 'fileDeleted'; file: string };

export type EventHandler = (event: ServerEvent) => void | Promise<void>;

export interface Disposable {
    dispose(): void;
}

export class NotificationBus {
    private handlers: EventHandler[] = [];
    private readonly log = new Logger('NotificationBus');

    /**
     * Deliver `event` to every current subscriber.
     *
     * A subscriber that throws or rejects is logged; the remaining
     * subscribers still receive the event.
     */
    publish(event: ServerEvent): void {
        for (const handler of [...this.handlers]) {
            try {
                const result = handler(event);
                if (result instanceof Promise) {
                    result.catch((err: unknown) => this.reportFailure(event, err));
                }
            } catch (err) {
                this.reportFailure(event, err);
            }
        }
    }

    subscribe(handler: EventHandler): Disposable {
        this.handlers.push(handler);
        return {
            dispose: () => {
                this.handlers = this.handlers.filter(h => h !== handler);
            },
        };
    }

    get subscriberCount(): number {
        return this.handlers.length;
    }

    private reportFailure(event: ServerEvent, err: unknown): void {
        this.log.error('Subscriber failed', { event: event.type, error: errorMessage(err) });
    }
}
