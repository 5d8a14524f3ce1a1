/**
 * Workspace Feature Handlers
 *
 * Custom push notifications fed from the notification bus, the project
 * requests, and the health command.
 */

import { FileChangeType } from 'vscode-languageserver/node.js';
import type { Connection, DidChangeWatchedFilesParams } from 'vscode-languageserver/node.js';
import { Logger, errorMessage } from '@quill-lsp/core';
import type { CompileResult } from '@quill-lsp/analyzer-bridge';
import type { AnalyzerHealth, Services } from '../services/index.js';
import type { Disposable, ProjectSummary, ServerEvent } from '../services/notification-bus.js';
import { failure, type Outcome } from '../dispatcher/responses.js';
import { QUILL_METHODS, SHOW_DIAGNOSTICS_COMMAND } from '../constants/index.js';
import { normalizePath, toFileUri } from '../utils/paths.js';

const log = new Logger('Workspace');

export interface NotificationSink {
    sendNotification(method: string, params?: unknown): Promise<void>;
}

/**
 * LSP notification for a bus event, or undefined for events that are not pushed.
 */
export function toNotification(event: ServerEvent): { method: string; params: object } | undefined {
    switch (event.type) {
        case 'fileParsed':
            return { method: QUILL_METHODS.FILE_PARSED, params: { uri: toFileUri(event.file), version: event.version } };
        case 'workspace':
            return { method: QUILL_METHODS.NOTIFY_WORKSPACE, params: event.event };
        case 'cancelled':
            return {
                method: QUILL_METHODS.NOTIFY_CANCEL,
                params: { uri: toFileUri(event.file), operation: event.operation, reason: event.reason },
            };
        case 'diagnostics':
        case 'backgroundFailed':
        case 'fileDeleted':
            return undefined;
    }
}

/**
 * Forward bus events to the client as custom notifications.
 */
export function attachWorkspaceNotifications(sink: NotificationSink, services: Pick<Services, 'bus'>): Disposable {
    return services.bus.subscribe((event) => {
        const notification = toNotification(event);
        return notification ? sink.sendNotification(notification.method, notification.params) : undefined;
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function projectParam(params: unknown): string | undefined {
    if (!isRecord(params)) {
        return undefined;
    }
    const project = params['project'];
    return typeof project === 'string' && project.length > 0 ? normalizePath(project) : undefined;
}

const INVALID_PROJECT = failure({ kind: 'notFound', message: "Missing 'project' parameter" });

export async function handleWorkspaceLoad(
    services: Pick<Services, 'dispatcher'>,
    params: unknown,
): Promise<Outcome<ProjectSummary>[]> {
    const raw = isRecord(params) ? params['projects'] : undefined;
    const projects = Array.isArray(raw) ? raw.filter((p): p is string => typeof p === 'string').map(normalizePath) : [];
    return services.dispatcher.workspaceLoad(projects);
}

/**
 * Load a project; `reload: true` resolves an already loaded one again.
 */
export async function handleProject(services: Pick<Services, 'dispatcher'>, params: unknown): Promise<Outcome<ProjectSummary>> {
    const project = projectParam(params);
    if (project === undefined) {
        return INVALID_PROJECT;
    }
    const reload = isRecord(params) && params['reload'] === true;
    return services.dispatcher.project(project, { reload });
}

export async function handleCompile(services: Pick<Services, 'dispatcher'>, params: unknown): Promise<Outcome<CompileResult>> {
    const project = projectParam(params);
    return project === undefined ? INVALID_PROJECT : services.dispatcher.compile(project);
}

/**
 * Deleted files are forgotten; a change to a loaded project file reloads it.
 */
export async function handleWatchedFiles(
    services: Pick<Services, 'dispatcher' | 'projects'>,
    params: DidChangeWatchedFilesParams,
): Promise<void> {
    for (const change of params.changes) {
        const file = normalizePath(change.uri);
        if (change.type === FileChangeType.Deleted) {
            services.dispatcher.fileDeleted(file);
            continue;
        }
        if (services.projects.get(file)?.status !== 'loaded') {
            continue;
        }
        log.info('Project file changed, reloading', { project: file });
        const outcome = await services.dispatcher.project(file, { reload: true });
        if (outcome.kind === 'error') {
            log.warn('Project reload failed', { project: file, error: outcome.error.message });
        }
    }
}

/**
 * Format health status as readable output.
 */
export function formatHealth(health: AnalyzerHealth | undefined): string {
    const lines: string[] = [];
    lines.push('=== Quill LSP Server Health ===');
    lines.push('');

    if (health) {
        const uptime = Math.floor(health.serverUptime / 1000);
        const uptimeStr = uptime > 60
            ? `${Math.floor(uptime / 60)}m ${uptime % 60}s`
            : `${uptime}s`;

        lines.push(`Server Uptime: ${uptimeStr}`);
        lines.push(`Analyzer Connected: ${health.analyzerConnected ? 'YES' : 'NO'}`);
        lines.push(`Analyzer PID: ${health.analyzerPid ?? 'N/A'}`);
        lines.push(`Analyzer Version: ${health.analyzerVersion ? `${health.analyzerVersion.name} ${health.analyzerVersion.version}` : 'Unknown'}`);

        lines.push('');
        if (health.recentErrors.length > 0) {
            lines.push('Recent Errors:');
            for (const err of health.recentErrors) {
                lines.push(`  - ${err}`);
            }
        } else {
            lines.push('No recent errors');
        }
    } else {
        lines.push('Health status unavailable');
    }

    lines.push('');
    lines.push('============================');
    return lines.join('\n');
}

/**
 * Register workspace handlers.
 */
export function registerWorkspaceHandlers(connection: Connection, services: Services): void {
    attachWorkspaceNotifications(connection, services);

    connection.onRequest(QUILL_METHODS.WORKSPACE_LOAD, async (params: unknown) => {
        log.info('Workspace load requested');
        return handleWorkspaceLoad(services, params);
    });

    connection.onRequest(QUILL_METHODS.PROJECT, async (params: unknown) => handleProject(services, params));

    connection.onRequest(QUILL_METHODS.COMPILE, async (params: unknown) => handleCompile(services, params));

    connection.onDidChangeWatchedFiles((params) => {
        handleWatchedFiles(services, params).catch((err: unknown) => {
            log.error('Watched file handling failed', { error: errorMessage(err) });
        });
    });

    connection.onExecuteCommand(async (params) => {
        if (params.command !== SHOW_DIAGNOSTICS_COMMAND) {
            return null;
        }
        try {
            return formatHealth(await services.analyzer.getHealth());
        } catch (err) {
            log.error('Health check failed', { error: errorMessage(err) });
            return formatHealth(undefined);
        }
    });
}
