/**
 * Shared types for the Quill LSP server.
 */

import { isLogLevelName, type LogLevelName } from '@quill-lsp/core';
import {
    ANALYZER_RATE_WINDOW_DEFAULT,
    DEFAULT_MAX_PROBLEMS,
    DIAGNOSTIC_DELAY_DEFAULT,
    SCRIPT_EXTENSIONS_DEFAULT,
} from '../constants/index.js';

/**
 * LSP server configuration settings, read from the `quill` section.
 */
export interface ServerSettings {
    /** Analyzer executable (e.g. 'quill-analyzer', '/opt/quill/bin/analyzer') */
    analyzerPath: string;
    /** Extra arguments passed to the analyzer */
    analyzerArgs: string[];
    /** Requests the analyzer accepts per `analyzerRateWindow`; 0 means no limit */
    analyzerMaxRequests: number;
    /** Window (seconds) for `analyzerMaxRequests` */
    analyzerRateWindow: number;
    /** Maximum number of problems to report per document */
    maxNumberOfProblems: number;
    /** Delay in milliseconds before re-parsing after a document change */
    diagnosticDelay: number;
    linter: boolean;
    unusedOpensAnalyzer: boolean;
    unusedDeclarationsAnalyzer: boolean;
    simplifyNameAnalyzer: boolean;
    /** Offer language keywords in completion lists */
    keywordsAutocomplete: boolean;
    /** Offer symbols from namespaces that are not opened yet */
    externalAutocomplete: boolean;
    /** Analyze scripts against the SDK rather than the desktop framework */
    useSdkScripts: boolean;
    scriptExtensions: string[];
    /** Pause (ms) between announcing a workspace load and loading projects */
    workspaceLoadDelay: number;
    /** Upper bound (ms) on waits for an up-to-date analysis; 0 waits indefinitely */
    latestResultTimeout: number;
    logLevel: LogLevelName;
}

/**
 * Default settings.
 */
export const defaultSettings: ServerSettings = {
    analyzerPath: 'quill-analyzer',
    analyzerArgs: [],
    analyzerMaxRequests: 0,
    analyzerRateWindow: ANALYZER_RATE_WINDOW_DEFAULT,
    maxNumberOfProblems: DEFAULT_MAX_PROBLEMS,
    diagnosticDelay: DIAGNOSTIC_DELAY_DEFAULT,
    linter: true,
    unusedOpensAnalyzer: true,
    unusedDeclarationsAnalyzer: true,
    simplifyNameAnalyzer: true,
    keywordsAutocomplete: true,
    externalAutocomplete: false,
    useSdkScripts: true,
    scriptExtensions: [...SCRIPT_EXTENSIONS_DEFAULT],
    workspaceLoadDelay: 0,
    latestResultTimeout: 0,
    logLevel: 'warn',
};

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickBoolean(raw: Record<string, unknown>, key: keyof ServerSettings, fallback: boolean): boolean {
    const value = raw[key];
    return typeof value === 'boolean' ? value : fallback;
}

function pickNumber(raw: Record<string, unknown>, key: keyof ServerSettings, fallback: number): number {
    const value = raw[key];
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function pickStrings(raw: Record<string, unknown>, key: keyof ServerSettings, fallback: string[]): string[] {
    const value = raw[key];
    return Array.isArray(value) && value.every((v): v is string => typeof v === 'string') ? [...value] : fallback;
}

/**
 * Overlay client-supplied settings on a base, ignoring values of the wrong type.
 */
export function mergeSettings(base: ServerSettings, raw: unknown): ServerSettings {
    if (!isRecord(raw)) {
        return base;
    }
    const analyzerPath = raw['analyzerPath'];
    const logLevel = raw['logLevel'];
    return {
        analyzerPath: typeof analyzerPath === 'string' && analyzerPath.length > 0 ? analyzerPath : base.analyzerPath,
        analyzerArgs: pickStrings(raw, 'analyzerArgs', base.analyzerArgs),
        analyzerMaxRequests: pickNumber(raw, 'analyzerMaxRequests', base.analyzerMaxRequests),
        analyzerRateWindow: pickNumber(raw, 'analyzerRateWindow', base.analyzerRateWindow),
        maxNumberOfProblems: pickNumber(raw, 'maxNumberOfProblems', base.maxNumberOfProblems),
        diagnosticDelay: pickNumber(raw, 'diagnosticDelay', base.diagnosticDelay),
        linter: pickBoolean(raw, 'linter', base.linter),
        unusedOpensAnalyzer: pickBoolean(raw, 'unusedOpensAnalyzer', base.unusedOpensAnalyzer),
        unusedDeclarationsAnalyzer: pickBoolean(raw, 'unusedDeclarationsAnalyzer', base.unusedDeclarationsAnalyzer),
        simplifyNameAnalyzer: pickBoolean(raw, 'simplifyNameAnalyzer', base.simplifyNameAnalyzer),
        keywordsAutocomplete: pickBoolean(raw, 'keywordsAutocomplete', base.keywordsAutocomplete),
        externalAutocomplete: pickBoolean(raw, 'externalAutocomplete', base.externalAutocomplete),
        useSdkScripts: pickBoolean(raw, 'useSdkScripts', base.useSdkScripts),
        scriptExtensions: pickStrings(raw, 'scriptExtensions', base.scriptExtensions),
        workspaceLoadDelay: pickNumber(raw, 'workspaceLoadDelay', base.workspaceLoadDelay),
        latestResultTimeout: pickNumber(raw, 'latestResultTimeout', base.latestResultTimeout),
        logLevel: typeof logLevel === 'string' && isLogLevelName(logLevel) ? logLevel : base.logLevel,
    };
}
