/**
 * Constants for the Quill LSP Server
 */

/**
 * Default delay (ms) before a changed document is re-parsed
 */
export const DIAGNOSTIC_DELAY_DEFAULT = 250;

/**
 * Default max number of problems (diagnostics) per document
 */
export const DEFAULT_MAX_PROBLEMS = 100;

/**
 * Default window (seconds) over which `analyzerMaxRequests` is counted
 */
export const ANALYZER_RATE_WINDOW_DEFAULT = 10;

/**
 * File extensions analyzed as standalone scripts
 */
export const SCRIPT_EXTENSIONS_DEFAULT: readonly string[] = ['.fsx', '.fsscript'];

/**
 * Answer for position queries when no check of the file exists yet
 */
export const NO_RECENT_CHECK_MESSAGE = 'Cached typecheck results not yet available';

/**
 * Answer for compile requests naming an unloaded project
 */
export const PROJECT_NOT_FOUND_MESSAGE = 'Project not found';

/**
 * Number of recent analyzer stderr errors kept for the health report
 */
export const MAX_RECENT_ERRORS = 5;

/**
 * Files the client is asked to watch: sources, scripts and project files
 */
export const WATCHED_FILES_GLOB = '**/*.{fs,fsi,fsx,fsscript,qproj}';

/**
 * Custom notification and request names
 */
export const QUILL_METHODS = {
    FILE_PARSED: 'quill/fileParsed',
    NOTIFY_WORKSPACE: 'quill/notifyWorkspace',
    NOTIFY_CANCEL: 'quill/notifyCancel',
    WORKSPACE_LOAD: 'quill/workspaceLoad',
    PROJECT: 'quill/project',
    COMPILE: 'quill/compile',
} as const;

/**
 * Command reporting server and analyzer health
 */
export const SHOW_DIAGNOSTICS_COMMAND = 'quill.lsp.showDiagnostics';

/**
 * LSP-related limits
 */
export const LSP = {
    /**
     * Maximum number of completions to return
     */
    MAX_COMPLETION_ITEMS: 500,

    /**
     * Maximum number of workspace symbols to return
     */
    MAX_WORKSPACE_SYMBOLS: 1000,
} as const;
