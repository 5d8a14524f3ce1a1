/**
 * Configuration constants for the analyzer bridge.
 */

/**
 * Default timeout for analyzer requests in milliseconds.
 *
 * @remarks
 * Requests that take longer than this are rejected with a BridgeError.
 * Analyses, and requests the caller can cancel through a signal, are not timed.
 * Can be overridden via {@link AnalyzerBridgeOptions.timeout}.
 */
export const BRIDGE_TIMEOUT_DEFAULT = 30000;

/**
 * Delay after spawning before the subprocess is considered ready (ms).
 */
export const PROCESS_STARTUP_DELAY = 100;

/**
 * Time given to the subprocess to exit after SIGTERM (ms).
 */
export const GRACEFUL_SHUTDOWN_DELAY = 200;

/**
 * Default analyzer executable, resolved through PATH.
 */
export const ANALYZER_COMMAND_DEFAULT = 'quill-analyzer';
