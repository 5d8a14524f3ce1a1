/**
 * Shared utilities for the Quill LSP packages: error hierarchy and logging.
 */

export {
    LSPError,
    AnalyzerError,
    BridgeError,
    CancellationError,
    isCancellation,
    errorMessage,
} from './errors.js';
export type { ErrorLayer } from './errors.js';
export { Logger, LogLevel, parseLogLevel, isLogLevelName } from './logging.js';
export type { LogLevelName } from './logging.js';
