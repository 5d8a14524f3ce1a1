/**
 * Error types for Quill LSP packages.
 *
 * Shared utilities for error handling across the LSP stack.
 */

/**
 * Valid error layers in the LSP stack.
 */
export type ErrorLayer = 'server' | 'bridge' | 'analyzer';

/**
 * Base error class for all LSP-related errors.
 *
 * Tracks which layer the error occurred at and supports error chaining
 * via the native Error.cause property.
 */
export class LSPError extends Error {
    /**
     * The layer where this error occurred.
     */
    public readonly layer: ErrorLayer;

    /**
     * The underlying error that caused this error (if any).
     */
    public override readonly cause?: Error;

    /**
     * @param message - Human-readable error message
     * @param layer - The layer where this error occurred
     * @param cause - The underlying error that caused this error
     */
    constructor(message: string, layer: ErrorLayer, cause?: Error) {
        super(message);

        this.name = 'LSPError';
        this.layer = layer;

        // Only set when provided, keeps exactOptionalPropertyTypes happy
        if (cause) {
            this.cause = cause;
        }

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    public override toString(): string {
        return `${this.name} [${this.layer}]: ${this.message}`;
    }

    /**
     * Get the full error chain as a readable string.
     */
    get chain(): string {
        return this.chainErrors.map(err => err.message).join(' -> ');
    }

    /**
     * Get all errors in the chain as an array.
     */
    get chainErrors(): Error[] {
        const errors: Error[] = [this];

        let current = this.cause;
        while (current) {
            errors.push(current);
            current = current.cause instanceof Error ? current.cause : undefined;
        }

        return errors;
    }
}

/**
 * Error reported by the external analyzer process.
 *
 * Analyzer errors typically involve:
 * - project or script options that could not be resolved
 * - compiler failures unrelated to the code being edited
 * - malformed responses from the analyzer
 *
 * @example
 * ```typescript
 * try {
 *   const check = await analyzer.parseAndCheck(file, version, text, options, signal);
 * } catch (cause) {
 *   throw new AnalyzerError('analyzer rejected parseAndCheck', cause);
 * }
 * ```
 */
export class AnalyzerError extends LSPError {
    constructor(message: string, cause?: Error) {
        super(message, 'analyzer', cause);
        this.name = 'AnalyzerError';
    }
}

/**
 * Error that occurs in the bridge layer.
 *
 * Bridge errors typically involve:
 * - communication timeouts with the analyzer subprocess
 * - JSON parsing/serialization failures
 * - stdin/stdout communication issues
 */
export class BridgeError extends LSPError {
    constructor(message: string, cause?: Error) {
        super(message, 'bridge', cause);
        this.name = 'BridgeError';
    }
}

/**
 * Raised when an operation observes that its cancellation signal fired.
 *
 * Cancellation is routine (the user kept typing), so callers convert this
 * into an informational outcome instead of reporting it as a failure.
 */
export class CancellationError extends LSPError {
    constructor(message = 'Operation cancelled', cause?: Error) {
        super(message, 'server', cause);
        this.name = 'CancellationError';
    }
}

/**
 * Type guard for cancellation, including a bare AbortSignal reason.
 */
export function isCancellation(err: unknown): boolean {
    if (err instanceof CancellationError) {
        return true;
    }
    return err instanceof Error && err.name === 'AbortError';
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
