/**
 * File identity helpers.
 *
 * Every map in the server is keyed by an absolute, normalized file system
 * path; editor URIs are converted at the boundary.
 */

import * as path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';

/**
 * Normalize a path or `file://` URI to an absolute file system path.
 */
export function normalizePath(fileOrUri: string): string {
    const fsPath = fileOrUri.startsWith('file://') ? fileURLToPath(fileOrUri) : fileOrUri;
    return path.resolve(fsPath);
}

export function toFileUri(filePath: string): string {
    return pathToFileURL(filePath).href;
}

/**
 * Whether the file is analyzed as a standalone script.
 */
export function isScriptFile(filePath: string, scriptExtensions: readonly string[]): boolean {
    const ext = path.extname(filePath).toLowerCase();
    return scriptExtensions.some(candidate => candidate.toLowerCase() === ext);
}

/**
 * Split text into lines on LF or CRLF.
 */
export function splitLines(text: string): string[] {
    return text.split(/\r?\n/);
}
