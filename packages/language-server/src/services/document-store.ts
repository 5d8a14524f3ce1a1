/**
 * Document Store
 *
 * Per-file text and version state. Entries are replaced whole and frozen,
 * so a reader sees either the previous or the next complete entry.
 * The store never triggers analysis.
 */

import * as fs from 'fs/promises';
import { Logger, errorMessage } from '@quill-lsp/core';
import { normalizePath, splitLines } from '../utils/paths.js';

/**
 * Snapshot of one file's content.
 */
export interface FileState {
    readonly path: string;
    readonly lines: readonly string[];
    /** When the entry was last replaced */
    readonly touched: Date;
    /** Editor version; absent for files read from disk and never edited */
    readonly version: number | undefined;
}

export type ReadFile = (filePath: string) => Promise<string>;

/**
 * Document store keyed by normalized absolute path.
 */
export class DocumentStore {
    private files = new Map<string, FileState>();
    private readonly log = new Logger('DocumentStore');

    constructor(private readonly readFile: ReadFile = (filePath) => fs.readFile(filePath, 'utf8')) {}

    /**
     * Replace the file's content and version unconditionally.
     */
    setContent(file: string, lines: readonly string[], version?: number): FileState {
        const key = normalizePath(file);
        const entry: FileState = Object.freeze({
            path: key,
            lines: Object.freeze([...lines]),
            touched: new Date(),
            version,
        });
        this.files.set(key, entry);
        return entry;
    }

    get(file: string): FileState | undefined {
        return this.files.get(normalizePath(file));
    }

    has(file: string): boolean {
        return this.files.has(normalizePath(file));
    }

    getContent(file: string): readonly string[] | undefined {
        return this.get(file)?.lines;
    }

    getVersion(file: string): number | undefined {
        return this.get(file)?.version;
    }

    /** Full text, lines joined with LF. */
    getText(file: string): string | undefined {
        return this.get(file)?.lines.join('\n');
    }

    getLine(file: string, line: number): string | undefined {
        return this.get(file)?.lines[line];
    }

    /** Forget a file that no longer exists. */
    delete(file: string): boolean {
        return this.files.delete(normalizePath(file));
    }

    entries(): IterableIterator<FileState> {
        return this.files.values();
    }

    get size(): number {
        return this.files.size;
    }

    /**
     * Read a file from disk into the store, unless an entry already exists.
     *
     * @returns The resident entry, or undefined when the file cannot be read.
     */
    async loadFromDisk(file: string): Promise<FileState | undefined> {
        const key = normalizePath(file);
        const resident = this.files.get(key);
        if (resident) {
            return resident;
        }

        let text: string;
        try {
            text = await this.readFile(key);
        } catch (err) {
            this.log.debug('Could not read file', { file: key, error: errorMessage(err) });
            return undefined;
        }

        // An editor may have opened the file while it was being read
        return this.files.get(key) ?? this.setContent(key, splitLines(text));
    }
}
