/**
 * Analysis Cache
 *
 * Most recent completed analysis per file, tagged with the document version
 * it was computed for, plus the navigation declaration index.
 */

import type { AnalysisCheck, AnalyzerDiagnostic, NavigationDeclaration } from '@quill-lsp/analyzer-bridge';
import type { DocumentStore } from './document-store.js';
import { normalizePath } from '../utils/paths.js';

export interface AnalysisResult {
    readonly file: string;
    readonly version: number;
    readonly check: AnalysisCheck;
    readonly diagnostics: readonly AnalyzerDiagnostic[];
    readonly checkedAt: Date;
}

export type CacheLookup =
    | { status: 'fresh'; entry: AnalysisResult }
    | { status: 'stale'; entry: AnalysisResult; currentVersion: number }
    | { status: 'missing' };

export interface FileDeclarations {
    file: string;
    declarations: readonly NavigationDeclaration[];
}

export class AnalysisCache {
    private results = new Map<string, AnalysisResult>();
    private declarations = new Map<string, readonly NavigationDeclaration[]>();

    constructor(private readonly documents: DocumentStore) {}

    /**
     * Store a result, superseding whatever was cached for the file.
     */
    put(file: string, version: number, check: AnalysisCheck): AnalysisResult {
        const key = normalizePath(file);
        const entry: AnalysisResult = Object.freeze({
            file: key,
            version,
            check,
            diagnostics: Object.freeze([...check.diagnostics]),
            checkedAt: new Date(),
        });
        this.results.set(key, entry);
        return entry;
    }

    /**
     * Look up a result and compare its version with the document's.
     *
     * A file whose document has no version (read from disk, never edited)
     * treats any cached result as fresh.
     */
    getIfFresh(file: string): CacheLookup {
        const key = normalizePath(file);
        const entry = this.results.get(key);
        if (!entry) {
            return { status: 'missing' };
        }
        const currentVersion = this.documents.getVersion(key);
        if (currentVersion === undefined || currentVersion === entry.version) {
            return { status: 'fresh', entry };
        }
        return { status: 'stale', entry, currentVersion };
    }

    /** Cached result regardless of staleness. */
    getMostRecent(file: string): AnalysisResult | undefined {
        return this.results.get(normalizePath(file));
    }

    getCheckedVersion(file: string): number | undefined {
        return this.getMostRecent(file)?.version;
    }

    setDeclarations(file: string, declarations: readonly NavigationDeclaration[]): void {
        this.declarations.set(normalizePath(file), Object.freeze([...declarations]));
    }

    /** Drop the result and declarations of a file. */
    remove(file: string): void {
        const key = normalizePath(file);
        this.results.delete(key);
        this.declarations.delete(key);
    }

    getDeclarations(file: string): readonly NavigationDeclaration[] | undefined {
        return this.declarations.get(normalizePath(file));
    }

    allDeclarations(): FileDeclarations[] {
        return [...this.declarations].map(([file, declarations]) => ({ file, declarations }));
    }
}
