/**
 * Completion side caches.
 *
 * Each completion request replaces the declarations, help text and
 * namespace inserts of the previous one. Writes carry the generation they
 * were computed for and are dropped once a newer completion has replaced it.
 */

import type { CompletionEntry, SourcePosition } from '@quill-lsp/analyzer-bridge';

/**
 * Where an `open` for an entry's namespace would be inserted.
 */
export interface NamespaceInsert {
    namespace: string;
    position: SourcePosition;
}

export interface CompletionContext {
    file: string;
    position: SourcePosition;
    generation: number;
}

export class CompletionCache {
    private generation = 0;
    private context: CompletionContext | undefined;
    private declarations = new Map<string, CompletionEntry>();
    private helpText = new Map<string, string>();
    private namespaceInserts = new Map<string, NamespaceInsert>();

    /**
     * Start a new generation holding `entries`.
     *
     * @returns The new generation number
     */
    replace(entries: readonly CompletionEntry[], file: string, position: SourcePosition): number {
        this.generation++;
        this.declarations.clear();
        this.helpText.clear();
        this.namespaceInserts.clear();

        for (const entry of entries) {
            this.declarations.set(entry.name, entry);
            if (entry.description !== undefined) {
                this.helpText.set(entry.name, entry.description);
            }
        }
        this.context = { file, position, generation: this.generation };
        return this.generation;
    }

    get currentGeneration(): number {
        return this.generation;
    }

    /** File and position of the completion that filled the cache. */
    get currentContext(): CompletionContext | undefined {
        return this.context;
    }

    getDeclaration(name: string): CompletionEntry | undefined {
        return this.declarations.get(name);
    }

    getHelpText(name: string): string | undefined {
        return this.helpText.get(name);
    }

    setHelpText(name: string, text: string, generation: number): boolean {
        if (generation !== this.generation) {
            return false;
        }
        this.helpText.set(name, text);
        return true;
    }

    getNamespaceInsert(name: string): NamespaceInsert | undefined {
        return this.namespaceInserts.get(name);
    }

    setNamespaceInsert(name: string, insert: NamespaceInsert, generation: number): boolean {
        if (generation !== this.generation) {
            return false;
        }
        this.namespaceInserts.set(name, insert);
        return true;
    }

    get size(): number {
        return this.declarations.size;
    }
}
