/**
 * Project Registry
 *
 * Loaded projects and the analysis options assigned to each file.
 * Options are resolved once per project and only recomputed when the
 * project is explicitly reloaded.
 */

import type { AnalysisOptions, ProjectError, ProjectInfo } from '@quill-lsp/analyzer-bridge';
import type { ProjectSummary } from './notification-bus.js';
import { normalizePath } from '../utils/paths.js';

export type ProjectStatus = 'loading' | 'loaded' | 'failed';

export interface Project {
    readonly path: string;
    readonly status: ProjectStatus;
    readonly options?: AnalysisOptions;
    readonly files: readonly string[];
    readonly references: readonly string[];
    readonly outputFile?: string;
    readonly error?: ProjectError;
}

function normalizeOptions(options: AnalysisOptions): AnalysisOptions {
    return {
        ...options,
        projectPath: normalizePath(options.projectPath),
        sourceFiles: options.sourceFiles.map(normalizePath),
    };
}

export function summarize(project: Project): ProjectSummary {
    const summary: ProjectSummary = {
        projectPath: project.path,
        files: [...project.files],
        references: [...project.references],
    };
    if (project.outputFile !== undefined) {
        summary.outputFile = project.outputFile;
    }
    return summary;
}

export class ProjectRegistry {
    private projects = new Map<string, Project>();
    private fileOptions = new Map<string, AnalysisOptions>();

    get(projectPath: string): Project | undefined {
        return this.projects.get(normalizePath(projectPath));
    }

    all(): Project[] {
        return [...this.projects.values()];
    }

    loaded(): Project[] {
        return this.all().filter(p => p.status === 'loaded');
    }

    markLoading(projectPath: string): void {
        const key = normalizePath(projectPath);
        const previous = this.projects.get(key);
        this.projects.set(key, {
            path: key,
            status: 'loading',
            files: previous?.files ?? [],
            references: previous?.references ?? [],
        });
    }

    markFailed(projectPath: string, error: ProjectError): Project {
        const key = normalizePath(projectPath);
        const project: Project = { path: key, status: 'failed', files: [], references: [], error };
        this.projects.set(key, project);
        return project;
    }

    /**
     * Record a loaded project and assign its options to every member file.
     * On a reload, files the project no longer compiles lose its options.
     */
    markLoaded(info: ProjectInfo): Project {
        const key = normalizePath(info.projectPath);
        const options = normalizeOptions(info.options);
        const files = info.files.map(normalizePath);
        for (const file of this.projects.get(key)?.files ?? []) {
            if (!files.includes(file) && this.fileOptions.get(file)?.projectPath === key) {
                this.fileOptions.delete(file);
            }
        }
        const project: Project = info.outputFile === undefined
            ? { path: key, status: 'loaded', options, files, references: [...info.references] }
            : { path: key, status: 'loaded', options, files, references: [...info.references], outputFile: info.outputFile };
        this.projects.set(key, project);
        for (const file of files) {
            this.fileOptions.set(file, options);
        }
        return project;
    }

    getOptions(file: string): AnalysisOptions | undefined {
        return this.fileOptions.get(normalizePath(file));
    }

    setOptions(file: string, options: AnalysisOptions): AnalysisOptions {
        const normalized = normalizeOptions(options);
        this.fileOptions.set(normalizePath(file), normalized);
        return normalized;
    }

    /** Drop the options synthesized for a script. Project members keep theirs. */
    forgetScript(file: string): void {
        const key = normalizePath(file);
        if (this.fileOptions.get(key)?.isScript) {
            this.fileOptions.delete(key);
        }
    }

    /** Loaded projects that compile `file`. */
    projectsContaining(file: string): Project[] {
        const key = normalizePath(file);
        return this.loaded().filter(p => p.files.includes(key));
    }
}
