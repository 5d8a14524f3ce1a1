/**
 * Project Registry Tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import type { ProjectInfo } from '@quill-lsp/analyzer-bridge';
import { ProjectRegistry, summarize } from '../../services/project-registry.js';
import { scriptOptionsFor } from '../helpers/fake-analyzer.js';

function appProject(): ProjectInfo {
    return {
        projectPath: '/workspace/App/App.qproj',
        options: {
            projectPath: '/workspace/App/App.qproj',
            sourceFiles: ['/workspace/App/Types.fs', '/workspace/App/Program.fs'],
            references: ['/lib/Core.dll'],
            flags: ['--optimize+'],
            isScript: false,
        },
        files: ['/workspace/App/Types.fs', '/workspace/App/./Program.fs'],
        references: ['/lib/Core.dll'],
    };
}

describe('ProjectRegistry', () => {
    it('assigns project options to every member file', () => {
        const registry = new ProjectRegistry();

        const project = registry.markLoaded(appProject());

        assert.equal(project.status, 'loaded');
        assert.deepEqual(project.files, ['/workspace/App/Types.fs', '/workspace/App/Program.fs']);
        assert.equal(registry.getOptions('file:///workspace/App/Program.fs')?.projectPath, '/workspace/App/App.qproj');
        assert.deepEqual(registry.projectsContaining('/workspace/App/Types.fs').map(p => p.path), ['/workspace/App/App.qproj']);
        assert.deepEqual(registry.projectsContaining('/workspace/Other.fs'), []);
    });

    it('tracks loading and failed projects apart from loaded ones', () => {
        const registry = new ProjectRegistry();
        registry.markLoading('/workspace/Lib/Lib.qproj');
        registry.markFailed('/workspace/Bad/Bad.qproj', {
            kind: 'projectNotRestored',
            projectPath: '/workspace/Bad/Bad.qproj',
            message: 'Restore packages first',
        });

        assert.equal(registry.get('/workspace/Lib/Lib.qproj')?.status, 'loading');
        assert.equal(registry.get('/workspace/Bad/Bad.qproj')?.error?.kind, 'projectNotRestored');
        assert.equal(registry.all().length, 2);
        assert.deepEqual(registry.loaded(), []);
    });

    it('stores script options under the normalized file', () => {
        const registry = new ProjectRegistry();

        registry.setOptions('file:///workspace/A.fsx', scriptOptionsFor('/workspace/A.fsx'));

        assert.equal(registry.getOptions('/workspace/A.fsx')?.isScript, true);
    });

    it('drops the options of files a reloaded project no longer compiles', () => {
        const registry = new ProjectRegistry();
        registry.markLoaded(appProject());
        registry.markLoading('/workspace/App/App.qproj');

        registry.markLoaded({ ...appProject(), files: ['/workspace/App/Types.fs'] });

        assert.equal(registry.getOptions('/workspace/App/Program.fs'), undefined);
        assert.equal(registry.getOptions('/workspace/App/Types.fs')?.projectPath, '/workspace/App/App.qproj');
    });

    it('forgets script options but not project options', () => {
        const registry = new ProjectRegistry();
        registry.markLoaded(appProject());
        registry.setOptions('/workspace/A.fsx', scriptOptionsFor('/workspace/A.fsx'));

        registry.forgetScript('file:///workspace/A.fsx');
        registry.forgetScript('/workspace/App/Types.fs');

        assert.equal(registry.getOptions('/workspace/A.fsx'), undefined);
        assert.equal(registry.getOptions('/workspace/App/Types.fs')?.projectPath, '/workspace/App/App.qproj');
    });

    it('summarizes without the options', () => {
        const registry = new ProjectRegistry();
        const project = registry.markLoaded({ ...appProject(), outputFile: '/workspace/App/bin/App.dll' });

        assert.deepEqual(summarize(project), {
            projectPath: '/workspace/App/App.qproj',
            files: ['/workspace/App/Types.fs', '/workspace/App/Program.fs'],
            references: ['/lib/Core.dll'],
            outputFile: '/workspace/App/bin/App.dll',
        });
    });
});
