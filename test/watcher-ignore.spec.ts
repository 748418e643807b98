// test/watcher-ignore.spec.ts
import path from 'path';
import {describe, expect, it} from 'vitest';
import {BuildActivity, createIgnoreMatcher, declaredOutputs} from '../src/core/watcher';
import {Mkfile} from '../src/core/mkfile';

describe('createIgnoreMatcher', () => {
    const projectDir = path.resolve('/work/project');
    const statePath = path.join(projectDir, '.mkstate.json');
    const ignored = createIgnoreMatcher(projectDir, statePath, ['build/**', '*.log']);

    it('ignores the state file every run rewrites', () => {
        expect(ignored(statePath)).toBe(true);
    });

    it('ignores version control and dependency folders', () => {
        expect(ignored(path.join(projectDir, '.git/HEAD'))).toBe(true);
        expect(ignored(path.join(projectDir, 'node_modules/x/index.js'))).toBe(true);
    });

    it('applies configured patterns to project-relative paths', () => {
        expect(ignored(path.join(projectDir, 'build/out.o'))).toBe(true);
        expect(ignored(path.join(projectDir, 'debug.log'))).toBe(true);
        expect(ignored(path.join(projectDir, 'src/debug.log'))).toBe(false);
    });

    it('watches ordinary sources and the project directory itself', () => {
        expect(ignored(path.join(projectDir, 'src/main.c'))).toBe(false);
        expect(ignored(projectDir)).toBe(false);
    });

    it('ignores anything outside the project directory', () => {
        expect(ignored(path.resolve('/work/other/file.txt'))).toBe(true);
    });
});

describe('createIgnoreMatcher with declared outputs', () => {
    const projectDir = path.resolve('/work/project');
    const statePath = path.join(projectDir, '.mkstate.json');
    const ignored = createIgnoreMatcher(projectDir, statePath, [], [
        {kind: 'shallow', path: 'build/out.txt'},
        {kind: 'deep', path: 'site'},
        {kind: 'shallow', path: './stamp.txt'},
        {kind: 'deep', path: '.'},
    ]);

    it('ignores a shallow output by its exact path', () => {
        expect(ignored(path.join(projectDir, 'build/out.txt'))).toBe(true);
        expect(ignored(path.join(projectDir, 'stamp.txt'))).toBe(true);
        expect(ignored(path.join(projectDir, 'build/other.txt'))).toBe(false);
    });

    it('ignores a deep output and everything below it', () => {
        expect(ignored(path.join(projectDir, 'site'))).toBe(true);
        expect(ignored(path.join(projectDir, 'site/assets/app.js'))).toBe(true);
        expect(ignored(path.join(projectDir, 'sitemap.xml'))).toBe(false);
    });

    it('keeps watching sources when the project directory is an output', () => {
        expect(ignored(path.join(projectDir, 'src/main.c'))).toBe(false);
    });
});

describe('declaredOutputs', () => {
    it('lists the concrete targets of the rule headers', () => {
        const mkfile = Mkfile.parse(['$all: out.txt', 'out.txt: in.txt', '  cp in.txt out.txt', '^dist:', '  true'].join('\n'));

        expect(declaredOutputs(mkfile)).toEqual([
            {kind: 'shallow', path: 'out.txt'},
            {kind: 'deep', path: 'dist'},
        ]);
    });
});

describe('BuildActivity', () => {
    it('covers nothing before the first build', () => {
        const activity = new BuildActivity();

        expect(activity.covers(0)).toBe(false);
        expect(activity.covers(undefined)).toBe(false);
    });

    it('covers every change while a build runs', () => {
        const activity = new BuildActivity();
        activity.begin();

        expect(activity.isRunning).toBe(true);
        expect(activity.covers(Number.MAX_SAFE_INTEGER)).toBe(true);
        expect(activity.covers(undefined)).toBe(true);
    });

    it('covers files a finished build wrote but not later edits', () => {
        const activity = new BuildActivity();
        activity.begin();
        activity.end(5_000);

        expect(activity.isRunning).toBe(false);
        expect(activity.covers(4_999.5)).toBe(true);
        expect(activity.covers(5_000)).toBe(true);
        expect(activity.covers(5_001)).toBe(false);
        expect(activity.covers(undefined)).toBe(false);
    });
});
