// test/make.spec.ts
import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {make} from '../src/core/make';
import {Mkfile} from '../src/core/mkfile';
import {UpdateState} from '../src/core/update-state';
import {
    CommandFailedError,
    CycleDetectedError,
    MissingRuleError,
    StateAccessError,
    TargetNotProducedError,
} from '../src/core/errors';
import {parseTarget} from '../src/schema';
import {RecordingRunner, makeTempDir, quietLogger, removeDir, setMtime, writeFile} from './helpers';

const HOUR_FROM_NOW = () => Math.floor(Date.now() / 1000) + 3600;

describe('make', () => {
    let dir: string;
    let state: UpdateState;
    let runner: RecordingRunner;

    beforeEach(() => {
        dir = makeTempDir();
        state = new UpdateState(dir);
        runner = new RecordingRunner();
    });

    afterEach(() => {
        removeDir(dir);
    });

    function build(rules: string[], token: string): Promise<boolean> {
        const mkfile = Mkfile.parse(rules.join('\n'));
        return make(mkfile, parseTarget(token), state, {runner, logger: quietLogger});
    }

    function read(rel: string): string {
        return fs.readFileSync(path.join(dir, rel), 'utf8');
    }

    describe('file produced from a source', () => {
        const rules = ['out.txt: in.txt', '    echo hi > out.txt'];

        beforeEach(() => {
            writeFile(dir, 'in.txt', 'source');
        });

        it('runs the command when the output does not exist', async () => {
            await expect(build(rules, 'out.txt')).resolves.toBe(true);

            expect(runner.commands).toEqual(['echo hi > out.txt']);
            expect(read('out.txt')).toBe('hi\n');
            expect(state.lastRecorded({kind: 'shallow', path: 'in.txt'})).toBeDefined();
            expect(state.lastRecorded({kind: 'shallow', path: 'out.txt'})).toBeDefined();
        });

        it('does nothing on an immediate re-run', async () => {
            await build(rules, 'out.txt');

            await expect(build(rules, 'out.txt')).resolves.toBe(false);
            expect(runner.commands).toEqual(['echo hi > out.txt']);
        });

        it('runs again once the source is modified after the last record', async () => {
            await build(rules, 'out.txt');
            setMtime(dir, 'in.txt', HOUR_FROM_NOW());

            await expect(build(rules, 'out.txt')).resolves.toBe(true);
            expect(runner.commands).toEqual(['echo hi > out.txt', 'echo hi > out.txt']);
        });

        it('runs again when the output was deleted', async () => {
            await build(rules, 'out.txt');
            fs.rmSync(path.join(dir, 'out.txt'));

            await expect(build(rules, 'out.txt')).resolves.toBe(true);
            expect(runner.commands).toHaveLength(2);
        });

        it('re-records an up-to-date output so older external edits are absorbed', async () => {
            await build(rules, 'out.txt');
            setMtime(dir, 'out.txt', 1_000);

            await expect(build(rules, 'out.txt')).resolves.toBe(false);
            expect(state.lastRecorded({kind: 'shallow', path: 'out.txt'})).toBe(1_000_000_000_000n);
        });
    });

    describe('targets without a rule', () => {
        it('reports a plain file as changed once, then unchanged', async () => {
            writeFile(dir, 'data.csv');

            await expect(build([], 'data.csv')).resolves.toBe(true);
            await expect(build([], 'data.csv')).resolves.toBe(false);
            await expect(build([], 'data.csv')).resolves.toBe(false);
            expect(runner.commands).toEqual([]);
        });

        it('fails with a missing rule error for an undeclared virtual target', async () => {
            await expect(build(['$all: a'], '$clean')).rejects.toBeInstanceOf(MissingRuleError);
        });

        it('fails with a missing rule error when one is reached transitively', async () => {
            await expect(build(['$all: $clean'], '$all')).rejects.toThrow(
                "No rule to make virtual target 'clean'",
            );
        });

        it('fails with a state access error for a file that does not exist', async () => {
            await expect(build([], 'nowhere.txt')).rejects.toBeInstanceOf(StateAccessError);
        });
    });

    describe('virtual targets', () => {
        it('always rebuilds a virtual target with no dependencies', async () => {
            const rules = ['$stamp:', '  echo x >> stamps.txt'];

            await expect(build(rules, '$stamp')).resolves.toBe(true);
            await expect(build(rules, '$stamp')).resolves.toBe(true);

            expect(read('stamps.txt')).toBe('x\nx\n');
            expect(state.size).toBe(0);
        });

        it('runs its commands only when a dependency changed', async () => {
            writeFile(dir, 'a.txt');
            const rules = ['$all: a.txt', '  echo built >> log.txt'];

            await expect(build(rules, '$all')).resolves.toBe(true);
            await expect(build(rules, '$all')).resolves.toBe(false);
            setMtime(dir, 'a.txt', HOUR_FROM_NOW());
            await expect(build(rules, '$all')).resolves.toBe(true);

            expect(read('log.txt')).toBe('built\nbuilt\n');
        });

        it('propagates a change through a chain of rules', async () => {
            writeFile(dir, 'src.txt', 'v1');
            const rules = [
                '$all: final.txt',
                '  echo done >> log.txt',
                'final.txt: mid.txt',
                '  cp mid.txt final.txt',
                'mid.txt: src.txt',
                '  cp src.txt mid.txt',
            ];

            await build(rules, '$all');
            runner.commands.length = 0;

            writeFile(dir, 'src.txt', 'v2');
            setMtime(dir, 'src.txt', HOUR_FROM_NOW());

            await expect(build(rules, '$all')).resolves.toBe(true);
            expect(runner.commands).toEqual([
                'cp src.txt mid.txt',
                'cp mid.txt final.txt',
                'echo done >> log.txt',
            ]);
            expect(read('final.txt')).toBe('v2');
        });
    });

    describe('deep targets', () => {
        it('builds a directory and then considers it up to date', async () => {
            writeFile(dir, 'page.md', '# hi');
            const rules = ['^site: page.md', '  mkdir -p site && cp page.md site/index.html'];

            await expect(build(rules, '^site')).resolves.toBe(true);
            await expect(build(rules, '^site')).resolves.toBe(false);
            expect(read('site/index.html')).toBe('# hi');
            expect(state.lastRecorded({kind: 'deep', path: 'site'})).toBeDefined();
        });

        it('rebuilds a dependent when a file is added to a deep dependency', async () => {
            writeFile(dir, 'assets/a.png');
            const rules = ['bundle.txt: ^assets', '  ls assets > bundle.txt'];

            await build(rules, 'bundle.txt');
            setMtime(dir, 'assets/a.png', 1_000);
            setMtime(dir, 'assets', 1_000);
            state.recordState({kind: 'deep', path: 'assets'});

            writeFile(dir, 'assets/b.png');

            await expect(build(rules, 'bundle.txt')).resolves.toBe(true);
            expect(read('bundle.txt')).toBe('a.png\nb.png\n');
        });
    });

    describe('failures', () => {
        it('stops at the first failing command', async () => {
            const rules = [
                'out.txt:',
                '  echo one >> trace.txt',
                '  exit 3',
                '  echo never >> trace.txt',
            ];

            const error = await build(rules, 'out.txt').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(CommandFailedError);
            if (!(error instanceof CommandFailedError)) throw new Error('unreachable');
            expect(error.command).toBe('exit 3');
            expect(error.exitCode).toBe(3);
            expect(error.code).toBe('COMMAND_FAILED');
            expect(runner.commands).toEqual(['echo one >> trace.txt', 'exit 3']);
            expect(read('trace.txt')).toBe('one\n');
        });

        it('does not attempt later dependencies after one fails', async () => {
            const rules = ['$all: $bad good.txt', '$bad:', '  exit 1', 'good.txt:', '  touch good.txt'];

            await expect(build(rules, '$all')).rejects.toBeInstanceOf(CommandFailedError);
            expect(runner.commands).toEqual(['exit 1']);
            expect(fs.existsSync(path.join(dir, 'good.txt'))).toBe(false);
        });

        it('fails when the commands do not produce the target', async () => {
            writeFile(dir, 'in.txt');

            await expect(build(['out.txt: in.txt', '  true'], 'out.txt')).rejects.toBeInstanceOf(
                TargetNotProducedError,
            );

            // Progress on the dependency is kept for the next run.
            expect(state.lastRecorded({kind: 'shallow', path: 'in.txt'})).toBeDefined();
            expect(state.lastRecorded({kind: 'shallow', path: 'out.txt'})).toBeUndefined();
        });

        it('reports a dependency cycle instead of recursing forever', async () => {
            const rules = ['$a: $b', '$b: $a'];

            const error = await build(rules, '$a').catch((err: unknown) => err);

            expect(error).toBeInstanceOf(CycleDetectedError);
            expect(error instanceof Error ? error.message : '').toBe(
                'Dependency cycle detected: $a -> $b -> $a',
            );
        });

        it('does not mistake a shared dependency for a cycle', async () => {
            writeFile(dir, 'shared.txt');
            const rules = ['$all: $x $y', '$x: shared.txt', '$y: shared.txt'];

            await expect(build(rules, '$all')).resolves.toBe(true);
        });
    });
});
