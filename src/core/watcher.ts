// src/core/watcher.ts

import fs from 'fs';
import path from 'path';
import chokidar from 'chokidar';
import {minimatch} from 'minimatch';
import {runOnce, type RunOptions} from './runner';
import {loadMkrConfig} from './config-loader';
import {Mkfile} from './mkfile';
import type {ConcreteTarget} from '../schema';
import {defaultLogger, type Logger} from '../util/logger';
import {readTextFileSync, relativeInside} from '../util/fs-utils';

const ALWAYS_IGNORED = ['.git/**', 'node_modules/**'];

export interface WatchOptions extends RunOptions {
    /**
     * Extra glob patterns to ignore, on top of `watch.ignore` from config.
     */
    ignore?: string[];

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;
}

export interface WatchHandle {
    close(): Promise<void>;
}

/**
 * Build a predicate telling whether a changed path should be ignored.
 * Paths outside the project directory are always ignored, as are the
 * state file that every run rewrites and the declared outputs: a
 * shallow output by its exact path, a deep one with everything below it.
 */
export function createIgnoreMatcher(
    projectDir: string,
    statePath: string,
    patterns: string[],
    outputs: readonly ConcreteTarget[] = [],
): (filePath: string) => boolean {
    const all = [...ALWAYS_IGNORED, ...patterns];
    const stateAbs = path.resolve(statePath);

    const outputPaths: Array<{ rel: string; deep: boolean }> = [];
    for (const output of outputs) {
        const rel = relativeInside(projectDir, path.resolve(projectDir, output.path));
        // The project directory itself stays watched.
        if (rel) outputPaths.push({rel, deep: output.kind === 'deep'});
    }

    return (filePath: string) => {
        const abs = path.resolve(projectDir, filePath);
        if (abs === stateAbs) return true;

        const rel = relativeInside(projectDir, abs);
        if (rel === null) return true;
        if (rel === '') return false;

        if (outputPaths.some((o) => rel === o.rel || (o.deep && rel.startsWith(`${o.rel}/`)))) {
            return true;
        }

        return all.some((pattern) => minimatch(rel, pattern, {dot: true}));
    };
}

/**
 * Concrete targets declared as rule headers.
 */
export function declaredOutputs(mkfile: Mkfile): ConcreteTarget[] {
    const outputs: ConcreteTarget[] = [];
    for (const target of mkfile.targets()) {
        if (target.kind === 'concrete') outputs.push(target.target);
    }
    return outputs;
}

/**
 * Tracks when builds run, so that what a build writes into the project
 * does not trigger the next build.
 */
export class BuildActivity {
    private running = false;
    private lastFinishedAt = Number.NEGATIVE_INFINITY;

    get isRunning(): boolean {
        return this.running;
    }

    begin(): void {
        this.running = true;
    }

    end(at: number = Date.now()): void {
        this.running = false;
        this.lastFinishedAt = at;
    }

    /**
     * True for a change made while a build runs, or one whose file was
     * last modified before the last build finished. A path that no longer
     * exists (`undefined`) only counts while a build runs.
     */
    covers(mtimeMs: number | undefined): boolean {
        if (this.running) return true;
        return mtimeMs !== undefined && mtimeMs <= this.lastFinishedAt;
    }
}

/**
 * Watch the project directory and re-make the target on every change.
 *
 * Runs are serialized. Changes made while a run is in progress, and
 * changes to files last modified before a run finished, are taken to be
 * the build's own writes and do not start another run. A failed run is
 * logged and watching continues.
 */
export async function watchMake(cwd: string, options: WatchOptions = {}): Promise<WatchHandle> {
    const logger = options.logger ?? defaultLogger.child('[watch]');

    const config = await loadMkrConfig(cwd, {
        configPath: options.configPath,
        overrides: options.overrides,
    });
    const patterns = [...config.watch.ignore, ...(options.ignore ?? [])];

    let ignored = createIgnoreMatcher(config.projectDir, config.statePath, patterns);
    const activity = new BuildActivity();
    let timer: NodeJS.Timeout | undefined;

    function refreshOutputs() {
        try {
            const mkfile = Mkfile.parse(readTextFileSync(config.mkfilePath, 'rule file'));
            ignored = createIgnoreMatcher(config.projectDir, config.statePath, patterns, declaredOutputs(mkfile));
        } catch (err) {
            // runOnce reports the same failure; keep the previous outputs.
            logger.debug(err);
        }
    }

    async function run() {
        if (activity.isRunning) return;
        refreshOutputs();
        activity.begin();
        try {
            await runOnce(cwd, {...options, logger: logger.child('[run]')});
        } catch (err) {
            logger.error('Build failed:', err instanceof Error ? err.message : err);
        } finally {
            activity.end();
        }
    }

    function scheduleRun() {
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => {
            void run();
        }, config.watch.debounceMs);
    }

    logger.info(`Watching ${config.projectDir}`);

    const watcher = chokidar.watch(config.projectDir, {
        ignoreInitial: true,
        persistent: true,
        ignored: (filePath: string) => ignored(filePath),
    });

    watcher
        .on('all', (event, filePath) => {
            if (ignored(filePath)) return;
            const stat = fs.statSync(filePath, {throwIfNoEntry: false});
            if (activity.covers(stat?.mtimeMs)) {
                logger.debug(`Skipping ${event} on ${filePath} written by the build`);
                return;
            }
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    refreshOutputs();
    scheduleRun();

    return {
        async close() {
            if (timer) clearTimeout(timer);
            await watcher.close();
        },
    };
}
