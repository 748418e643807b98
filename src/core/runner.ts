// src/core/runner.ts

import {formatTarget, parseTarget, virtualTarget} from '../schema';
import type {MkrConfig, ResolvedMkrConfig, Target} from '../schema';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {readTextFileSync} from '../util/fs-utils';
import {ShellCommandRunner, type CommandRunner} from './command-runner';
import {loadMkrConfig} from './config-loader';
import {Maker} from './make';
import {Mkfile} from './mkfile';
import {StateFile} from './state-file';

export interface RunOptions {
    /**
     * Target token to make; defaults to the configured default target.
     */
    target?: string;

    /**
     * Optional explicit config file (absolute or relative to cwd).
     */
    configPath?: string;

    /**
     * Values that win over the config file (typically CLI flags).
     */
    overrides?: MkrConfig;

    /**
     * Optional command runner override; defaults to the configured shell.
     */
    runner?: CommandRunner;

    /**
     * Optional logger override.
     */
    logger?: Logger;
}

export interface RunResult {
    target: Target;
    changed: boolean;
    config: ResolvedMkrConfig;
}

/**
 * Pick the target a requested token refers to. A token whose parsed form
 * has no rule is taken as a virtual target name, so "clean" finds "$clean".
 */
export function resolveRequestedTarget(mkfile: Mkfile, token: string): Target {
    const parsed = parseTarget(token);
    return mkfile.has(parsed) ? parsed : virtualTarget(token);
}

/**
 * Run one build: load config, rule file and state, make the requested
 * target, then save the state whether or not the build succeeded.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<RunResult> {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const config = await loadMkrConfig(cwd, {
        configPath: options.configPath,
        overrides: options.overrides,
    });

    const mkfile = Mkfile.parse(readTextFileSync(config.mkfilePath, 'rule file'));
    logger.debug(`Parsed ${mkfile.size} rules from ${config.mkfilePath}`);

    const stateFile = new StateFile(config.statePath, config.projectDir, logger.child('[state]'));
    const state = stateFile.load();

    const target = resolveRequestedTarget(mkfile, options.target ?? config.defaultTarget);
    const maker = new Maker(mkfile, state, {
        cwd: config.projectDir,
        runner: options.runner ?? new ShellCommandRunner({shell: config.shell}),
        logger: logger.child('[make]'),
    });

    let changed: boolean;
    try {
        changed = await maker.make(target);
    } finally {
        stateFile.save(state);
    }

    if (changed) {
        logger.info(`Made ${formatTarget(target)}`);
    } else {
        logger.info(`${formatTarget(target)} is up to date`);
    }

    return {target, changed, config};
}
