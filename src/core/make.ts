// src/core/make.ts

import pluralize from 'pluralize';
import {formatTarget, targetsEqual} from '../schema';
import type {Target} from '../schema';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';
import {ShellCommandRunner, type CommandRunner} from './command-runner';
import {
    CommandFailedError,
    CycleDetectedError,
    MissingRuleError,
    TargetNotProducedError,
} from './errors';
import type {Mkfile} from './mkfile';
import type {UpdateState} from './update-state';

export interface MakeOptions {
    /**
     * Directory commands run in. Defaults to the state's base directory,
     * so commands and target paths agree on what a relative path means.
     */
    cwd?: string;

    /**
     * Defaults to a `ShellCommandRunner` on "/bin/sh".
     */
    runner?: CommandRunner;

    /**
     * Optional logger; defaults to defaultLogger.child('[make]').
     */
    logger?: Logger;
}

/**
 * Depth-first evaluation of the dependency graph rooted at one target.
 *
 * Rules are read from the `Mkfile`; staleness is read from and recorded
 * into the `UpdateState`, which the caller persists afterwards whatever
 * the outcome.
 */
export class Maker {
    private readonly cwd: string;
    private readonly runner: CommandRunner;
    private readonly logger: Logger;

    constructor(
        private readonly mkfile: Mkfile,
        private readonly state: UpdateState,
        options: MakeOptions = {},
    ) {
        this.cwd = options.cwd ?? state.baseDir;
        this.runner = options.runner ?? new ShellCommandRunner();
        this.logger = options.logger ?? defaultLogger.child('[make]');
    }

    /**
     * Resolves to true when the target was (re)built, false when it was
     * already up to date. Rejects with a `MakeError` on the first failure.
     */
    make(target: Target): Promise<boolean> {
        return this.makeTarget(target, []);
    }

    private async makeTarget(target: Target, chain: readonly Target[]): Promise<boolean> {
        const seenAt = chain.findIndex((t) => targetsEqual(t, target));
        if (seenAt !== -1) {
            throw new CycleDetectedError([...chain.slice(seenAt), target]);
        }

        this.logger.debug(`Making ${formatTarget(target)}`);

        const rule = this.mkfile.rule(target);
        if (!rule) {
            if (target.kind === 'virtual') {
                throw new MissingRuleError(target);
            }
            if (this.state.isUpToDate(target.target)) {
                return false;
            }
            this.state.recordState(target.target);
            return true;
        }

        const nextChain = [...chain, target];
        let dependencyChanged = false;
        for (const dependency of rule.dependencies) {
            // Every dependency is made, even after one reports a change.
            if (await this.makeTarget(dependency, nextChain)) {
                dependencyChanged = true;
            }
        }

        const needsMaking =
            dependencyChanged ||
            (target.kind === 'concrete' && !this.state.exists(target.target)) ||
            (target.kind === 'virtual' && rule.dependencies.length === 0);

        if (needsMaking) {
            for (const command of rule.commands) {
                this.logger.info(`Executing command '${command}'`);
                const result = await this.runner.run(command, this.cwd);
                if (result.exitCode !== 0) {
                    throw new CommandFailedError(target, command, result.exitCode, result.error);
                }
            }

            if (target.kind === 'concrete') {
                if (!this.state.exists(target.target)) {
                    throw new TargetNotProducedError(target.target);
                }
                this.state.recordState(target.target);
            }

            this.logger.info(
                `Rebuilt ${formatTarget(target)} (${rule.commands.length} ${pluralize('command', rule.commands.length)})`,
            );
        } else if (target.kind === 'concrete') {
            // Absorb external edits whose time does not pass the record.
            this.state.recordState(target.target);
        }

        return needsMaking;
    }
}

/**
 * Make one target with a fresh `Maker`.
 */
export function make(
    mkfile: Mkfile,
    target: Target,
    state: UpdateState,
    options: MakeOptions = {},
): Promise<boolean> {
    return new Maker(mkfile, state, options).make(target);
}
