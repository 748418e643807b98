// src/core/command-runner.ts

import {spawn} from 'child_process';
import type {StdioOptions} from 'child_process';
import {DEFAULT_SHELL} from '../schema';

export interface CommandResult {
    /** Process exit code; a signal or a failed spawn is reported as non-zero. */
    exitCode: number;
    /** Set when the shell could not be started at all. */
    error?: Error;
}

/**
 * Runs one command string to completion. Only the exit status matters
 * to the engine.
 */
export interface CommandRunner {
    run(command: string, cwd: string): Promise<CommandResult>;
}

export interface ShellCommandRunnerOptions {
    /** Default: "/bin/sh" */
    shell?: string;
    /** Default: "inherit" */
    stdio?: StdioOptions;
}

/**
 * Hands each command verbatim to `<shell> -c <command>`.
 */
export class ShellCommandRunner implements CommandRunner {
    private readonly shell: string;
    private readonly stdio: StdioOptions;

    constructor(options: ShellCommandRunnerOptions = {}) {
        this.shell = options.shell ?? DEFAULT_SHELL;
        this.stdio = options.stdio ?? 'inherit';
    }

    run(command: string, cwd: string): Promise<CommandResult> {
        return new Promise((resolve) => {
            const proc = spawn(this.shell, ['-c', command], {
                cwd,
                stdio: this.stdio,
                env: process.env,
            });

            // "error" fires when the shell itself cannot be spawned; "close"
            // may or may not follow, so settle on whichever comes first.
            let settled = false;
            const settle = (result: CommandResult) => {
                if (settled) return;
                settled = true;
                resolve(result);
            };

            proc.on('error', (error) => settle({exitCode: 127, error}));
            proc.on('close', (code) => settle({exitCode: code ?? 1}));
        });
    }
}
