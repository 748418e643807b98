// test/helpers.ts
import fs from 'fs';
import os from 'os';
import path from 'path';
import {ShellCommandRunner, type CommandResult, type CommandRunner} from '../src/core/command-runner';
import {Logger} from '../src/util/logger';

export const quietLogger = new Logger({level: 'silent'});

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'mkr-test-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, {recursive: true, force: true});
}

export function writeFile(dir: string, rel: string, contents = ''): string {
    const abs = path.join(dir, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, contents, 'utf8');
    return abs;
}

/**
 * Set both atime and mtime of a path to `seconds` since the epoch.
 */
export function setMtime(dir: string, rel: string, seconds: number): void {
    fs.utimesSync(path.join(dir, rel), seconds, seconds);
}

/**
 * Runs commands through the real shell and remembers each one.
 */
export class RecordingRunner implements CommandRunner {
    readonly commands: string[] = [];
    private readonly shell = new ShellCommandRunner({stdio: 'ignore'});

    run(command: string, cwd: string): Promise<CommandResult> {
        this.commands.push(command);
        return this.shell.run(command, cwd);
    }
}
