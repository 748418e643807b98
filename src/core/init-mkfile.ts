// src/core/init-mkfile.ts

import fs from 'fs';
import path from 'path';
import {CONFIG_FILES, DEFAULT_MKFILE} from '../schema';
import {defaultLogger} from '../util/logger';

const logger = defaultLogger.child('[init]');

export interface InitMkfileOptions {
    /**
     * Overwrite existing files.
     */
    force?: boolean;

    /**
     * Rule file name, relative to cwd. Default: "mkfile"
     */
    mkfileName?: string;
}

export interface InitMkfileResult {
    mkfilePath: string;
    configPath: string;
    created: { mkfile: boolean; config: boolean };
}

const DEFAULT_MKFILE_TEXT = `# Rule blocks: "target: dependencies", then indented commands.
#   plain name  -> a file, stale when its own mtime moves
#   ^name       -> a directory tree, stale when anything inside it moves
#   $name       -> a virtual target with no file behind it
#
# A virtual target without dependencies runs on every invocation.

$all: build/out.txt

build/out.txt: ^src
    mkdir -p build
    cat src/* > build/out.txt

$clean:
    rm -rf build
`;

const DEFAULT_CONFIG_TS = `// mkr.config.ts
// Every field is optional; CLI flags win over what is set here.

export default {
  // mkfile: 'mkfile',
  // stateFile: '.mkstate.json',
  // defaultTarget: 'all',
  // shell: '/bin/sh',
  // watch: {
  //   debounceMs: 150,
  //   ignore: ['build/**'],
  // },
};
`;

function writeStarter(filePath: string, contents: string, force: boolean, what: string): boolean {
    const existed = fs.existsSync(filePath);
    if (existed && !force) {
        logger.info(`${what} already exists at ${filePath} (use --force to overwrite).`);
        return false;
    }
    fs.writeFileSync(filePath, contents, 'utf8');
    logger.info(`${existed ? 'Overwrote' : 'Created'} ${what.toLowerCase()} at ${filePath}`);
    return true;
}

/**
 * Write a starter rule file and config into cwd, leaving existing files
 * alone unless `force` is set.
 */
export function initMkfile(cwd: string, options: InitMkfileOptions = {}): InitMkfileResult {
    const force = options.force ?? false;
    const mkfilePath = path.resolve(cwd, options.mkfileName ?? DEFAULT_MKFILE);
    const configPath = path.resolve(cwd, CONFIG_FILES[0]);

    return {
        mkfilePath,
        configPath,
        created: {
            mkfile: writeStarter(mkfilePath, DEFAULT_MKFILE_TEXT, force, 'Rule file'),
            config: writeStarter(configPath, DEFAULT_CONFIG_TS, force, 'Config'),
        },
    };
}
