// src/schema/config.ts

export const DEFAULT_MKFILE = 'mkfile';
export const DEFAULT_STATE_FILE = '.mkstate.json';
export const DEFAULT_TARGET = 'all';
export const DEFAULT_SHELL = '/bin/sh';
export const DEFAULT_DEBOUNCE_MS = 150;

/**
 * Candidate config file names, in lookup order.
 */
export const CONFIG_FILES = [
    'mkr.config.ts',
    'mkr.config.js',
    'mkr.config.cjs',
    'mkr.config.json',
] as const;

export interface WatchConfig {
    /**
     * Delay in milliseconds between the last detected change and a re-run.
     *
     * Default: 150
     */
    debounceMs?: number;

    /**
     * Glob patterns, relative to the project directory, whose changes
     * never trigger a re-run.
     */
    ignore?: string[];
}

/**
 * Root configuration object for mkr.
 *
 * This is what you export from `mkr.config.ts` (or write to
 * `mkr.config.json`) next to your rule file. Every field is optional;
 * CLI flags take precedence over what is set here.
 */
export interface MkrConfig {
    /**
     * Path to the rule file, relative to the working directory.
     *
     * Default: "mkfile"
     */
    mkfile?: string;

    /**
     * Path to the persisted update state, relative to the working directory.
     *
     * Default: ".mkstate.json"
     */
    stateFile?: string;

    /**
     * Target made when none is given on the command line.
     *
     * Default: "all"
     */
    defaultTarget?: string;

    /**
     * Shell that receives each command as `<shell> -c <command>`.
     *
     * Default: "/bin/sh"
     */
    shell?: string;

    watch?: WatchConfig;
}

/**
 * Effective options after config file, CLI overrides and defaults
 * have been merged. Paths are absolute.
 */
export interface ResolvedMkrConfig {
    /** Absolute path of the config file, if one was loaded. */
    configPath?: string;
    mkfilePath: string;
    statePath: string;
    /** Directory that commands run in and target paths resolve against. */
    projectDir: string;
    defaultTarget: string;
    shell: string;
    watch: Required<WatchConfig>;
}
