// src/index.ts

export * from './schema';
export {Mkfile, parseRules} from './core/mkfile';
export {UpdateState} from './core/update-state';
export {Maker, make, type MakeOptions} from './core/make';
export {
    ShellCommandRunner,
    type CommandResult,
    type CommandRunner,
    type ShellCommandRunnerOptions,
} from './core/command-runner';
export {StateFile} from './core/state-file';
export {
    MakeError,
    MissingRuleError,
    CommandFailedError,
    TargetNotProducedError,
    StateAccessError,
    CycleDetectedError,
    type MakeErrorCode,
} from './core/errors';
export {loadMkrConfig, discoverConfig, validateConfig, type LoadMkrConfigOptions} from './core/config-loader';
export {runOnce, resolveRequestedTarget, type RunOptions, type RunResult} from './core/runner';
export {
    watchMake,
    createIgnoreMatcher,
    declaredOutputs,
    BuildActivity,
    type WatchOptions,
    type WatchHandle,
} from './core/watcher';
export {initMkfile, type InitMkfileOptions, type InitMkfileResult} from './core/init-mkfile';
export {Logger, defaultLogger, parseLogLevel, type LogLevel, type LoggerOptions} from './util/logger';
export {VERSION} from './version';
