// src/core/errors.ts

import {formatConcreteTarget, formatTarget, targetToken} from '../schema';
import type {ConcreteTarget, Target} from '../schema';

export type MakeErrorCode =
    | 'MISSING_RULE'
    | 'COMMAND_FAILED'
    | 'TARGET_NOT_PRODUCED'
    | 'STATE_ACCESS'
    | 'CYCLE_DETECTED';

/**
 * Base class for everything that aborts a build. Every one of these is
 * fatal to the current invocation.
 */
export class MakeError extends Error {
    constructor(
        readonly code: MakeErrorCode,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class MissingRuleError extends MakeError {
    constructor(readonly target: Target) {
        super('MISSING_RULE', `No rule to make ${formatTarget(target)}`);
    }
}

export class CommandFailedError extends MakeError {
    constructor(
        readonly target: Target,
        readonly command: string,
        readonly exitCode: number,
        cause?: Error,
    ) {
        super(
            'COMMAND_FAILED',
            `Command '${command}' failed with exit code ${exitCode} while making ${formatTarget(target)}`,
            cause ? {cause} : undefined,
        );
    }
}

export class TargetNotProducedError extends MakeError {
    constructor(readonly target: ConcreteTarget) {
        super(
            'TARGET_NOT_PRODUCED',
            `Commands succeeded but ${formatConcreteTarget(target)} was not created`,
        );
    }
}

export class StateAccessError extends MakeError {
    constructor(
        readonly target: ConcreteTarget,
        readonly path: string,
        cause: unknown,
    ) {
        const reason = cause instanceof Error ? cause.message : String(cause);
        super(
            'STATE_ACCESS',
            `Cannot read modification time of ${formatConcreteTarget(target)} at ${path}: ${reason}`,
            {cause},
        );
    }
}

export class CycleDetectedError extends MakeError {
    constructor(readonly chain: Target[]) {
        super(
            'CYCLE_DETECTED',
            `Dependency cycle detected: ${chain.map(targetToken).join(' -> ')}`,
        );
    }
}
