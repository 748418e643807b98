// src/schema/rule.ts

import type {Target} from './target';

/**
 * How to bring one target up to date.
 *
 * Both lists are order-significant: dependencies are made in declared
 * order before staleness is decided, and commands run in declared order.
 */
export interface Rule {
    dependencies: Target[];
    commands: string[];
}

/**
 * One parsed rule block together with the target its header names.
 */
export interface RuleEntry {
    target: Target;
    rule: Rule;
}
