// src/core/mkfile.ts

import {parseTarget, targetKey} from '../schema';
import type {Rule, RuleEntry, Target} from '../schema';

interface RuleHeader {
    targetToken: string;
    dependencyTokens: string[];
}

const LEADING_TOKEN = /^(\S+)(.*)$/;
const SEPARATOR_AFTER_TOKEN = /^\s*:(.*)$/;

function startsIndented(line: string): boolean {
    return line.startsWith(' ') || line.startsWith('\t');
}

/**
 * A command line is indented and has at least one character after its
 * first space or tab; one that trims to nothing stays in the block and
 * is dropped as an empty command.
 */
function isContinuation(line: string): boolean {
    return startsIndented(line) && line.length > 1;
}

function splitTokens(text: string): string[] {
    return text.split(/\s+/).filter(Boolean);
}

/**
 * Recognize a rule header: "<target> : <deps...>".
 *
 * The target is the longest leading non-whitespace run that is followed,
 * optionally after whitespace, by ":". So "out:a:b c" names target "out:a"
 * with dependencies "b" and "c", while "out : a" names target "out".
 */
function parseHeader(line: string): RuleHeader | null {
    if (startsIndented(line)) return null;

    const match = line.match(LEADING_TOKEN);
    if (!match) return null;

    const [, token, rest] = match;

    const afterToken = rest.match(SEPARATOR_AFTER_TOKEN);
    if (afterToken) {
        return {targetToken: token, dependencyTokens: splitTokens(afterToken[1])};
    }

    const colon = token.lastIndexOf(':');
    if (colon <= 0) return null;

    return {
        targetToken: token.slice(0, colon),
        dependencyTokens: splitTokens(token.slice(colon + 1) + rest),
    };
}

/**
 * Parse rule-file text into rule entries, in file order.
 *
 * A rule block is a header line followed by indented command lines; the
 * block ends at an empty line, a lone space or tab, a non-indented line
 * or the end of input.
 * Anything that does not fit this shape is skipped without error.
 */
export function parseRules(text: string): RuleEntry[] {
    const lines = text.split(/\r?\n/);
    const entries: RuleEntry[] = [];

    let i = 0;
    while (i < lines.length) {
        const header = parseHeader(lines[i]);
        i++;
        if (!header) continue;

        const commands: string[] = [];
        while (i < lines.length && isContinuation(lines[i])) {
            const command = lines[i].trim();
            if (command) commands.push(command);
            i++;
        }

        entries.push({
            target: parseTarget(header.targetToken),
            rule: {
                dependencies: header.dependencyTokens.map(parseTarget),
                commands,
            },
        });
    }

    return entries;
}

/**
 * The rule store for one invocation: at most one rule per target,
 * immutable once parsed.
 */
export class Mkfile {
    private readonly rules: ReadonlyMap<string, RuleEntry>;

    constructor(entries: Iterable<RuleEntry>) {
        const rules = new Map<string, RuleEntry>();
        for (const entry of entries) {
            // A later declaration replaces an earlier one.
            rules.set(targetKey(entry.target), entry);
        }
        this.rules = rules;
    }

    static parse(text: string): Mkfile {
        return new Mkfile(parseRules(text));
    }

    get size(): number {
        return this.rules.size;
    }

    has(target: Target): boolean {
        return this.rules.has(targetKey(target));
    }

    rule(target: Target): Rule | undefined {
        return this.rules.get(targetKey(target))?.rule;
    }

    dependencies(target: Target): readonly Target[] {
        return this.rule(target)?.dependencies ?? [];
    }

    commands(target: Target): readonly string[] {
        return this.rule(target)?.commands ?? [];
    }

    /**
     * Declared targets in order of their first declaration.
     */
    targets(): Target[] {
        return [...this.rules.values()].map((entry) => entry.target);
    }

    entries(): RuleEntry[] {
        return [...this.rules.values()];
    }
}
