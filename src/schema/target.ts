// src/schema/target.ts

/**
 * A filesystem target whose staleness is the modification time of
 * exactly one path.
 */
export interface ShallowTarget {
    kind: 'shallow';
    path: string;
}

/**
 * A filesystem target whose staleness is the newest modification time
 * found anywhere under its path (the path itself included).
 */
export interface DeepTarget {
    kind: 'deep';
    path: string;
}

export type ConcreteTarget = ShallowTarget | DeepTarget;

export interface VirtualTarget {
    kind: 'virtual';
    name: string;
}

export interface ConcreteTargetRef {
    kind: 'concrete';
    target: ConcreteTarget;
}

/**
 * Anything that can appear on either side of a rule header.
 */
export type Target = VirtualTarget | ConcreteTargetRef;

export const VIRTUAL_PREFIX = '$';
export const DEEP_PREFIX = '^';

export function virtualTarget(name: string): VirtualTarget {
    return {kind: 'virtual', name};
}

export function shallowTarget(path: string): ConcreteTargetRef {
    return {kind: 'concrete', target: {kind: 'shallow', path}};
}

export function deepTarget(path: string): ConcreteTargetRef {
    return {kind: 'concrete', target: {kind: 'deep', path}};
}

/**
 * Parse a target token:
 * - "$name" → virtual target "name"
 * - "^path" → deep concrete target over "path"
 * - "path"  → shallow concrete target over "path"
 */
export function parseTarget(token: string): Target {
    if (token.startsWith(VIRTUAL_PREFIX)) {
        return virtualTarget(token.slice(VIRTUAL_PREFIX.length));
    }
    if (token.startsWith(DEEP_PREFIX)) {
        return deepTarget(token.slice(DEEP_PREFIX.length));
    }
    return shallowTarget(token);
}

/**
 * Identity key of a concrete target. Kind and path both take part, so a
 * shallow and a deep target over one path never share a key.
 */
export function concreteKey(target: ConcreteTarget): string {
    return `${target.kind}:${target.path}`;
}

/**
 * Identity key used for structural equality and map lookups.
 */
export function targetKey(target: Target): string {
    return target.kind === 'virtual' ? `virtual:${target.name}` : concreteKey(target.target);
}

/**
 * The token `parseTarget` would turn back into this target, e.g. "$all",
 * "^src" or "out.txt".
 */
export function targetToken(target: Target): string {
    if (target.kind === 'virtual') return `${VIRTUAL_PREFIX}${target.name}`;
    return target.target.kind === 'deep'
        ? `${DEEP_PREFIX}${target.target.path}`
        : target.target.path;
}

export function targetsEqual(a: Target, b: Target): boolean {
    return targetKey(a) === targetKey(b);
}

export function formatConcreteTarget(target: ConcreteTarget): string {
    return target.kind === 'deep'
        ? `directory tree '${target.path}'`
        : `file '${target.path}'`;
}

export function formatTarget(target: Target): string {
    return target.kind === 'virtual'
        ? `virtual target '${target.name}'`
        : formatConcreteTarget(target.target);
}
