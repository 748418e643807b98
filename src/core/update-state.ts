// src/core/update-state.ts

import fs from 'fs';
import path from 'path';
import {concreteKey} from '../schema';
import type {ConcreteTarget, StateEntry} from '../schema';
import {StateAccessError} from './errors';

interface StateRecord {
    target: ConcreteTarget;
    mtimeNs: bigint;
}

/**
 * Last recorded modification time, in nanoseconds, of every concrete
 * target the engine has seen. Owned by the caller and passed into the engine; loading and saving
 * it is the job of `StateFile`.
 */
export class UpdateState {
    private readonly records = new Map<string, StateRecord>();

    /**
     * @param baseDir directory that relative target paths resolve against
     */
    constructor(readonly baseDir: string = process.cwd()) { }

    static fromSnapshot(entries: Iterable<StateEntry>, baseDir?: string): UpdateState {
        const state = new UpdateState(baseDir);
        for (const entry of entries) {
            state.set({kind: entry.kind, path: entry.path}, entry.mtimeNs);
        }
        return state;
    }

    get size(): number {
        return this.records.size;
    }

    resolve(target: ConcreteTarget): string {
        return path.resolve(this.baseDir, target.path);
    }

    exists(target: ConcreteTarget): boolean {
        return fs.existsSync(this.resolve(target));
    }

    /**
     * Current modification time of a target. For a deep target this walks
     * the whole subtree on every call.
     */
    currentModificationTime(target: ConcreteTarget): bigint {
        return this.modificationTimeOf(target, this.resolve(target));
    }

    private modificationTimeOf(target: ConcreteTarget, absPath: string): bigint {
        let stat: fs.BigIntStats;
        let children: string[] = [];
        try {
            stat = fs.statSync(absPath, {bigint: true});
            if (target.kind === 'deep' && stat.isDirectory()) {
                children = fs.readdirSync(absPath);
            }
        } catch (err) {
            throw new StateAccessError(target, absPath, err);
        }

        let latest = stat.mtimeNs;
        for (const child of children) {
            const childTime = this.modificationTimeOf(target, path.join(absPath, child));
            if (childTime > latest) latest = childTime;
        }
        return latest;
    }

    lastRecorded(target: ConcreteTarget): bigint | undefined {
        return this.records.get(concreteKey(target))?.mtimeNs;
    }

    /**
     * True when a record exists and the target has not been modified
     * after it. Equal timestamps count as up to date.
     */
    isUpToDate(target: ConcreteTarget): boolean {
        const recorded = this.lastRecorded(target);
        if (recorded === undefined) return false;
        return this.currentModificationTime(target) <= recorded;
    }

    recordState(target: ConcreteTarget): void {
        this.set(target, this.currentModificationTime(target));
    }

    set(target: ConcreteTarget, mtimeNs: bigint): void {
        this.records.set(concreteKey(target), {
            target: {kind: target.kind, path: target.path},
            mtimeNs,
        });
    }

    entries(): StateEntry[] {
        return [...this.records.values()].map(({target, mtimeNs}) => ({
            kind: target.kind,
            path: target.path,
            mtimeNs,
        }));
    }
}
