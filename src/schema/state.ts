// src/schema/state.ts

import type {ConcreteTarget} from './target';

/**
 * One record: a concrete target and the modification time, in whole
 * nanoseconds (`fs.BigIntStats.mtimeNs`), observed when it was last recorded.
 */
export interface StateEntry {
    kind: ConcreteTarget['kind'];
    path: string;
    mtimeNs: bigint;
}

/**
 * A `StateEntry` as written to disk. JSON has no 64-bit integers, so the
 * time is a decimal string.
 */
export interface PersistedStateEntry {
    kind: ConcreteTarget['kind'];
    path: string;
    mtimeNs: string;
}

/**
 * The on-disk shape of `.mkstate.json`.
 */
export interface StateFileContents {
    version: 1;
    entries: PersistedStateEntry[];
}
