// src/core/state-file.ts

import fs from 'fs';
import path from 'path';
import type {PersistedStateEntry, StateEntry, StateFileContents} from '../schema';
import {ensureDirSync} from '../util/fs-utils';
import {defaultLogger, type Logger} from '../util/logger';
import {UpdateState} from './update-state';

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const NANOSECONDS = /^\d+$/;

function toStateEntry(value: unknown): StateEntry | null {
   if (!isRecord(value)) return null;
   const {kind, path: entryPath, mtimeNs} = value;
   if (kind !== 'shallow' && kind !== 'deep') return null;
   if (typeof entryPath !== 'string' || typeof mtimeNs !== 'string' || !NANOSECONDS.test(mtimeNs)) {
      return null;
   }
   return {kind, path: entryPath, mtimeNs: BigInt(mtimeNs)};
}

function toPersisted(entry: StateEntry): PersistedStateEntry {
   return {kind: entry.kind, path: entry.path, mtimeNs: entry.mtimeNs.toString()};
}

/**
 * Reads and writes the update state as versioned JSON.
 *
 * A missing or unusable file is never fatal: loading falls back to an
 * empty state so the next run simply rebuilds what it cannot vouch for.
 */
export class StateFile {
   private readonly logger: Logger;

   /**
    * @param statePath absolute path, or relative to `baseDir`
    * @param baseDir directory target paths in the loaded state resolve against
    */
   constructor(
      private readonly statePath: string,
      private readonly baseDir: string = process.cwd(),
      logger?: Logger,
   ) {
      this.logger = logger ?? defaultLogger.child('[state]');
   }

   get pathAbs(): string {
      return path.resolve(this.baseDir, this.statePath);
   }

   load(): UpdateState {
      const statePath = this.pathAbs;
      if (!fs.existsSync(statePath)) {
         this.logger.debug(`No state file at ${statePath}, starting empty.`);
         return new UpdateState(this.baseDir);
      }

      let parsed: unknown;
      try {
         parsed = JSON.parse(fs.readFileSync(statePath, 'utf8'));
      } catch (err) {
         this.logger.warn(`Failed to read state file ${statePath}, starting empty.`, err);
         return new UpdateState(this.baseDir);
      }

      if (!isRecord(parsed) || parsed.version !== 1 || !Array.isArray(parsed.entries)) {
         this.logger.warn(`State file ${statePath} has an unknown format, starting empty.`);
         return new UpdateState(this.baseDir);
      }

      const entries: StateEntry[] = [];
      let dropped = 0;
      for (const raw of parsed.entries) {
         const entry = toStateEntry(raw);
         if (entry) {
            entries.push(entry);
         } else {
            dropped++;
         }
      }
      if (dropped > 0) {
         this.logger.warn(`Ignored ${dropped} invalid entries in ${statePath}.`);
      }

      return UpdateState.fromSnapshot(entries, this.baseDir);
   }

   save(state: UpdateState): void {
      const statePath = this.pathAbs;
      ensureDirSync(path.dirname(statePath));
      const contents: StateFileContents = {
         version: 1,
         entries: state.entries().map(toPersisted),
      };
      fs.writeFileSync(statePath, `${JSON.stringify(contents, null, 2)}\n`, 'utf8');
      this.logger.debug(`Saved ${contents.entries.length} state entries to ${statePath}`);
   }
}
