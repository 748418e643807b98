// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import os from 'os';
import crypto from 'crypto';
import {transform} from 'esbuild';
import {z} from 'zod';

import {
   CONFIG_FILES,
   DEFAULT_DEBOUNCE_MS,
   DEFAULT_MKFILE,
   DEFAULT_SHELL,
   DEFAULT_STATE_FILE,
   DEFAULT_TARGET,
   type MkrConfig,
   type ResolvedMkrConfig,
} from '../schema';
import {defaultLogger} from '../util/logger';
import {ensureDirSync} from '../util/fs-utils';

const logger = defaultLogger.child('[config]');

const nonEmpty = (field: string) => z.string().min(1, `${field} must not be empty`);

const MkrConfigSchema = z
   .object({
      mkfile: nonEmpty('mkfile').optional(),
      stateFile: nonEmpty('stateFile').optional(),
      defaultTarget: nonEmpty('defaultTarget').optional(),
      shell: nonEmpty('shell').optional(),
      watch: z
         .object({
            debounceMs: z.number().int().nonnegative().optional(),
            ignore: z.array(z.string()).optional(),
         })
         .strict()
         .optional(),
   })
   .strict();

export interface LoadMkrConfigOptions {
   /**
    * Explicit config file path (absolute or relative to cwd). If omitted,
    * CONFIG_FILES are looked up in cwd and a missing file means defaults.
    */
   configPath?: string;

   /**
    * Values that win over the config file (typically CLI flags).
    */
   overrides?: MkrConfig;
}

/**
 * Resolve the effective configuration for a run.
 *
 * Precedence: overrides > config file > defaults. Relative paths resolve
 * against cwd; the project directory is the rule file's directory.
 */
export async function loadMkrConfig(
   cwd: string,
   options: LoadMkrConfigOptions = {},
): Promise<ResolvedMkrConfig> {
   const absCwd = path.resolve(cwd);
   const configPath = options.configPath
      ? path.resolve(absCwd, options.configPath)
      : discoverConfig(absCwd);

   let fileConfig: MkrConfig = {};
   if (configPath) {
      if (!fs.existsSync(configPath)) {
         throw new Error(`mkr: config file not found: ${configPath}`);
      }
      fileConfig = validateConfig(await importConfig(configPath), configPath);
   }

   const overrides = options.overrides ?? {};
   const merged: MkrConfig = {
      mkfile: overrides.mkfile ?? fileConfig.mkfile,
      stateFile: overrides.stateFile ?? fileConfig.stateFile,
      defaultTarget: overrides.defaultTarget ?? fileConfig.defaultTarget,
      shell: overrides.shell ?? fileConfig.shell,
      watch: {
         debounceMs: overrides.watch?.debounceMs ?? fileConfig.watch?.debounceMs,
         ignore: [...(fileConfig.watch?.ignore ?? []), ...(overrides.watch?.ignore ?? [])],
      },
   };

   const mkfilePath = path.resolve(absCwd, merged.mkfile ?? DEFAULT_MKFILE);
   const resolved: ResolvedMkrConfig = {
      configPath: configPath ?? undefined,
      mkfilePath,
      statePath: path.resolve(absCwd, merged.stateFile ?? DEFAULT_STATE_FILE),
      projectDir: path.dirname(mkfilePath),
      defaultTarget: merged.defaultTarget ?? DEFAULT_TARGET,
      shell: merged.shell ?? DEFAULT_SHELL,
      watch: {
         debounceMs: merged.watch?.debounceMs ?? DEFAULT_DEBOUNCE_MS,
         ignore: merged.watch?.ignore ?? [],
      },
   };

   logger.debug(
      `Resolved config: config=${resolved.configPath ?? 'none'}, mkfile=${resolved.mkfilePath}, state=${resolved.statePath}`,
   );

   return resolved;
}

export function discoverConfig(dir: string): string | null {
   for (const file of CONFIG_FILES) {
      const full = path.join(dir, file);
      if (fs.existsSync(full)) {
         return full;
      }
   }
   return null;
}

export function validateConfig(raw: unknown, source: string): MkrConfig {
   const result = MkrConfigSchema.safeParse(raw);

   if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue.path.length > 0 ? ` at "${issue.path.join('.')}"` : '';
      throw new Error(`mkr: config error in "${source}"${where}: ${issue.message}`);
   }

   return result.data;
}

function unwrapDefault(mod: unknown): unknown {
   if (typeof mod === 'object' && mod !== null && 'default' in mod) {
      return mod.default;
   }
   return mod;
}

/**
 * Load the raw config value from the given path.
 * - .json is parsed directly.
 * - .ts is transpiled with esbuild to CommonJS and required from a temp file.
 * - .js/.cjs are required directly.
 */
async function importConfig(configPath: string): Promise<unknown> {
   const ext = path.extname(configPath).toLowerCase();

   if (ext === '.json') {
      try {
         return JSON.parse(fs.readFileSync(configPath, 'utf8'));
      } catch (err) {
         const reason = err instanceof Error ? err.message : String(err);
         throw new Error(`mkr: cannot parse config "${configPath}": ${reason}`, {cause: err});
      }
   }

   if (ext === '.ts') {
      return importTsConfig(configPath);
   }

   if (ext === '.js' || ext === '.cjs') {
      return unwrapDefault(requireFresh(configPath));
   }

   throw new Error(`mkr: unsupported config format: ${ext || configPath}`);
}

function requireFresh(file: string): unknown {
   delete require.cache[require.resolve(file)];
   const mod: unknown = require(file);
   return mod;
}

/**
 * Transpile a TS config file with esbuild and require the compiled file.
 * The temp file is keyed on (path + mtime) so edits invalidate it.
 */
async function importTsConfig(configPath: string): Promise<unknown> {
   const source = fs.readFileSync(configPath, 'utf8');
   const stat = fs.statSync(configPath);

   const hash = crypto
      .createHash('sha1')
      .update(configPath)
      .update(String(stat.mtimeMs))
      .digest('hex');

   const tmpDir = ensureDirSync(path.join(os.tmpdir(), 'mkr-config'));
   const tmpFile = path.join(tmpDir, `${hash}.cjs`);

   if (!fs.existsSync(tmpFile)) {
      const result = await transform(source, {
         loader: 'ts',
         format: 'cjs',
         platform: 'node',
         target: 'node20',
         sourcefile: configPath,
      });
      fs.writeFileSync(tmpFile, result.code, 'utf8');
   }

   return unwrapDefault(requireFresh(tmpFile));
}
