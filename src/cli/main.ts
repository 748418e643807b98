#!/usr/bin/env node

import path from "path";
import { Command } from "commander";
import pluralize from "pluralize";
import { runOnce, type RunOptions } from "../core/runner";
import { watchMake } from "../core/watcher";
import { initMkfile } from "../core/init-mkfile";
import { loadMkrConfig } from "../core/config-loader";
import { Mkfile } from "../core/mkfile";
import { MakeError } from "../core/errors";
import { targetToken, type MkrConfig } from "../schema";
import { defaultLogger, type Logger } from "../util/logger";
import { readTextFileSync } from "../util/fs-utils";
import { VERSION } from "../version";

interface BaseCliOptions {
  mkfile?: string;
  state?: string;
  config?: string;
  shell?: string;
  watch?: boolean;
  ignore?: string[];
  quiet?: boolean;
  debug?: boolean;
}

interface InitCliOptions {
  force?: boolean;
}

/**
 * Create a logger with the appropriate level from CLI flags.
 */
function createCliLogger(opts: { quiet?: boolean; debug?: boolean }): Logger {
  if (opts.quiet) {
    defaultLogger.setLevel("silent");
  } else if (opts.debug) {
    defaultLogger.setLevel("debug");
  }
  return defaultLogger;
}

function toOverrides(opts: BaseCliOptions): MkrConfig {
  return {
    mkfile: opts.mkfile,
    stateFile: opts.state,
    shell: opts.shell,
  };
}

async function handleMakeCommand(
  cwd: string,
  target: string | undefined,
  opts: BaseCliOptions,
) {
  const logger = createCliLogger(opts);

  const runOptions: RunOptions = {
    target,
    configPath: opts.config,
    overrides: toOverrides(opts),
  };

  if (opts.watch) {
    const handle = await watchMake(cwd, {
      ...runOptions,
      ignore: opts.ignore,
    });
    process.once("SIGINT", () => {
      handle.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error(err);
          process.exit(1);
        },
      );
    });
    return;
  }

  try {
    await runOnce(cwd, runOptions);
  } catch (err) {
    const requested = target ?? "default target";
    if (err instanceof MakeError) {
      logger.error(`Failed to make ${requested}: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

async function handleListCommand(cwd: string, opts: BaseCliOptions) {
  const logger = createCliLogger(opts);
  const config = await loadMkrConfig(cwd, {
    configPath: opts.config,
    overrides: toOverrides(opts),
  });

  const mkfile = Mkfile.parse(readTextFileSync(config.mkfilePath, "rule file"));
  logger.info(
    `${path.relative(cwd, config.mkfilePath) || config.mkfilePath}: ${mkfile.size} ${pluralize("rule", mkfile.size)}`,
  );

  for (const { target, rule } of mkfile.entries()) {
    const deps = rule.dependencies.length;
    const cmds = rule.commands.length;
    process.stdout.write(
      `${targetToken(target)}\t${deps} ${pluralize("dependency", deps)}, ${cmds} ${pluralize("command", cmds)}\n`,
    );
  }
}

function handleInitCommand(
  cwd: string,
  initOpts: InitCliOptions,
  baseOpts: BaseCliOptions,
) {
  const logger = createCliLogger(baseOpts);
  const result = initMkfile(cwd, {
    force: initOpts.force,
    mkfileName: baseOpts.mkfile,
  });
  logger.debug(`Init result: ${JSON.stringify(result.created)}`);
}

async function main() {
  const cwd = process.cwd();

  const program = new Command();

  program
    .name("mkr")
    .description("mkr – timestamp-based incremental builds from an mkfile")
    .version(VERSION)
    .argument("[target]", "target to make (plain path, ^tree or $virtual)")
    .option("-m, --mkfile <path>", "Path to the rule file (default: ./mkfile)")
    .option("-s, --state <path>", "Path to the update state file (default: ./.mkstate.json)")
    .option("-c, --config <path>", "Path to an mkr config file")
    .option("--shell <path>", "Shell used to run commands (default: /bin/sh)")
    .option("-w, --watch", "Re-make the target whenever files change")
    .option("--ignore <patterns...>", "Glob patterns ignored in watch mode")
    .option("--quiet", "Silence logs")
    .option("--debug", "Enable debug logging");

  program
    .command("list")
    .description("List the targets declared in the rule file")
    .action(async (_opts: unknown, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      await handleListCommand(cwd, baseOpts);
    });

  program
    .command("init")
    .description("Write a starter mkfile and mkr.config.ts")
    .option("--force", "Overwrite existing files")
    .action((initOpts: InitCliOptions, cmd: Command) => {
      const baseOpts = cmd.parent?.opts<BaseCliOptions>() ?? {};
      handleInitCommand(cwd, initOpts, baseOpts);
    });

  program.action(async (target: string | undefined, opts: BaseCliOptions) => {
    await handleMakeCommand(cwd, target, opts);
  });

  await program.parseAsync(process.argv);
}

// Run and handle errors
main().catch((err) => {
  defaultLogger.error(err);
  process.exit(1);
});
