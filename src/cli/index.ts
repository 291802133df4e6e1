/* Root CLI factory for the "script-debugger" tool.
 * - No positional arguments: the target is always ./test.py.
 * - Global --debug/--boring with config defaults tagged in help.
 * - Never calls process.exit(); Commander errors are thrown to the caller.
 */
import { Command, Option } from 'commander';

import { findConfigPathSync } from '@/cli/config/find';
import { type LoadedConfig, loadConfig } from '@/cli/config/load';
import { runTarget, TARGET_FILE } from '@/runner/debug/service';
import { DEFAULT_INTERPRETER } from '@/runner/exec/run-script';
import { error } from '@/runner/util/color';
import { printVersion } from '@/runner/version';

import {
  applyRootFlags,
  installExitOverride,
  rootDefaults,
  tagDefault,
} from './cli-utils';

type RootOpts = { debug?: boolean; boring?: boolean; version?: boolean };

const renderHelpFooter = (cwd: string): string => {
  const cfgPath = findConfigPathSync(cwd);
  return [
    '',
    `Runs ./${TARGET_FILE} through the interpreter (default: "${DEFAULT_INTERPRETER}")`,
    'and explains the error it raises, if any.',
    '',
    `Config: ${cfgPath ?? 'none (script-debugger.config.yml|yaml|json)'}`,
    '',
  ].join('\n');
};

/**
 * Build the root CLI without side effects (safe for tests).
 *
 * @param cwd - Directory holding the target file and (or below) the config.
 */
export const makeCli = (cwd: string = process.cwd()): Command => {
  const cli = new Command();
  const { debugDefault, boringDefault } = rootDefaults(cwd);

  cli
    .name('script-debugger')
    .description(
      `Run ./${TARGET_FILE} and explain the error it raises in plain words.`,
    )
    .allowExcessArguments(false);

  const optDebug = new Option('-d, --debug', 'enable verbose debug logging');
  const optNoDebug = new Option(
    '-D, --no-debug',
    'disable verbose debug logging',
  );
  tagDefault(debugDefault ? optDebug : optNoDebug, true);
  cli.addOption(optDebug).addOption(optNoDebug);

  const optBoring = new Option(
    '-b, --boring',
    'disable all color and styling (useful for tests/CI)',
  );
  const optNoBoring = new Option(
    '-B, --no-boring',
    'do not disable color/styling',
  );
  tagDefault(boringDefault ? optBoring : optNoBoring, true);
  cli.addOption(optBoring).addOption(optNoBoring);

  cli.option('-v, --version', 'print version');
  cli.addHelpText('after', () => renderHelpFooter(cwd));
  installExitOverride(cli);

  // Resolve -d/-b against env and config defaults before the action runs.
  cli.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<RootOpts>();
    const fromCli = (name: 'debug' | 'boring'): boolean | undefined =>
      thisCommand.getOptionValueSource(name) === 'cli'
        ? Boolean(opts[name])
        : undefined;
    applyRootFlags(
      { debug: fromCli('debug'), boring: fromCli('boring') },
      rootDefaults(cwd),
    );
  });

  cli.action(async () => {
    if (cli.opts<RootOpts>().version) {
      printVersion();
      return;
    }

    let config: LoadedConfig;
    try {
      config = await loadConfig(cwd);
    } catch (e) {
      console.error(error(e instanceof Error ? e.message : String(e)));
      process.exitCode = 1;
      return;
    }

    const outcome = await runTarget(cwd, {
      command: config.interpreter,
      timeout: config.timeout,
      timeoutGrace: config.timeoutGrace,
    });
    if (outcome.kind === 'exit') process.exitCode = outcome.code;
  });

  return cli;
};
