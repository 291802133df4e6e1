/** Shared Commander helpers for the script-debugger CLI.
 * Exit override and config-derived option defaults.
 */
import type { Command, Option } from 'commander';

import { loadConfigSync } from '@/cli/config/load';
import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_ROOT_DEFAULTS } from '@/runner/util/debug-scopes';

/**
 * Make Commander throw a CommanderError instead of calling process.exit().
 * Help and usage errors surface to the caller, which maps them to an exit code.
 */
export const installExitOverride = (cmd: Command): void => {
  cmd.exitOverride();
};

/** Tag an Option description with (default) when active. */
export function tagDefault(opt: Option, on: boolean): void {
  if (on && !opt.description.includes('(default)')) {
    opt.description = `${opt.description} (default)`;
  }
}

/** Root-level boolean defaults (debug/boring) from config or built-ins. */
export const rootDefaults = (
  dir: string,
): { debugDefault: boolean; boringDefault: boolean } => {
  try {
    const cli = loadConfigSync(dir).cliDefaults;
    return {
      debugDefault: cli?.debug ?? false,
      boringDefault: cli?.boring ?? false,
    };
  } catch (e) {
    // The root action reports the config error; defaults fall back to built-ins.
    debugFallback(
      DBG_SCOPE_CLI_ROOT_DEFAULTS,
      e instanceof Error ? e.message.split('\n')[0] : String(e),
    );
    return { debugDefault: false, boringDefault: false };
  }
};

/**
 * Apply debug/boring to the environment.
 * Precedence: CLI flag > SCRIPT_DEBUGGER_DEBUG=1 / SCRIPT_DEBUGGER_BORING=1 >
 * config default.
 */
export const applyRootFlags = (
  flags: { debug?: boolean; boring?: boolean },
  defaults: { debugDefault: boolean; boringDefault: boolean },
): void => {
  const envDebugActive = process.env.SCRIPT_DEBUGGER_DEBUG === '1';
  let debugFinal = defaults.debugDefault;
  if (typeof flags.debug === 'boolean') debugFinal = flags.debug;
  else if (envDebugActive) debugFinal = true;

  const envBoringActive = process.env.SCRIPT_DEBUGGER_BORING === '1';
  let boringFinal = defaults.boringDefault;
  if (typeof flags.boring === 'boolean') boringFinal = flags.boring;
  else if (envBoringActive) boringFinal = true;

  if (debugFinal) process.env.SCRIPT_DEBUGGER_DEBUG = '1';
  else delete process.env.SCRIPT_DEBUGGER_DEBUG;

  if (boringFinal) {
    process.env.SCRIPT_DEBUGGER_BORING = '1';
    process.env.FORCE_COLOR = '0';
    process.env.NO_COLOR = '1';
  } else {
    delete process.env.SCRIPT_DEBUGGER_BORING;
  }
};
