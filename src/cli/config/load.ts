/* src/cli/config/load.ts
 * Load and validate script-debugger configuration from script-debugger.config.*.
 */
import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';

import { ZodError } from 'zod';

import { parseConfigText } from '@/common/config/parse';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_CLI_CONFIG_LOAD } from '@/runner/util/debug-scopes';

import { findConfigPathSync } from './find';
import { configSchema, type DebuggerConfig } from './schema';

export type LoadedConfig = DebuggerConfig & {
  /** Absolute path of the file the values came from (absent for built-ins). */
  path?: string;
};

const formatZodError = (e: unknown): string =>
  e instanceof ZodError
    ? e.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('\n')
    : String(e);

const parseNode = (text: string, cfgPath: string): LoadedConfig => {
  const rel = cfgPath.replace(/\\/g, '/');
  let root: unknown;
  try {
    root = parseConfigText(cfgPath, text);
  } catch (e) {
    throw new Error(
      `script-debugger: unreadable config in ${rel}\n${e instanceof Error ? e.message : String(e)}`,
    );
  }
  // An empty YAML document parses to null; treat it as "no settings".
  const result = configSchema.safeParse(root ?? {});
  if (!result.success) {
    throw new Error(
      `script-debugger: invalid config in ${rel}\n${formatZodError(result.error)}`,
    );
  }
  debugLog(DBG_SCOPE_CLI_CONFIG_LOAD, `loaded ${rel}`);
  return { ...result.data, path: cfgPath };
};

/** Load and validate the config nearest to `cwd` (empty when none exists). */
export const loadConfig = async (cwd: string): Promise<LoadedConfig> => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return {};
  return parseNode(await readFile(cfgPath, 'utf8'), cfgPath);
};

/** Synchronous variant for CLI construction/help default tagging. */
export const loadConfigSync = (cwd: string): LoadedConfig => {
  const cfgPath = findConfigPathSync(cwd);
  if (!cfgPath) return {};
  return parseNode(readFileSync(cfgPath, 'utf8'), cfgPath);
};
