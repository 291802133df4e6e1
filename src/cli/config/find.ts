/* src/cli/config/find.ts
 * Locate the nearest script-debugger.config.* walking up from a directory.
 */
import { existsSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

export const CONFIG_FILE_NAMES = [
  'script-debugger.config.yml',
  'script-debugger.config.yaml',
  'script-debugger.config.json',
] as const;

/** Nearest-first search; returns the absolute path or null when none exists. */
export const findConfigPathSync = (cwd: string): string | null => {
  let cur = resolve(cwd);
  for (;;) {
    for (const name of CONFIG_FILE_NAMES) {
      const p = join(cur, name);
      if (existsSync(p)) return p;
    }
    const parent = dirname(cur);
    if (parent === cur) return null;
    cur = parent;
  }
};
