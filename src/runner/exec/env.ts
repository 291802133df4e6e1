/* src/runner/exec/env.ts
 * Child process environment preparation (PYTHONPATH augmentation for the
 * exception hook).
 */
import { delimiter } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Directory holding the interpreter-side hook (sitecustomize.py). */
export const hookDir = fileURLToPath(new URL('./python', import.meta.url));

/** Env switch the hook checks (and removes, so nested interpreters skip it). */
export const HOOK_ENV = 'SCRIPT_DEBUGGER_HOOK';

/** Build child env with PYTHONPATH prefixed by the hook directory. */
export const buildChildEnv = (
  parentEnv: NodeJS.ProcessEnv,
): NodeJS.ProcessEnv => ({
  ...parentEnv,
  PYTHONPATH: [hookDir, parentEnv.PYTHONPATH ?? '']
    .filter(Boolean)
    .join(delimiter),
  [HOOK_ENV]: '1',
});
