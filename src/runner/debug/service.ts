/* src/runner/debug/service.ts
 * Read the target file, execute it, and explain whatever it raises.
 */
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { messageOf } from '@/runner/errors';
import {
  DEFAULT_INTERPRETER,
  type ExecOptions,
  runScript,
  type ScriptResult,
} from '@/runner/exec/run-script';
import { classifyMessage, type ErrorCategory } from '@/runner/explain/classify';
import { printReport } from '@/runner/explain/report';
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_TARGET_READ } from '@/runner/util/debug-scopes';

/** The script that is always executed, relative to the working directory. */
export const TARGET_FILE = 'test.py';

export type RunOutcome =
  | { kind: 'ok' }
  | { kind: 'explained'; message: string; category: ErrorCategory }
  | { kind: 'exit'; code: number };

export type DebugRunOptions = Partial<Omit<ExecOptions, 'cwd'>> & {
  /** Replaces interpreter execution (tests). */
  execute?: (source: string, opts: ExecOptions) => Promise<ScriptResult>;
};

/**
 * Run {@link TARGET_FILE} from `cwd` and report a raised error.
 *
 * Every error raised while reading or executing the file is caught here and
 * printed with its explanation; none reaches the caller.
 */
export const runTarget = async (
  cwd: string,
  options: DebugRunOptions = {},
): Promise<RunOutcome> => {
  const { execute = runScript, ...rest } = options;
  const execOpts: ExecOptions = {
    ...rest,
    cwd,
    command: rest.command ?? DEFAULT_INTERPRETER,
  };
  try {
    const source = await readFile(resolve(cwd, TARGET_FILE), 'utf8');
    debugLog(
      DBG_SCOPE_TARGET_READ,
      `${TARGET_FILE}: ${String(source.length)} chars`,
    );
    return await execute(source, execOpts);
  } catch (e) {
    const message = messageOf(e);
    const category = classifyMessage(message);
    printReport(message, category);
    return { kind: 'explained', message, category };
  }
};
