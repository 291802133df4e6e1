/* src/runner/exec/run-script.ts
 * Execute script source with the interpreter command (stdout passthrough,
 * stderr capture, timeout with kill escalation).
 *
 * Running the script is inherently unsafe: it executes with the caller's full
 * privileges. Nothing here sandboxes it.
 */
import { spawn } from 'node:child_process';
import { constants } from 'node:os';

import treeKill from 'tree-kill';

import {
  InterpreterUnavailableError,
  ScriptFailure,
  ScriptTimeoutError,
} from '@/runner/errors';
import { debugLog } from '@/runner/util/debug';
import {
  DBG_SCOPE_EXEC_SPAWN,
  DBG_SCOPE_EXEC_TIMEOUT,
} from '@/runner/util/debug-scopes';

import { buildChildEnv } from './env';
import { extractExceptionRecord } from './exception-record';
import { isProcessLevel, parseTraceback } from './traceback';

export const DEFAULT_INTERPRETER = 'python3 -';
export const DEFAULT_TIMEOUT_GRACE = 10;

export type ExecOptions = {
  cwd: string;
  /** Shell command that reads the program from stdin. */
  command: string;
  /** Seconds before the script is terminated; 0/undefined disables. */
  timeout?: number;
  /** Seconds between SIGTERM and SIGKILL of the process tree. */
  timeoutGrace?: number;
  /** Receives the script's stdout as it arrives (default: process.stdout). */
  stdout?: NodeJS.WritableStream;
  /** Receives forwarded stderr (default: process.stderr). */
  stderr?: NodeJS.WritableStream;
};

export type ExecResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
  timedOut: boolean;
};

/** A script run that did not raise: it completed, or it ended the process itself. */
export type ScriptResult = { kind: 'ok' } | { kind: 'exit'; code: number };

/** Spawn the interpreter, feed it `source` on stdin and wait for it to exit. */
export const executeSource = async (
  source: string,
  opts: ExecOptions,
): Promise<ExecResult> => {
  const out = opts.stdout ?? process.stdout;
  const child = spawn(opts.command, {
    cwd: opts.cwd,
    shell: true,
    windowsHide: true,
    env: buildChildEnv(process.env),
  });
  debugLog(
    DBG_SCOPE_EXEC_SPAWN,
    `${opts.command} (pid ${String(child.pid)}, cwd ${opts.cwd})`,
  );

  let stderr = '';
  child.stdout.on('data', (d: Buffer) => {
    out.write(d);
  });
  // Decode as a stream so characters split across chunks survive.
  child.stderr.setEncoding('utf8');
  child.stderr.on('data', (d: string) => {
    stderr += d;
  });
  // The interpreter may exit before draining stdin (e.g. command not found).
  child.stdin.on('error', (e) => {
    debugLog(DBG_SCOPE_EXEC_SPAWN, `stdin: ${e.message}`);
  });
  child.stdin.end(source);

  const timeoutSec =
    typeof opts.timeout === 'number' && opts.timeout > 0 ? opts.timeout : 0;
  const graceSec =
    typeof opts.timeoutGrace === 'number' && opts.timeoutGrace > 0
      ? opts.timeoutGrace
      : DEFAULT_TIMEOUT_GRACE;
  let timedOut = false;
  let timer: NodeJS.Timeout | undefined;
  let killTimer: NodeJS.Timeout | undefined;

  if (timeoutSec > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      debugLog(DBG_SCOPE_EXEC_TIMEOUT, `SIGTERM after ${String(timeoutSec)}s`);
      child.kill('SIGTERM');
      // escalate to SIGKILL of the whole tree after grace
      killTimer = setTimeout(() => {
        const pid = child.pid;
        if (typeof pid !== 'number') return;
        debugLog(DBG_SCOPE_EXEC_TIMEOUT, `SIGKILL tree of ${String(pid)}`);
        treeKill(pid, 'SIGKILL', (err) => {
          if (err) debugLog(DBG_SCOPE_EXEC_TIMEOUT, err.message);
        });
      }, graceSec * 1000);
    }, timeoutSec * 1000);
  }

  try {
    const { exitCode, signal } = await new Promise<{
      exitCode: number | null;
      signal: NodeJS.Signals | null;
    }>((resolveP, rejectP) => {
      child.on('error', (e) =>
        rejectP(e instanceof Error ? e : new Error(String(e))),
      );
      child.on('close', (code, sig) =>
        resolveP({ exitCode: code, signal: sig }),
      );
    });
    debugLog(
      DBG_SCOPE_EXEC_SPAWN,
      `exit ${String(exitCode)}${signal ? ` (${signal})` : ''}`,
    );
    return { exitCode, signal, stderr, timedOut };
  } finally {
    if (timer) clearTimeout(timer);
    if (killTimer) clearTimeout(killTimer);
  }
};

/** Exit status a shell reports for a signal-terminated child. */
const signalExitCode = (signal: NodeJS.Signals): number =>
  128 + (constants.signals[signal] ?? 0);

/**
 * Map an interpreter exit onto the script's result.
 *
 * The hook's exception record is preferred over the traceback text; stderr
 * is forwarded without it. On failure only what the script wrote before the
 * report is forwarded.
 *
 * @throws ScriptTimeoutError - the run was cut short by the timeout.
 * @throws ScriptFailure - stderr carries an ordinary exception report.
 * @throws InterpreterUnavailableError - the shell could not run the command.
 */
export const interpretResult = (
  result: ExecResult,
  opts: Pick<ExecOptions, 'command' | 'timeout' | 'stderr'>,
): ScriptResult => {
  const errOut = opts.stderr ?? process.stderr;
  if (result.timedOut) throw new ScriptTimeoutError(opts.timeout ?? 0);

  const { record, rest } = extractExceptionRecord(result.stderr);
  if (result.exitCode === 0) {
    if (rest.length > 0) errOut.write(rest);
    return { kind: 'ok' };
  }

  const parsed = parseTraceback(rest);
  const failure = record
    ? { excType: record.type, message: record.message }
    : parsed;
  const ordinary =
    typeof record?.ordinary === 'boolean'
      ? record.ordinary
      : failure !== undefined && !isProcessLevel(failure.excType);
  if (failure && ordinary) {
    const before = parsed ? parsed.preamble : rest;
    if (before.length > 0) errOut.write(before);
    throw new ScriptFailure(failure.excType, failure.message);
  }

  const code =
    result.exitCode ?? (result.signal ? signalExitCode(result.signal) : 1);
  if (!failure && (code === 126 || code === 127)) {
    const lastLine =
      rest
        .split(/\r?\n/)
        .map((l) => l.trim())
        .filter((l) => l.length > 0)
        .pop() ?? '';
    throw new InterpreterUnavailableError(opts.command, code, lastLine);
  }

  if (rest.length > 0) errOut.write(rest);
  return { kind: 'exit', code };
};

/** Execute `source` and interpret the outcome (see interpretResult). */
export const runScript = async (
  source: string,
  opts: ExecOptions,
): Promise<ScriptResult> =>
  interpretResult(await executeSource(source, opts), opts);
