/* src/runner/exec/exception-record.ts
 * The one-line record the interpreter hook writes after its report.
 */
import { z } from 'zod';

import { debugFallback } from '@/runner/util/debug';
import { DBG_SCOPE_EXCEPTION_RECORD } from '@/runner/util/debug-scopes';

export const RECORD_MARKER = 'script-debugger:exception:';

const recordSchema = z.object({
  /** Type name as the report prints it (module-qualified outside builtins). */
  type: z.string().min(1),
  /** str(e) */
  message: z.string(),
  /** An Exception subclass, as opposed to a process-level BaseException. */
  ordinary: z.boolean().optional(),
});

export type ExceptionRecord = z.infer<typeof recordSchema>;

/**
 * Take the hook's record out of `stderr`.
 *
 * @returns the record, if a valid one was written, and stderr without the
 * record line.
 */
export const extractExceptionRecord = (
  stderr: string,
): { record?: ExceptionRecord; rest: string } => {
  const at = stderr.lastIndexOf(RECORD_MARKER);
  if (at < 0 || (at > 0 && stderr[at - 1] !== '\n')) return { rest: stderr };

  const nl = stderr.indexOf('\n', at);
  const end = nl < 0 ? stderr.length : nl + 1;
  const rest = stderr.slice(0, at) + stderr.slice(end);
  const raw = stderr
    .slice(at + RECORD_MARKER.length, nl < 0 ? stderr.length : nl)
    .replace(/\r$/, '');

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e) {
    debugFallback(
      DBG_SCOPE_EXCEPTION_RECORD,
      e instanceof Error ? e.message : String(e),
    );
    return { rest };
  }
  const parsed = recordSchema.safeParse(json);
  if (!parsed.success) {
    debugFallback(DBG_SCOPE_EXCEPTION_RECORD, 'record does not match schema');
    return { rest };
  }
  return { record: parsed.data, rest };
};
