/* src/runner/exec/traceback.ts
 * Recover the raised exception from an interpreter's stderr report.
 */
import { debugLog } from '@/runner/util/debug';
import { DBG_SCOPE_TRACEBACK } from '@/runner/util/debug-scopes';

export type ParsedTraceback = {
  /** Exception type as printed (may be dotted, e.g. json.decoder.JSONDecodeError). */
  excType: string;
  /** Exception text as the runtime renders it for str(e). */
  message: string;
  /** stderr written before the report began (the script's own output). */
  preamble: string;
};

const HEADER = 'Traceback (most recent call last):';
const FRAME = /^\s+File "(.*)", line (\d+)/;
const EXCEPTION_LINE = /^([A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*)(?::(?: (.*))?)?$/;

/** Types whose str(e) carries a "(file, line n)" suffix. */
const SYNTAX_FAMILY = new Set(['SyntaxError', 'IndentationError', 'TabError']);

/**
 * Exceptions that terminate the interpreter rather than signal a bug; they
 * are not caught, so the script's own exit stands.
 */
const PROCESS_LEVEL = new Set([
  'SystemExit',
  'KeyboardInterrupt',
  'GeneratorExit',
  'BaseException',
]);

export const isProcessLevel = (excType: string): boolean =>
  PROCESS_LEVEL.has(excType);

const isIndentedOrBlank = (line: string): boolean =>
  line.trim().length === 0 || /^\s/.test(line);

/** Lines of a top-level exception group report are prefixed with "  | ". */
const GROUP_HEADER = '  + Exception Group Traceback (most recent call last):';
const GROUP_PREFIX = /^  \| ?/;

const isReportStart = (line: string): boolean =>
  line === HEADER || line === GROUP_HEADER;

/**
 * Parse the last exception report in `stderr`.
 *
 * Reads past the frames that follow the final `Traceback` header (or, for
 * compile-time syntax errors that have no header, the first `File "…"`
 * frame) to the unindented `Type: message` line. Lines after it are the rest
 * of a multi-line message; notes the runtime prints after the message cannot
 * be told apart from it here.
 *
 * An exception group report is unwrapped first: its `  | ` prefix is
 * stripped up to the `  +-+` line that opens the sub-exceptions, and the
 * group's own line becomes the exception line.
 *
 * @returns `undefined` when no exception report is found.
 */
export const parseTraceback = (stderr: string): ParsedTraceback | undefined => {
  const lines = stderr.replace(/\r\n/g, '\n').split('\n');

  let last = -1;
  for (let k = lines.length - 1; k >= 0; k -= 1) {
    if (isReportStart(lines[k])) {
      last = k;
      break;
    }
  }

  let body: string[];
  let reportStart: number;
  if (last >= 0) {
    // Chained reports start at the first header, not the last one.
    reportStart = lines.findIndex(isReportStart);
    body = lines.slice(last + 1);
    if (lines[last] === GROUP_HEADER) {
      const end = body.findIndex((l) => !GROUP_PREFIX.test(l));
      body = (end < 0 ? body : body.slice(0, end)).map((l) =>
        l.replace(GROUP_PREFIX, ''),
      );
    }
  } else {
    reportStart = lines.findIndex((l) => FRAME.test(l));
    if (reportStart < 0) return undefined;
    body = lines.slice(reportStart);
  }

  let i = 0;
  let location: { file: string; line: string } | undefined;
  while (i < body.length && isIndentedOrBlank(body[i])) {
    const m = FRAME.exec(body[i]);
    if (m) location = { file: m[1], line: m[2] };
    i += 1;
  }
  if (i >= body.length) return undefined;

  const head = EXCEPTION_LINE.exec(body[i]);
  if (!head) {
    debugLog(DBG_SCOPE_TRACEBACK, `unrecognised exception line: ${body[i]}`);
    return undefined;
  }
  const excType = head[1];
  const rest = body.slice(i + 1);
  while (rest.length > 0 && rest[rest.length - 1].trim().length === 0)
    rest.pop();

  let message = [head[2] ?? '', ...rest].join('\n');
  if (SYNTAX_FAMILY.has(excType) && location) {
    message = `${message} (${location.file}, line ${location.line})`;
  }
  const before = lines.slice(0, reportStart);
  const preamble = before.length > 0 ? `${before.join('\n')}\n` : '';
  debugLog(DBG_SCOPE_TRACEBACK, `${excType}: ${message}`);
  return { excType, message, preamble };
};
