/* src/runner/util/debug.ts
 * Centralized, opt-in debug logger.
 * Emits only when SCRIPT_DEBUGGER_DEBUG=1 to avoid noisy output in normal mode.
 */
import { dim } from './color';

export const isDebug = (): boolean =>
  process.env.SCRIPT_DEBUGGER_DEBUG === '1';

/** Log a debug line (scope: module:function). stderr keeps stdout clean for the report. */
export const debugLog = (scope: string, message: string): void => {
  if (!isDebug()) return;
  console.error(dim(`script-debugger: debug: ${scope}: ${message}`));
};

/** Log a concise fallback notice under SCRIPT_DEBUGGER_DEBUG=1. */
export const debugFallback = (scope: string, reason: string): void => {
  if (!isDebug()) return;
  console.error(
    dim(`script-debugger: debug: fallback: ${scope}: ${reason}`),
  );
};
