/* src/runner/util/debug-scopes.ts
 * Centralized labels for debugLog/debugFallback.
 * Keeping these in one place ensures logs and tests remain consistent.
 */

/** cli config loader */
export const DBG_SCOPE_CLI_CONFIG_LOAD = 'cli.config:load';

/** root defaults resolver (config unreadable while building the CLI) */
export const DBG_SCOPE_CLI_ROOT_DEFAULTS = 'cli.root:defaults';

/** target file read */
export const DBG_SCOPE_TARGET_READ = 'debug.service:read';

/** interpreter spawn/exit */
export const DBG_SCOPE_EXEC_SPAWN = 'exec.run-script:spawn';

/** interpreter timeout/kill escalation */
export const DBG_SCOPE_EXEC_TIMEOUT = 'exec.run-script:timeout';

/** exception record written by the interpreter hook */
export const DBG_SCOPE_EXCEPTION_RECORD = 'exec.exception-record:parse';

/** traceback parse */
export const DBG_SCOPE_TRACEBACK = 'exec.traceback:parse';

// Add new scope tokens here; tests reference these exact tokens.
