/* src/runner/util/color.ts
 * Meaning-based color helpers that respect SCRIPT_DEBUGGER_BORING/NO_COLOR/FORCE_COLOR.
 * BORING or non‑TTY => return unstyled strings.
 */
import chalk from 'chalk';

export function isBoring(): boolean {
  // Compute TTY dynamically so tests and callers can toggle isTTY/env reliably.
  const tty = Boolean(process.stdout.isTTY);
  return (
    process.env.SCRIPT_DEBUGGER_BORING === '1' ||
    process.env.NO_COLOR === '1' ||
    process.env.FORCE_COLOR === '0' ||
    !tty
  );
}

/** Semantic aliases (unstyled in BORING/non‑TTY) */
export function error(s: string): string {
  return isBoring() ? s : chalk.red(s);
}

export function dim(s: string): string {
  return isBoring() ? s : chalk.dim(s);
}

/** Text styles (unstyled in BORING/non‑TTY) */
export function bold(s: string): string {
  return isBoring() ? s : chalk.bold(s);
}
