/* src/runner/explain/report.ts
 * Render and print the error report (header, raw message, explanation block).
 */
import { bold, error } from '@/runner/util/color';

import { type ErrorCategory, EXPLANATIONS } from './classify';

/**
 * Build the report lines for a caught error.
 *
 * The raw message is kept verbatim, including embedded newlines, so a
 * multi-line message occupies more than one physical line.
 */
export const renderReport = (
  message: string,
  category: ErrorCategory,
): string[] => [
  bold('Error detected:'),
  error(message),
  '',
  bold('Explanation:'),
  EXPLANATIONS[category],
];

export const printReport = (message: string, category: ErrorCategory): void => {
  for (const line of renderReport(message, category)) console.log(line);
};
