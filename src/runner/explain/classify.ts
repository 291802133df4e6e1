/* src/runner/explain/classify.ts
 * Display-only classification of an error message by substring.
 * First match wins; the checks are literal and order matters.
 */

export type ErrorCategory = 'undefined-name' | 'syntax' | 'other';

/** Explanation printed under each category. */
export const EXPLANATIONS: Readonly<Record<ErrorCategory, string>> = {
  'undefined-name': 'You are using a variable before assigning a value.',
  syntax: 'There is a syntax mistake. Check brackets or colons.',
  other: 'An error occurred. Please check your code.',
};

export const classifyMessage = (message: string): ErrorCategory => {
  if (message.includes('not defined')) return 'undefined-name';
  if (message.toLowerCase().includes('syntax')) return 'syntax';
  return 'other';
};
