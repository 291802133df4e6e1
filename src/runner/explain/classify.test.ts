import { describe, expect, it } from 'vitest';

import { classifyMessage, EXPLANATIONS } from './classify';

describe('classifyMessage', () => {
  it('treats "not defined" as an undefined name', () => {
    expect(classifyMessage("name 'x' is not defined")).toBe('undefined-name');
  });

  it('matches "not defined" case-sensitively', () => {
    expect(classifyMessage("name 'x' is NOT DEFINED")).toBe('other');
  });

  it('matches "syntax" in any case', () => {
    expect(classifyMessage('invalid syntax (<stdin>, line 1)')).toBe('syntax');
    expect(classifyMessage('Bad SYNTAX here')).toBe('syntax');
  });

  it('prefers the undefined-name branch when both substrings occur', () => {
    expect(classifyMessage('syntax helper is not defined')).toBe(
      'undefined-name',
    );
  });

  it('falls back to other', () => {
    expect(classifyMessage('division by zero')).toBe('other');
    expect(classifyMessage('')).toBe('other');
  });

  it('maps a missing-file message to other', () => {
    expect(
      classifyMessage(
        "ENOENT: no such file or directory, open '/tmp/work/test.py'",
      ),
    ).toBe('other');
  });

  it('carries one explanation per category', () => {
    expect(EXPLANATIONS).toEqual({
      'undefined-name': 'You are using a variable before assigning a value.',
      syntax: 'There is a syntax mistake. Check brackets or colons.',
      other: 'An error occurred. Please check your code.',
    });
  });
});
