import { describe, expect, it } from 'vitest';

import { extractExceptionRecord, RECORD_MARKER } from './exception-record';

describe('extractExceptionRecord', () => {
  it('returns the record and stderr without its line', () => {
    const stderr = [
      'Traceback (most recent call last):',
      '  File "<stdin>", line 1, in <module>',
      'ValueError: boom',
      'hint',
      `${RECORD_MARKER}{"type": "ValueError", "message": "boom"}`,
      '',
    ].join('\n');
    expect(extractExceptionRecord(stderr)).toEqual({
      record: { type: 'ValueError', message: 'boom' },
      rest: [
        'Traceback (most recent call last):',
        '  File "<stdin>", line 1, in <module>',
        'ValueError: boom',
        'hint',
        '',
      ].join('\n'),
    });
  });

  it('decodes escaped multi-line messages', () => {
    const stderr = `${RECORD_MARKER}{"type": "RuntimeError", "message": "first\\nsecond \\u00e9"}\r\n`;
    expect(extractExceptionRecord(stderr)).toEqual({
      record: { type: 'RuntimeError', message: 'first\nsecond é' },
      rest: '',
    });
  });

  it('leaves stderr alone when there is no record', () => {
    expect(extractExceptionRecord('sh: 1: python3: not found\n')).toEqual({
      rest: 'sh: 1: python3: not found\n',
    });
  });

  it('ignores the marker when it does not start a line', () => {
    const stderr = `echo ${RECORD_MARKER}{"type": "X", "message": ""}\n`;
    expect(extractExceptionRecord(stderr)).toEqual({ rest: stderr });
  });

  it('drops a malformed record without using it', () => {
    expect(
      extractExceptionRecord(`before\n${RECORD_MARKER}{"type": ""}\n`),
    ).toEqual({ rest: 'before\n' });
    expect(extractExceptionRecord(`${RECORD_MARKER}{not json`)).toEqual({
      rest: '',
    });
  });
});
