// src/test-support/target.ts
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Writable } from 'node:stream';
import { fileURLToPath } from 'node:url';

import { TARGET_FILE } from '@/runner/debug/service';

const fakeInterpreterPath = fileURLToPath(
  new URL('../test/fixtures/fake-interpreter.mjs', import.meta.url),
);

/** Shell command running the directive-driven stand-in interpreter under this Node. */
export const fakeInterpreterCommand = `"${process.execPath}" "${fakeInterpreterPath}"`;

/** Write ./test.py in `dir` from directive lines. */
export const writeTarget = async (
  dir: string,
  lines: string[],
): Promise<string> => {
  const abs = path.join(dir, TARGET_FILE);
  await writeFile(abs, `${lines.join('\n')}\n`, 'utf8');
  return abs;
};

/** A writable sink that records everything written to it. */
export const collectingStream = (): {
  stream: Writable;
  text: () => string;
} => {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString('utf8') };
};
