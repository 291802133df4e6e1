import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, rmDirWithRetries } from '@/test';

import { findConfigPathSync } from './find';
import { loadConfig, loadConfigSync } from './load';

describe('config loading', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('script-debugger-cfg-');
  });

  afterEach(async () => {
    await rmDirWithRetries(dir);
  });

  const write = async (name: string, body: string): Promise<string> => {
    const p = path.join(dir, name);
    await writeFile(p, body, 'utf8');
    return p;
  };

  it('returns built-ins when no config exists', async () => {
    await expect(loadConfig(dir)).resolves.toEqual({});
    expect(loadConfigSync(dir)).toEqual({});
  });

  it('parses YAML and coerces boolean-ish defaults', async () => {
    const p = await write(
      'script-debugger.config.yml',
      [
        'interpreter: python3.12 -',
        'timeout: "30"',
        'cliDefaults:',
        '  debug: "1"',
        '  boring: false',
        '',
      ].join('\n'),
    );
    await expect(loadConfig(dir)).resolves.toEqual({
      interpreter: 'python3.12 -',
      timeout: 30,
      cliDefaults: { debug: true, boring: false },
      path: p,
    });
  });

  it('parses JSON by extension', async () => {
    const p = await write(
      'script-debugger.config.json',
      JSON.stringify({ timeoutGrace: 2 }),
    );
    expect(loadConfigSync(dir)).toEqual({ timeoutGrace: 2, path: p });
  });

  it('finds the nearest config walking upward', async () => {
    const p = await write('script-debugger.config.yaml', 'timeout: 4\n');
    const nested = path.join(dir, 'a', 'b');
    await mkdir(nested, { recursive: true });
    expect(findConfigPathSync(nested)).toBe(p);
    expect(loadConfigSync(nested).timeout).toBe(4);
  });

  it('treats an empty file as no settings', async () => {
    const p = await write('script-debugger.config.yml', '');
    expect(loadConfigSync(dir)).toEqual({ path: p });
  });

  it('reports every schema issue with its path', async () => {
    await write(
      'script-debugger.config.yml',
      ['timeout: -1', 'target: other.py', ''].join('\n'),
    );
    const rel = path
      .join(dir, 'script-debugger.config.yml')
      .replace(/\\/g, '/');
    expect(() => loadConfigSync(dir)).toThrow(
      [
        `script-debugger: invalid config in ${rel}`,
        'timeout: Number must be greater than 0',
        "(root): Unrecognized key(s) in object: 'target'",
      ].join('\n'),
    );
  });

  it('rejects an empty interpreter command', async () => {
    await write('script-debugger.config.yml', 'interpreter: "  "\n');
    await expect(loadConfig(dir)).rejects.toThrow(
      'interpreter: interpreter must be a non-empty command',
    );
  });

  it('reports unparseable text', async () => {
    await write('script-debugger.config.json', '{ "timeout": ');
    expect(() => loadConfigSync(dir)).toThrow(/unreadable config in/);
  });
});
