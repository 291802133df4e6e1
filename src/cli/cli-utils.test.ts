import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Option } from 'commander';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { makeTempDir, rmDirWithRetries } from '@/test';

import { applyRootFlags, rootDefaults, tagDefault } from './cli-utils';

describe('cli-utils', () => {
  const envBackup = { ...process.env };
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('script-debugger-cli-');
  });

  afterEach(async () => {
    process.env = { ...envBackup };
    await rmDirWithRetries(dir);
  });

  it('tags an option description once', () => {
    const opt = new Option('-d, --debug', 'enable verbose debug logging');
    tagDefault(opt, true);
    tagDefault(opt, true);
    expect(opt.description).toBe('enable verbose debug logging (default)');
  });

  it('reads debug/boring defaults from config', async () => {
    await writeFile(
      path.join(dir, 'script-debugger.config.yml'),
      'cliDefaults:\n  debug: true\n',
      'utf8',
    );
    expect(rootDefaults(dir)).toEqual({
      debugDefault: true,
      boringDefault: false,
    });
  });

  it('falls back to built-ins when the config is invalid', async () => {
    await writeFile(
      path.join(dir, 'script-debugger.config.yml'),
      'cliDefaults:\n  color: true\n',
      'utf8',
    );
    expect(rootDefaults(dir)).toEqual({
      debugDefault: false,
      boringDefault: false,
    });
  });

  it('lets a CLI flag override the environment', () => {
    process.env.SCRIPT_DEBUGGER_DEBUG = '1';
    applyRootFlags(
      { debug: false },
      { debugDefault: true, boringDefault: false },
    );
    expect(process.env.SCRIPT_DEBUGGER_DEBUG).toBeUndefined();
  });

  it('keeps an environment debug request over a config default', () => {
    process.env.SCRIPT_DEBUGGER_DEBUG = '1';
    applyRootFlags({}, { debugDefault: false, boringDefault: false });
    expect(process.env.SCRIPT_DEBUGGER_DEBUG).toBe('1');
  });

  it('applies boring from config and disables color variables', () => {
    delete process.env.SCRIPT_DEBUGGER_BORING;
    applyRootFlags({}, { debugDefault: false, boringDefault: true });
    expect(process.env.SCRIPT_DEBUGGER_BORING).toBe('1');
    expect(process.env.NO_COLOR).toBe('1');
    expect(process.env.FORCE_COLOR).toBe('0');
  });

  it('keeps an environment boring request when no flag or config sets it', () => {
    process.env.SCRIPT_DEBUGGER_BORING = '1';
    applyRootFlags({}, { debugDefault: false, boringDefault: false });
    expect(process.env.SCRIPT_DEBUGGER_BORING).toBe('1');
  });

  it('clears boring when negated on the command line', () => {
    process.env.SCRIPT_DEBUGGER_BORING = '1';
    applyRootFlags(
      { boring: false },
      { debugDefault: false, boringDefault: true },
    );
    expect(process.env.SCRIPT_DEBUGGER_BORING).toBeUndefined();
  });
});
