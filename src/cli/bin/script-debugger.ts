// src/cli/bin/script-debugger.ts
// CLI bootstrap (executes the parser). Kept separate from src/cli/index.ts so
// tests can build the CLI without running it.
import { CommanderError } from 'commander';

import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // Commander has already printed help or the usage error.
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    console.error(e instanceof Error ? e.message : String(e));
    process.exitCode = 1;
  });
