#!/usr/bin/env tsx
// src/cli/bin/run-examples.ts
// CLI bootstrap (executes the parser).
import { CommanderError } from 'commander';

import { makeCli } from '..';

makeCli()
  .parseAsync()
  .catch((e: unknown) => {
    // help/version/usage errors: commander already printed the message
    if (e instanceof CommanderError) {
      process.exitCode = e.exitCode;
      return;
    }
    console.error(e);
    process.exitCode = 1;
  });
