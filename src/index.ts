#!/usr/bin/env node
import { createProgram } from './cli/program';
import { formatError } from './cli/formatters';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(formatError(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  });
