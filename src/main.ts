#!/usr/bin/env node
import { buildProgram, describeError } from './cli';
import { ExitCode } from './submissionService';

buildProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.stderr.write(`Error: ${describeError(error)}\n`);
    process.exitCode = ExitCode.Failure;
  });
