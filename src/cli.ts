#!/usr/bin/env node

import { describeError } from './lib/errors.js';
import { createProgram } from './program.js';

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(describeError(err));
    process.exitCode = 1;
  });
