#!/usr/bin/env node
import { createProgram } from './program.js';
import { handleError } from './utils/errors.js';

const program = createProgram();

program.parseAsync(process.argv).catch((err: unknown) => {
  handleError(err, process.argv.includes('--json'));
});
