#!/usr/bin/env node
import { hideBin } from 'yargs/helpers';

import { createCli } from './cli.js';
import { errorMessage } from './audit/errors.js';

createCli(hideBin(process.argv), { cwd: process.cwd(), print: (text) => console.log(text) })
  .fail((msg, error) => {
    if (error) throw error;
    console.error(msg);
    process.exit(1);
  })
  .parseAsync()
  .catch((error: unknown) => {
    console.error(`sg-audit: ${errorMessage(error)}`);
    process.exitCode = 1;
  });
