#!/usr/bin/env node
/**
 * modsync client entry point
 */

import { getLog } from '@modsync/core';
import { createProgram } from './commands';

const log = getLog('cli');

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    log.fatal({ err: error }, 'Command failed');
    process.exitCode = 1;
  });
