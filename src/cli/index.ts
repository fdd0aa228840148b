#!/usr/bin/env node
/**
 * rulesmith CLI - compose rule guidance for a file path
 */

import 'dotenv/config';
import { runCli } from './run.js';
import { logger } from '../base/utils/logger.js';
import { errorMessage } from '../core/rules/errors.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('cli', 'Unexpected failure', { error: errorMessage(error) });
    process.exitCode = 1;
  });
