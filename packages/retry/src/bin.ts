#!/usr/bin/env node

import { extractErrorInfo } from '@rebound/errors';
import { LoggerFactory } from '@rebound/logging';

import { createCli } from './cli.js';

const logger = LoggerFactory.createConsoleLogger('rebound', 'INFO');

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error('Command failed', error, extractErrorInfo(error));
    process.exitCode = 1;
  });
