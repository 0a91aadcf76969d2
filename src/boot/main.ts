#!/usr/bin/env node
/**
 * Process entry point
 */

import chalk from 'chalk';

import { createProgram } from './cli';
import { initialize } from './init';

function waitForStop(): Promise<string> {
  return new Promise(function(resolve) {
    process.once('SIGINT', function() { resolve('SIGINT'); });
    process.once('SIGTERM', function() { resolve('SIGTERM'); });
  });
}

const program = createProgram({ initialize: initialize, waitForStop: waitForStop });

program.parseAsync(process.argv).catch(function(err: unknown) {
  console.error(chalk.red('Error:'), err instanceof Error ? err.message : String(err));
  process.exit(1);
});
