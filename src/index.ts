#!/usr/bin/env node
import chalk from 'chalk';
import { runCli } from './cli.js';

runCli().catch((error: unknown) => {
  console.error(chalk.red('✗ Unexpected error:'), error);
  process.exitCode = 1;
});
