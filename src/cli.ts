import { Command } from 'commander';
import chalk from 'chalk';
import { cleanCommand } from './commands/clean.js';
import { tasksCommand } from './commands/tasks.js';
import { configInitCommand, configPathCommand, configShowCommand } from './commands/config.js';
import { uiCommand } from './commands/ui.js';
import { ConfigError } from './utils/errors.js';

const VERSION = '0.3.0';

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, ...value.split(',').map((v) => v.trim()).filter(Boolean)];
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('quick-cleaner')
    .description('Free disk space by clearing temp folders, the Recycle Bin, thumbnail and browser caches')
    .version(VERSION, '-v, --version', 'Output the current version');

  program
    .command('clean', { isDefault: true })
    .description('Run every enabled cleanup task')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .option('-s, --select', 'Pick the tasks to run interactively')
    .option('--only <categories>', 'Run only these categories (comma separated)', collect)
    .option('--enable <categories>', 'Enable categories that are off by default', collect)
    .option('--disable <categories>', 'Skip these categories', collect)
    .option('-c, --config <path>', 'Use this config file')
    .option('--no-progress', 'Do not draw the progress bar')
    .option('--json', 'Print the run summary as JSON')
    .option('--verbose', 'Log every step')
    .action(async (options) => {
      await cleanCommand(options);
    });

  program
    .command('tasks')
    .description('List configured tasks and detected browsers')
    .option('-c, --config <path>', 'Use this config file')
    .action(async (options) => {
      await tasksCommand(options);
    });

  const config = program.command('config').description('Manage the config file');
  config
    .command('init')
    .description('Write the default task list to the config file')
    .option('-f, --force', 'Overwrite an existing config')
    .action(async (options) => {
      await configInitCommand(options);
    });
  config
    .command('show')
    .description('Print the effective configuration')
    .option('-c, --config <path>', 'Use this config file')
    .action(async (options) => {
      await configShowCommand(options);
    });
  config
    .command('path')
    .description('Print the config file in use')
    .action(async () => {
      await configPathCommand();
    });

  program
    .command('ui')
    .description('Start the local dashboard API')
    .option('-p, --port <port>', 'Port to listen on', '3000')
    .option('-c, --config <path>', 'Use this config file')
    .action(async (options) => {
      await uiCommand(options);
    });

  return program;
}

export async function runCli(args: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(args);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(chalk.red(`✗ ${error.message}`));
      process.exitCode = 1;
      return;
    }
    throw error;
  }
}
