import chalk from 'chalk';
import ora from 'ora';
import type { CategoryId } from '../types.js';
import { CATEGORIES } from '../types.js';
import { loadConfig, taskName, isTaskEnabled, PathResolver } from '../utils/index.js';

export interface TasksCommandOptions {
  config?: string;
}

export async function tasksCommand(options: TasksCommandOptions): Promise<void> {
  const config = await loadConfig(options.config);
  const resolver = PathResolver.fromEnvironment();

  const spinner = ora('Detecting installed browsers...').start();
  let installed: Partial<Record<CategoryId, boolean>>;
  try {
    installed = await resolver.detectInstalled();
    spinner.stop();
  } catch (error) {
    spinner.fail('Browser detection failed');
    throw error;
  }

  console.log();
  console.log(chalk.bold('Cleanup tasks') + chalk.dim(' (run in this order)'));
  console.log(chalk.dim('─'.repeat(60)));

  for (const descriptor of config.tasks) {
    const category = CATEGORIES[descriptor.category];
    const enabled = isTaskEnabled(descriptor);
    const state = enabled ? chalk.green('on ') : chalk.dim('off');
    const detected = installed[category.id];
    const note =
      detected === false ? chalk.dim(' (no data found)') : category.scope === 'system' ? chalk.yellow(' (needs admin)') : '';

    console.log(`  ${state}  ${taskName(descriptor).padEnd(26)} ${chalk.dim(category.id.padEnd(14))}${note}`);
  }

  console.log();
}
