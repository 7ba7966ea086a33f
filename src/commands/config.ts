import chalk from 'chalk';
import { configExists, initConfig, loadConfig, CONFIG_PATHS } from '../utils/index.js';

export async function configInitCommand(options: { force?: boolean }): Promise<void> {
  const existing = await configExists();
  if (existing && !options.force) {
    console.log(chalk.yellow(`Config already exists at ${existing} (use --force to overwrite)`));
    return;
  }
  const path = await initConfig(existing ?? undefined);
  console.log(chalk.green(`✓ Wrote default config to ${path}`));
}

export async function configShowCommand(options: { config?: string }): Promise<void> {
  const config = await loadConfig(options.config);
  console.log(JSON.stringify(config, null, 2));
}

export async function configPathCommand(): Promise<void> {
  const existing = await configExists();
  console.log(existing ?? chalk.dim(`No config file (searched ${CONFIG_PATHS.join(', ')})`));
}
