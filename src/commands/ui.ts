import chalk from 'chalk';
import { startServer } from '../server/index.js';
import { loadConfig } from '../utils/index.js';
import { CleaningEngine } from '../engine/cleaning-engine.js';

export async function uiCommand(options: { port?: string; config?: string }): Promise<void> {
  const port = options.port ? parseInt(options.port, 10) : 3000;
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid port: ${options.port}`);
  }

  const config = await loadConfig(options.config);
  const engine = new CleaningEngine({ tasks: config.tasks, progressCapacity: config.progressCapacity });

  console.log(chalk.cyan('Starting dashboard API...'));
  console.log(chalk.dim('Press Ctrl+C to stop the server.'));

  const url = startServer(engine, port);

  console.log(chalk.green(`\nDashboard API available at: ${chalk.underline(url)}\n`));
}
