import chalk from 'chalk';
import confirm from '@inquirer/confirm';
import checkbox from '@inquirer/checkbox';
import checkDiskSpace from 'check-disk-space';
import { parse } from 'path';
import type { CleaningEvent, Logger, RunSummary, TaskDescriptor } from '../types.js';
import { CleaningEngine } from '../engine/cleaning-engine.js';
import { ConfigError } from '../utils/errors.js';
import { applyTaskOverrides, loadConfig, taskName, isTaskEnabled, formatSize, ProgressBar, PathResolver } from '../utils/index.js';

export interface CleanCommandOptions {
  yes?: boolean;
  select?: boolean;
  only?: string[];
  enable?: string[];
  disable?: string[];
  config?: string;
  progress?: boolean;
  json?: boolean;
  verbose?: boolean;
}

const QUIET_LOGGER: Logger = {
  log: () => undefined,
  warn: () => undefined,
  error: (...args: unknown[]) => console.error(...args),
};

async function freeSpace(drive: string): Promise<number | null> {
  try {
    return (await checkDiskSpace(drive)).free;
  } catch {
    return null;
  }
}

async function selectTasksInteractively(descriptors: TaskDescriptor[]): Promise<TaskDescriptor[]> {
  const selected = await checkbox<number>({
    message: 'Tasks to run',
    choices: descriptors.map((descriptor, index) => ({
      name: taskName(descriptor),
      value: index,
      checked: isTaskEnabled(descriptor),
    })),
    pageSize: 15,
  });
  return descriptors.map((descriptor, index) => ({ ...descriptor, enabled: selected.includes(index) }));
}

export async function cleanCommand(options: CleanCommandOptions): Promise<RunSummary | null> {
  // A prompt would interleave with the JSON on stdout
  if (options.json && !options.yes) {
    throw new ConfigError('--json cannot ask for confirmation, add --yes to clean without the prompt');
  }

  const config = await loadConfig(options.config);
  let descriptors = applyTaskOverrides(config.tasks, {
    only: options.only,
    enable: options.enable,
    disable: options.disable,
  });

  if (options.select) {
    descriptors = await selectTasksInteractively(descriptors);
  }

  const resolver = PathResolver.fromEnvironment();
  const engine = new CleaningEngine({
    tasks: descriptors,
    resolver,
    logger: options.verbose ? console : QUIET_LOGGER,
    progressCapacity: config.progressCapacity,
  });

  const tasks = engine.enabledTasks;
  if (tasks.length === 0) {
    console.log(chalk.yellow('\nNo tasks enabled.\n'));
    return null;
  }

  if (!options.yes) {
    console.log();
    console.log(chalk.bold('Will clean:'));
    for (const task of tasks) {
      console.log(`  ${chalk.cyan('•')} ${task.name}`);
    }
    console.log();
    const proceed = await confirm({
      message: `Permanently delete data from ${tasks.length} locations?`,
      default: false,
    });
    if (!proceed) {
      console.log(chalk.yellow('\nCleaning cancelled.\n'));
      return null;
    }
  }

  const drive = parse(resolver.profileDir).root;
  const freeBefore = await freeSpace(drive);

  const showProgress = options.progress !== false && !options.json && process.stdout.isTTY;
  const progress = showProgress ? new ProgressBar({ total: tasks.length }) : null;

  const onProgress = (event: CleaningEvent): void => {
    if (event.type === 'summary') return;
    const label = `${event.taskName} ${chalk.dim(`· ${formatSize(event.bytesFreedSoFar)} freed`)}`;
    progress?.update(Math.round(event.fraction * event.taskCount), label);
  };

  const onInterrupt = (): void => {
    if (engine.cancel()) {
      console.log(chalk.yellow('\nStopping after the current item...'));
    }
  };
  process.on('SIGINT', onInterrupt);

  let summary: RunSummary;
  try {
    summary = await engine.run(onProgress);
  } finally {
    process.off('SIGINT', onInterrupt);
  }

  progress?.finish();

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  printCleanResults(summary);

  const freeAfter = await freeSpace(drive);
  if (freeBefore !== null && freeAfter !== null) {
    console.log(chalk.dim(`Free space on ${drive}: ${formatSize(freeBefore)} → ${formatSize(freeAfter)}`));
    console.log();
  }

  return summary;
}

const MAX_ERRORS_SHOWN = 3;

export function printCleanResults(summary: RunSummary): void {
  console.log();
  console.log(summary.cancelled ? chalk.bold.yellow('⚠ Cleaning Cancelled') : chalk.bold.green('✓ Cleaning Complete'));
  console.log(chalk.dim('─'.repeat(50)));

  for (const result of summary.results) {
    const size = result.estimated ? `~${formatSize(result.bytesFreed)}` : formatSize(result.bytesFreed);
    const mark = result.itemsFailed > 0 ? chalk.yellow('!') : chalk.green('✓');
    console.log(`  ${result.task.padEnd(30)} ${mark} ${size.padStart(10)} ${chalk.dim(`(${result.itemsDeleted} items)`)}`);

    for (const error of result.errors.slice(0, MAX_ERRORS_SHOWN)) {
      console.log(chalk.dim(`      ${chalk.red('✗')} ${error.path}: ${error.reason}`));
    }
    if (result.errors.length > MAX_ERRORS_SHOWN) {
      console.log(chalk.dim(`      … ${result.errors.length - MAX_ERRORS_SHOWN} more`));
    }
  }

  console.log();
  console.log(chalk.dim('─'.repeat(50)));
  console.log(chalk.bold(`Freed: ${chalk.green(formatSize(summary.totalBytesFreed))}`));
  console.log(chalk.dim(`Cleaned ${summary.totalItemsDeleted} items`));

  if (summary.totalItemsFailed > 0) {
    console.log(chalk.red(`Skipped: ${summary.totalItemsFailed} items in use or protected`));
  }

  console.log();
}
