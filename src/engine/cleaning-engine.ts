import type {
  CleanerKind,
  CleaningEvent,
  CleanupTask,
  Logger,
  ProgressEvent,
  ProgressEventType,
  ProgressListener,
  RunSummary,
  TaskDescriptor,
  TaskResult,
} from '../types.js';
import { createCleaners } from '../cleaners/index.js';
import type { CleanContext, Cleaner } from '../cleaners/base-cleaner.js';
import { DEFAULT_TASKS } from '../utils/config.js';
import { EngineBusyError, errorCode, errorMessage } from '../utils/errors.js';
import type { FileSystem } from '../utils/fs.js';
import { PathResolver, type LocationResolver } from '../utils/paths.js';
import type { RecycleBin } from '../utils/recycle-bin.js';
import { formatSize } from '../utils/size.js';
import { ProgressChannel } from './progress-channel.js';
import { createTasks } from './tasks.js';

export type EngineState = 'idle' | 'running' | 'completed';

export interface CleaningEngineOptions {
  tasks?: readonly TaskDescriptor[];
  resolver?: LocationResolver;
  recycleBin?: RecycleBin;
  fileSystem?: FileSystem;
  logger?: Logger;
  /** Most progress events queued for a slow listener before intermediate ones are dropped. */
  progressCapacity?: number;
}

/**
 * Runs the configured cleanup tasks one after another and reports what was freed.
 *
 * A run always completes with a summary: task failures end up in the results, never as a rejection.
 * Only one run may be in flight per instance.
 */
export class CleaningEngine {
  readonly tasks: readonly CleanupTask[];
  private readonly cleaners: Record<CleanerKind, Cleaner>;
  private readonly logger: Logger;
  private readonly progressCapacity: number | undefined;
  private currentState: EngineState = 'idle';
  private cancelRequested = false;

  constructor(options: CleaningEngineOptions = {}) {
    const resolver = options.resolver ?? PathResolver.fromEnvironment();
    this.tasks = createTasks(options.tasks ?? DEFAULT_TASKS, resolver);
    this.cleaners = createCleaners({ recycleBin: options.recycleBin, fileSystem: options.fileSystem });
    this.logger = options.logger ?? console;
    this.progressCapacity = options.progressCapacity;
  }

  get state(): EngineState {
    return this.currentState;
  }

  get isRunning(): boolean {
    return this.currentState === 'running';
  }

  get enabledTasks(): CleanupTask[] {
    return this.tasks.filter((task) => task.enabled);
  }

  /**
   * Starts a run. Throws EngineBusyError synchronously if one is already in progress.
   */
  run(onProgress?: ProgressListener): Promise<RunSummary> {
    if (this.currentState === 'running') {
      throw new EngineBusyError();
    }
    this.currentState = 'running';
    this.cancelRequested = false;

    return this.execute(onProgress).finally(() => {
      this.currentState = 'completed';
    });
  }

  /** Asks the current run to stop after the entry it is working on. Returns false when idle. */
  cancel(): boolean {
    if (this.currentState !== 'running') {
      return false;
    }
    if (!this.cancelRequested) {
      this.logger.log('[Engine] Cancellation requested');
    }
    this.cancelRequested = true;
    return true;
  }

  private async execute(onProgress?: ProgressListener): Promise<RunSummary> {
    const startedAt = new Date();
    const channel = new ProgressChannel<CleaningEvent>(onProgress ?? (() => undefined), {
      capacity: this.progressCapacity,
      isDroppable: (event) => event.type === 'task-progress',
      logger: this.logger,
    });
    const shouldStop = () => this.cancelRequested;

    const tasks = this.enabledTasks;
    const results: TaskResult[] = [];
    let bytesFreedSoFar = 0;

    this.logger.log(`[Engine] Starting run with ${tasks.length} tasks`);

    for (const [index, task] of tasks.entries()) {
      if (shouldStop()) break;

      const emit = (type: ProgressEventType, bytes: number, completed: number): void => {
        const event: ProgressEvent = {
          type,
          taskName: task.name,
          category: task.category.id,
          taskIndex: index,
          taskCount: tasks.length,
          fraction: completed / tasks.length,
          bytesFreedSoFar: bytes,
        };
        channel.push(event);
      };

      emit('task-started', bytesFreedSoFar, index);
      const base = bytesFreedSoFar;
      const result = await this.runTask(task, {
        shouldStop,
        onStep: (taskBytes) => emit('task-progress', base + taskBytes, index),
        logger: this.logger,
      });

      results.push(result);
      bytesFreedSoFar += result.bytesFreed;
      emit('task-finished', bytesFreedSoFar, index + 1);

      this.logger.log(
        `[Engine] ${task.name}: ${formatSize(result.bytesFreed)} freed, ${result.itemsDeleted} deleted, ${result.itemsFailed} failed`
      );
    }

    const cancelled = this.cancelRequested && (results.length < tasks.length || results.some((r) => r.cancelled));
    const summary: RunSummary = Object.freeze({
      totalBytesFreed: results.reduce((sum, r) => sum + r.bytesFreed, 0),
      totalItemsDeleted: results.reduce((sum, r) => sum + r.itemsDeleted, 0),
      totalItemsFailed: results.reduce((sum, r) => sum + r.itemsFailed, 0),
      results,
      startedAt,
      finishedAt: new Date(),
      cancelled,
    });

    channel.push({ type: 'summary', summary });
    await channel.drain();

    this.logger.log(
      `[Engine] Run ${summary.cancelled ? 'cancelled' : 'complete'}: ${formatSize(summary.totalBytesFreed)} freed across ${results.length} tasks`
    );
    return summary;
  }

  private async runTask(task: CleanupTask, context: CleanContext): Promise<TaskResult> {
    const startedAt = Date.now();
    try {
      return await this.cleaners[task.category.cleaner].clean(task, context);
    } catch (error) {
      // Cleaners record their own failures, anything reaching here is unexpected
      this.logger.error(`[Engine] ${task.name} failed unexpectedly:`, error);
      return Object.freeze({
        task: task.name,
        category: task.category.id,
        bytesFreed: 0,
        itemsDeleted: 0,
        itemsFailed: 1,
        errors: [{ path: task.category.id, reason: errorMessage(error), code: errorCode(error) }],
        estimated: false,
        cancelled: false,
        durationMs: Date.now() - startedAt,
      });
    }
  }
}
