import { BaseCleaner, type CleanContext } from './base-cleaner.js';
import type { CleanupTask, TaskResult } from '../types.js';
import { deleteContents, emptyOutcome, mergeOutcomes, type FileSystem } from '../utils/fs.js';
import { errorCode, errorMessage } from '../utils/errors.js';

export class DirectoryCleaner extends BaseCleaner {
  readonly kind = 'directory' as const;

  constructor(private readonly fileSystem?: FileSystem) {
    super();
  }

  async clean(task: CleanupTask, context: CleanContext): Promise<TaskResult> {
    const startedAt = Date.now();
    const total = emptyOutcome();

    try {
      for await (const root of task.roots()) {
        if (context.shouldStop()) {
          total.cancelled = true;
          break;
        }

        const outcome = await deleteContents(root, {
          recursive: task.policy.recursive,
          removeRoot: !task.policy.deleteContentsOnly,
          shouldStop: context.shouldStop,
          fileSystem: this.fileSystem,
        });
        mergeOutcomes(total, outcome);

        if (outcome.failed > 0) {
          context.logger.warn(`[DirectoryCleaner] ${task.name}: ${outcome.failed} entries could not be removed under ${root}`);
        }
        context.onStep(total.bytesFreed);

        if (outcome.cancelled) break;
      }
    } catch (error) {
      // The resolver gave up on part of the category; what it did yield was cleaned above
      context.logger.error(`[DirectoryCleaner] ${task.name}: ${errorMessage(error)}`);
      total.failed++;
      total.errors.push({ path: task.category.id, reason: errorMessage(error), code: errorCode(error) });
    }

    return this.createResult(task, startedAt, {
      bytesFreed: total.bytesFreed,
      itemsDeleted: total.deleted,
      itemsFailed: total.failed,
      errors: total.errors,
      cancelled: total.cancelled,
    });
  }
}
