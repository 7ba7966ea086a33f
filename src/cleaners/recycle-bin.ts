import { BaseCleaner, type CleanContext } from './base-cleaner.js';
import type { CleanupTask, DeletionError, TaskResult } from '../types.js';
import type { RecycleBin, RecycleBinInfo } from '../utils/recycle-bin.js';
import { errorCode, errorMessage } from '../utils/errors.js';

const RECYCLE_BIN_PATH = 'shell:RecycleBinFolder';

/**
 * Empties the Recycle Bin through the shell instead of deleting paths.
 * Byte counts come from the shell's own size query; when that query fails, or could not measure
 * every deleted folder, the result is flagged as estimated.
 */
export class RecycleBinCleaner extends BaseCleaner {
  readonly kind = 'recycle-bin' as const;

  constructor(private readonly recycleBin: RecycleBin) {
    super();
  }

  private async tryQuery(errors: DeletionError[]): Promise<RecycleBinInfo | null> {
    try {
      return await this.recycleBin.query();
    } catch (error) {
      errors.push({ path: RECYCLE_BIN_PATH, reason: errorMessage(error), code: errorCode(error) });
      return null;
    }
  }

  async clean(task: CleanupTask, context: CleanContext): Promise<TaskResult> {
    const startedAt = Date.now();
    const errors: DeletionError[] = [];

    if (context.shouldStop()) {
      return this.createResult(task, startedAt, { cancelled: true });
    }

    const before = await this.tryQuery(errors);
    if (before) {
      context.logger.log(`[RecycleBin] ${before.items} items, ${before.bytes} bytes before emptying`);
    } else {
      context.logger.warn('[RecycleBin] Size query failed, freed bytes will be an estimate');
    }

    if (before && before.items === 0) {
      return this.createResult(task, startedAt, {});
    }

    try {
      await this.recycleBin.empty();
    } catch (error) {
      context.logger.error(`[RecycleBin] Empty failed: ${errorMessage(error)}`);
      errors.push({ path: RECYCLE_BIN_PATH, reason: errorMessage(error), code: errorCode(error) });
      return this.createResult(task, startedAt, {
        itemsFailed: Math.max(1, before?.items ?? 0),
        errors,
        estimated: before === null || before.partial === true,
      });
    }

    if (!before) {
      return this.createResult(task, startedAt, { errors, estimated: true });
    }

    // Whatever the shell could not remove is still in the bin afterwards
    const after = await this.tryQuery(errors);
    const bytesFreed = after ? Math.max(0, before.bytes - after.bytes) : before.bytes;
    const itemsLeft = after ? Math.min(after.items, before.items) : 0;

    context.onStep(bytesFreed);
    return this.createResult(task, startedAt, {
      bytesFreed,
      itemsDeleted: before.items - itemsLeft,
      itemsFailed: itemsLeft,
      errors,
      estimated: before.partial === true || after?.partial === true,
    });
  }
}
