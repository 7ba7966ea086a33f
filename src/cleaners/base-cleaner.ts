import type { CleanerKind, CleanupTask, DeletionError, Logger, TaskResult } from '../types.js';

export interface CleanContext {
  /** Checked between roots and between entries; true once the run was cancelled. */
  shouldStop: () => boolean;
  /** Reports bytes freed so far by the current task. */
  onStep: (bytesFreed: number) => void;
  logger: Logger;
}

export interface Cleaner {
  readonly kind: CleanerKind;
  clean(task: CleanupTask, context: CleanContext): Promise<TaskResult>;
}

export interface ResultFields {
  bytesFreed?: number;
  itemsDeleted?: number;
  itemsFailed?: number;
  errors?: DeletionError[];
  estimated?: boolean;
  cancelled?: boolean;
}

export abstract class BaseCleaner implements Cleaner {
  abstract readonly kind: CleanerKind;
  abstract clean(task: CleanupTask, context: CleanContext): Promise<TaskResult>;

  protected createResult(task: CleanupTask, startedAt: number, fields: ResultFields): TaskResult {
    return Object.freeze({
      task: task.name,
      category: task.category.id,
      bytesFreed: fields.bytesFreed ?? 0,
      itemsDeleted: fields.itemsDeleted ?? 0,
      itemsFailed: fields.itemsFailed ?? 0,
      errors: [...(fields.errors ?? [])],
      estimated: fields.estimated ?? false,
      cancelled: fields.cancelled ?? false,
      durationMs: Date.now() - startedAt,
    });
  }
}
