import { access, chmod, lstat, readdir, rmdir, stat, unlink } from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import { join } from 'path';
import type { DeletionError } from '../types.js';
import { errorCode, errorMessage } from './errors.js';

/** The file-system calls the deleter depends on. Swapped out in tests to inject failures. */
export interface FileSystem {
  stat(path: string): Promise<Stats>;
  lstat(path: string): Promise<Stats>;
  readdir(path: string, options: { withFileTypes: true }): Promise<Dirent[]>;
  unlink(path: string): Promise<void>;
  rmdir(path: string): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
  stat: (path) => stat(path),
  lstat: (path) => lstat(path),
  readdir: (path, options) => readdir(path, options),
  unlink: (path) => unlink(path),
  rmdir: (path) => rmdir(path),
  chmod: (path, mode) => chmod(path, mode),
};

export interface DeleteOptions {
  recursive: boolean;
  /** Also remove the root directory once its contents are gone. */
  removeRoot?: boolean;
  shouldStop?: () => boolean;
  fileSystem?: FileSystem;
}

export interface DeleteOutcome {
  bytesFreed: number;
  deleted: number;
  failed: number;
  errors: DeletionError[];
  cancelled: boolean;
}

export function emptyOutcome(): DeleteOutcome {
  return { bytesFreed: 0, deleted: 0, failed: 0, errors: [], cancelled: false };
}

export function mergeOutcomes(target: DeleteOutcome, source: DeleteOutcome): DeleteOutcome {
  target.bytesFreed += source.bytesFreed;
  target.deleted += source.deleted;
  target.failed += source.failed;
  target.errors.push(...source.errors);
  target.cancelled = target.cancelled || source.cancelled;
  return target;
}

export async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function hasContent(path: string): Promise<boolean> {
  try {
    const entries = await readdir(path);
    return entries.length > 0;
  } catch {
    return false;
  }
}

function recordFailure(outcome: DeleteOutcome, path: string, error: unknown): void {
  outcome.failed++;
  outcome.errors.push({ path, reason: errorMessage(error), code: errorCode(error) });
}

const WRITE_PROTECTED = new Set(['EPERM', 'EACCES']);
const LEFT_NON_EMPTY = new Set(['ENOTEMPTY', 'EEXIST']);

async function removeFile(fs: FileSystem, path: string, size: number, outcome: DeleteOutcome, isLink = false): Promise<void> {
  try {
    await fs.unlink(path);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      // Gone between listing and deletion, nothing was freed by us
      return;
    }
    // Links skip the chmod retry: chmod would change the target, not the link
    if (isLink || !code || !WRITE_PROTECTED.has(code)) {
      recordFailure(outcome, path, error);
      return;
    }
    // Read-only files refuse unlink on Windows until the attribute is cleared
    try {
      await fs.chmod(path, 0o666);
      await fs.unlink(path);
    } catch (retryError) {
      recordFailure(outcome, path, retryError);
      return;
    }
  }
  outcome.bytesFreed += size;
  outcome.deleted++;
}

async function removeDirectory(fs: FileSystem, path: string, outcome: DeleteOutcome, childFailures: number): Promise<void> {
  try {
    await fs.rmdir(path);
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') return;
    if (childFailures > 0 && code && LEFT_NON_EMPTY.has(code)) return;
    recordFailure(outcome, path, error);
  }
}

async function deleteEntry(fs: FileSystem, path: string, stats: Stats, options: DeleteOptions, outcome: DeleteOutcome): Promise<void> {
  if (stats.isSymbolicLink()) {
    await removeFile(fs, path, 0, outcome, true);
  } else if (stats.isFile()) {
    await removeFile(fs, path, stats.size, outcome);
  } else if (stats.isDirectory() && options.recursive) {
    const before = outcome.failed;
    await walk(fs, path, options, outcome);
    if (!outcome.cancelled) {
      await removeDirectory(fs, path, outcome, outcome.failed - before);
    }
  }
}

async function walk(fs: FileSystem, dir: string, options: DeleteOptions, outcome: DeleteOutcome): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    recordFailure(outcome, dir, error);
    return;
  }

  for (const entry of entries) {
    if (options.shouldStop?.()) {
      outcome.cancelled = true;
      return;
    }

    const path = join(dir, entry.name);
    let stats: Stats;
    try {
      // Size is read right before deletion, not taken from an earlier scan
      stats = await fs.lstat(path);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') continue;
      recordFailure(outcome, path, error);
      continue;
    }

    await deleteEntry(fs, path, stats, options, outcome);
    if (outcome.cancelled) return;
  }
}

/**
 * Deletes what lives under `root` and reports what was freed.
 *
 * A missing root is not an error. A root that is itself a file is deleted as a single entry.
 * Every entry is isolated: a failure is recorded in `errors` and the walk carries on.
 */
export async function deleteContents(root: string, options: DeleteOptions): Promise<DeleteOutcome> {
  const fs = options.fileSystem ?? nodeFileSystem;
  const outcome = emptyOutcome();

  let stats: Stats;
  try {
    // Roots are followed (a Temp folder may be a junction); entries below never are
    stats = await fs.stat(root);
  } catch (error) {
    if (errorCode(error) !== 'ENOENT') {
      recordFailure(outcome, root, error);
    }
    return outcome;
  }

  if (!stats.isDirectory()) {
    if (options.shouldStop?.()) {
      outcome.cancelled = true;
      return outcome;
    }
    await deleteEntry(fs, root, stats, options, outcome);
    return outcome;
  }

  await walk(fs, root, options, outcome);

  if (options.removeRoot && !outcome.cancelled) {
    await removeDirectory(fs, root, outcome, outcome.failed);
  }

  return outcome;
}
