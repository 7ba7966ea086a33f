import type { CleanerKind } from '../types.js';
import type { Cleaner } from './base-cleaner.js';
import { DirectoryCleaner } from './directory-cleaner.js';
import { RecycleBinCleaner } from './recycle-bin.js';
import { WindowsRecycleBin, type RecycleBin } from '../utils/recycle-bin.js';
import type { FileSystem } from '../utils/fs.js';

export interface CleanerDependencies {
  recycleBin?: RecycleBin;
  fileSystem?: FileSystem;
}

export function createCleaners(deps: CleanerDependencies = {}): Record<CleanerKind, Cleaner> {
  return {
    'directory': new DirectoryCleaner(deps.fileSystem),
    'recycle-bin': new RecycleBinCleaner(deps.recycleBin ?? new WindowsRecycleBin()),
  };
}

export { BaseCleaner, type Cleaner, type CleanContext } from './base-cleaner.js';
export { DirectoryCleaner, RecycleBinCleaner };
