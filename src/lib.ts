export { CleaningEngine, type CleaningEngineOptions, type EngineState } from './engine/cleaning-engine.js';
export { ProgressChannel, DEFAULT_PROGRESS_CAPACITY, type ProgressChannelOptions } from './engine/progress-channel.js';
export { createTasks } from './engine/tasks.js';
export { createCleaners, BaseCleaner, DirectoryCleaner, RecycleBinCleaner, type Cleaner, type CleanContext } from './cleaners/index.js';
export {
  PathResolver,
  LOCATION_TABLE,
  BROWSER_CATEGORIES,
  type Environment,
  type KnownFolder,
  type LocationResolver,
  type LocationSpec,
} from './utils/paths.js';
export { deleteContents, nodeFileSystem, type DeleteOptions, type DeleteOutcome, type FileSystem } from './utils/fs.js';
export { WindowsRecycleBin, type RecycleBin, type RecycleBinInfo } from './utils/recycle-bin.js';
export {
  DEFAULT_TASKS,
  applyTaskOverrides,
  loadConfig,
  parseTaskDescriptors,
  type Config,
  type TaskOverrides,
} from './utils/config.js';
export { CleanerError, ConfigError, EngineBusyError, ResolutionError, UnsupportedPlatformError } from './utils/errors.js';
export { formatSize } from './utils/size.js';
export * from './types.js';
