export type CategoryId =
  | 'recycle-bin'
  | 'user-temp'
  | 'system-temp'
  | 'recent-items'
  | 'thumbnails'
  | 'chrome-cache'
  | 'edge-cache'
  | 'brave-cache'
  | 'vivaldi-cache'
  | 'opera-cache'
  | 'firefox-cache';

export type CategoryGroup = 'System' | 'Browsers';
export type CategoryScope = 'user' | 'system';
export type CleanerKind = 'directory' | 'recycle-bin';

export interface CleanupPolicy {
  recursive: boolean;
  deleteContentsOnly: boolean;
  emptyRecycleBin: boolean;
}

export interface Category {
  id: CategoryId;
  name: string;
  group: CategoryGroup;
  description: string;
  scope: CategoryScope;
  cleaner: CleanerKind;
  policy: CleanupPolicy;
}

export interface TaskDescriptor {
  name?: string;
  category: CategoryId;
  enabled?: boolean;
  recursive?: boolean;
}

export interface CleanupTask {
  readonly name: string;
  readonly category: Category;
  readonly enabled: boolean;
  readonly policy: Readonly<CleanupPolicy>;
  /** Lazily resolved on every call; never cached between runs. */
  roots(): AsyncIterable<string>;
}

export interface DeletionError {
  path: string;
  reason: string;
  code?: string;
}

export interface TaskResult {
  task: string;
  category: CategoryId;
  bytesFreed: number;
  itemsDeleted: number;
  itemsFailed: number;
  errors: DeletionError[];
  /** True when bytesFreed is a best-effort figure rather than a measured one. */
  estimated: boolean;
  cancelled: boolean;
  durationMs: number;
}

export interface RunSummary {
  totalBytesFreed: number;
  totalItemsDeleted: number;
  totalItemsFailed: number;
  results: TaskResult[];
  startedAt: Date;
  finishedAt: Date;
  cancelled: boolean;
}

export type ProgressEventType = 'task-started' | 'task-progress' | 'task-finished';

export interface ProgressEvent {
  type: ProgressEventType;
  taskName: string;
  category: CategoryId;
  taskIndex: number;
  taskCount: number;
  fraction: number;
  bytesFreedSoFar: number;
}

export interface SummaryEvent {
  type: 'summary';
  summary: RunSummary;
}

export type CleaningEvent = ProgressEvent | SummaryEvent;
export type ProgressListener = (event: CleaningEvent) => void;

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

const DIRECTORY_CONTENTS: CleanupPolicy = {
  recursive: true,
  deleteContentsOnly: true,
  emptyRecycleBin: false,
};

function browserCache(id: CategoryId, name: string): Category {
  return {
    id,
    name: `${name} Cache`,
    group: 'Browsers',
    description: `Disk, code, GPU and service-worker caches of every ${name} profile`,
    scope: 'user',
    cleaner: 'directory',
    policy: DIRECTORY_CONTENTS,
  };
}

export const CATEGORIES: Record<CategoryId, Category> = {
  'recycle-bin': {
    id: 'recycle-bin',
    name: 'Recycle Bin',
    group: 'System',
    description: 'Items deleted to the Recycle Bin on every drive',
    scope: 'user',
    cleaner: 'recycle-bin',
    policy: { recursive: false, deleteContentsOnly: false, emptyRecycleBin: true },
  },
  'user-temp': {
    id: 'user-temp',
    name: 'User Temp',
    group: 'System',
    description: 'Contents of the per-user %TEMP% folder',
    scope: 'user',
    cleaner: 'directory',
    policy: DIRECTORY_CONTENTS,
  },
  'system-temp': {
    id: 'system-temp',
    name: 'System Temp',
    group: 'System',
    description: 'Contents of %WINDIR%\\Temp (usually needs an elevated prompt)',
    scope: 'system',
    cleaner: 'directory',
    policy: DIRECTORY_CONTENTS,
  },
  'recent-items': {
    id: 'recent-items',
    name: 'Recent Items',
    group: 'System',
    description: 'Shortcuts in the Recent Items list and jump lists',
    scope: 'user',
    cleaner: 'directory',
    policy: DIRECTORY_CONTENTS,
  },
  'thumbnails': {
    id: 'thumbnails',
    name: 'Windows Thumbnails',
    group: 'System',
    description: 'Explorer thumbcache and iconcache databases',
    scope: 'user',
    cleaner: 'directory',
    policy: { recursive: false, deleteContentsOnly: false, emptyRecycleBin: false },
  },
  'chrome-cache': browserCache('chrome-cache', 'Google Chrome'),
  'edge-cache': browserCache('edge-cache', 'Microsoft Edge'),
  'brave-cache': browserCache('brave-cache', 'Brave'),
  'vivaldi-cache': browserCache('vivaldi-cache', 'Vivaldi'),
  'opera-cache': browserCache('opera-cache', 'Opera'),
  'firefox-cache': browserCache('firefox-cache', 'Firefox'),
};

export const CATEGORY_IDS: readonly CategoryId[] = [
  'recycle-bin',
  'user-temp',
  'system-temp',
  'recent-items',
  'thumbnails',
  'chrome-cache',
  'edge-cache',
  'brave-cache',
  'vivaldi-cache',
  'opera-cache',
  'firefox-cache',
];

export function isCategoryId(value: string): value is CategoryId {
  return CATEGORY_IDS.some((id) => id === value);
}
