import { readFile, writeFile, access, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { CATEGORIES, CATEGORY_IDS, isCategoryId, type CategoryId, type TaskDescriptor } from '../types.js';
import { ConfigError } from './errors.js';
import { DEFAULT_PROGRESS_CAPACITY } from '../engine/progress-channel.js';

export const CONFIG_PATHS = [
  join(homedir(), '.quickcleanerrc'),
  join(homedir(), '.config', 'quick-cleaner', 'config.json'),
];

const categoryIdSchema = z.string().refine(isCategoryId, (value) => ({
  message: `Unknown category "${value}" (expected one of: ${CATEGORY_IDS.join(', ')})`,
}));

export const taskDescriptorSchema = z
  .object({
    name: z.string().trim().min(1).optional(),
    category: categoryIdSchema,
    enabled: z.boolean().optional(),
    recursive: z.boolean().optional(),
  })
  .strict();

export const configSchema = z
  .object({
    tasks: z.array(taskDescriptorSchema).optional(),
    progressCapacity: z.number().int().positive().optional(),
  })
  .strict();

export interface Config {
  tasks: TaskDescriptor[];
  progressCapacity: number;
}

/**
 * Declaration order is the order tasks run and report in.
 * System Temp is off out of the box since it needs an elevated prompt.
 */
export const DEFAULT_TASKS: readonly TaskDescriptor[] = [
  { category: 'recycle-bin', enabled: true },
  { category: 'user-temp', enabled: true },
  { category: 'system-temp', enabled: false },
  { category: 'recent-items', enabled: true },
  { category: 'thumbnails', enabled: true },
  { category: 'chrome-cache', enabled: true },
  { category: 'edge-cache', enabled: true },
  { category: 'brave-cache', enabled: true },
  { category: 'vivaldi-cache', enabled: true },
  { category: 'opera-cache', enabled: true },
  { category: 'firefox-cache', enabled: true },
];

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/** Validates raw task descriptors. Throws ConfigError on unknown categories, bad fields or duplicate names. */
export function parseTaskDescriptors(input: unknown): TaskDescriptor[] {
  const result = z.array(taskDescriptorSchema).safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid task list: ${formatIssues(result.error)}`);
  }

  const descriptors: TaskDescriptor[] = result.data;

  const seen = new Set<string>();
  for (const descriptor of descriptors) {
    const name = taskName(descriptor);
    if (seen.has(name)) {
      throw new ConfigError(`Duplicate task name "${name}"`);
    }
    seen.add(name);
  }

  return descriptors;
}

export function taskName(descriptor: TaskDescriptor): string {
  return descriptor.name ?? CATEGORIES[descriptor.category].name;
}

/** Descriptors without an explicit flag follow the category scope: user tasks on, system tasks off. */
export function isTaskEnabled(descriptor: TaskDescriptor): boolean {
  return descriptor.enabled ?? CATEGORIES[descriptor.category].scope === 'user';
}

export function getDefaultConfig(): Config {
  return {
    tasks: DEFAULT_TASKS.map((task) => ({ ...task })),
    progressCapacity: DEFAULT_PROGRESS_CAPACITY,
  };
}

let cachedConfig: Config | null = null;

export function clearConfigCache(): void {
  cachedConfig = null;
}

/**
 * Reads the first config file that exists. No file means defaults;
 * a file that exists but does not parse is a ConfigError, never silently ignored.
 */
export async function loadConfig(configPath?: string): Promise<Config> {
  if (cachedConfig && !configPath) {
    return cachedConfig;
  }

  const paths = configPath ? [configPath] : CONFIG_PATHS;

  for (const path of paths) {
    try {
      await access(path);
    } catch {
      if (configPath) {
        throw new ConfigError(`Config file not found: ${configPath}`);
      }
      continue;
    }

    const content = await readFile(path, 'utf-8');
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`${path}: ${formatIssues(parsed.error)}`);
    }

    const defaults = getDefaultConfig();
    const config: Config = {
      tasks: parsed.data.tasks ? parseTaskDescriptors(parsed.data.tasks) : defaults.tasks,
      progressCapacity: parsed.data.progressCapacity ?? defaults.progressCapacity,
    };
    if (!configPath) cachedConfig = config;
    return config;
  }

  cachedConfig = getDefaultConfig();
  return cachedConfig;
}

export async function saveConfig(config: Config, configPath?: string): Promise<string> {
  const path = configPath ?? CONFIG_PATHS[0];
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(config, null, 2));
  if (!configPath) cachedConfig = config;
  return path;
}

export async function configExists(): Promise<string | null> {
  for (const path of CONFIG_PATHS) {
    try {
      await access(path);
      return path;
    } catch {
      continue;
    }
  }
  return null;
}

export async function initConfig(configPath?: string): Promise<string> {
  return saveConfig(getDefaultConfig(), configPath);
}

export interface TaskOverrides {
  enable?: string[];
  disable?: string[];
  /** When set, every task outside this list is disabled. */
  only?: string[];
}

function toCategoryIds(values: string[] | undefined, flag: string): Set<CategoryId> {
  const ids = new Set<CategoryId>();
  for (const value of values ?? []) {
    if (!isCategoryId(value)) {
      throw new ConfigError(`Unknown category "${value}" for ${flag} (expected one of: ${CATEGORY_IDS.join(', ')})`);
    }
    ids.add(value);
  }
  return ids;
}

export function applyTaskOverrides(descriptors: readonly TaskDescriptor[], overrides: TaskOverrides): TaskDescriptor[] {
  const enable = toCategoryIds(overrides.enable, '--enable');
  const disable = toCategoryIds(overrides.disable, '--disable');
  const only = overrides.only ? toCategoryIds(overrides.only, '--only') : null;

  return descriptors.map((descriptor) => {
    let enabled = isTaskEnabled(descriptor);
    if (only) enabled = only.has(descriptor.category);
    if (enable.has(descriptor.category)) enabled = true;
    if (disable.has(descriptor.category)) enabled = false;
    return { ...descriptor, enabled };
  });
}
