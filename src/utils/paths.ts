import { homedir } from 'os';
import { isAbsolute, join } from 'path';
import { readdir } from 'fs/promises';
import fg from 'fast-glob';
import type { CategoryId } from '../types.js';
import { ConfigError, ResolutionError } from './errors.js';
import { exists, hasContent, isDirectory } from './fs.js';

export type KnownFolder = 'profile' | 'localAppData' | 'roamingAppData' | 'temp' | 'windows';

/**
 * Where a category's data lives, relative to a known folder.
 *
 * - `profiles` picks the profile directories under the location: the location itself,
 *   the location plus each direct subdirectory, or only the subdirectories.
 * - `targets` are subpaths inside each profile directory; omitted means the profile directory itself.
 * - `files` are glob patterns matched directly inside the location; matches become file roots.
 */
export interface LocationSpec {
  base: KnownFolder;
  segments: string[];
  profiles?: 'root' | 'root-and-children' | 'children';
  targets?: string[][];
  files?: string[];
}

const CHROMIUM_CACHE_DIRS = [
  ['Cache'],
  ['Code Cache'],
  ['GPUCache'],
  ['ShaderCache'],
  ['DawnCache'],
  ['Media Cache'],
  ['Service Worker', 'CacheStorage'],
];

const FIREFOX_CACHE_DIRS = [['cache2'], ['startupCache']];

function chromium(...segments: string[]): LocationSpec {
  return { base: 'localAppData', segments, profiles: 'root-and-children', targets: CHROMIUM_CACHE_DIRS };
}

function firefox(base: KnownFolder): LocationSpec {
  return { base, segments: ['Mozilla', 'Firefox', 'Profiles'], profiles: 'children', targets: FIREFOX_CACHE_DIRS };
}

export const LOCATION_TABLE: Record<CategoryId, LocationSpec[]> = {
  // Emptied through the shell, not by path
  'recycle-bin': [],
  'user-temp': [{ base: 'temp', segments: [] }],
  'system-temp': [{ base: 'windows', segments: ['Temp'] }],
  'recent-items': [{ base: 'roamingAppData', segments: ['Microsoft', 'Windows', 'Recent'] }],
  'thumbnails': [
    {
      base: 'localAppData',
      segments: ['Microsoft', 'Windows', 'Explorer'],
      files: ['thumbcache*.db', 'iconcache*.db'],
    },
  ],
  'chrome-cache': [chromium('Google', 'Chrome', 'User Data')],
  'edge-cache': [chromium('Microsoft', 'Edge', 'User Data')],
  'brave-cache': [chromium('BraveSoftware', 'Brave-Browser', 'User Data')],
  'vivaldi-cache': [chromium('Vivaldi', 'User Data')],
  'opera-cache': [{ ...chromium('Opera Software', 'Opera Stable'), profiles: 'root' }],
  'firefox-cache': [firefox('localAppData'), firefox('roamingAppData')],
};

export const BROWSER_CATEGORIES: readonly CategoryId[] = [
  'chrome-cache',
  'edge-cache',
  'brave-cache',
  'vivaldi-cache',
  'opera-cache',
  'firefox-cache',
];

export interface Environment {
  env: Record<string, string | undefined>;
  homeDir: string;
}

/** Resolves category locations against one user's environment. */
export interface LocationResolver {
  resolve(category: CategoryId): AsyncIterable<string>;
}

interface FolderSource {
  variables: string[];
  fallback?: (resolver: PathResolver) => string | undefined;
}

const KNOWN_FOLDERS: Record<KnownFolder, FolderSource> = {
  profile: { variables: ['USERPROFILE'] },
  localAppData: {
    variables: ['LOCALAPPDATA'],
    fallback: (r) => join(r.profileDir, 'AppData', 'Local'),
  },
  roamingAppData: {
    variables: ['APPDATA'],
    fallback: (r) => join(r.profileDir, 'AppData', 'Roaming'),
  },
  temp: {
    variables: ['TEMP', 'TMP'],
    fallback: (r) => {
      const local = r.knownFolder('localAppData');
      return local ? join(local, 'Temp') : undefined;
    },
  },
  windows: { variables: ['WINDIR', 'SystemRoot'] },
};

async function subdirectories(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => join(dir, entry.name))
      .sort();
  } catch {
    return [];
  }
}

export class PathResolver implements LocationResolver {
  readonly profileDir: string;
  private readonly env: Record<string, string | undefined>;
  private readonly table: Record<CategoryId, LocationSpec[]>;

  constructor(environment: Environment, table: Record<CategoryId, LocationSpec[]> = LOCATION_TABLE) {
    this.env = environment.env;
    this.table = table;
    const profile = this.variable('USERPROFILE') ?? (isAbsolute(environment.homeDir) ? environment.homeDir : undefined);
    if (!profile) {
      throw new ConfigError('Cannot determine the user profile directory (USERPROFILE and home directory are both unset)');
    }
    this.profileDir = profile;
  }

  static fromEnvironment(): PathResolver {
    return new PathResolver({ env: process.env, homeDir: homedir() });
  }

  private variable(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value && isAbsolute(value) ? value : undefined;
  }

  knownFolder(folder: KnownFolder): string | undefined {
    if (folder === 'profile') return this.profileDir;
    const source = KNOWN_FOLDERS[folder];
    for (const name of source.variables) {
      const value = this.variable(name);
      if (value) return value;
    }
    return source.fallback?.(this);
  }

  /**
   * Yields the existing roots of a category. Candidates that do not exist are skipped.
   * Throws ResolutionError after the resolvable locations were yielded when a base folder is unknown.
   */
  async *resolve(category: CategoryId): AsyncGenerator<string> {
    const missing: string[] = [];

    for (const spec of this.table[category]) {
      const base = this.knownFolder(spec.base);
      if (!base) {
        missing.push(...KNOWN_FOLDERS[spec.base].variables);
        continue;
      }
      yield* this.expand(join(base, ...spec.segments), spec);
    }

    if (missing.length > 0) {
      throw new ResolutionError(`Cannot resolve ${category}: ${missing.join(' / ')} not set`, missing);
    }
  }

  private async *expand(location: string, spec: LocationSpec): AsyncGenerator<string> {
    if (!(await isDirectory(location))) return;

    if (spec.files) {
      const matches = await fg(spec.files, {
        cwd: location,
        onlyFiles: true,
        caseSensitiveMatch: false,
        absolute: false,
      });
      for (const match of matches.sort()) {
        yield join(location, match);
      }
      return;
    }

    const profiles = spec.profiles ?? 'root';
    const profileDirs: string[] = [];
    if (profiles !== 'children') profileDirs.push(location);
    if (profiles !== 'root') profileDirs.push(...(await subdirectories(location)));

    const targets = spec.targets ?? [[]];
    for (const profileDir of profileDirs) {
      for (const target of targets) {
        const candidate = join(profileDir, ...target);
        if (await exists(candidate)) {
          yield candidate;
        }
      }
    }
  }

  /** Whether each browser has any profile data on this machine. */
  async detectInstalled(): Promise<Partial<Record<CategoryId, boolean>>> {
    const detected: Partial<Record<CategoryId, boolean>> = {};
    for (const category of BROWSER_CATEGORIES) {
      let found = false;
      for (const spec of this.table[category]) {
        const base = this.knownFolder(spec.base);
        if (base && (await hasContent(join(base, ...spec.segments)))) {
          found = true;
          break;
        }
      }
      detected[category] = found;
    }
    return detected;
  }
}
