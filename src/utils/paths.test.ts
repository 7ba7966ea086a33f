import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PathResolver, LOCATION_TABLE, type Environment } from './paths.js';
import { ConfigError, ResolutionError } from './errors.js';

async function collect(roots: AsyncIterable<string>): Promise<string[]> {
  const paths: string[] = [];
  for await (const path of roots) paths.push(path);
  return paths;
}

describe('PathResolver', () => {
  let home: string;
  let local: string;
  let roaming: string;
  let environment: Environment;

  beforeEach(async () => {
    home = await mkdtemp(join(tmpdir(), 'quick-cleaner-home-'));
    local = join(home, 'AppData', 'Local');
    roaming = join(home, 'AppData', 'Roaming');
    await mkdir(local, { recursive: true });
    await mkdir(roaming, { recursive: true });
    environment = {
      homeDir: home,
      env: {
        USERPROFILE: home,
        LOCALAPPDATA: local,
        APPDATA: roaming,
        TEMP: join(home, 'Temp'),
        WINDIR: join(home, 'Windows'),
      },
    };
  });

  afterEach(async () => {
    await rm(home, { recursive: true, force: true });
  });

  it('should find cache folders in the user data root and every Chromium profile', async () => {
    const userData = join(local, 'Google', 'Chrome', 'User Data');
    await mkdir(join(userData, 'ShaderCache'), { recursive: true });
    await mkdir(join(userData, 'Default', 'Cache'), { recursive: true });
    await writeFile(join(userData, 'Default', 'Preferences'), '{}');
    await mkdir(join(userData, 'Profile 1', 'Code Cache'), { recursive: true });
    await mkdir(join(userData, 'Profile 1', 'Service Worker', 'CacheStorage'), { recursive: true });

    const roots = await collect(new PathResolver(environment).resolve('chrome-cache'));

    expect(roots).toEqual([
      join(userData, 'ShaderCache'),
      join(userData, 'Default', 'Cache'),
      join(userData, 'Profile 1', 'Code Cache'),
      join(userData, 'Profile 1', 'Service Worker', 'CacheStorage'),
    ]);
  });

  it('should return nothing for browsers that are not installed', async () => {
    const resolver = new PathResolver(environment);

    for (const category of ['edge-cache', 'brave-cache', 'vivaldi-cache', 'opera-cache', 'firefox-cache'] as const) {
      expect(await collect(resolver.resolve(category))).toEqual([]);
    }
  });

  it('should look only at the Opera root, not its subfolders', async () => {
    const opera = join(local, 'Opera Software', 'Opera Stable');
    await mkdir(join(opera, 'Cache'), { recursive: true });
    await mkdir(join(opera, 'Default', 'Cache'), { recursive: true });

    const roots = await collect(new PathResolver(environment).resolve('opera-cache'));

    expect(roots).toEqual([join(opera, 'Cache')]);
  });

  it('should yield a cache path per Firefox profile in local and roaming app data', async () => {
    const localProfiles = join(local, 'Mozilla', 'Firefox', 'Profiles');
    const roamingProfiles = join(roaming, 'Mozilla', 'Firefox', 'Profiles');
    await mkdir(join(localProfiles, 'abc.default', 'cache2'), { recursive: true });
    await mkdir(join(localProfiles, 'abc.default', 'startupCache'), { recursive: true });
    await mkdir(join(roamingProfiles, 'xyz.default-release', 'cache2'), { recursive: true });

    const roots = await collect(new PathResolver(environment).resolve('firefox-cache'));

    expect(roots).toEqual([
      join(localProfiles, 'abc.default', 'cache2'),
      join(localProfiles, 'abc.default', 'startupCache'),
      join(roamingProfiles, 'xyz.default-release', 'cache2'),
    ]);
  });

  it('should match thumbnail and icon cache databases only', async () => {
    const explorer = join(local, 'Microsoft', 'Windows', 'Explorer');
    await mkdir(join(explorer, 'ThumbCacheToDelete'), { recursive: true });
    await writeFile(join(explorer, 'thumbcache_32.db'), 'x');
    await writeFile(join(explorer, 'iconcache_16.db'), 'x');
    await writeFile(join(explorer, 'other.db'), 'x');

    const roots = await collect(new PathResolver(environment).resolve('thumbnails'));

    expect(roots).toEqual([join(explorer, 'iconcache_16.db'), join(explorer, 'thumbcache_32.db')]);
  });

  it('should fall back to the local app data Temp folder when TEMP and TMP are unusable', async () => {
    await mkdir(join(local, 'Temp'));
    const resolver = new PathResolver({
      ...environment,
      env: { ...environment.env, TEMP: 'relative\\temp', TMP: undefined },
    });

    expect(await collect(resolver.resolve('user-temp'))).toEqual([join(local, 'Temp')]);
  });

  it('should resolve the recent items folder under roaming app data', async () => {
    const recent = join(roaming, 'Microsoft', 'Windows', 'Recent');
    await mkdir(recent, { recursive: true });

    expect(await collect(new PathResolver(environment).resolve('recent-items'))).toEqual([recent]);
  });

  it('should raise a resolution error when the Windows folder is unknown', async () => {
    const resolver = new PathResolver({ ...environment, env: { ...environment.env, WINDIR: undefined } });

    const result = collect(resolver.resolve('system-temp'));

    await expect(result).rejects.toBeInstanceOf(ResolutionError);
    await expect(result).rejects.toMatchObject({ missing: ['WINDIR', 'SystemRoot'] });
  });

  it('should yield the resolvable locations before raising for the missing ones', async () => {
    const temp = join(home, 'Temp');
    await mkdir(temp);
    const table = {
      ...LOCATION_TABLE,
      'user-temp': [
        { base: 'temp' as const, segments: [] },
        { base: 'windows' as const, segments: ['Temp'] },
      ],
    };
    const resolver = new PathResolver({ ...environment, env: { ...environment.env, WINDIR: undefined } }, table);

    const yielded: string[] = [];
    let failure: unknown;
    try {
      for await (const root of resolver.resolve('user-temp')) yielded.push(root);
    } catch (error) {
      failure = error;
    }

    expect(yielded).toEqual([temp]);
    expect(failure).toBeInstanceOf(ResolutionError);
  });

  it('should refuse to start without a user profile', () => {
    expect(() => new PathResolver({ homeDir: '', env: {} })).toThrow(ConfigError);
  });

  it('should detect which browsers have profile data', async () => {
    await mkdir(join(local, 'Google', 'Chrome', 'User Data', 'Default'), { recursive: true });
    await mkdir(join(local, 'Microsoft', 'Edge', 'User Data'), { recursive: true });

    const detected = await new PathResolver(environment).detectInstalled();

    expect(detected).toEqual({
      'chrome-cache': true,
      'edge-cache': false,
      'brave-cache': false,
      'vivaldi-cache': false,
      'opera-cache': false,
      'firefox-cache': false,
    });
  });
});
