import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm, readdir, symlink, access, chmod as setMode, stat } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { deleteContents, nodeFileSystem, type FileSystem } from './fs.js';

function failingOn(codes: Record<string, string>): FileSystem {
  return {
    ...nodeFileSystem,
    unlink: async (path) => {
      const code = codes[path];
      if (code) {
        throw Object.assign(new Error(`${code}: cannot delete ${path}`), { code });
      }
      return nodeFileSystem.unlink(path);
    },
  };
}

async function present(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('deleteContents', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'quick-cleaner-fs-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should free the sum of the file sizes in a nested directory', async () => {
    await mkdir(join(root, 'cache'));
    await writeFile(join(root, 'cache', 'a.bin'), Buffer.alloc(100));
    await writeFile(join(root, 'cache', 'b.bin'), Buffer.alloc(250));

    const outcome = await deleteContents(root, { recursive: true });

    expect(outcome.bytesFreed).toBe(350);
    expect(outcome.deleted).toBe(2);
    expect(outcome.failed).toBe(0);
    expect(outcome.errors).toEqual([]);
    expect(await readdir(root)).toEqual([]);
  });

  it('should keep the root directory when cleaning contents only', async () => {
    await writeFile(join(root, 'x.tmp'), Buffer.alloc(10));

    await deleteContents(root, { recursive: true });

    expect(await present(root)).toBe(true);
  });

  it('should keep going when one file cannot be deleted', async () => {
    await writeFile(join(root, 'a.tmp'), Buffer.alloc(10));
    await writeFile(join(root, 'b.tmp'), Buffer.alloc(20));
    await writeFile(join(root, 'c.tmp'), Buffer.alloc(30));
    const locked = join(root, 'b.tmp');

    const outcome = await deleteContents(root, {
      recursive: true,
      fileSystem: failingOn({ [locked]: 'EBUSY' }),
    });

    expect(outcome.deleted).toBe(2);
    expect(outcome.failed).toBe(1);
    expect(outcome.bytesFreed).toBe(40);
    expect(outcome.errors).toEqual([{ path: locked, reason: `EBUSY: cannot delete ${locked}`, code: 'EBUSY' }]);
    expect(await readdir(root)).toEqual(['b.tmp']);
  });

  it('should return an empty outcome for a missing root', async () => {
    const outcome = await deleteContents(join(root, 'does-not-exist'), { recursive: true });

    expect(outcome).toEqual({ bytesFreed: 0, deleted: 0, failed: 0, errors: [], cancelled: false });
  });

  it('should leave subdirectories alone when not recursive', async () => {
    await writeFile(join(root, 'top.log'), Buffer.alloc(5));
    await mkdir(join(root, 'nested'));
    await writeFile(join(root, 'nested', 'inner.log'), Buffer.alloc(7));

    const outcome = await deleteContents(root, { recursive: false });

    expect(outcome.bytesFreed).toBe(5);
    expect(outcome.deleted).toBe(1);
    expect(await readdir(root)).toEqual(['nested']);
    expect(await readdir(join(root, 'nested'))).toEqual(['inner.log']);
  });

  it('should clear the read-only attribute and retry once on EPERM', async () => {
    const target = join(root, 'readonly.dat');
    await writeFile(target, Buffer.alloc(64));

    let attempts = 0;
    const chmod = vi.fn(nodeFileSystem.chmod);
    const fileSystem: FileSystem = {
      ...nodeFileSystem,
      chmod,
      unlink: async (path) => {
        attempts++;
        if (attempts === 1) {
          throw Object.assign(new Error('EPERM: operation not permitted'), { code: 'EPERM' });
        }
        return nodeFileSystem.unlink(path);
      },
    };

    const outcome = await deleteContents(root, { recursive: true, fileSystem });

    expect(chmod).toHaveBeenCalledWith(target, 0o666);
    expect(outcome.deleted).toBe(1);
    expect(outcome.bytesFreed).toBe(64);
    expect(outcome.failed).toBe(0);
  });

  it('should not report a directory left behind by a failed child twice', async () => {
    await mkdir(join(root, 'sub'));
    const locked = join(root, 'sub', 'locked.db');
    await writeFile(locked, Buffer.alloc(3));

    const outcome = await deleteContents(root, {
      recursive: true,
      fileSystem: failingOn({ [locked]: 'EBUSY' }),
    });

    expect(outcome.failed).toBe(1);
    expect(outcome.errors.map((e) => e.path)).toEqual([locked]);
    expect(await present(join(root, 'sub'))).toBe(true);
  });

  it('should stop between entries once asked to', async () => {
    for (const name of ['one', 'two', 'three']) {
      await writeFile(join(root, name), Buffer.alloc(10));
    }
    let deletions = 0;
    const fileSystem: FileSystem = {
      ...nodeFileSystem,
      unlink: async (path) => {
        await nodeFileSystem.unlink(path);
        deletions++;
      },
    };

    const outcome = await deleteContents(root, {
      recursive: true,
      fileSystem,
      shouldStop: () => deletions >= 1,
    });

    expect(outcome.cancelled).toBe(true);
    expect(outcome.deleted).toBe(1);
    expect(outcome.bytesFreed).toBe(10);
    expect(await readdir(root)).toHaveLength(2);
  });

  it('should delete a root that is a single file', async () => {
    const file = join(root, 'thumbcache_256.db');
    await writeFile(file, Buffer.alloc(128));

    const outcome = await deleteContents(file, { recursive: false });

    expect(outcome.deleted).toBe(1);
    expect(outcome.bytesFreed).toBe(128);
    expect(await present(file)).toBe(false);
  });

  it('should unlink symbolic links without touching their target', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'quick-cleaner-target-'));
    try {
      const target = join(outside, 'keep.txt');
      await writeFile(target, Buffer.alloc(50));
      await symlink(target, join(root, 'link.txt'));

      const outcome = await deleteContents(root, { recursive: true });

      expect(outcome.deleted).toBe(1);
      expect(outcome.bytesFreed).toBe(0);
      expect(await present(target)).toBe(true);
      expect(await readdir(root)).toEqual([]);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });

  it('should not change the mode of a link target when unlinking the link is refused', async () => {
    const outside = await mkdtemp(join(tmpdir(), 'quick-cleaner-target-'));
    try {
      const target = join(outside, 'private.key');
      await writeFile(target, 'x');
      await setMode(target, 0o400);
      const link = join(root, 'private.lnk');
      await symlink(target, link);

      const chmod = vi.fn(nodeFileSystem.chmod);
      const fileSystem: FileSystem = {
        ...nodeFileSystem,
        chmod,
        unlink: async () => {
          throw Object.assign(new Error('EPERM: operation not permitted'), { code: 'EPERM' });
        },
      };

      const outcome = await deleteContents(root, { recursive: true, fileSystem });

      expect(chmod).not.toHaveBeenCalled();
      expect((await stat(target)).mode & 0o777).toBe(0o400);
      expect(outcome.deleted).toBe(0);
      expect(outcome.failed).toBe(1);
      expect(outcome.errors).toEqual([{ path: link, reason: 'EPERM: operation not permitted', code: 'EPERM' }]);
    } finally {
      await rm(outside, { recursive: true, force: true });
    }
  });
});
