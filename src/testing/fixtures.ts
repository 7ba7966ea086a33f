import { vi } from 'vitest';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { CategoryId, Logger } from '../types.js';
import type { LocationResolver } from '../utils/paths.js';
import type { RecycleBin, RecycleBinInfo } from '../utils/recycle-bin.js';
import type { CleanContext } from '../cleaners/base-cleaner.js';

export function silentLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

/** Serves fixed roots per category, optionally failing after yielding them. */
export class StaticResolver implements LocationResolver {
  constructor(
    private readonly roots: Partial<Record<CategoryId, string[]>>,
    private readonly failures: Partial<Record<CategoryId, Error>> = {}
  ) {}

  async *resolve(category: CategoryId): AsyncGenerator<string> {
    for (const root of this.roots[category] ?? []) {
      yield root;
    }
    const failure = this.failures[category];
    if (failure) throw failure;
  }
}

/** Replays queued query answers; a queued Error is thrown instead of returned. */
export class FakeRecycleBin implements RecycleBin {
  readonly empty = vi.fn(async (): Promise<void> => undefined);
  private readonly answers: (RecycleBinInfo | Error)[];

  constructor(...answers: (RecycleBinInfo | Error)[]) {
    this.answers = answers;
  }

  async query(): Promise<RecycleBinInfo> {
    const answer = this.answers.shift() ?? { items: 0, bytes: 0 };
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

export function cleanContext(overrides: Partial<CleanContext> = {}): CleanContext {
  return {
    shouldStop: () => false,
    onStep: vi.fn(),
    logger: silentLogger(),
    ...overrides,
  };
}

/** Writes files of the given sizes, creating parent folders as needed. */
export async function writeFiles(files: Record<string, number>): Promise<void> {
  for (const [path, size] of Object.entries(files)) {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, Buffer.alloc(size));
  }
}
