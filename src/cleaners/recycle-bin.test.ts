import { describe, it, expect } from 'vitest';
import { RecycleBinCleaner } from './recycle-bin.js';
import { createTasks } from '../engine/tasks.js';
import { FakeRecycleBin, StaticResolver, cleanContext } from '../testing/fixtures.js';

const [task] = createTasks([{ category: 'recycle-bin' }], new StaticResolver({}));

describe('RecycleBinCleaner', () => {
  it('should report the exact size measured before emptying', async () => {
    const bin = new FakeRecycleBin({ items: 3, bytes: 3000 }, { items: 0, bytes: 0 });

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext());

    expect(bin.empty).toHaveBeenCalledTimes(1);
    expect(result).toMatchObject({
      task: 'Recycle Bin',
      category: 'recycle-bin',
      bytesFreed: 3000,
      itemsDeleted: 3,
      itemsFailed: 0,
      errors: [],
      estimated: false,
    });
  });

  it('should not call the shell to empty a bin that is already empty', async () => {
    const bin = new FakeRecycleBin({ items: 0, bytes: 0 });

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext());

    expect(bin.empty).not.toHaveBeenCalled();
    expect(result.bytesFreed).toBe(0);
    expect(result.itemsDeleted).toBe(0);
  });

  it('should flag the result as estimated when the size cannot be queried', async () => {
    const bin = new FakeRecycleBin(new Error('COM object unavailable'));

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext());

    expect(bin.empty).toHaveBeenCalledTimes(1);
    expect(result.estimated).toBe(true);
    expect(result.bytesFreed).toBe(0);
    expect(result.errors).toEqual([{ path: 'shell:RecycleBinFolder', reason: 'COM object unavailable', code: undefined }]);
  });

  it('should flag the result as estimated when a deleted folder could only be measured in part', async () => {
    const bin = new FakeRecycleBin({ items: 2, bytes: 4096, partial: true }, { items: 0, bytes: 0, partial: false });

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext());

    expect(result.bytesFreed).toBe(4096);
    expect(result.itemsDeleted).toBe(2);
    expect(result.estimated).toBe(true);
  });

  it('should count every item as failed when emptying fails', async () => {
    const bin = new FakeRecycleBin({ items: 2, bytes: 500 });
    bin.empty.mockRejectedValueOnce(new Error('The process cannot access the file'));

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext());

    expect(result.bytesFreed).toBe(0);
    expect(result.itemsDeleted).toBe(0);
    expect(result.itemsFailed).toBe(2);
    expect(result.errors.map((e) => e.reason)).toEqual(['The process cannot access the file']);
  });

  it('should only count what actually left the bin', async () => {
    const bin = new FakeRecycleBin({ items: 2, bytes: 500 }, { items: 1, bytes: 100 });

    const context = cleanContext();
    const result = await new RecycleBinCleaner(bin).clean(task, context);

    expect(result.bytesFreed).toBe(400);
    expect(result.itemsDeleted).toBe(1);
    expect(result.itemsFailed).toBe(1);
    expect(context.onStep).toHaveBeenCalledWith(400);
  });

  it('should do nothing once the run is cancelled', async () => {
    const bin = new FakeRecycleBin({ items: 2, bytes: 500 });

    const result = await new RecycleBinCleaner(bin).clean(task, cleanContext({ shouldStop: () => true }));

    expect(bin.empty).not.toHaveBeenCalled();
    expect(result.cancelled).toBe(true);
  });
});
