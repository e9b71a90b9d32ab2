import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { WarehouseAdapter } from '../warehouse/types';
import { RowBatcher } from './loader';
import type { EventRow, TableReference } from './types';

const table: TableReference = { projectId: 'test-project', datasetId: 'cyberprobe', tableId: 'cyberprobe' };

function createAdapter(insertRows: WarehouseAdapter['insertRows']): WarehouseAdapter {
  return {
    getTable: vi.fn(async () => undefined),
    createTable: vi.fn(async () => undefined),
    insertRows
  };
}

function rowAt(index: number): EventRow {
  return { id: `e${index}`, action: 'icmp', device: 'd1', time: '2024-01-01T00:00:00Z' };
}

async function submitRows(batcher: RowBatcher, count: number): Promise<void> {
  for (let i = 0; i < count; i += 1) {
    await batcher.submit(rowAt(i));
  }
}

describe('RowBatcher', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('does not flush at exactly the threshold', async () => {
    const insertRows = vi.fn(async () => undefined);
    const batcher = new RowBatcher(createAdapter(insertRows), table);

    await submitRows(batcher, 100);

    expect(insertRows).not.toHaveBeenCalled();
    expect(batcher.size).toBe(100);
  });

  it('flushes the whole batch once it exceeds the threshold', async () => {
    const inserted: EventRow[][] = [];
    const insertRows = vi.fn(async (_ref: TableReference, rows: EventRow[]) => {
      inserted.push(rows);
    });
    const batcher = new RowBatcher(createAdapter(insertRows), table);

    await submitRows(batcher, 101);

    expect(insertRows).toHaveBeenCalledTimes(1);
    expect(insertRows.mock.calls[0][0]).toBe(table);
    expect(inserted[0]).toHaveLength(101);
    expect(inserted[0][0]).toStrictEqual(rowAt(0));
    expect(inserted[0][100]).toStrictEqual(rowAt(100));
    expect(batcher.size).toBe(0);
  });

  it('clears the batch when the insert fails', async () => {
    const insertRows = vi.fn(async () => {
      throw new Error('quota exceeded');
    });
    const batcher = new RowBatcher(createAdapter(insertRows), table, { threshold: 2 });

    await expect(submitRows(batcher, 3)).resolves.toBeUndefined();

    expect(insertRows).toHaveBeenCalledTimes(1);
    expect(batcher.size).toBe(0);
    expect(console.error).toHaveBeenCalledWith('InsertAll failed, batch discarded', {
      table: 'cyberprobe',
      rows: 3,
      error: 'quota exceeded'
    });
  });

  it('starts a fresh batch after a flush', async () => {
    const insertRows = vi.fn(async () => undefined);
    const batcher = new RowBatcher(createAdapter(insertRows), table, { threshold: 2 });

    await submitRows(batcher, 5);

    expect(insertRows).toHaveBeenCalledTimes(1);
    expect(batcher.size).toBe(2);
  });

  it('writes the tail of the batch on an explicit flush', async () => {
    const insertRows = vi.fn(async () => undefined);
    const batcher = new RowBatcher(createAdapter(insertRows), table);

    await submitRows(batcher, 7);

    await expect(batcher.flush()).resolves.toBe(7);
    expect(insertRows).toHaveBeenCalledTimes(1);
    expect(batcher.size).toBe(0);
  });

  it('skips the insert when nothing is pending', async () => {
    const insertRows = vi.fn(async () => undefined);
    const batcher = new RowBatcher(createAdapter(insertRows), table);

    await expect(batcher.flush()).resolves.toBe(0);
    expect(insertRows).not.toHaveBeenCalled();
  });

  it('reports zero rows written when an explicit flush fails', async () => {
    const insertRows = vi.fn(async () => {
      throw new Error('network down');
    });
    const batcher = new RowBatcher(createAdapter(insertRows), table);

    await submitRows(batcher, 3);

    await expect(batcher.flush()).resolves.toBe(0);
    expect(batcher.size).toBe(0);
  });
});
