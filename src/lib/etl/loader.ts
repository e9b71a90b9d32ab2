import type { WarehouseAdapter } from '../warehouse/types';
import type { BatchOptions, EventRow, TableReference } from './types';

export const DEFAULT_INSERT_BATCH = 100;

/**
 * Buffers rows and writes them in one insert once the buffer holds more than
 * `threshold` rows. There is no timer: a partial batch waits for more rows or
 * an explicit {@link RowBatcher.flush}.
 */
export class RowBatcher {
  private readonly adapter: WarehouseAdapter;
  private readonly table: TableReference;
  private readonly threshold: number;
  private rows: EventRow[] = [];

  constructor(adapter: WarehouseAdapter, table: TableReference, options: BatchOptions = {}) {
    this.adapter = adapter;
    this.table = table;
    this.threshold = options.threshold ?? DEFAULT_INSERT_BATCH;
  }

  get size(): number {
    return this.rows.length;
  }

  async submit(row: EventRow): Promise<void> {
    this.rows.push(row);

    if (this.rows.length > this.threshold) {
      await this.flush();
    }
  }

  /**
   * Sends every buffered row and empties the buffer. The buffer is emptied
   * even when the insert fails; those rows are dropped.
   */
  async flush(): Promise<number> {
    if (this.rows.length === 0) {
      return 0;
    }

    const rows = this.rows;
    this.rows = [];

    try {
      await this.adapter.insertRows(this.table, rows);
      return rows.length;
    } catch (error) {
      console.error('InsertAll failed, batch discarded', {
        table: this.table.tableId,
        rows: rows.length,
        error: error instanceof Error ? error.message : String(error)
      });
      return 0;
    }
  }
}
