import type { EventRow, TableDefinition, TableReference } from '../etl/types';

export type WarehouseAdapter = {
  /** Rejects when the table cannot be read, for whatever reason. */
  getTable(ref: TableReference): Promise<void>;
  createTable(ref: TableReference, definition: TableDefinition): Promise<void>;
  insertRows(ref: TableReference, rows: EventRow[]): Promise<void>;
};

export type ServiceAccountKey = {
  client_email: string;
  private_key: string;
  project_id?: string;
};
