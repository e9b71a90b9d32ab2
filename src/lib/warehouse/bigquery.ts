import { BigQuery } from '@google-cloud/bigquery';
import { v4 as uuidv4 } from 'uuid';

import type { EventRow, TableDefinition, TableField, TableReference } from '../etl/types';
import type { ServiceAccountKey, WarehouseAdapter } from './types';

export type RawRow = {
  insertId: string;
  json: EventRow;
};

export type CreateTableOptions = {
  description: string;
  timePartitioning: { type: string };
  schema: { fields: TableField[] };
};

/** The slice of the BigQuery client the adapter calls. */
export type BigQueryClient = {
  dataset(datasetId: string, options: { projectId: string }): {
    table(tableId: string): {
      getMetadata(): Promise<unknown>;
      insert(rows: RawRow[], options: { raw: boolean }): Promise<unknown>;
    };
    createTable(tableId: string, options: CreateTableOptions): Promise<unknown>;
  };
};

export function createBigQueryClient(key: ServiceAccountKey, projectId: string): BigQuery {
  return new BigQuery({
    projectId,
    credentials: {
      client_email: key.client_email,
      private_key: key.private_key
    }
  });
}

export function createBigQueryAdapter(bigquery: BigQueryClient): WarehouseAdapter {
  const datasetFor = (ref: TableReference) => bigquery.dataset(ref.datasetId, { projectId: ref.projectId });

  return {
    async getTable(ref: TableReference): Promise<void> {
      await datasetFor(ref).table(ref.tableId).getMetadata();
    },
    async createTable(ref: TableReference, definition: TableDefinition): Promise<void> {
      await datasetFor(ref).createTable(ref.tableId, {
        description: definition.description,
        timePartitioning: { type: definition.partitioning },
        schema: { fields: definition.fields }
      });
    },
    async insertRows(ref: TableReference, rows: EventRow[]): Promise<void> {
      // Raw rows so each carries an insertId for best-effort dedup on the service side.
      await datasetFor(ref)
        .table(ref.tableId)
        .insert(
          rows.map((row) => ({ insertId: uuidv4(), json: row })),
          { raw: true }
        );
    }
  };
}
