import type { WarehouseAdapter } from '../warehouse/types';
import { buildEventTable } from './schema';
import type { TableReference } from './types';

export type ProvisionResult = 'exists' | 'created';

/**
 * Creates the event table unless it can already be read. A failed lookup is
 * not inspected: not-found and any other error both lead to a create attempt,
 * and a failed create rejects.
 */
export async function ensureTable(
  adapter: WarehouseAdapter,
  ref: TableReference
): Promise<ProvisionResult> {
  try {
    await adapter.getTable(ref);
    console.log(`Table ${ref.tableId} exists.`);
    return 'exists';
  } catch (error) {
    console.log(`Table ${ref.tableId} does not exist, creating...`, {
      reason: describeError(error)
    });
  }

  try {
    await adapter.createTable(ref, buildEventTable());
  } catch (error) {
    throw new Error(`Table create error for ${formatTable(ref)}: ${describeError(error)}`);
  }

  console.log(`Table ${ref.tableId} created.`);
  return 'created';
}

function formatTable(ref: TableReference): string {
  return `${ref.projectId}.${ref.datasetId}.${ref.tableId}`;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
