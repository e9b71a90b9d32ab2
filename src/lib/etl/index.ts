import { decodeEvent } from '../events/decoder';
import type { RowBatcher } from './loader';
import { mapEvent } from './transformer';

export { buildHeaderRow, normalizeHeaderName, ALLOWED_HTTP_HEADERS } from './headers';
export { DEFAULT_INSERT_BATCH, RowBatcher } from './loader';
export { ensureTable, type ProvisionResult } from './provisioner';
export { buildEventTable } from './schema';
export { mapEvent } from './transformer';
export type { EventRow, TableDefinition, TableReference } from './types';

export type HandleOutcome = 'buffered' | 'dropped';

export type EventHandler = (payload: Buffer | null) => Promise<HandleOutcome>;

export function createEventHandler(deps: { batcher: RowBatcher }): EventHandler {
  const { batcher } = deps;

  return async (payload) => {
    const decoded = decodeEvent(payload);

    if (!decoded.ok) {
      console.warn("Couldn't decode event, dropping message", { error: decoded.error });
      return 'dropped';
    }

    await batcher.submit(mapEvent(decoded.event));
    return 'buffered';
  };
}
