import { headerColumns } from './headers';
import type { FieldMode, FieldType, TableDefinition, TableField } from './types';

export const EVENT_TABLE_DESCRIPTION = 'cyberprobe event table';

function field(
  name: string,
  type: FieldType,
  mode: FieldMode,
  fields?: TableField[]
): TableField {
  return fields ? { name, type, mode, fields } : { name, type, mode };
}

// Port columns are STRING: the address part of "tcp:443" is loaded verbatim.
export function buildEventTable(): TableDefinition {
  return {
    description: EVENT_TABLE_DESCRIPTION,
    partitioning: 'DAY',
    fields: [
      field('id', 'STRING', 'REQUIRED'),
      field('time', 'TIMESTAMP', 'REQUIRED'),
      field('action', 'STRING', 'REQUIRED'),
      field('device', 'STRING', 'REQUIRED'),
      field('udp_src', 'STRING', 'NULLABLE'),
      field('udp_dest', 'STRING', 'NULLABLE'),
      field('tcp_src', 'STRING', 'NULLABLE'),
      field('tcp_dest', 'STRING', 'NULLABLE'),
      field('ipv4_src', 'STRING', 'NULLABLE'),
      field('ipv4_dest', 'STRING', 'NULLABLE'),
      field('type', 'STRING', 'NULLABLE'),
      field('query', 'STRING', 'REPEATED'),
      field('answer', 'RECORD', 'REPEATED', [
        field('name', 'STRING', 'NULLABLE'),
        field('address', 'STRING', 'NULLABLE')
      ]),
      field('method', 'STRING', 'NULLABLE'),
      field('status', 'STRING', 'NULLABLE'),
      field('code', 'INTEGER', 'NULLABLE'),
      field('size', 'INTEGER', 'NULLABLE'),
      field('command', 'STRING', 'NULLABLE'),
      field('text', 'STRING', 'REPEATED'),
      field(
        'header',
        'RECORD',
        'NULLABLE',
        headerColumns().map((name) => field(name, 'STRING', 'NULLABLE'))
      ),
      field('url', 'STRING', 'NULLABLE'),
      field('from', 'STRING', 'NULLABLE'),
      field('to', 'STRING', 'REPEATED')
    ]
  };
}
