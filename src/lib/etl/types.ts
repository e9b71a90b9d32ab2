export type HeaderRow = Record<string, string>;

export type AnswerRow = {
  name?: string;
  address?: string;
};

/**
 * One row of the event table. Properties mirror the table columns; an absent
 * property is an omitted column, never a null.
 */
export type EventRow = {
  id?: string;
  time?: string;
  action?: string;
  device?: string;
  udp_src?: string;
  udp_dest?: string;
  tcp_src?: string;
  tcp_dest?: string;
  ipv4_src?: string;
  ipv4_dest?: string;
  type?: string;
  query?: string[];
  answer?: AnswerRow[];
  method?: string;
  status?: string;
  code?: number;
  size?: number;
  command?: string;
  text?: string[];
  header?: HeaderRow;
  url?: string;
  from?: string;
  to?: string[];
};

export type FieldType = 'STRING' | 'INTEGER' | 'TIMESTAMP' | 'RECORD';

export type FieldMode = 'REQUIRED' | 'NULLABLE' | 'REPEATED';

export type TableField = {
  name: string;
  type: FieldType;
  mode: FieldMode;
  fields?: TableField[];
};

export type TableDefinition = {
  description: string;
  partitioning: 'DAY';
  fields: TableField[];
};

export type TableReference = {
  projectId: string;
  datasetId: string;
  tableId: string;
};

export type BatchOptions = {
  threshold?: number;
};
