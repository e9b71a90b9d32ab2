import { DEFAULT_INSERT_BATCH } from './etl/loader';

export type QueueConfig = {
  brokers: string[];
  clientId: string;
  groupId: string;
  input: string;
  outputs: string[];
};

export type SinkConfig = {
  keyFile: string;
  projectId: string;
  datasetId: string;
  tableId: string;
  insertBatch: number;
  healthPort?: number;
  queue: QueueConfig;
};

type Env = Record<string, string | undefined>;

const PROGRAM_NAME = 'bigquery';

/**
 * Reads the sink's settings. `args` are the positional arguments: the input
 * queue, then any output queues (accepted for parity with other pipeline
 * stages, never written to).
 */
export function loadSinkConfig(env: Env, args: string[]): SinkConfig {
  const projectId = readString(env.BIGQUERY_PROJECT);

  if (!projectId) {
    throw new Error('Missing required environment variable: BIGQUERY_PROJECT');
  }

  const [input, ...outputs] = args;

  if (!input || input.trim().length === 0) {
    throw new Error('Missing input queue name argument');
  }

  return {
    keyFile: readString(env.KEY) ?? 'private.json',
    projectId,
    datasetId: readString(env.BIGQUERY_DATASET) ?? 'cyberprobe',
    tableId: readString(env.RAW_TABLE) ?? 'cyberprobe',
    insertBatch: readPositiveInt('INSERT_BATCH', env.INSERT_BATCH) ?? DEFAULT_INSERT_BATCH,
    healthPort: readPort('HEALTH_PORT', env.HEALTH_PORT),
    queue: {
      brokers: readList(env.KAFKA_BROKERS) ?? ['localhost:9092'],
      clientId: readString(env.KAFKA_CLIENT_ID) ?? PROGRAM_NAME,
      groupId: readString(env.KAFKA_GROUP_ID) ?? PROGRAM_NAME,
      input: input.trim(),
      outputs
    }
  };
}

function readPositiveInt(name: string, value: string | undefined): number | undefined {
  const raw = readString(value);

  if (raw === undefined) {
    return;
  }

  const parsed = Number.parseInt(raw, 10);

  if (Number.isNaN(parsed) || parsed <= 0 || String(parsed) !== raw) {
    throw new Error(`Invalid ${name}: ${raw}`);
  }

  return parsed;
}

function readPort(name: string, value: string | undefined): number | undefined {
  const port = readPositiveInt(name, value);

  if (port !== undefined && port > 65535) {
    throw new Error(`Invalid ${name}: ${port}`);
  }

  return port;
}

function readList(value: string | undefined): string[] | undefined {
  const raw = readString(value);

  if (raw === undefined) {
    return;
  }

  const entries = raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

  return entries.length > 0 ? entries : undefined;
}

function readString(value: string | undefined): string | undefined {
  if (!value) {
    return;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
