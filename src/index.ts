#!/usr/bin/env node
import type { Server } from 'http';

import { createApp } from './app';
import { loadSinkConfig } from './lib/config';
import { listen, type Running, shutdown } from './lifecycle';
import { createEventHandler, ensureTable, RowBatcher } from './lib/etl';
import { createKafkaConsumer } from './lib/queue/kafka';
import { createBigQueryAdapter, createBigQueryClient } from './lib/warehouse/bigquery';
import { loadServiceAccountKey } from './lib/warehouse/credentials';

async function main(): Promise<Running> {
  console.log('Initialising...');

  const config = loadSinkConfig(process.env, process.argv.slice(2));
  const key = await loadServiceAccountKey(config.keyFile);
  const adapter = createBigQueryAdapter(createBigQueryClient(key, config.projectId));

  console.log('Connected.', { project: config.projectId, dataset: config.datasetId });

  const table = {
    projectId: config.projectId,
    datasetId: config.datasetId,
    tableId: config.tableId
  };

  await ensureTable(adapter, table);

  const batcher = new RowBatcher(adapter, table, { threshold: config.insertBatch });
  const handler = createEventHandler({ batcher });

  let server: Server | undefined;
  if (config.healthPort !== undefined) {
    server = await listen(createApp({ batcher }), config.healthPort);
    console.log(`health server listening on port ${config.healthPort}`);
  }

  const consumer = createKafkaConsumer(config.queue);
  await consumer.start(handler);

  console.log('Initialisation complete.');

  return { consumer, batcher, server };
}

main()
  .then((running) => {
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => {
        shutdown(running, signal)
          .then(() => process.exit(0))
          .catch((error) => {
            console.error('Shutdown failed', error);
            process.exit(1);
          });
      });
    }
  })
  .catch((error) => {
    console.error('init:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
