import type { Server } from 'http';

import type { Express } from 'express';

import type { RowBatcher } from './lib/etl/loader';
import type { QueueConsumer } from './lib/queue/kafka';

export type Running = {
  consumer: Pick<QueueConsumer, 'stop'>;
  batcher: Pick<RowBatcher, 'flush'>;
  server?: Server;
};

/** Resolves once the app is listening; rejects on a bind error such as EADDRINUSE. */
export function listen(app: Express, port: number): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);

    const onError = (error: Error) => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = () => {
      server.off('error', onError);
      resolve(server);
    };

    server.once('error', onError);
    server.once('listening', onListening);
  });
}

/**
 * Stops consuming, then writes the pending batch. The flush runs even when
 * stopping the consumer fails.
 */
export async function shutdown(running: Running, signal: string): Promise<void> {
  console.log(`Received ${signal}, shutting down`);

  try {
    await running.consumer.stop();
  } catch (error) {
    console.error('Consumer stop failed', { error: error instanceof Error ? error.message : error });
  }

  const written = await running.batcher.flush();
  console.log('Flushed pending rows', { rows: written });

  const server = running.server;
  if (server) {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
