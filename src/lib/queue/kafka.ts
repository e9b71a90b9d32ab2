import { Kafka, type Consumer } from 'kafkajs';

import type { QueueConfig } from '../config';

export type MessageHandler = (payload: Buffer | null) => Promise<unknown>;

export type QueueConsumer = {
  start(handler: MessageHandler): Promise<void>;
  stop(): Promise<void>;
};

export function createKafkaConsumer(config: QueueConfig): QueueConsumer {
  const kafka = new Kafka({
    clientId: config.clientId,
    brokers: config.brokers
  });
  let consumer: Consumer | undefined;

  return {
    async start(handler: MessageHandler): Promise<void> {
      if (consumer) {
        return;
      }

      if (config.outputs.length > 0) {
        console.log('Output queues are not used by this sink', { outputs: config.outputs });
      }

      const next = kafka.consumer({ groupId: config.groupId });
      await next.connect();
      consumer = next;

      await next.subscribe({ topics: [config.input], fromBeginning: false });
      // One message at a time: the batch has a single owner and no locking.
      await next.run({
        partitionsConsumedConcurrently: 1,
        eachMessage: async ({ message }) => {
          await handler(message.value);
        }
      });

      console.log(`Consuming from ${config.input}`, { group: config.groupId });
    },
    async stop(): Promise<void> {
      if (!consumer) {
        return;
      }

      const current = consumer;
      consumer = undefined;
      await current.disconnect();
    }
  };
}
