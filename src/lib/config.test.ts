import { describe, expect, it } from 'vitest';

import { loadSinkConfig } from './config';

describe('loadSinkConfig', () => {
  it('applies defaults', () => {
    const config = loadSinkConfig({ BIGQUERY_PROJECT: 'test-project' }, ['cyberprobe']);

    expect(config).toStrictEqual({
      keyFile: 'private.json',
      projectId: 'test-project',
      datasetId: 'cyberprobe',
      tableId: 'cyberprobe',
      insertBatch: 100,
      healthPort: undefined,
      queue: {
        brokers: ['localhost:9092'],
        clientId: 'bigquery',
        groupId: 'bigquery',
        input: 'cyberprobe',
        outputs: []
      }
    });
  });

  it('reads overrides and output queues', () => {
    const config = loadSinkConfig(
      {
        KEY: '/etc/keys/sa.json',
        BIGQUERY_PROJECT: 'test-project',
        BIGQUERY_DATASET: 'probes',
        RAW_TABLE: 'events',
        INSERT_BATCH: '250',
        HEALTH_PORT: '8080',
        KAFKA_BROKERS: 'kafka-a:9092, kafka-b:9092',
        KAFKA_CLIENT_ID: 'loader',
        KAFKA_GROUP_ID: 'loader-group'
      },
      ['withioc', 'ignored-a', 'ignored-b']
    );

    expect(config.keyFile).toBe('/etc/keys/sa.json');
    expect(config.datasetId).toBe('probes');
    expect(config.tableId).toBe('events');
    expect(config.insertBatch).toBe(250);
    expect(config.healthPort).toBe(8080);
    expect(config.queue).toStrictEqual({
      brokers: ['kafka-a:9092', 'kafka-b:9092'],
      clientId: 'loader',
      groupId: 'loader-group',
      input: 'withioc',
      outputs: ['ignored-a', 'ignored-b']
    });
  });

  it('requires a project', () => {
    expect(() => loadSinkConfig({ BIGQUERY_PROJECT: '  ' }, ['cyberprobe'])).toThrow(
      'Missing required environment variable: BIGQUERY_PROJECT'
    );
  });

  it('requires an input queue', () => {
    expect(() => loadSinkConfig({ BIGQUERY_PROJECT: 'test-project' }, [])).toThrow(
      'Missing input queue name argument'
    );
  });

  it.each(['0', '-5', 'abc', '10rows'])('rejects INSERT_BATCH=%s', (value) => {
    expect(() =>
      loadSinkConfig({ BIGQUERY_PROJECT: 'test-project', INSERT_BATCH: value }, ['cyberprobe'])
    ).toThrow(`Invalid INSERT_BATCH: ${value}`);
  });

  it('rejects an out of range health port', () => {
    expect(() =>
      loadSinkConfig({ BIGQUERY_PROJECT: 'test-project', HEALTH_PORT: '70000' }, ['cyberprobe'])
    ).toThrow('Invalid HEALTH_PORT: 70000');
  });
});
