import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import { describe, it, expect } from 'vitest';
import { loadEnv } from '../env';

describe('loadEnv', () => {
  it('applies defaults', () => {
    expect(loadEnv({})).toEqual({
      port: 8000,
      mongodbUri: 'mongodb://localhost:27017',
      dbName: 'sensors',
      sensorCollection: 'sensors',
      stalenessDays: 2,
      aggregationTimeoutMs: 1_000,
      storeConnectTimeoutMs: 5_000,
      defaultOrganization: 'default',
      intentStrategy: 'pattern',
      extractionStrict: false,
      modelServerUrl: 'http://localhost:8080',
      modelApiKey: undefined,
      modelCtx: 4096,
      modelRequestTimeoutMs: 30_000,
    });
  });

  it('reads overrides', () => {
    const env = loadEnv({
      PORT: '9000',
      STALENESS_DAYS: '5',
      DEFAULT_ORGANIZATION: ' orgX ',
      INTENT_STRATEGY: 'model',
      EXTRACTION_STRICT: 'true',
      MODEL_API_KEY: 'test-secret',
    });

    expect(env.port).toBe(9000);
    expect(env.stalenessDays).toBe(5);
    expect(env.defaultOrganization).toBe('orgX');
    expect(env.intentStrategy).toBe('model');
    expect(env.extractionStrict).toBe(true);
    expect(env.modelApiKey).toBe('test-secret');
  });

  it('falls back to defaults for invalid timeouts', () => {
    const env = loadEnv({ AGGREGATION_TIMEOUT_MS: 'soon', MODEL_CTX: '0' });

    expect(env.aggregationTimeoutMs).toBe(1_000);
    expect(env.modelCtx).toBe(4096);
  });

  it('keeps fractional staleness thresholds', () => {
    expect(loadEnv({ STALENESS_DAYS: '0.5' }).stalenessDays).toBe(0.5);
    expect(loadEnv({ STALENESS_DAYS: '1.5' }).stalenessDays).toBe(1.5);
  });

  it('rejects a non-positive staleness threshold', () => {
    expect(() => loadEnv({ STALENESS_DAYS: '0' })).toThrow(
      'STALENESS_DAYS must be a positive number of days, got "0"',
    );
    expect(() => loadEnv({ STALENESS_DAYS: 'two' })).toThrow(
      'STALENESS_DAYS must be a positive number of days, got "two"',
    );
  });

  it('documents every variable it reads in .env.example', () => {
    const example = dotenv.parse(readFileSync(resolve(process.cwd(), '.env.example')));

    expect(Object.keys(example).sort()).toEqual([
      'AGGREGATION_TIMEOUT_MS',
      'DB_NAME',
      'DEFAULT_ORGANIZATION',
      'EXTRACTION_STRICT',
      'INTENT_STRATEGY',
      'MODEL_API_KEY',
      'MODEL_CTX',
      'MODEL_REQUEST_TIMEOUT_MS',
      'MODEL_SERVER_URL',
      'MONGODB_URI',
      'PORT',
      'SENSOR_COLLECTION',
      'STALENESS_DAYS',
      'STORE_CONNECT_TIMEOUT_MS',
    ]);
    expect(loadEnv(example)).toEqual(loadEnv({}));
  });

  it('rejects an invalid port or strategy', () => {
    expect(() => loadEnv({ PORT: '-1' })).toThrow('PORT must be a positive number, got "-1"');
    expect(() => loadEnv({ INTENT_STRATEGY: 'regex' })).toThrow(
      'INTENT_STRATEGY must be "pattern" or "model", got "regex"',
    );
  });
});
