import dotenv from 'dotenv';
import type { IntentStrategy } from '../core/types';

dotenv.config();

const DEFAULT_PORT = 8000;
const DEFAULT_STALENESS_DAYS = 2;
const DEFAULT_AGGREGATION_TIMEOUT_MS = 1_000;
const DEFAULT_STORE_CONNECT_TIMEOUT_MS = 5_000;
const DEFAULT_MODEL_CTX = 4096;
const DEFAULT_MODEL_REQUEST_TIMEOUT_MS = 30_000;

export interface AppEnv {
  port: number;
  mongodbUri: string;
  dbName: string;
  sensorCollection: string;
  /** Days without a report after which a sensor counts as disconnected; fractions allowed. */
  stalenessDays: number;
  /** Upper bound for the connectivity aggregation (maxTimeMS). */
  aggregationTimeoutMs: number;
  storeConnectTimeoutMs: number;
  /** Organization used when the message does not name one. */
  defaultOrganization: string;
  intentStrategy: IntentStrategy;
  /** When true, unreadable model output is returned as HTTP 422 instead of a clarification answer. */
  extractionStrict: boolean;
  modelServerUrl: string;
  modelApiKey?: string;
  modelCtx: number;
  modelRequestTimeoutMs: number;
}

type RawEnv = Record<string, string | undefined>;

export function loadEnv(source: RawEnv = process.env): AppEnv {
  const rawPort = source.PORT ?? String(DEFAULT_PORT);
  const port = Number(rawPort);

  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`PORT must be a positive number, got "${rawPort}"`);
  }

  return {
    port,
    mongodbUri: source.MONGODB_URI ?? 'mongodb://localhost:27017',
    dbName: source.DB_NAME ?? 'sensors',
    sensorCollection: source.SENSOR_COLLECTION ?? 'sensors',
    stalenessDays: parseStalenessDays(source.STALENESS_DAYS, DEFAULT_STALENESS_DAYS),
    aggregationTimeoutMs: parsePositiveInt(
      source.AGGREGATION_TIMEOUT_MS,
      DEFAULT_AGGREGATION_TIMEOUT_MS,
    ),
    storeConnectTimeoutMs: parsePositiveInt(
      source.STORE_CONNECT_TIMEOUT_MS,
      DEFAULT_STORE_CONNECT_TIMEOUT_MS,
    ),
    defaultOrganization: nonEmpty(source.DEFAULT_ORGANIZATION) ?? 'default',
    intentStrategy: parseStrategy(source.INTENT_STRATEGY),
    extractionStrict: parseBoolean(source.EXTRACTION_STRICT),
    modelServerUrl: nonEmpty(source.MODEL_SERVER_URL) ?? 'http://localhost:8080',
    modelApiKey: nonEmpty(source.MODEL_API_KEY),
    modelCtx: parsePositiveInt(source.MODEL_CTX, DEFAULT_MODEL_CTX),
    modelRequestTimeoutMs: parsePositiveInt(
      source.MODEL_REQUEST_TIMEOUT_MS,
      DEFAULT_MODEL_REQUEST_TIMEOUT_MS,
    ),
  };
}

function parseStrategy(input: string | undefined): IntentStrategy {
  if (input === undefined || input === '' || input === 'pattern') return 'pattern';
  if (input === 'model') return 'model';
  throw new Error(`INTENT_STRATEGY must be "pattern" or "model", got "${input}"`);
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseStalenessDays(value: string | undefined, defaultVal: number): number {
  if (value === undefined || value === '') return defaultVal;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`STALENESS_DAYS must be a positive number of days, got "${value}"`);
  }
  return n;
}

function parsePositiveInt(value: string | undefined, defaultVal: number): number {
  if (value === undefined || value === '') return defaultVal;
  const n = Number(value);
  if (!Number.isFinite(n) || n < 1) return defaultVal;
  return Math.floor(n);
}
