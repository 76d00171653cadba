import type { CompletionClient, CompletionInput } from '../services/model-client';
import type { PipelineLogger } from '../core/chat-pipeline';
import type { SensorRecord } from '../store/sensor-model';
import type {
  ConnectivityGroup,
  GroupByConnectivityInput,
  SensorStore,
} from '../store/sensor-store';

export const NOW = new Date('2026-03-10T12:00:00.000Z');
export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

export function sensor(
  sensorId: string,
  organization: string,
  lastReportTimestamp?: Date,
): SensorRecord {
  return {
    sensorId,
    organization,
    sensorType: 'vibration',
    batteryLevel: 80,
    gatewayId: 'g1',
    ...(lastReportTimestamp ? { lastReportTimestamp } : {}),
  };
}

/** Mirrors the grouped aggregation: match, sort by sensorId, strict `>` on the timestamp. */
export class InMemorySensorStore implements SensorStore {
  readonly calls: GroupByConnectivityInput[] = [];
  failWith: Error | null = null;

  constructor(private readonly records: SensorRecord[]) {}

  async groupByConnectivity(input: GroupByConnectivityInput): Promise<ConnectivityGroup[]> {
    this.calls.push(input);
    if (this.failWith) {
      throw this.failWith;
    }
    const matching = this.records
      .filter((record) => record.organization === input.organization)
      .sort((a, b) => a.sensorId.localeCompare(b.sensorId));

    const groups = new Map<boolean, ConnectivityGroup>();
    for (const record of matching) {
      const connected =
        record.lastReportTimestamp !== undefined &&
        record.lastReportTimestamp.getTime() > input.reportedAfter.getTime();
      const group = groups.get(connected) ?? { connected, count: 0, sensorIds: [] };
      group.count += 1;
      group.sensorIds.push(record.sensorId);
      groups.set(connected, group);
    }
    return [...groups.values()];
  }

  async ping(): Promise<void> {}

  async close(): Promise<void> {}
}

export class ScriptedCompletionClient implements CompletionClient {
  readonly prompts: CompletionInput[] = [];

  constructor(private readonly output: string | Error) {}

  async complete(input: CompletionInput): Promise<string> {
    this.prompts.push(input);
    if (this.output instanceof Error) {
      throw this.output;
    }
    return this.output;
  }
}

export interface RecordedLog {
  level: 'info' | 'warn' | 'error';
  obj: unknown;
  msg?: string;
}

export function createRecordingLogger(): PipelineLogger & { entries: RecordedLog[] } {
  const entries: RecordedLog[] = [];
  return {
    entries,
    info: (obj, msg) => entries.push({ level: 'info', obj, msg }),
    warn: (obj, msg) => entries.push({ level: 'warn', obj, msg }),
    error: (obj, msg) => entries.push({ level: 'error', obj, msg }),
  };
}
