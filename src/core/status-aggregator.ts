import type { ConnectivityGroup, SensorStore } from '../store/sensor-store';
import { AggregationError } from './errors';
import { emptySummary, type StatusSummary } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface StatusAggregatorConfig {
  store: SensorStore;
  defaultThresholdDays: number;
  timeoutMs: number;
  now?: () => Date;
}

export class StatusAggregator {
  private readonly now: () => Date;

  constructor(private readonly config: StatusAggregatorConfig) {
    assertPositiveDays(config.defaultThresholdDays);
    this.now = config.now ?? (() => new Date());
  }

  async summarize(
    organization: string,
    thresholdDays: number = this.config.defaultThresholdDays,
  ): Promise<StatusSummary> {
    assertPositiveDays(thresholdDays);
    const reportedAfter = new Date(this.now().getTime() - thresholdDays * DAY_MS);

    let groups: ConnectivityGroup[];
    try {
      groups = await this.config.store.groupByConnectivity({
        organization,
        reportedAfter,
        timeoutMs: this.config.timeoutMs,
      });
    } catch (error) {
      throw new AggregationError(organization, { cause: error });
    }

    const summary = emptySummary();
    for (const group of groups) {
      if (group.connected) {
        summary.connectedCount += group.count;
      } else {
        summary.disconnectedCount += group.count;
        summary.disconnectedIds.push(...group.sensorIds);
      }
    }
    return summary;
  }
}

function assertPositiveDays(days: number): void {
  if (!Number.isFinite(days) || days <= 0) {
    throw new RangeError(`Staleness threshold must be a positive number of days, got ${days}`);
  }
}
