export interface ConnectivityGroup {
  connected: boolean;
  count: number;
  sensorIds: string[];
}

export interface GroupByConnectivityInput {
  organization: string;
  /** Sensors whose last report is strictly after this instant are connected. */
  reportedAfter: Date;
  timeoutMs: number;
}

/** Read-only access to the sensor fleet. */
export interface SensorStore {
  groupByConnectivity(input: GroupByConnectivityInput): Promise<ConnectivityGroup[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
