import mongoose, {
  type ConnectOptions,
  type Connection,
  type Model,
  type PipelineStage,
} from 'mongoose';
import { getSensorModel, type SensorRecord } from './sensor-model';
import type {
  ConnectivityGroup,
  GroupByConnectivityInput,
  SensorStore,
} from './sensor-store';

export interface MongoSensorStoreConfig {
  uri: string;
  dbName: string;
  collection: string;
  /** Server selection timeout; a store that cannot be reached within it fails startup. */
  connectTimeoutMs: number;
}

interface GroupDocument {
  _id: boolean;
  count: number;
  sensorIds: string[];
}

/**
 * Single grouped query: sensors are never loaded client-side.
 * A missing lastReportTimestamp sorts below every date, so it is never `$gt`.
 */
export function buildConnectivityPipeline(
  organization: string,
  reportedAfter: Date,
): PipelineStage[] {
  return [
    { $match: { organization } },
    { $sort: { sensorId: 1 } },
    {
      $project: {
        _id: 0,
        sensorId: 1,
        connected: { $gt: ['$lastReportTimestamp', reportedAfter] },
      },
    },
    {
      $group: {
        _id: '$connected',
        count: { $sum: 1 },
        sensorIds: { $push: '$sensorId' },
      },
    },
  ];
}

/** Commands fail immediately while disconnected instead of queueing behind bufferTimeoutMS. */
export function buildConnectionOptions(config: MongoSensorStoreConfig): ConnectOptions {
  return {
    dbName: config.dbName,
    serverSelectionTimeoutMS: config.connectTimeoutMs,
    bufferCommands: false,
  };
}

export class MongoSensorStore implements SensorStore {
  private constructor(
    private readonly connection: Connection,
    private readonly sensors: Model<SensorRecord>,
  ) {}

  static async connect(config: MongoSensorStoreConfig): Promise<MongoSensorStore> {
    const connection = await mongoose
      .createConnection(config.uri, buildConnectionOptions(config))
      .asPromise();
    return MongoSensorStore.fromConnection(connection, config.collection);
  }

  static fromConnection(connection: Connection, collection: string): MongoSensorStore {
    return new MongoSensorStore(connection, getSensorModel(connection, collection));
  }

  async groupByConnectivity(input: GroupByConnectivityInput): Promise<ConnectivityGroup[]> {
    const groups = await this.sensors
      .aggregate<GroupDocument>(
        buildConnectivityPipeline(input.organization, input.reportedAfter),
      )
      .option({ maxTimeMS: input.timeoutMs })
      .exec();

    return groups.map((group) => ({
      connected: group._id === true,
      count: group.count,
      sensorIds: group.sensorIds,
    }));
  }

  async ping(): Promise<void> {
    const db = this.connection.db;
    if (!db) {
      throw new Error('MongoDB connection has no database handle');
    }
    await db.admin().ping();
  }

  async close(): Promise<void> {
    await this.connection.close();
  }
}
