import { Schema, type Connection, type Model } from 'mongoose';

export const SENSOR_TYPES = [
  'vibration',
  'temperature',
  'humidity',
  'pressure',
  'ultrasound',
] as const;

export type SensorType = (typeof SENSOR_TYPES)[number];

export interface SensorRecord {
  sensorId: string;
  organization: string;
  sensorType: SensorType;
  batteryLevel: number;
  /** Legacy flag written by older gateways; connectivity is derived from lastReportTimestamp. */
  connectionFlag?: boolean;
  gatewayId: string;
  lastReportTimestamp?: Date;
}

export const sensorSchema = new Schema<SensorRecord>(
  {
    sensorId: { type: String, required: true },
    organization: { type: String, required: true, index: true },
    sensorType: { type: String, enum: [...SENSOR_TYPES], required: true },
    batteryLevel: { type: Number, min: 0, max: 100, required: true },
    connectionFlag: { type: Boolean },
    gatewayId: { type: String, required: true },
    lastReportTimestamp: { type: Date },
  },
  { versionKey: false, autoIndex: false, autoCreate: false },
);

sensorSchema.index({ organization: 1, sensorId: 1 }, { unique: true });

export function getSensorModel(
  connection: Connection,
  collection: string,
): Model<SensorRecord> {
  return connection.model<SensorRecord>('Sensor', sensorSchema, collection);
}
