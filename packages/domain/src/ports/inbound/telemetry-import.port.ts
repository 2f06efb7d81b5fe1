import type { TelemetryRecord } from '../../entities/telemetry-record.js';

export const TELEMETRY_CSV_HEADER = [
  'timestamp',
  'temperature',
  'pressure',
  'velocity',
  'battery',
  'fuel',
] as const;

export interface TelemetryImportPort {
  /** Parses a whole CSV document; throws ParseError on the first bad line. */
  parse(text: string): TelemetryRecord[];
}
