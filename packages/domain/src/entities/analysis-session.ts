import type { TelemetryRecord, TelemetrySource } from './telemetry-record.js';

export interface AnalysisSession {
  readonly id: string;
  readonly source: TelemetrySource;
  readonly records: readonly TelemetryRecord[];
  readonly activeProfileName: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}
