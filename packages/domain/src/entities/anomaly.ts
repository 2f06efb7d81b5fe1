import type { TelemetryParameter } from './telemetry-parameter.js';
import type { TelemetryRecord } from './telemetry-record.js';

export type AnomalyKind = 'below_lower' | 'above_upper' | 'missing';

export interface AnomalyFinding {
  readonly parameter: TelemetryParameter;
  readonly kind: AnomalyKind;
  readonly value: number | null;
  /** The violated bound; absent for `missing`. */
  readonly bound?: number;
}

export interface EvaluatedRecord {
  readonly record: TelemetryRecord;
  readonly anomalies: ReadonlySet<TelemetryParameter>;
  readonly findings: readonly AnomalyFinding[];
}
