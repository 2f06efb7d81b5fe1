import type { AnomalyKind } from './anomaly.js';
import type { TelemetryParameter } from './telemetry-parameter.js';

export interface TelemetryAlert {
  readonly parameter: TelemetryParameter;
  readonly kind: AnomalyKind;
  /** Records that triggered this alert. */
  readonly recordCount: number;
  /** Lowest value for `below_lower`, highest for `above_upper`, null for `missing`. */
  readonly extremeValue: number | null;
  readonly message: string;
}

export type GaugeStatus = 'nominal' | 'warning' | 'critical' | 'unknown';

export interface GaugeReading {
  readonly parameter: TelemetryParameter;
  readonly latestValue: number | null;
  readonly latestTs: Date | null;
  readonly status: GaugeStatus;
}
