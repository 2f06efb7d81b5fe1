import type { TelemetryParameter } from './telemetry-parameter.js';

export type HealthClassification = 'nominal' | 'warning' | 'critical';

export interface HealthThresholds {
  /** Percentage above which a parameter puts the dataset in `warning`. */
  readonly warningPct: number;
  /** Percentage above which a parameter puts the dataset in `critical`. */
  readonly criticalPct: number;
}

export interface ParameterStatistics {
  readonly count: number;
  readonly mean: number;
  readonly std: number;
  readonly min: number;
  readonly max: number;
}

export interface ParameterSummary {
  readonly parameter: TelemetryParameter;
  readonly anomalyCount: number;
  readonly percentage: number;
  readonly outOfBoundsCount: number;
  readonly belowCount: number;
  readonly aboveCount: number;
  readonly missingCount: number;
  readonly statistics: ParameterStatistics | null;
}

export interface TimeRange {
  readonly start: Date;
  readonly end: Date;
}

export interface AnalysisSummary {
  readonly totalRecords: number;
  readonly anomalousRecords: number;
  readonly timeRange: TimeRange | null;
  readonly parameters: Readonly<Record<TelemetryParameter, ParameterSummary>>;
  readonly health: HealthClassification;
}
