import { TELEMETRY_PARAMETERS, readParameter } from '@telemetry-analyzer/domain';
import type {
  AnalysisSummary,
  EvaluatedRecord,
  HealthClassification,
  HealthThresholds,
  ParameterStatistics,
  ParameterSummary,
  TelemetryParameter,
  TimeRange,
} from '@telemetry-analyzer/domain';

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = Object.freeze({
  warningPct: 5,
  criticalPct: 20,
});

export function classifyHealth(
  percentages: readonly number[],
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS,
): HealthClassification {
  if (percentages.some((pct) => pct > thresholds.criticalPct)) return 'critical';
  if (percentages.some((pct) => pct > thresholds.warningPct)) return 'warning';
  return 'nominal';
}

/** count/mean/std/min/max over present values; std is the sample deviation. */
export function describeValues(values: readonly number[]): ParameterStatistics | null {
  if (values.length === 0) return null;
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  const mean = sum / values.length;
  let sq = 0;
  for (const v of values) sq += (v - mean) ** 2;
  const std = values.length > 1 ? Math.sqrt(sq / (values.length - 1)) : 0;
  return { count: values.length, mean, std, min, max };
}

function timeRangeOf(evaluated: readonly EvaluatedRecord[]): TimeRange | null {
  if (evaluated.length === 0) return null;
  let start = Infinity;
  let end = -Infinity;
  for (const { record } of evaluated) {
    const ms = record.ts.getTime();
    if (ms < start) start = ms;
    if (ms > end) end = ms;
  }
  return { start: new Date(start), end: new Date(end) };
}

function summarizeParameter(
  parameter: TelemetryParameter,
  evaluated: readonly EvaluatedRecord[],
): ParameterSummary {
  let anomalyCount = 0;
  let belowCount = 0;
  let aboveCount = 0;
  let missingCount = 0;
  const values: number[] = [];

  for (const { record, anomalies, findings } of evaluated) {
    const value = readParameter(record, parameter);
    if (value !== null) values.push(value);
    if (!anomalies.has(parameter)) continue;
    anomalyCount++;
    const finding = findings.find((f) => f.parameter === parameter);
    if (finding?.kind === 'below_lower') belowCount++;
    else if (finding?.kind === 'above_upper') aboveCount++;
    else if (finding?.kind === 'missing') missingCount++;
  }

  const total = evaluated.length;
  return {
    parameter,
    anomalyCount,
    percentage: total === 0 ? 0 : (anomalyCount / total) * 100,
    outOfBoundsCount: belowCount + aboveCount,
    belowCount,
    aboveCount,
    missingCount,
    statistics: describeValues(values),
  };
}

/**
 * Reduces evaluated records to per-parameter anomaly counts and percentages
 * plus an overall health label. An empty dataset yields zero percentages.
 */
export function summarize(
  evaluated: readonly EvaluatedRecord[],
  thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS,
): AnalysisSummary {
  const parameters = {
    temperature: summarizeParameter('temperature', evaluated),
    pressure: summarizeParameter('pressure', evaluated),
    velocity: summarizeParameter('velocity', evaluated),
    battery: summarizeParameter('battery', evaluated),
    fuel: summarizeParameter('fuel', evaluated),
  };

  return {
    totalRecords: evaluated.length,
    anomalousRecords: evaluated.filter((e) => e.anomalies.size > 0).length,
    timeRange: timeRangeOf(evaluated),
    parameters,
    health: classifyHealth(
      TELEMETRY_PARAMETERS.map((p) => parameters[p].percentage),
      thresholds,
    ),
  };
}
