import { PARAMETER_INFO, TELEMETRY_PARAMETERS, readParameter } from '@telemetry-analyzer/domain';
import type {
  AnomalyKind,
  EvaluatedRecord,
  GaugeReading,
  GaugeStatus,
  MissionProfile,
  ParameterBounds,
  TelemetryAlert,
  TelemetryParameter,
  TelemetryRecord,
} from '@telemetry-analyzer/domain';

/** Fraction of a bound's magnitude that counts as "close to the limit". */
export const GAUGE_WARNING_MARGIN = 0.1;

const KIND_ORDER: readonly AnomalyKind[] = ['below_lower', 'above_upper', 'missing'];

export function formatValue(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function alertMessage(parameter: TelemetryParameter, kind: AnomalyKind, extreme: number | null, count: number): string {
  const { label, unit } = PARAMETER_INFO[parameter];
  if (kind === 'missing' || extreme === null) {
    return `${label} missing in ${count} ${count === 1 ? 'record' : 'records'}`;
  }
  const side = kind === 'below_lower' ? 'Low' : 'High';
  return `${side} ${label} detected: ${formatValue(extreme)} ${unit}`;
}

/**
 * One alert per parameter and violated side, carrying the most extreme value
 * seen. Ordered by parameter, then low, high, missing.
 */
export function buildAlerts(evaluated: readonly EvaluatedRecord[]): TelemetryAlert[] {
  const alerts: TelemetryAlert[] = [];

  for (const parameter of TELEMETRY_PARAMETERS) {
    for (const kind of KIND_ORDER) {
      let count = 0;
      let extreme: number | null = null;
      for (const { findings } of evaluated) {
        const finding = findings.find((f) => f.parameter === parameter && f.kind === kind);
        if (!finding) continue;
        count++;
        if (finding.value === null) continue;
        if (extreme === null) extreme = finding.value;
        else if (kind === 'below_lower') extreme = Math.min(extreme, finding.value);
        else extreme = Math.max(extreme, finding.value);
      }
      if (count === 0) continue;
      alerts.push({
        parameter,
        kind,
        recordCount: count,
        extremeValue: extreme,
        message: alertMessage(parameter, kind, extreme, count),
      });
    }
  }
  return alerts;
}

export function gaugeStatus(value: number | null, bounds: ParameterBounds): GaugeStatus {
  if (value === null) return 'unknown';
  const { lowerBound, upperBound } = bounds;
  if (value < lowerBound || value > upperBound) return 'critical';
  if (
    (Number.isFinite(lowerBound) && value < lowerBound + Math.abs(lowerBound) * GAUGE_WARNING_MARGIN) ||
    (Number.isFinite(upperBound) && value > upperBound - Math.abs(upperBound) * GAUGE_WARNING_MARGIN)
  ) {
    return 'warning';
  }
  return 'nominal';
}

/** Latest present reading of each parameter, graded against the profile. */
export function buildGauges(records: readonly TelemetryRecord[], profile: MissionProfile): GaugeReading[] {
  return TELEMETRY_PARAMETERS.map((parameter): GaugeReading => {
    for (let i = records.length - 1; i >= 0; i--) {
      const record = records[i];
      if (!record) continue;
      const value = readParameter(record, parameter);
      if (value === null) continue;
      return {
        parameter,
        latestValue: value,
        latestTs: record.ts,
        status: gaugeStatus(value, profile.bounds[parameter]),
      };
    }
    return { parameter, latestValue: null, latestTs: null, status: 'unknown' };
  });
}
