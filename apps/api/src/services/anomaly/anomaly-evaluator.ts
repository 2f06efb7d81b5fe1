import { TELEMETRY_PARAMETERS, hasFiniteBound, readParameter } from '@telemetry-analyzer/domain';
import type {
  AnomalyFinding,
  EvaluatedRecord,
  MissionProfile,
  ParameterBounds,
  TelemetryParameter,
  TelemetryRecord,
} from '@telemetry-analyzer/domain';

function checkParameter(
  parameter: TelemetryParameter,
  value: number | null,
  bounds: ParameterBounds,
): AnomalyFinding | null {
  if (value === null) {
    // Unknown is unsafe, but only where the profile checks the parameter at all
    return hasFiniteBound(bounds) ? { parameter, kind: 'missing', value: null } : null;
  }
  if (value < bounds.lowerBound) {
    return { parameter, kind: 'below_lower', value, bound: bounds.lowerBound };
  }
  if (value > bounds.upperBound) {
    return { parameter, kind: 'above_upper', value, bound: bounds.upperBound };
  }
  return null;
}

/** Every bound violation of one record, in parameter order. */
export function inspect(record: TelemetryRecord, profile: MissionProfile): AnomalyFinding[] {
  const findings: AnomalyFinding[] = [];
  for (const parameter of TELEMETRY_PARAMETERS) {
    const finding = checkParameter(parameter, readParameter(record, parameter), profile.bounds[parameter]);
    if (finding) findings.push(finding);
  }
  return findings;
}

/**
 * Names of the parameters of `record` that fall outside `profile`.
 * Bounds are inclusive: a value equal to a bound is in range.
 */
export function evaluate(record: TelemetryRecord, profile: MissionProfile): ReadonlySet<TelemetryParameter> {
  return new Set(inspect(record, profile).map((f) => f.parameter));
}

/** Order-preserving, side-effect free; recomputed on every profile switch. */
export function evaluateAll(
  records: readonly TelemetryRecord[],
  profile: MissionProfile,
): EvaluatedRecord[] {
  return records.map((record) => {
    const findings = inspect(record, profile);
    return {
      record,
      anomalies: new Set(findings.map((f) => f.parameter)),
      findings,
    };
  });
}
