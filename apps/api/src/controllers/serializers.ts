import { TELEMETRY_PARAMETERS, toWireBounds } from '@telemetry-analyzer/domain';
import type {
  AnalysisResult,
  AnalysisSession,
  EvaluatedRecord,
  MissionProfile,
  TelemetryParameter,
  WireParameterBounds,
} from '@telemetry-analyzer/domain';

// JSON views of domain objects: Sets become arrays, unbounded sides become null.
// Dates are left to Date#toJSON.

export interface ProfileDto {
  name: string;
  builtIn: boolean;
  createdAt: Date;
  bounds: Record<TelemetryParameter, WireParameterBounds>;
}

export function profileDto(profile: MissionProfile): ProfileDto {
  return {
    name: profile.name,
    builtIn: profile.builtIn,
    createdAt: profile.createdAt,
    bounds: {
      temperature: toWireBounds(profile.bounds.temperature),
      pressure: toWireBounds(profile.bounds.pressure),
      velocity: toWireBounds(profile.bounds.velocity),
      battery: toWireBounds(profile.bounds.battery),
      fuel: toWireBounds(profile.bounds.fuel),
    },
  };
}

export function recordDto(evaluated: EvaluatedRecord) {
  const { record, anomalies, findings } = evaluated;
  return {
    ...record,
    anomalies: TELEMETRY_PARAMETERS.filter((p) => anomalies.has(p)),
    findings,
  };
}

export function sessionDto(session: AnalysisSession) {
  return {
    id: session.id,
    source: session.source,
    activeProfileName: session.activeProfileName,
    recordCount: session.records.length,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

export function analysisDto(result: AnalysisResult, opts: { includeRecords: boolean }) {
  return {
    profile: profileDto(result.profile),
    summary: result.summary,
    alerts: result.alerts,
    gauges: result.gauges,
    ...(opts.includeRecords ? { records: result.evaluated.map(recordDto) } : {}),
  };
}
