import type { AnalysisSession } from '../../entities/analysis-session.js';
import type { AnalysisSummary } from '../../entities/analysis-summary.js';
import type { EvaluatedRecord } from '../../entities/anomaly.js';
import type { GaugeReading, TelemetryAlert } from '../../entities/alert.js';
import type { MissionProfile, ParameterBounds } from '../../entities/mission-profile.js';
import type { TelemetryParameter } from '../../entities/telemetry-parameter.js';
import type { TelemetryRecord, TelemetrySource } from '../../entities/telemetry-record.js';

export interface AnalysisResult {
  readonly profile: MissionProfile;
  readonly evaluated: readonly EvaluatedRecord[];
  readonly summary: AnalysisSummary;
  readonly alerts: readonly TelemetryAlert[];
  readonly gauges: readonly GaugeReading[];
}

export interface SyntheticRequest {
  count: number;
  start: Date;
  intervalMinutes: number;
  seed: number;
  anomalyRate?: number;
  referenceProfileName?: string;
}

export type BoundsOverrides = Partial<Record<TelemetryParameter, Partial<ParameterBounds>>>;

export interface CreateSessionCommand {
  source: TelemetrySource;
  records: readonly TelemetryRecord[];
  profileName?: string;
}

export interface TelemetryAnalysisPort {
  analyze(records: readonly TelemetryRecord[], profileName: string): AnalysisResult;
  createSession(cmd: CreateSessionCommand): AnalysisSession;
  createSyntheticSession(request: SyntheticRequest): AnalysisSession;
  getSession(sessionId: string): AnalysisSession;
  analyzeSession(sessionId: string): AnalysisResult;
  switchProfile(sessionId: string, profileName: string): AnalysisResult;
  deleteSession(sessionId: string): void;
}
