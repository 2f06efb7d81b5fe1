import { v4 as uuidv4 } from 'uuid';
import { wallClockNow } from '@telemetry-analyzer/adapters';
import { NotFoundError } from '@telemetry-analyzer/domain';
import type {
  AnalysisResult,
  AnalysisSession,
  CreateSessionCommand,
  SessionRepositoryPort,
  SyntheticRequest,
  TelemetryAnalysisPort,
  TelemetryRecord,
} from '@telemetry-analyzer/domain';
import type { AnalysisConfig } from '../../config/analysis.js';
import { evaluateAll } from '../anomaly/anomaly-evaluator.js';
import { buildAlerts, buildGauges } from '../alerts/alert-builder.js';
import { MissionProfileStore } from '../profiles/mission-profile-store.js';
import { generate } from '../simulation/telemetry-generator.js';
import { summarize } from '../summary/summary-aggregator.js';

export interface AnalysisServiceDeps {
  profiles: MissionProfileStore;
  sessions: SessionRepositoryPort;
  config: AnalysisConfig;
  newId?: () => string;
  now?: () => Date;
}

/**
 * Runs the evaluate → summarize pass. Nothing here keeps a "current" profile
 * or dataset: one-shot calls take both as arguments and sessions carry their
 * own, re-resolving the profile by name on every pass.
 */
export class AnalysisService implements TelemetryAnalysisPort {
  private readonly profiles: MissionProfileStore;
  private readonly sessions: SessionRepositoryPort;
  private readonly config: AnalysisConfig;
  private readonly newId: () => string;
  private readonly now: () => Date;

  constructor(deps: AnalysisServiceDeps) {
    this.profiles = deps.profiles;
    this.sessions = deps.sessions;
    this.config = deps.config;
    this.newId = deps.newId ?? (() => uuidv4());
    this.now = deps.now ?? wallClockNow;
  }

  analyze(records: readonly TelemetryRecord[], profileName: string): AnalysisResult {
    const profile = this.profiles.getProfile(profileName);
    const evaluated = evaluateAll(records, profile);
    return {
      profile,
      evaluated,
      summary: summarize(evaluated, this.config.health),
      alerts: buildAlerts(evaluated),
      gauges: buildGauges(records, profile),
    };
  }

  createSession(cmd: CreateSessionCommand): AnalysisSession {
    const profileName = cmd.profileName ?? this.config.defaultProfileName;
    // Fail before storing anything if the profile is unknown
    this.profiles.getProfile(profileName);

    const now = this.now();
    const session: AnalysisSession = {
      id: this.newId(),
      source: cmd.source,
      records: Object.freeze([...cmd.records]),
      activeProfileName: profileName,
      createdAt: now,
      updatedAt: now,
    };
    this.sessions.put(session);
    console.log(`[sessions] created ${session.id} (${session.source}, ${session.records.length} records)`);
    return session;
  }

  createSyntheticSession(request: SyntheticRequest): AnalysisSession {
    const profileName = request.referenceProfileName ?? this.config.defaultProfileName;
    const records = generate(request.count, request.start, request.intervalMinutes, request.seed, {
      anomalyRate: request.anomalyRate ?? this.config.simulation.anomalyRate,
      referenceProfile: this.profiles.getProfile(profileName),
    });
    return this.createSession({ source: 'synthetic', records, profileName });
  }

  getSession(sessionId: string): AnalysisSession {
    const session = this.sessions.find(sessionId);
    if (!session) throw new NotFoundError('session', sessionId);
    return session;
  }

  analyzeSession(sessionId: string): AnalysisResult {
    const session = this.getSession(sessionId);
    return this.analyze(session.records, session.activeProfileName);
  }

  switchProfile(sessionId: string, profileName: string): AnalysisResult {
    const session = this.getSession(sessionId);
    const result = this.analyze(session.records, profileName);
    this.sessions.put({ ...session, activeProfileName: result.profile.name, updatedAt: this.now() });
    return result;
  }

  deleteSession(sessionId: string): void {
    if (!this.sessions.remove(sessionId)) throw new NotFoundError('session', sessionId);
  }
}
