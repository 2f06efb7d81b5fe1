import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { TelemetryCsvParser } from '@telemetry-analyzer/adapters';
import type { MissionProfileRepositoryPort, TelemetryImportPort } from '@telemetry-analyzer/domain';

import { getAnalysisConfig, getServerConfig } from './config/analysis.js';
import type { AnalysisConfig, ServerConfig } from './config/analysis.js';
import { createProfilesRouter } from './controllers/profiles.controller.js';
import { createAnalysisRouter } from './controllers/analysis.controller.js';
import { createSessionsRouter } from './controllers/sessions.controller.js';
import { errorHandler } from './middleware/error-handler.js';
import { AnalysisService } from './services/analysis/analysis.service.js';
import { MissionProfileStore } from './services/profiles/mission-profile-store.js';
import { InMemorySessionRepository } from './services/sessions/in-memory-session.repository.js';

export interface AppDeps {
  server: ServerConfig;
  analysisConfig: AnalysisConfig;
  profiles: MissionProfileStore;
  repository: MissionProfileRepositoryPort | null;
  importer: TelemetryImportPort;
  analysis: AnalysisService;
  now?: () => Date;
  randomSeed?: () => number;
}

/** Wires the default in-memory collaborators; callers override what they need. */
export function createAppDeps(overrides: Partial<AppDeps> = {}): AppDeps {
  const analysisConfig = overrides.analysisConfig ?? getAnalysisConfig();
  const profiles = overrides.profiles ?? new MissionProfileStore();
  const analysis =
    overrides.analysis ??
    new AnalysisService({
      profiles,
      sessions: new InMemorySessionRepository(analysisConfig.maxSessions),
      config: analysisConfig,
      now: overrides.now,
    });
  return {
    server: overrides.server ?? getServerConfig(),
    analysisConfig,
    profiles,
    repository: overrides.repository ?? null,
    importer: overrides.importer ?? new TelemetryCsvParser(),
    analysis,
    now: overrides.now,
    randomSeed: overrides.randomSeed,
  };
}

export function buildApp(deps: AppDeps = createAppDeps()): ReturnType<typeof express> {
  const app = express();
  const { server, analysisConfig } = deps;

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  app.use(cors({ origin: server.corsOrigin }));
  if (server.accessLog) app.use(morgan(server.logFormat));
  app.use(express.json({ limit: '1mb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api/profiles', createProfilesRouter({ profiles: deps.profiles, repository: deps.repository }));
  app.use(
    '/api/analysis',
    createAnalysisRouter({
      analysis: deps.analysis,
      importer: deps.importer,
      defaultProfileName: analysisConfig.defaultProfileName,
      csvBodyLimit: server.csvBodyLimit,
    }),
  );
  app.use(
    '/api/sessions',
    createSessionsRouter({
      analysis: deps.analysis,
      importer: deps.importer,
      config: analysisConfig,
      csvBodyLimit: server.csvBodyLimit,
      now: deps.now,
      randomSeed: deps.randomSeed,
    }),
  );

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      persistence: deps.repository ? 'postgres' : 'memory',
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}
