import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryAnalysisPort, TelemetryImportPort } from '@telemetry-analyzer/domain';
import type { AnalysisConfig } from '../config/analysis.js';
import { csvBody, requireCsvText } from '../middleware/csv-body.js';
import { analysisDto, recordDto, sessionDto } from './serializers.js';

export interface SessionsRouterDeps {
  analysis: TelemetryAnalysisPort;
  importer: TelemetryImportPort;
  config: AnalysisConfig;
  csvBodyLimit: string;
  now?: () => Date;
  randomSeed?: () => number;
}

const MS_PER_MINUTE = 60_000;

const csvQuerySchema = z.object({
  profile: z.string().min(1).optional(),
});

const syntheticBodySchema = z.object({
  count: z.number().int().min(0).max(100_000).optional(),
  start: z.string().datetime().optional(),
  intervalMinutes: z.number().positive().max(24 * 60).optional(),
  seed: z.number().int().min(0).max(0xffffffff).optional(),
  anomalyRate: z.number().min(0).max(1).optional(),
  profile: z.string().min(1).optional(),
});

const switchProfileSchema = z.object({
  profile: z.string().min(1),
});

const recordsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  offset: z.coerce.number().int().min(0).default(0),
  anomalousOnly: z.enum(['true', 'false']).default('false'),
});

function sessionId(req: Request): string {
  return req.params['sessionId'] ?? '';
}

export function createSessionsRouter(deps: SessionsRouterDeps): Router {
  const router = Router();
  const { analysis, importer, config } = deps;
  const now = deps.now ?? (() => new Date());
  const randomSeed = deps.randomSeed ?? (() => Math.floor(Math.random() * 0x7fffffff));

  /** POST /api/sessions/csv: load a CSV document into a new session */
  router.post('/csv', csvBody(deps.csvBodyLimit), (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = csvQuerySchema.parse(req.query);
      const records = importer.parse(requireCsvText(req));
      const session = analysis.createSession({ source: 'csv', records, profileName: query.profile });
      const result = analysis.analyzeSession(session.id);
      res.status(201).json({ session: sessionDto(session), analysis: analysisDto(result, { includeRecords: false }) });
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/sessions/synthetic: generate a demo dataset into a new session */
  router.post('/synthetic', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = syntheticBodySchema.parse(req.body ?? {});
      const count = body.count ?? config.simulation.defaultCount;
      const intervalMinutes = body.intervalMinutes ?? config.simulation.intervalMinutes;
      const seed = body.seed ?? randomSeed();
      // Default window ends at the current minute
      const nowMinute = Math.floor(now().getTime() / MS_PER_MINUTE) * MS_PER_MINUTE;
      const start = body.start
        ? new Date(body.start)
        : new Date(nowMinute - count * intervalMinutes * MS_PER_MINUTE);

      const session = analysis.createSyntheticSession({
        count,
        start,
        intervalMinutes,
        seed,
        anomalyRate: body.anomalyRate,
        referenceProfileName: body.profile,
      });
      const result = analysis.analyzeSession(session.id);
      res.status(201).json({
        session: sessionDto(session),
        seed,
        analysis: analysisDto(result, { includeRecords: false }),
      });
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/sessions/:sessionId */
  router.get('/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(sessionDto(analysis.getSession(sessionId(req))));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/sessions/:sessionId/analysis: recompute with the active profile */
  router.get('/:sessionId/analysis', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(analysisDto(analysis.analyzeSession(sessionId(req)), { includeRecords: false }));
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/sessions/:sessionId/profile: switch profile and recompute */
  router.put('/:sessionId/profile', (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = switchProfileSchema.parse(req.body);
      const result = analysis.switchProfile(sessionId(req), body.profile);
      res.json(analysisDto(result, { includeRecords: false }));
    } catch (err) {
      next(err);
    }
  });

  /** GET /api/sessions/:sessionId/records: page of evaluated records */
  router.get('/:sessionId/records', (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = recordsQuerySchema.parse(req.query);
      const { evaluated } = analysis.analyzeSession(sessionId(req));
      const rows = query.anomalousOnly === 'true'
        ? evaluated.filter((e) => e.anomalies.size > 0)
        : evaluated;
      res.json({
        data: rows.slice(query.offset, query.offset + query.limit).map(recordDto),
        total: rows.length,
      });
    } catch (err) {
      next(err);
    }
  });

  /** DELETE /api/sessions/:sessionId */
  router.delete('/:sessionId', (req: Request, res: Response, next: NextFunction) => {
    try {
      analysis.deleteSession(sessionId(req));
      res.status(204).end();
    } catch (err) {
      next(err);
    }
  });

  return router;
}
