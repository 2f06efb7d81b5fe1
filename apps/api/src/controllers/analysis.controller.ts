import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { TelemetryAnalysisPort, TelemetryImportPort } from '@telemetry-analyzer/domain';
import { csvBody, requireCsvText } from '../middleware/csv-body.js';
import { analysisDto } from './serializers.js';

export interface AnalysisRouterDeps {
  analysis: TelemetryAnalysisPort;
  importer: TelemetryImportPort;
  defaultProfileName: string;
  csvBodyLimit: string;
}

const analyzeQuerySchema = z.object({
  profile: z.string().min(1).optional(),
  includeRecords: z.enum(['true', 'false']).default('true'),
});

export function createAnalysisRouter(deps: AnalysisRouterDeps): Router {
  const router = Router();

  /** POST /api/analysis: one-shot evaluation of a CSV document, nothing retained */
  router.post('/', csvBody(deps.csvBodyLimit), (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = analyzeQuerySchema.parse(req.query);
      const records = deps.importer.parse(requireCsvText(req));
      const result = deps.analysis.analyze(records, query.profile ?? deps.defaultProfileName);
      res.json(analysisDto(result, { includeRecords: query.includeRecords === 'true' }));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
