import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ParseError, TelemetryAnalyzerError, ValidationError } from '@telemetry-analyzer/domain';

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof TelemetryAnalyzerError) {
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...(err instanceof ParseError ? { line: err.line } : {}),
      ...(err instanceof ValidationError ? { details: err.issues } : {}),
    });
    return;
  }
  // body-parser errors (payload too large, malformed JSON) carry their own status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled error', err);
  res.status(500).json({ error: 'Internal server error' });
}
