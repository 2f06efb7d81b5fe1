import express from 'express';
import type { Request, RequestHandler } from 'express';
import { ValidationError } from '@telemetry-analyzer/domain';

export const CSV_CONTENT_TYPES = ['text/csv', 'text/plain', 'application/csv'];

export function csvBody(limit: string): RequestHandler {
  return express.text({ type: CSV_CONTENT_TYPES, limit });
}

/** The raw CSV document of a request that went through `csvBody`. */
export function requireCsvText(req: Request): string {
  const body: unknown = req.body;
  if (typeof body !== 'string' || body.trim() === '') {
    throw new ValidationError('request body must be a CSV document sent as text/csv');
  }
  return body;
}
