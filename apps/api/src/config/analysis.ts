/**
 * Analysis & server configuration, read from the environment
 * (`dotenv/config` is loaded by the entry point).
 */

import { z } from 'zod';
import type { HealthThresholds } from '@telemetry-analyzer/domain';

const percentage = z.coerce.number().min(0).max(100);

const analysisEnvSchema = z
  .object({
    HEALTH_WARNING_PCT: percentage.default(5),
    HEALTH_CRITICAL_PCT: percentage.default(20),
    SIM_ANOMALY_RATE: z.coerce.number().min(0).max(1).default(0.1),
    SIM_DEFAULT_COUNT: z.coerce.number().int().min(0).max(100_000).default(180),
    SIM_INTERVAL_MINUTES: z.coerce.number().positive().default(5),
    MAX_SESSIONS: z.coerce.number().int().positive().default(100),
    DEFAULT_PROFILE: z.string().min(1).default('Default'),
  })
  .refine((env) => env.HEALTH_WARNING_PCT <= env.HEALTH_CRITICAL_PCT, {
    message: 'HEALTH_WARNING_PCT must not exceed HEALTH_CRITICAL_PCT',
    path: ['HEALTH_WARNING_PCT'],
  });

const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(3001),
  CORS_ORIGIN: z.string().default('*'),
  LOG_FORMAT: z.string().default('combined'),
  CSV_BODY_LIMIT: z.string().default('5mb'),
  NODE_ENV: z.string().default('development'),
});

export interface AnalysisConfig {
  health: HealthThresholds;
  simulation: {
    anomalyRate: number;
    defaultCount: number;
    intervalMinutes: number;
  };
  maxSessions: number;
  defaultProfileName: string;
}

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  logFormat: string;
  csvBodyLimit: string;
  /** Access logs are off under NODE_ENV=test. */
  accessLog: boolean;
}

type Env = Record<string, string | undefined>;

export function getAnalysisConfig(env: Env = process.env): AnalysisConfig {
  const parsed = analysisEnvSchema.parse(env);
  return {
    health: {
      warningPct: parsed.HEALTH_WARNING_PCT,
      criticalPct: parsed.HEALTH_CRITICAL_PCT,
    },
    simulation: {
      anomalyRate: parsed.SIM_ANOMALY_RATE,
      defaultCount: parsed.SIM_DEFAULT_COUNT,
      intervalMinutes: parsed.SIM_INTERVAL_MINUTES,
    },
    maxSessions: parsed.MAX_SESSIONS,
    defaultProfileName: parsed.DEFAULT_PROFILE,
  };
}

export function getServerConfig(env: Env = process.env): ServerConfig {
  const parsed = serverEnvSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    logFormat: parsed.LOG_FORMAT,
    csvBodyLimit: parsed.CSV_BODY_LIMIT,
    accessLog: parsed.NODE_ENV !== 'test',
  };
}
