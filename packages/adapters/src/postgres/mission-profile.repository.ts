import { z } from 'zod';
import { TELEMETRY_PARAMETERS, fromWireBounds, toWireBounds } from '@telemetry-analyzer/domain';
import type {
  MissionProfile,
  MissionProfileRepositoryPort,
  ProfileBounds,
  TelemetryParameter,
  WireParameterBounds,
} from '@telemetry-analyzer/domain';
import { getPool } from './pool.js';

const wireBoundsSchema = z.object({
  lowerBound: z.number().nullable(),
  upperBound: z.number().nullable(),
});

const profileRowSchema = z.object({
  name: z.string(),
  bounds: z.object({
    temperature: wireBoundsSchema,
    pressure: wireBoundsSchema,
    velocity: wireBoundsSchema,
    battery: wireBoundsSchema,
    fuel: wireBoundsSchema,
  }),
  created_at: z.coerce.date(),
});

const SCHEMA_SQL = `
  CREATE SCHEMA IF NOT EXISTS telemetry;
  CREATE TABLE IF NOT EXISTS telemetry.mission_profiles (
    name        TEXT PRIMARY KEY,
    bounds      JSONB NOT NULL,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
  );
`;

export class PgMissionProfileRepository implements MissionProfileRepositoryPort {
  /** Creates the profile table if needed. Idempotent. */
  async ensureSchema(): Promise<void> {
    await getPool().query(SCHEMA_SQL);
  }

  async loadAll(): Promise<MissionProfile[]> {
    const { rows } = await getPool().query(
      `SELECT name, bounds, created_at
       FROM telemetry.mission_profiles
       ORDER BY created_at ASC, name ASC`,
    );
    return rows.map(mapProfileRow);
  }

  async save(profile: MissionProfile): Promise<void> {
    const wire: Partial<Record<TelemetryParameter, WireParameterBounds>> = {};
    for (const p of TELEMETRY_PARAMETERS) wire[p] = toWireBounds(profile.bounds[p]);

    await getPool().query(
      `INSERT INTO telemetry.mission_profiles (name, bounds, created_at)
       VALUES ($1, $2, $3)
       ON CONFLICT (name)
       DO UPDATE SET bounds = EXCLUDED.bounds, updated_at = NOW()`,
      [profile.name, JSON.stringify(wire), profile.createdAt],
    );
  }
}

function mapProfileRow(row: unknown): MissionProfile {
  const parsed = profileRowSchema.parse(row);
  const bounds: ProfileBounds = {
    temperature: fromWireBounds(parsed.bounds.temperature),
    pressure: fromWireBounds(parsed.bounds.pressure),
    velocity: fromWireBounds(parsed.bounds.velocity),
    battery: fromWireBounds(parsed.bounds.battery),
    fuel: fromWireBounds(parsed.bounds.fuel),
  };
  return {
    name: parsed.name,
    builtIn: false,
    bounds,
    createdAt: parsed.created_at,
  };
}
