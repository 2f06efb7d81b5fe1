import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import {
  TELEMETRY_PARAMETERS,
  ValidationError,
  fromWireBounds,
  isTelemetryParameter,
} from '@telemetry-analyzer/domain';
import type {
  BoundsOverrides,
  MissionProfileRepositoryPort,
  ParameterBounds,
} from '@telemetry-analyzer/domain';
import type { MissionProfileStore } from '../services/profiles/mission-profile-store.js';
import { profileDto } from './serializers.js';

export interface ProfilesRouterDeps {
  profiles: MissionProfileStore;
  /** Absent when running without a database. */
  repository: MissionProfileRepositoryPort | null;
}

const wireBoundsSchema = z.object({
  lowerBound: z.number().nullable(),
  upperBound: z.number().nullable(),
});

const saveBodySchema = z.object({
  bounds: z.record(wireBoundsSchema),
});

const cloneBodySchema = z.object({
  name: z.string().min(1).max(80),
  overrides: z
    .record(
      z.object({
        lowerBound: z.number().nullable().optional(),
        upperBound: z.number().nullable().optional(),
      }),
    )
    .optional(),
});

type CloneOverrides = NonNullable<z.infer<typeof cloneBodySchema>['overrides']>;

function toOverrides(raw: CloneOverrides): BoundsOverrides {
  const unknown = Object.keys(raw).filter((key) => !isTelemetryParameter(key));
  if (unknown.length > 0) {
    throw new ValidationError(`unknown parameter(s) in overrides: ${unknown.join(', ')}`);
  }
  const overrides: BoundsOverrides = {};
  for (const p of TELEMETRY_PARAMETERS) {
    const entry = raw[p];
    if (!entry) continue;
    // undefined keeps the source side; null lifts it
    overrides[p] = {
      ...(entry.lowerBound !== undefined ? { lowerBound: entry.lowerBound ?? -Infinity } : {}),
      ...(entry.upperBound !== undefined ? { upperBound: entry.upperBound ?? Infinity } : {}),
    };
  }
  return overrides;
}

export function createProfilesRouter(deps: ProfilesRouterDeps): Router {
  const router = Router();
  const { profiles, repository } = deps;

  /** GET /api/profiles: built-ins first, then user profiles in creation order */
  router.get('/', (_req: Request, res: Response) => {
    const data = profiles.listProfiles().map((name) => profileDto(profiles.getProfile(name)));
    res.json({ data, total: data.length });
  });

  /** GET /api/profiles/:name */
  router.get('/:name', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(profileDto(profiles.getProfile(req.params['name'] ?? '')));
    } catch (err) {
      next(err);
    }
  });

  /** PUT /api/profiles/:name: create or overwrite a user profile */
  router.put('/:name', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const name = req.params['name'] ?? '';
      const body = saveBodySchema.parse(req.body);
      const existed = profiles.hasProfile(name.trim());

      const bounds: Record<string, ParameterBounds> = {};
      for (const [key, wire] of Object.entries(body.bounds)) bounds[key] = fromWireBounds(wire);

      // Persist first: a failed write must not leave the edit live in memory
      const profile = profiles.prepareProfile(name, bounds);
      await repository?.save(profile);
      profiles.commit(profile);
      res.status(existed ? 200 : 201).json(profileDto(profile));
    } catch (err) {
      next(err);
    }
  });

  /** POST /api/profiles/:name/clone: copy-on-edit into a new user profile */
  router.post('/:name/clone', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = cloneBodySchema.parse(req.body);
      const profile = profiles.prepareClone(
        req.params['name'] ?? '',
        body.name,
        toOverrides(body.overrides ?? {}),
      );
      await repository?.save(profile);
      profiles.commit(profile);
      res.status(201).json(profileDto(profile));
    } catch (err) {
      next(err);
    }
  });

  return router;
}
