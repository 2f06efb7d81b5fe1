import 'dotenv/config';
import { createServer } from 'http';
import {
  PgMissionProfileRepository,
  closePool,
  isDatabaseConfigured,
} from '@telemetry-analyzer/adapters';
import type { MissionProfileRepositoryPort } from '@telemetry-analyzer/domain';
import { buildApp, createAppDeps } from './app.js';
import { MissionProfileStore } from './services/profiles/mission-profile-store.js';

/**
 * Loads stored user profiles. Non-fatal: without a reachable database the
 * service keeps running with built-in and in-memory profiles only.
 */
async function initProfileRepository(
  profiles: MissionProfileStore,
): Promise<MissionProfileRepositoryPort | null> {
  if (!isDatabaseConfigured()) {
    console.log('[server] DATABASE_URL not set, user profiles are kept in memory');
    return null;
  }
  const repository = new PgMissionProfileRepository();
  try {
    await repository.ensureSchema();
    const loaded = profiles.hydrate(await repository.loadAll());
    console.log(`[server] database connected, ${loaded} stored profile(s) loaded`);
    return repository;
  } catch (err) {
    console.warn(
      '[server] ⚠ profile database unavailable, user profiles are kept in memory.',
      err instanceof Error ? err.message : err,
    );
    await closePool();
    return null;
  }
}

async function main() {
  const profiles = new MissionProfileStore();
  const repository = await initProfileRepository(profiles);
  const deps = createAppDeps({ profiles, repository });

  const app = buildApp(deps);
  const httpServer = createServer(app);

  httpServer.listen(deps.server.port, () => {
    console.log(`[server] listening on http://0.0.0.0:${deps.server.port}`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    httpServer.close();
    await closePool();
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown());
  process.on('SIGINT', () => void shutdown());
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
