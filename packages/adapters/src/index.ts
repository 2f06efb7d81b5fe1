// ─── PostgreSQL Adapters ───────────────────────────────────────────────────────
export { getPool, closePool, isDatabaseConfigured } from './postgres/pool.js';
export { PgMissionProfileRepository } from './postgres/mission-profile.repository.js';

// ─── CSV Adapter ──────────────────────────────────────────────────────────────
export { TelemetryCsvParser, parseTimestamp, formatTimestamp } from './csv/telemetry-csv.parser.js';

// ─── Clock / Noise ────────────────────────────────────────────────────────────
export { DeterministicClock, wallClockNow } from './clock/deterministic-clock.js';
export { NoiseSource, MAX_SEED, isValidSeed } from './random/noise-source.js';
