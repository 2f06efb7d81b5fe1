// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/telemetry-parameter.js';
export * from './entities/telemetry-record.js';
export * from './entities/mission-profile.js';
export * from './entities/anomaly.js';
export * from './entities/analysis-summary.js';
export * from './entities/alert.js';
export * from './entities/analysis-session.js';

// ─── Errors ───────────────────────────────────────────────────────────────────
export * from './errors.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/telemetry-import.port.js';
export * from './ports/inbound/telemetry-analysis.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/mission-profile-repository.port.js';
export * from './ports/outbound/session-repository.port.js';
