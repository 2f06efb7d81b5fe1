/**
 * API Controller Tests
 *
 * Builds the Express app with in-memory collaborators and a fixed clock, then
 * drives it through supertest.
 */

import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import request from 'supertest';
import type { MissionProfileRepositoryPort } from '@telemetry-analyzer/domain';
import { buildApp, createAppDeps } from '../app.js';
import type { AnalysisConfig, ServerConfig } from '../config/analysis.js';

const NOW = new Date('2025-04-25T12:00:30.000Z');

const server: ServerConfig = {
  port: 0,
  corsOrigin: '*',
  logFormat: 'dev',
  csvBodyLimit: '1mb',
  accessLog: false,
};

const analysisConfig: AnalysisConfig = {
  health: { warningPct: 5, criticalPct: 20 },
  simulation: { anomalyRate: 0.1, defaultCount: 180, intervalMinutes: 5 },
  maxSessions: 10,
  defaultProfileName: 'Default',
};

const CSV = [
  'timestamp,temperature,pressure,velocity,battery,fuel',
  '25-04-2025 09:00,24,0.97,7071,60,97',
  '25-04-2025 09:05,-3,0.97,7172,57,96',
].join('\n');

const mockSave = jest.fn<MissionProfileRepositoryPort['save']>();
const mockLoadAll = jest.fn<MissionProfileRepositoryPort['loadAll']>();

function makeApp(withRepository = false) {
  return buildApp(
    createAppDeps({
      server,
      analysisConfig,
      repository: withRepository ? { save: mockSave, loadAll: mockLoadAll } : null,
      now: () => NOW,
      randomSeed: () => 7,
    }),
  );
}

beforeEach(() => {
  jest.clearAllMocks();
  mockSave.mockResolvedValue(undefined);
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
});

// ─── Health ───────────────────────────────────────────────────────────────────

describe('GET /healthz', () => {
  it('returns ok with the persistence mode', async () => {
    const res = await request(makeApp()).get('/healthz').expect(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.ts).toBeDefined();
    expect(res.body.persistence).toBe('memory');
  });
});

// ─── Profiles ─────────────────────────────────────────────────────────────────

describe('GET /api/profiles', () => {
  it('lists the built-ins in order with unbounded sides as null', async () => {
    const res = await request(makeApp()).get('/api/profiles').expect(200);
    expect(res.body.total).toBe(6);
    expect(res.body.data.map((p: { name: string }) => p.name)).toEqual([
      'Default',
      'LEO Satellite',
      'Deep Space Probe',
      'Mars Mission',
      'Venus Orbiter',
      'Lunar Lander',
    ]);
    expect(res.body.data[0].bounds.battery).toEqual({ lowerBound: 20, upperBound: null });
    expect(res.body.data[0].bounds.velocity).toEqual({ lowerBound: null, upperBound: null });
  });
});

describe('GET /api/profiles/:name', () => {
  it('returns a profile by name', async () => {
    const res = await request(makeApp()).get('/api/profiles/Mars%20Mission').expect(200);
    expect(res.body.name).toBe('Mars Mission');
    expect(res.body.builtIn).toBe(true);
    expect(res.body.bounds.temperature).toEqual({ lowerBound: -40, upperBound: 25 });
  });

  it('returns 404 for an unknown profile', async () => {
    const res = await request(makeApp()).get('/api/profiles/Jupiter').expect(404);
    expect(res.body).toEqual({ error: 'not_found', message: 'mission profile not found: Jupiter' });
  });
});

describe('PUT /api/profiles/:name', () => {
  const bounds = {
    temperature: { lowerBound: -10, upperBound: 30 },
    pressure: { lowerBound: 0.9, upperBound: 1.1 },
    velocity: { lowerBound: null, upperBound: null },
    battery: { lowerBound: 25, upperBound: null },
    fuel: { lowerBound: 30, upperBound: null },
  };

  it('creates then overwrites a user profile and persists it', async () => {
    const app = makeApp(true);
    const created = await request(app).put('/api/profiles/Cubesat').send({ bounds }).expect(201);
    expect(created.body.name).toBe('Cubesat');
    expect(created.body.builtIn).toBe(false);
    expect(created.body.bounds).toEqual(bounds);

    await request(app)
      .put('/api/profiles/Cubesat')
      .send({ bounds: { ...bounds, fuel: { lowerBound: 10, upperBound: null } } })
      .expect(200);

    expect(mockSave).toHaveBeenCalledTimes(2);
    const list = await request(app).get('/api/profiles').expect(200);
    expect(list.body.total).toBe(7);
    expect(list.body.data[6].bounds.fuel).toEqual({ lowerBound: 10, upperBound: null });
  });

  it('leaves the store unchanged when persisting fails', async () => {
    const app = makeApp(true);
    await request(app).put('/api/profiles/Cubesat').send({ bounds }).expect(201);

    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockSave.mockRejectedValue(new Error('connection refused'));

    await request(app).put('/api/profiles/Ghost').send({ bounds }).expect(500);
    await request(app).get('/api/profiles/Ghost').expect(404);

    await request(app)
      .put('/api/profiles/Cubesat')
      .send({ bounds: { ...bounds, fuel: { lowerBound: 10, upperBound: null } } })
      .expect(500);
    const kept = await request(app).get('/api/profiles/Cubesat').expect(200);
    expect(kept.body.bounds.fuel).toEqual({ lowerBound: 30, upperBound: null });
  });

  it('rejects edits to a built-in profile', async () => {
    const res = await request(makeApp()).put('/api/profiles/Default').send({ bounds }).expect(400);
    expect(res.body.error).toBe('validation_error');
    expect(res.body.message).toBe('built-in profile "Default" is read-only');
  });

  it('reports every invalid parameter', async () => {
    const res = await request(makeApp())
      .put('/api/profiles/Broken')
      .send({ bounds: { ...bounds, temperature: { lowerBound: 40, upperBound: 0 }, humidity: { lowerBound: 0, upperBound: 1 } } })
      .expect(400);
    expect(res.body.details).toEqual([
      'unknown parameter "humidity"',
      'temperature: lowerBound 40 exceeds upperBound 0',
    ]);
  });

  it('rejects a malformed body', async () => {
    const res = await request(makeApp()).put('/api/profiles/Broken').send({ bounds: 'wide' }).expect(400);
    expect(res.body.error).toBe('validation_error');
  });
});

describe('POST /api/profiles/:name/clone', () => {
  it('copies a profile with overrides', async () => {
    const res = await request(makeApp(true))
      .post('/api/profiles/Default/clone')
      .send({ name: 'Hot Default', overrides: { temperature: { upperBound: 60 }, battery: { lowerBound: null } } })
      .expect(201);
    expect(res.body.name).toBe('Hot Default');
    expect(res.body.bounds.temperature).toEqual({ lowerBound: 0, upperBound: 60 });
    expect(res.body.bounds.battery).toEqual({ lowerBound: null, upperBound: null });
    expect(res.body.bounds.fuel).toEqual({ lowerBound: 20, upperBound: null });
    expect(mockSave).toHaveBeenCalledTimes(1);
  });

  it('does not keep a clone whose save failed', async () => {
    const app = makeApp(true);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    mockSave.mockRejectedValue(new Error('connection refused'));

    await request(app).post('/api/profiles/Default/clone').send({ name: 'Hot Default' }).expect(500);
    await request(app).get('/api/profiles/Hot%20Default').expect(404);
  });

  it('rejects unknown override keys', async () => {
    const res = await request(makeApp())
      .post('/api/profiles/Default/clone')
      .send({ name: 'Humid', overrides: { humidity: { upperBound: 1 } } })
      .expect(400);
    expect(res.body.message).toBe('unknown parameter(s) in overrides: humidity');
  });

  it('returns 404 for an unknown source', async () => {
    await request(makeApp()).post('/api/profiles/Jupiter/clone').send({ name: 'Copy' }).expect(404);
  });
});

// ─── One-shot analysis ────────────────────────────────────────────────────────

describe('POST /api/analysis', () => {
  it('evaluates a CSV document against the default profile', async () => {
    const res = await request(makeApp())
      .post('/api/analysis')
      .set('Content-Type', 'text/csv')
      .send(CSV)
      .expect(200);

    expect(res.body.profile.name).toBe('Default');
    expect(res.body.summary.totalRecords).toBe(2);
    expect(res.body.summary.anomalousRecords).toBe(1);
    expect(res.body.summary.parameters.temperature.percentage).toBe(50);
    expect(res.body.summary.health).toBe('critical');
    expect(res.body.summary.timeRange).toEqual({
      start: '2025-04-25T09:00:00.000Z',
      end: '2025-04-25T09:05:00.000Z',
    });
    expect(res.body.alerts.map((a: { message: string }) => a.message)).toEqual([
      'Low Temperature detected: -3 °C',
    ]);
    expect(res.body.records).toHaveLength(2);
    expect(res.body.records[1].anomalies).toEqual(['temperature']);
  });

  it('omits records on request and honours the profile query', async () => {
    const res = await request(makeApp())
      .post('/api/analysis?profile=Venus%20Orbiter&includeRecords=false')
      .set('Content-Type', 'text/csv')
      .send(CSV)
      .expect(200);
    expect(res.body.profile.name).toBe('Venus Orbiter');
    expect(res.body.records).toBeUndefined();
    // 24 and -3 against [10, 60]
    expect(res.body.summary.parameters.temperature.percentage).toBe(50);
  });

  it('returns 422 with the line of a malformed row', async () => {
    const res = await request(makeApp())
      .post('/api/analysis')
      .set('Content-Type', 'text/csv')
      .send(`${CSV}\n25-04-2025 09:10,abc,1,7000,50,90`)
      .expect(422);
    expect(res.body).toEqual({
      error: 'parse_error',
      message: 'line 4: temperature is not a number: "abc"',
      line: 4,
    });
  });

  it('rejects a request without a CSV body', async () => {
    const res = await request(makeApp()).post('/api/analysis').send({ csv: CSV }).expect(400);
    expect(res.body.message).toBe('request body must be a CSV document sent as text/csv');
  });

  it('returns 404 for an unknown profile', async () => {
    await request(makeApp())
      .post('/api/analysis?profile=Jupiter')
      .set('Content-Type', 'text/csv')
      .send(CSV)
      .expect(404);
  });
});

// ─── Sessions ─────────────────────────────────────────────────────────────────

describe('sessions', () => {
  it('loads a CSV session, switches profile and pages records', async () => {
    const app = makeApp();
    const created = await request(app)
      .post('/api/sessions/csv?profile=Mars%20Mission')
      .set('Content-Type', 'text/csv')
      .send(CSV)
      .expect(201);

    const id: string = created.body.session.id;
    expect(created.body.session.source).toBe('csv');
    expect(created.body.session.recordCount).toBe(2);
    expect(created.body.session.activeProfileName).toBe('Mars Mission');
    // 24 and -3 against [-40, 25]
    expect(created.body.analysis.summary.parameters.temperature.percentage).toBe(0);

    const switched = await request(app).put(`/api/sessions/${id}/profile`).send({ profile: 'Default' }).expect(200);
    expect(switched.body.profile.name).toBe('Default');
    expect(switched.body.summary.parameters.temperature.percentage).toBe(50);

    const session = await request(app).get(`/api/sessions/${id}`).expect(200);
    expect(session.body.activeProfileName).toBe('Default');

    const page = await request(app).get(`/api/sessions/${id}/records?anomalousOnly=true`).expect(200);
    expect(page.body.total).toBe(1);
    expect(page.body.data[0].ts).toBe('2025-04-25T09:05:00.000Z');
    expect(page.body.data[0].findings).toEqual([
      { parameter: 'temperature', kind: 'below_lower', value: -3, bound: 0 },
    ]);

    const all = await request(app).get(`/api/sessions/${id}/records?limit=1&offset=1`).expect(200);
    expect(all.body.total).toBe(2);
    expect(all.body.data).toHaveLength(1);
    expect(all.body.data[0].temperature).toBe(-3);
  });

  it('generates a synthetic session ending at the current minute', async () => {
    const app = makeApp();
    const res = await request(app).post('/api/sessions/synthetic').send({ count: 10 }).expect(201);
    expect(res.body.seed).toBe(7);
    expect(res.body.session.source).toBe('synthetic');
    expect(res.body.session.recordCount).toBe(10);
    expect(res.body.analysis.summary.timeRange).toEqual({
      start: '2025-04-25T11:10:00.000Z',
      end: '2025-04-25T11:55:00.000Z',
    });
  });

  it('reproduces a synthetic dataset from its seed', async () => {
    const app = makeApp();
    const body = { count: 20, seed: 42, start: '2025-04-25T00:00:00.000Z' };
    const a = await request(app).post('/api/sessions/synthetic').send(body).expect(201);
    const b = await request(app).post('/api/sessions/synthetic').send(body).expect(201);
    const recordsA = await request(app).get(`/api/sessions/${a.body.session.id}/records`).expect(200);
    const recordsB = await request(app).get(`/api/sessions/${b.body.session.id}/records`).expect(200);
    expect(recordsA.body.data).toEqual(recordsB.body.data);
  });

  it('rejects an out-of-range anomaly rate', async () => {
    const res = await request(makeApp()).post('/api/sessions/synthetic').send({ anomalyRate: 2 }).expect(400);
    expect(res.body.error).toBe('validation_error');
  });

  it('deletes a session', async () => {
    const app = makeApp();
    const created = await request(app).post('/api/sessions/synthetic').send({ count: 5 }).expect(201);
    const id: string = created.body.session.id;
    await request(app).delete(`/api/sessions/${id}`).expect(204);
    await request(app).get(`/api/sessions/${id}`).expect(404);
    await request(app).delete(`/api/sessions/${id}`).expect(404);
  });

  it('returns 404 for an unknown session', async () => {
    const res = await request(makeApp()).get('/api/sessions/no-such-session/analysis').expect(404);
    expect(res.body.message).toBe('session not found: no-such-session');
  });
});
