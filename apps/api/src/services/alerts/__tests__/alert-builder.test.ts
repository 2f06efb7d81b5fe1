import { describe, it, expect } from '@jest/globals';
import type { TelemetryRecord } from '@telemetry-analyzer/domain';
import { evaluateAll } from '../../anomaly/anomaly-evaluator.js';
import { defaultProfile } from '../../profiles/builtin-profiles.js';
import { buildAlerts, buildGauges, formatValue, gaugeStatus } from '../alert-builder.js';

const T0 = new Date(Date.UTC(2025, 3, 25, 9, 0));

function makeRecord(minute: number, overrides: Partial<TelemetryRecord> = {}): TelemetryRecord {
  return {
    ts: new Date(T0.getTime() + minute * 60_000),
    temperature: 20,
    pressure: 1,
    velocity: 7000,
    battery: 80,
    fuel: 90,
    ...overrides,
  };
}

describe('buildAlerts()', () => {
  it('returns nothing for a clean dataset', () => {
    expect(buildAlerts(evaluateAll([makeRecord(0), makeRecord(5)], defaultProfile()))).toEqual([]);
  });

  it('groups violations per parameter and side with the most extreme value', () => {
    const evaluated = evaluateAll(
      [
        makeRecord(0, { temperature: -3 }),
        makeRecord(5, { temperature: -7, fuel: null }),
        makeRecord(10, { temperature: 45.678 }),
        makeRecord(15, { battery: 12.5 }),
      ],
      defaultProfile(),
    );

    expect(buildAlerts(evaluated)).toEqual([
      {
        parameter: 'temperature',
        kind: 'below_lower',
        recordCount: 2,
        extremeValue: -7,
        message: 'Low Temperature detected: -7 °C',
      },
      {
        parameter: 'temperature',
        kind: 'above_upper',
        recordCount: 1,
        extremeValue: 45.678,
        message: 'High Temperature detected: 45.68 °C',
      },
      {
        parameter: 'battery',
        kind: 'below_lower',
        recordCount: 1,
        extremeValue: 12.5,
        message: 'Low Battery Level detected: 12.5 %',
      },
      {
        parameter: 'fuel',
        kind: 'missing',
        recordCount: 1,
        extremeValue: null,
        message: 'Fuel Level missing in 1 record',
      },
    ]);
  });

  it('pluralises the missing-value message', () => {
    const evaluated = evaluateAll(
      [makeRecord(0, { pressure: null }), makeRecord(5, { pressure: null })],
      defaultProfile(),
    );
    expect(buildAlerts(evaluated).map((a) => a.message)).toEqual(['Pressure missing in 2 records']);
  });
});

describe('gaugeStatus()', () => {
  const bounds = { lowerBound: 0, upperBound: 40 };

  it('grades against the bounds with a margin near each limit', () => {
    expect(gaugeStatus(20, bounds)).toBe('nominal');
    expect(gaugeStatus(37, bounds)).toBe('warning');
    expect(gaugeStatus(40, bounds)).toBe('warning');
    expect(gaugeStatus(41, bounds)).toBe('critical');
    expect(gaugeStatus(-1, bounds)).toBe('critical');
    expect(gaugeStatus(null, bounds)).toBe('unknown');
  });

  it('never warns on an unbounded side', () => {
    const open = { lowerBound: 20, upperBound: Infinity };
    expect(gaugeStatus(1e9, open)).toBe('nominal');
    expect(gaugeStatus(21, open)).toBe('warning');
  });
});

describe('buildGauges()', () => {
  it('uses the latest present value of each parameter', () => {
    const records = [
      makeRecord(0, { temperature: 10, fuel: 50 }),
      makeRecord(5, { temperature: 38, fuel: null }),
    ];
    const gauges = buildGauges(records, defaultProfile());

    expect(gauges.map((g) => g.parameter)).toEqual(['temperature', 'pressure', 'velocity', 'battery', 'fuel']);
    expect(gauges[0]).toEqual({ parameter: 'temperature', latestValue: 38, latestTs: records[1]?.ts, status: 'warning' });
    expect(gauges[4]).toEqual({ parameter: 'fuel', latestValue: 50, latestTs: records[0]?.ts, status: 'nominal' });
  });

  it('reports unknown when there is no data', () => {
    expect(buildGauges([], defaultProfile()).every((g) => g.status === 'unknown' && g.latestValue === null)).toBe(true);
  });
});

describe('formatValue()', () => {
  it('rounds to two decimals', () => {
    expect(formatValue(7071.456)).toBe('7071.46');
    expect(formatValue(3)).toBe('3');
  });
});
